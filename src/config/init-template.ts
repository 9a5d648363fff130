/**
 * Commented configuration file written by `aws-lab init`. Every value shown is
 * the built-in default; bundled asset paths are left commented out.
 */
export function renderInitConfig(now: Date = new Date()): string {
  return `# AWS lab provisioner configuration
# Generated on ${now.toISOString()}
# Values support \${VAR} and \${VAR:-default} environment substitution.

project:
  name: automation-lab
  tag_key: Project
  tag_value: AutomationLab

aws:
  region: eu-west-1
  # profile: default  # Uncomment to use a specific AWS profile

network:
  vpc_cidr: 10.0.0.0/16
  public_subnet_cidr: 10.0.1.0/24
  private_subnet_cidr: 10.0.2.0/24
  vpc_name: AutomationVPC
  public_subnet_name: AutomationPublicSubnet
  private_subnet_name: AutomationPrivateSubnet

security_group:
  name: AutomationSecurityGroup
  description: Security group for Automation Lab EC2 instance
  ingress:
    - { port: 22, cidr: 0.0.0.0/0, description: SSH }
    - { port: 80, cidr: 0.0.0.0/0, description: HTTP }
    - { port: 443, cidr: 0.0.0.0/0, description: HTTPS }

instance:
  type: t3.micro
  name: AutomationWebServer
  key_name: AutoKeyPair
  ami_name_filter: amzn2-ami-hvm-*-x86_64-gp2
  # user_data_template: ./user-data.sh.tmpl  # {{WEB_PAGE}} and {{INSTANCE_NAME}} are substituted
  # web_page: ./index.html
  accepted_states: [running, stopped]
  wait_timeout_seconds: 300

bucket:
  name_prefix: automation-lab-bucket
  # welcome_file: ./welcome.txt  # Set to "" to skip the upload
  versioning: true
  public_access: true

paths:
  state_file: .env
  log_file: setup.log
  key_dir: .
`;
}
