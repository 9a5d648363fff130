// Core type definitions for the AWS lab provisioner

export const RESOURCE_KINDS = [
  'KeyPair',
  'Network',
  'Gateway',
  'PublicSubnet',
  'PrivateSubnet',
  'RouteTable',
  'SecurityGroup',
  'Instance',
  'Bucket'
] as const;

export type ResourceKind = typeof RESOURCE_KINDS[number];

export const STATE_KEYS = [
  'KEY_NAME',
  'VPC_ID',
  'IGW_ID',
  'PUBLIC_SUBNET_ID',
  'PUBLIC_SUBNET_AZ',
  'PRIVATE_SUBNET_ID',
  'PRIVATE_SUBNET_AZ',
  'PUBLIC_RT_ID',
  'PUBLIC_RT_ASSOC_ID',
  'SECURITY_GROUP_ID',
  'AMI_ID',
  'INSTANCE_ID',
  'PUBLIC_IP',
  'PRIVATE_IP',
  'INSTANCE_AZ',
  'S3_BUCKET_NAME',
  'WELCOME_FILE_URL'
] as const;

export type StateKey = typeof STATE_KEYS[number];

export interface StateEntry {
  key: StateKey;
  value: string;
}

export interface ProjectConfig {
  name: string;
  tag_key: string;
  tag_value: string;
}

export interface AWSConfig {
  region: string;
  profile?: string;
}

export interface NetworkConfig {
  vpc_cidr: string;
  public_subnet_cidr: string;
  private_subnet_cidr: string;
  vpc_name: string;
  public_subnet_name: string;
  private_subnet_name: string;
}

export interface IngressRuleConfig {
  port: number;
  cidr: string;
  description?: string;
}

export interface SecurityGroupConfig {
  name: string;
  description: string;
  ingress: IngressRuleConfig[];
}

export interface InstanceConfig {
  type: string;
  name: string;
  key_name: string;
  ami_name_filter: string;
  user_data_template: string;
  web_page: string;
  accepted_states: string[];
  wait_timeout_seconds: number;
}

export interface BucketConfig {
  name_prefix: string;
  welcome_file?: string;
  versioning: boolean;
  public_access: boolean;
}

export interface PathsConfig {
  state_file: string;
  log_file: string;
  key_dir: string;
}

export interface InfraConfig {
  project: ProjectConfig;
  aws: AWSConfig;
  network: NetworkConfig;
  security_group: SecurityGroupConfig;
  instance: InstanceConfig;
  bucket: BucketConfig;
  paths: PathsConfig;
}

export type StepOutcome =
  | 'created'
  | 'reused'
  | 'planned'
  | 'skipped'
  | 'deleted'
  | 'already-absent'
  | 'failed';

export interface DeploymentError {
  code: string;
  message: string;
  details?: unknown;
  remediation?: string;
}

export interface StepResult {
  kind: ResourceKind;
  step: string;
  title: string;
  outcome: StepOutcome;
  identifier?: string;
  error?: DeploymentError;
  duration: number;
}

export interface RunMetadata {
  runId: string;
  timestamp: Date;
  duration?: number;
  region: string;
  dryRun: boolean;
}

export interface DeploymentResult {
  success: boolean;
  steps: StepResult[];
  errors?: DeploymentError[];
  metadata: RunMetadata;
}

export interface TeardownResult {
  success: boolean;
  steps: StepResult[];
  errors?: DeploymentError[];
  backupFile?: string;
  metadata: RunMetadata;
}

export type ResourcePresence = 'present' | 'absent' | 'not-recorded' | 'unknown';

export interface ResourceStatus {
  kind: ResourceKind;
  title: string;
  key: StateKey;
  presence: ResourcePresence;
  identifier?: string;
  status?: string;
  publicIp?: string;
  objectCount?: number;
  error?: string;
}

export interface StatusReport {
  resources: ResourceStatus[];
  stateFile: string;
  metadata: RunMetadata;
}
