import { existsSync, readFileSync } from 'fs';
import { ConfigurationError } from '../errors/index.js';
import { RenderedUserData, TemplateVariables, UserDataOptions } from './types.js';

const PLACEHOLDER = /\{\{([A-Z0-9_]+)\}\}/g;

/**
 * Substitutes {{NAME}} placeholders; names with no variable are left as written
 */
export class TemplateEngine {
  render(template: string, variables: TemplateVariables): string {
    return template.replace(PLACEHOLDER, (match, name: string) =>
      Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] : match
    );
  }

  renderFile(templatePath: string, variables: TemplateVariables): string {
    return this.render(this.readRequired(templatePath, 'Template'), variables);
  }

  /**
   * Instance bootstrap script: the web page is inlined at {{WEB_PAGE}} and the
   * instance name at {{INSTANCE_NAME}}.
   */
  renderUserData(options: UserDataOptions): RenderedUserData {
    const webPage = this.readRequired(options.webPagePath, 'Web page');
    const script = this.renderFile(options.templatePath, {
      WEB_PAGE: webPage.replace(/\n$/, ''),
      INSTANCE_NAME: options.instanceName
    });

    return {
      script,
      base64: Buffer.from(script, 'utf-8').toString('base64')
    };
  }

  private readRequired(path: string, label: string): string {
    if (!existsSync(path)) {
      throw new ConfigurationError(`${label} file not found: ${path}`, {
        remediation: 'Check the instance paths in the configuration file'
      });
    }
    return readFileSync(path, 'utf-8');
  }
}

export function createTemplateEngine(): TemplateEngine {
  return new TemplateEngine();
}
