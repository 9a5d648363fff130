// Template-specific types
export type TemplateVariables = Record<string, string>;

export interface UserDataOptions {
  templatePath: string;
  webPagePath: string;
  instanceName: string;
}

export interface RenderedUserData {
  script: string;
  /** Script encoded for the RunInstances UserData field */
  base64: string;
}
