export interface AccountRecord {
  name: string;
  stage?: string | null;
  extra_fields?: Record<string, unknown>;
  proxy_host?: string;
  proxy_port?: number | null;
  proxy_scheme?: string;
  proxy_user?: string;
  proxy_password?: string;
  [field: string]: unknown;
}

export type SharedVariableType = 'string' | 'list';

export interface SharedVariableDefinition {
  type: SharedVariableType;
  value: string | string[];
}

export type SharedVariableDefinitions = Record<string, SharedVariableDefinition>;
