import type { RecordBase } from '../api/index.js';

export interface App extends RecordBase {
  name: string;
  short_description: string;
  long_description?: string;
  image?: string;
  external_app_url?: string;
  external_headers?: Record<string, string>;
  keywords?: string[];
}

/**
 * Bot that answers an app's inbound messages with an agent or agent group
 */
export interface AppBot extends RecordBase {
  app?: string;
  response_url?: string;
  agent?: string;
  agent_group?: string;
  api_key?: string;
  api_key_partial?: string;
}

export interface Tool extends RecordBase {
  name?: string;
  friendly_name?: string;
  short_description: string;
  tool_schema: string;
  required_environment_variables?: string[];
  source_url?: string;
  url?: string;
  public?: boolean;
  keywords?: string[];
}
