import type { RecordBase } from '../api/index.js';

export interface User extends RecordBase {
  email: string;
  first_name?: string;
  last_name?: string;
}

export interface Organization extends RecordBase {
  name: string;
  short_description?: string;
  long_description?: string;
  image?: string;
}

/**
 * OAuth client registered on the platform
 */
export interface OAuthClientRecord extends RecordBase {
  name: string;
  client_id?: string;
  redirect_uris?: string[];
  scopes?: string[];
}
