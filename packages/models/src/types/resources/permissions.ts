import type { RecordBase } from '../api/index.js';

export interface AccessPolicy extends RecordBase {
  name: string;
  effect?: 'allow' | 'deny';
  actions?: string[];
  resources?: string[];
}

export interface OrgPermission extends RecordBase {
  policy?: string;
}

export interface UserPermission extends RecordBase {
  client?: string;
  policy?: string;
}
