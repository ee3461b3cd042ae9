import type { RecordBase } from '../api/index.js';

export interface Wallet extends RecordBase {
  balance?: number;
  currency?: string;
}

export interface Meter extends RecordBase {
  type?: string;
  value?: number;
  metadata?: Record<string, unknown>;
}
