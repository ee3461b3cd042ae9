import type { RecordBase } from '../api/index.js';

export interface Agent extends RecordBase {
  name: string;
  short_description?: string;
  long_description?: string;
  model?: string;
  system_prompt?: string;
  public?: boolean;
}

export interface AgentGroup extends RecordBase {
  name: string;
  short_description?: string;
  long_description?: string;
  agents?: string[];
  public?: boolean;
}

export interface Model extends RecordBase {
  name: string;
  short_description?: string;
  provider?: string;
  model_id?: string;
  max_tokens?: number;
  public?: boolean;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionRequest {
  messages: ChatMessage[];
  model?: string;
  max_tokens?: number;
  temperature?: number;
}

export interface ChatCompletionResponse {
  id: string;
  model?: string;
  choices: Array<{
    index: number;
    message: ChatMessage;
    finish_reason?: string;
  }>;
}

/**
 * Queued completion; the result is delivered out of band
 */
export interface AsyncChatCompletion {
  id: string;
  status?: string;
}
