export type { User, Organization, OAuthClientRecord } from './identity.js';
export type {
  Agent,
  AgentGroup,
  Model,
  ChatMessage,
  ChatCompletionRequest,
  ChatCompletionResponse,
  AsyncChatCompletion,
} from './agents.js';
export type { App, AppBot, Tool } from './apps.js';
export type { Wallet, Meter } from './billing.js';
export type { AccessPolicy, OrgPermission, UserPermission } from './permissions.js';
