import type {
  AccessPolicy,
  AgentGroup,
  App,
  AppBot,
  Meter,
  Model,
  OAuthClientRecord,
  OrgPermission,
  Organization,
  Tool,
  User,
  UserPermission,
  Wallet,
} from '@helio/models';
import type { ApiClient } from '../client/api-client.js';
import {
  AccessPolicySchema,
  AgentGroupSchema,
  AppBotSchema,
  AppSchema,
  MeterSchema,
  ModelSchema,
  OAuthClientRecordSchema,
  OrgPermissionSchema,
  OrganizationSchema,
  ToolSchema,
  UserPermissionSchema,
  UserSchema,
  WalletSchema,
} from '../schemas.js';
import { Collection } from './collection.js';
import { CompletionCollection } from './completion-collection.js';

export { Collection, type CallOptions } from './collection.js';
export { CompletionCollection } from './completion-collection.js';
export { AgentsCollection } from './agents-collection.js';

/** Resource path of every plain collection */
export const RESOURCE_PATHS = {
  users: 'user',
  organizations: 'org',
  agentGroups: 'group',
  tools: 'tool',
  apps: 'app',
  models: 'model',
  clients: 'client',
  wallets: 'wallet',
  meters: 'meter',
  accessPolicies: 'iam/policy',
  orgPermissions: 'iam/org-permission',
  userPermissions: 'iam/user-permission',
} as const;

export const createUsers = (client: ApiClient): Collection<User> =>
  new Collection(client, RESOURCE_PATHS.users, UserSchema);

export const createOrganizations = (client: ApiClient): Collection<Organization> =>
  new Collection(client, RESOURCE_PATHS.organizations, OrganizationSchema);

export const createAgentGroups = (
  client: ApiClient,
): CompletionCollection<AgentGroup> =>
  new CompletionCollection(client, RESOURCE_PATHS.agentGroups, AgentGroupSchema);

export const createTools = (client: ApiClient): Collection<Tool> =>
  new Collection(client, RESOURCE_PATHS.tools, ToolSchema);

export const createApps = (client: ApiClient): Collection<App> =>
  new Collection(client, RESOURCE_PATHS.apps, AppSchema);

/**
 * Bots of one app, under `app/{appId}/bot`
 * @throws {TypeError} For an empty app id
 */
export const createAppBots = (client: ApiClient, appId: string): Collection<AppBot> => {
  if (!appId) {
    throw new TypeError(`${RESOURCE_PATHS.apps}: appId is required`);
  }
  return new Collection(
    client,
    `${RESOURCE_PATHS.apps}/${encodeURIComponent(appId)}/bot`,
    AppBotSchema,
  );
};

export const createModels = (client: ApiClient): CompletionCollection<Model> =>
  new CompletionCollection(client, RESOURCE_PATHS.models, ModelSchema);

export const createClients = (client: ApiClient): Collection<OAuthClientRecord> =>
  new Collection(client, RESOURCE_PATHS.clients, OAuthClientRecordSchema);

export const createWallets = (client: ApiClient): Collection<Wallet> =>
  new Collection(client, RESOURCE_PATHS.wallets, WalletSchema);

export const createMeters = (client: ApiClient): Collection<Meter> =>
  new Collection(client, RESOURCE_PATHS.meters, MeterSchema);

export const createAccessPolicies = (client: ApiClient): Collection<AccessPolicy> =>
  new Collection(client, RESOURCE_PATHS.accessPolicies, AccessPolicySchema);

export const createOrgPermissions = (client: ApiClient): Collection<OrgPermission> =>
  new Collection(client, RESOURCE_PATHS.orgPermissions, OrgPermissionSchema);

export const createUserPermissions = (client: ApiClient): Collection<UserPermission> =>
  new Collection(client, RESOURCE_PATHS.userPermissions, UserPermissionSchema);
