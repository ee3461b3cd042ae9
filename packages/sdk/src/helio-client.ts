import { z } from 'zod';
import { logEvent, RequestUtils, type ICredentialStore } from '@helio/core';
import {
  AuthClient,
  AuthenticationError,
  MemoryCredentialStore,
  OAuthClient,
  TokenExchanger,
  TokenUtils,
} from '@helio/auth';
import type {
  AccessPolicy,
  AgentGroup,
  ApiEnvelope,
  App,
  AppBot,
  ClientConfig,
  ClientConfigInput,
  Credential,
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
import { ApiClient } from './client/api-client.js';
import { resolveClientConfig } from './config/config.js';
import {
  AgentsCollection,
  type CallOptions,
  type Collection,
  type CompletionCollection,
  createAccessPolicies,
  createAgentGroups,
  createAppBots,
  createApps,
  createClients,
  createMeters,
  createModels,
  createOrgPermissions,
  createOrganizations,
  createTools,
  createUserPermissions,
  createUsers,
  createWallets,
} from './collections/index.js';
import { envelopeOf } from './schemas.js';

/**
 * @public
 */
export interface OAuthFlowOptions {
  redirectUri: string;
  scopes: string[];
  state?: string;
}

const IdentitySchema = envelopeOf(z.record(z.unknown()));

/**
 * Entry point to the platform API.
 *
 * One instance owns one configuration and one credential slot. Sign-in
 * through `auth` or an `oauth()` flow installs the credential every
 * collection call uses.
 *
 * @example
 * ```typescript
 * const helio = new HelioClient({ clientId: 'client-1' });
 * await helio.auth.signInWithPassword('user@example.com', 'hunter2');
 * const { data: agents } = await helio.agents.list({ limit: 10 });
 * ```
 * @public
 */
export class HelioClient {
  public readonly config: ClientConfig;
  /** Correlates this client's log lines */
  public readonly instanceId: string;
  public readonly auth: AuthClient;
  public readonly api: ApiClient;

  public readonly users: Collection<User>;
  public readonly organizations: Collection<Organization>;
  public readonly agents: AgentsCollection;
  public readonly agentGroups: CompletionCollection<AgentGroup>;
  public readonly tools: Collection<Tool>;
  public readonly apps: Collection<App>;
  public readonly models: CompletionCollection<Model>;
  public readonly clients: Collection<OAuthClientRecord>;
  public readonly wallets: Collection<Wallet>;
  public readonly meters: Collection<Meter>;
  public readonly accessPolicies: Collection<AccessPolicy>;
  public readonly orgPermissions: Collection<OrgPermission>;
  public readonly userPermissions: Collection<UserPermission>;

  private readonly store: ICredentialStore;
  private readonly exchanger: TokenExchanger;

  /**
   * @param input - Explicit settings; unset fields come from `HELIO_*` variables, then defaults
   * @param env - Environment to read, `process.env` by default
   * @throws {AuthenticationError} kind `configuration` for invalid settings
   */
  public constructor(
    input: ClientConfigInput = {},
    env: Record<string, string | undefined> = process.env,
  ) {
    this.config = resolveClientConfig(input, env);
    this.instanceId = RequestUtils.generateInstanceId();

    this.store = new MemoryCredentialStore({
      expirySkewMs: this.config.expirySkewMs,
    });
    this.exchanger = new TokenExchanger({
      apiUrl: this.config.apiUrl,
      apiVersion: this.config.apiVersion,
      clientId: this.config.clientId,
      requestTimeoutMs: this.config.requestTimeoutMs,
    });
    this.auth = new AuthClient(
      {
        apiUrl: this.config.apiUrl,
        apiVersion: this.config.apiVersion,
        clientId: this.config.clientId,
        clientSecret: this.config.clientSecret,
        requestTimeoutMs: this.config.requestTimeoutMs,
        expirySkewMs: this.config.expirySkewMs,
      },
      this.store,
      this.exchanger,
    );
    this.api = new ApiClient(
      { ...this.config, instanceId: this.instanceId },
      this.auth,
    );

    if (this.config.apiKey) {
      this.auth.useApiKey(this.config.apiKey);
    }

    this.users = createUsers(this.api);
    this.organizations = createOrganizations(this.api);
    this.agents = new AgentsCollection(this.api);
    this.agentGroups = createAgentGroups(this.api);
    this.tools = createTools(this.api);
    this.apps = createApps(this.api);
    this.models = createModels(this.api);
    this.clients = createClients(this.api);
    this.wallets = createWallets(this.api);
    this.meters = createMeters(this.api);
    this.accessPolicies = createAccessPolicies(this.api);
    this.orgPermissions = createOrgPermissions(this.api);
    this.userPermissions = createUserPermissions(this.api);

    logEvent('debug', 'sdk:client_created', {
      instanceId: this.instanceId,
      apiUrl: this.config.apiUrl,
      apiVersion: this.config.apiVersion,
      hasApiKey: this.config.apiKey !== undefined,
      hasClientId: this.config.clientId !== undefined,
    });
  }

  /**
   * The active credential, or null when signed out
   */
  public get credential(): Credential | null {
    return this.store.current();
  }

  /**
   * Secret of the active credential: the API key or the access token
   */
  public get apiKey(): string | undefined {
    const credential = this.store.current();
    return credential ? TokenUtils.credentialSecret(credential) : undefined;
  }

  /**
   * Starts an authorization code flow sharing this client's credential slot.
   * A successful exchange makes every collection call use the OAuth credential.
   * @throws {AuthenticationError} kind `configuration` when no clientId is configured
   */
  public oauth(options: OAuthFlowOptions): OAuthClient {
    if (!this.config.clientId) {
      throw AuthenticationError.configuration(
        'clientId is required to start an OAuth flow',
      );
    }
    return new OAuthClient(
      {
        clientId: this.config.clientId,
        redirectUri: options.redirectUri,
        scopes: options.scopes,
        state: options.state,
        appUrl: this.config.appUrl,
        apiUrl: this.config.apiUrl,
        apiVersion: this.config.apiVersion,
      },
      this.store,
      {
        exchanger: this.exchanger,
        expirySkewMs: this.config.expirySkewMs,
      },
    );
  }

  /**
   * Bots of one app
   * @throws {TypeError} For an empty app id
   */
  public appBots(appId: string): Collection<AppBot> {
    return createAppBots(this.api, appId);
  }

  /**
   * Session the platform holds for the active credential. Unlike
   * `auth.getSession()`, this asks the server.
   */
  public async fetchSession(
    options: CallOptions = {},
  ): Promise<ApiEnvelope<Record<string, unknown>>> {
    return this.api.request('GET', 'auth/session', IdentitySchema, {
      signal: options.signal,
    });
  }

  /**
   * Identity behind the active credential
   */
  public async self(
    options: CallOptions = {},
  ): Promise<ApiEnvelope<Record<string, unknown>>> {
    return this.api.request('GET', 'auth/self', IdentitySchema, {
      signal: options.signal,
    });
  }
}
