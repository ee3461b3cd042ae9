/**
 * Zod schemas for platform resource bodies.
 *
 * Schemas check the fields the SDK types declare and pass everything else
 * through untouched. Top-level `null` fields are treated as absent.
 * @public
 */

import { z } from 'zod';
import type {
  AccessPolicy,
  Agent,
  AgentGroup,
  ApiEnvelope,
  App,
  AppBot,
  AsyncChatCompletion,
  ChatCompletionResponse,
  Meter,
  Model,
  OAuthClientRecord,
  OrgPermission,
  Organization,
  Paging,
  Tool,
  User,
  UserPermission,
  Wallet,
} from '@helio/models';

/**
 * Parser for a response body of type T
 * @public
 */
export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function dropNulls(input: unknown): unknown {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return input;
  }
  return Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== null),
  );
}

const recordBase = {
  id: z.string().optional(),
  org: z.string().optional(),
  user: z.string().optional(),
  active: z.boolean().optional(),
  tags: z.array(z.string()).optional(),
  extensors: z.record(z.string()).optional(),
  external_id: z.string().optional(),
};

function resource<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess(
    dropNulls,
    z.object({ ...recordBase, ...shape }).passthrough(),
  );
}

const describedShape = {
  name: z.string(),
  short_description: z.string().optional(),
  long_description: z.string().optional(),
};

export const UserSchema: ResponseSchema<User> = resource({
  email: z.string(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
});

export const OrganizationSchema: ResponseSchema<Organization> = resource({
  ...describedShape,
  image: z.string().optional(),
});

export const OAuthClientRecordSchema: ResponseSchema<OAuthClientRecord> =
  resource({
    name: z.string(),
    client_id: z.string().optional(),
    redirect_uris: z.array(z.string()).optional(),
    scopes: z.array(z.string()).optional(),
  });

export const AgentSchema: ResponseSchema<Agent> = resource({
  ...describedShape,
  model: z.string().optional(),
  system_prompt: z.string().optional(),
  public: z.boolean().optional(),
});

export const AgentGroupSchema: ResponseSchema<AgentGroup> = resource({
  ...describedShape,
  agents: z.array(z.string()).optional(),
  public: z.boolean().optional(),
});

export const ModelSchema: ResponseSchema<Model> = resource({
  name: z.string(),
  short_description: z.string().optional(),
  provider: z.string().optional(),
  model_id: z.string().optional(),
  max_tokens: z.number().optional(),
  public: z.boolean().optional(),
});

export const AppSchema: ResponseSchema<App> = resource({
  name: z.string(),
  short_description: z.string(),
  long_description: z.string().optional(),
  image: z.string().optional(),
  external_app_url: z.string().optional(),
  external_headers: z.record(z.string()).optional(),
  keywords: z.array(z.string()).optional(),
});

export const AppBotSchema: ResponseSchema<AppBot> = resource({
  app: z.string().optional(),
  response_url: z.string().optional(),
  agent: z.string().optional(),
  agent_group: z.string().optional(),
  api_key: z.string().optional(),
  api_key_partial: z.string().optional(),
});

export const ToolSchema: ResponseSchema<Tool> = resource({
  name: z.string().optional(),
  friendly_name: z.string().optional(),
  short_description: z.string(),
  tool_schema: z.string(),
  required_environment_variables: z.array(z.string()).optional(),
  source_url: z.string().optional(),
  url: z.string().optional(),
  public: z.boolean().optional(),
  keywords: z.array(z.string()).optional(),
});

export const WalletSchema: ResponseSchema<Wallet> = resource({
  balance: z.number().optional(),
  currency: z.string().optional(),
});

export const MeterSchema: ResponseSchema<Meter> = resource({
  type: z.string().optional(),
  value: z.number().optional(),
  metadata: z.record(z.unknown()).optional(),
});

export const AccessPolicySchema: ResponseSchema<AccessPolicy> = resource({
  name: z.string(),
  effect: z.enum(['allow', 'deny']).optional(),
  actions: z.array(z.string()).optional(),
  resources: z.array(z.string()).optional(),
});

export const OrgPermissionSchema: ResponseSchema<OrgPermission> = resource({
  policy: z.string().optional(),
});

export const UserPermissionSchema: ResponseSchema<UserPermission> = resource({
  client: z.string().optional(),
  policy: z.string().optional(),
});

const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
});

export const ChatCompletionResponseSchema: ResponseSchema<ChatCompletionResponse> =
  z
    .object({
      id: z.string(),
      model: z.string().optional(),
      choices: z.array(
        z.object({
          index: z.number(),
          message: ChatMessageSchema,
          finish_reason: z.string().optional(),
        }),
      ),
    })
    .passthrough();

export const AsyncChatCompletionSchema: ResponseSchema<AsyncChatCompletion> = z
  .object({
    id: z.string(),
    status: z.string().optional(),
  })
  .passthrough();

const PagingSchema: ResponseSchema<Paging> = z.object({
  offset: z.number().optional(),
  limit: z.number().optional(),
  total: z.number().optional(),
  page: z.number().optional(),
  total_pages: z.number().optional(),
});

const EnvelopeSchema = z.object({
  data: z.unknown(),
  paging: PagingSchema.optional(),
});

/**
 * `{ data, paging? }` envelope around a payload
 * @public
 */
export function envelopeOf<T>(
  data: ResponseSchema<T>,
): ResponseSchema<ApiEnvelope<T>> {
  return EnvelopeSchema.transform((envelope, ctx): ApiEnvelope<T> => {
    const parsed = data.safeParse(envelope.data);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['data', ...issue.path],
          message: issue.message,
        });
      }
      return z.NEVER;
    }
    return envelope.paging
      ? { data: parsed.data, paging: envelope.paging }
      : { data: parsed.data };
  });
}
