import type {
  Agent,
  AsyncChatCompletion,
  ChatCompletionRequest,
} from '@helio/models';
import type { ApiClient } from '../client/api-client.js';
import { AgentSchema, AsyncChatCompletionSchema } from '../schemas.js';
import type { CallOptions } from './collection.js';
import { CompletionCollection } from './completion-collection.js';

/**
 * Agents, plus synchronous and queued chat completions against one agent
 * @public
 */
export class AgentsCollection extends CompletionCollection<Agent> {
  public constructor(client: ApiClient) {
    super(client, 'agent', AgentSchema);
  }

  /**
   * Queues a chat completion, `POST agent/{id}/completions/async`. The
   * platform answers with the queued job, not the completion.
   */
  public async chatCompletionAsync(
    agentId: string,
    request: ChatCompletionRequest,
    options: CallOptions = {},
  ): Promise<AsyncChatCompletion> {
    return this.postCompletion(
      this.itemPath(agentId, 'completions', 'async'),
      AsyncChatCompletionSchema,
      request,
      options,
    );
  }
}
