import type {
  ChatCompletionRequest,
  ChatCompletionResponse,
} from '@helio/models';
import { ChatCompletionResponseSchema, type ResponseSchema } from '../schemas.js';
import { Collection, type CallOptions } from './collection.js';

/**
 * Collection whose records can run chat completions: agents, agent groups
 * and models.
 * @public
 */
export class CompletionCollection<T, TCreate = Partial<T>> extends Collection<
  T,
  TCreate
> {
  /**
   * Runs a chat completion against one record,
   * `POST {path}/{id}/completions`
   * @throws {TypeError} For an empty id or message list, before any request
   */
  public async chatCompletion(
    id: string,
    request: ChatCompletionRequest,
    options: CallOptions = {},
  ): Promise<ChatCompletionResponse> {
    return this.postCompletion(
      this.itemPath(id, 'completions'),
      ChatCompletionResponseSchema,
      request,
      options,
    );
  }

  protected async postCompletion<R>(
    path: string,
    schema: ResponseSchema<R>,
    request: ChatCompletionRequest,
    options: CallOptions,
  ): Promise<R> {
    if (request.messages.length === 0) {
      throw new TypeError('chat completion needs at least one message');
    }
    return this.client.request('POST', path, schema, {
      body: request,
      signal: options.signal,
    });
  }
}
