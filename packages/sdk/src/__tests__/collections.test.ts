import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ApiClient } from '../client/api-client.js';
import { ApiError } from '../errors/api-error.js';
import {
  AgentsCollection,
  Collection,
  createAccessPolicies,
  createAgentGroups,
  createAppBots,
  createModels,
  createOrgPermissions,
  createUserPermissions,
  createUsers,
} from '../collections/index.js';
import { UserSchema } from '../schemas.js';
import {
  API_ROOT,
  TEST_API_URL,
  apiKeyCredential,
  createCredentialProvider,
  createFakePlatform,
  installFetchMock,
  jsonResponse,
  rejectionOf,
  type FakePlatform,
} from './test-utils.js';

describe('collections', () => {
  let mockFetch: ReturnType<typeof installFetchMock>;
  let platform: FakePlatform;
  let api: ApiClient;
  let agents: AgentsCollection;

  beforeEach(() => {
    mockFetch = installFetchMock();
    platform = createFakePlatform();
    mockFetch.mockImplementation(platform.fetch);
    api = new ApiClient(
      { apiUrl: TEST_API_URL, apiVersion: '1' },
      createCredentialProvider(apiKeyCredential()),
    );
    agents = new AgentsCollection(api);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('Collection', () => {
    it('should list records in their envelope, dropping null fields', async () => {
      const result = await agents.list({ limit: 10, search: '' });

      expect(result).toEqual({
        data: [
          { id: 'agent-1', name: 'Support', model: 'model-1' },
          { id: 'agent-2', name: 'Research' },
        ],
        paging: { offset: 0, limit: 10, total: 2 },
      });
      expect(platform.calls[0]?.url).toBe(`${API_ROOT}/agent?limit=10`);
    });

    it('should get one record without the meta key', async () => {
      await expect(agents.get('agent-1')).resolves.toEqual({
        data: { id: 'agent-1', name: 'Support', model: 'model-1' },
      });
    });

    it('should create a record from a JSON body', async () => {
      const result = await agents.create({ name: 'Drafting' });

      expect(result).toEqual({ data: { id: 'agent-3', name: 'Drafting' } });
      expect(platform.calls[0]).toMatchObject({
        method: 'POST',
        url: `${API_ROOT}/agent`,
        body: '{"name":"Drafting"}',
      });
    });

    it('should resolve a 204 delete to undefined', async () => {
      await expect(agents.delete('agent-2')).resolves.toBeUndefined();
      expect(platform.calls[0]?.method).toBe('DELETE');
    });

    it('should surface a 404 as ApiError', async () => {
      const error = await rejectionOf(agents.update('agent-1', { name: 'Renamed' }));

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ status: 404, code: 'not_found', message: 'Not found' });
    });

    it('should encode ids into the path', async () => {
      await rejectionOf(agents.get('a b/c'));

      expect(platform.calls[0]?.url).toBe(`${API_ROOT}/agent/a%20b%2Fc`);
    });

    it('should reject an empty id without a request', async () => {
      await expect(agents.get('')).rejects.toThrow('agent: id is required');
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should reject records missing required fields', async () => {
      mockFetch.mockReset();
      mockFetch.mockResolvedValueOnce(jsonResponse({ data: { id: 'user-1' } }));
      const users = new Collection(api, 'user', UserSchema);

      const error = await rejectionOf(users.get('user-1'));

      expect(error).toMatchObject({
        message: 'Invalid response: data.email: Required',
        code: 'invalid_response',
      });
    });
  });

  describe('resource paths', () => {
    it('should bind each collection to its platform path', () => {
      expect(createUsers(api).path).toBe('user');
      expect(createAccessPolicies(api).path).toBe('iam/policy');
      expect(createOrgPermissions(api).path).toBe('iam/org-permission');
      expect(createUserPermissions(api).path).toBe('iam/user-permission');
      expect(agents.path).toBe('agent');
    });
  });

  describe('AgentsCollection.chatCompletion', () => {
    it('should post the messages to the agent completion endpoint', async () => {
      const response = await agents.chatCompletion('agent-1', {
        messages: [{ role: 'user', content: 'Hi' }],
      });

      expect(response.choices[0]?.message).toEqual({
        role: 'assistant',
        content: 'Hello there',
      });
      expect(platform.calls[0]).toMatchObject({
        method: 'POST',
        url: `${API_ROOT}/agent/agent-1/completions`,
        body: '{"messages":[{"role":"user","content":"Hi"}]}',
      });
    });

    it('should reject an empty message list', async () => {
      await expect(agents.chatCompletion('agent-1', { messages: [] })).rejects.toThrow(
        'chat completion needs at least one message',
      );
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe('AgentsCollection.chatCompletionAsync', () => {
    it('should queue the completion and return the job', async () => {
      const job = await agents.chatCompletionAsync('agent-1', {
        messages: [{ role: 'user', content: 'Summarize' }],
      });

      expect(job).toEqual({ id: 'job-1', status: 'queued' });
      expect(platform.calls[0]).toMatchObject({
        method: 'POST',
        url: `${API_ROOT}/agent/agent-1/completions/async`,
      });
    });

    it('should reject an empty message list', async () => {
      await expect(
        agents.chatCompletionAsync('agent-1', { messages: [] }),
      ).rejects.toThrow('chat completion needs at least one message');
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe('completions on models and agent groups', () => {
    it('should post to the model completion endpoint', async () => {
      const response = await createModels(api).chatCompletion('model-1', {
        messages: [{ role: 'user', content: 'Hi' }],
        max_tokens: 64,
      });

      expect(response.id).toBe('model-completion');
      expect(platform.calls[0]).toMatchObject({
        method: 'POST',
        url: `${API_ROOT}/model/model-1/completions`,
        body: '{"messages":[{"role":"user","content":"Hi"}],"max_tokens":64}',
      });
    });

    it('should post to the agent group completion endpoint', async () => {
      const response = await createAgentGroups(api).chatCompletion('group-1', {
        messages: [{ role: 'user', content: 'Hi' }],
      });

      expect(response.id).toBe('group-completion');
      expect(platform.calls[0]?.url).toBe(`${API_ROOT}/group/group-1/completions`);
    });
  });

  describe('createAppBots', () => {
    it('should list the bots of one app', async () => {
      const bots = createAppBots(api, 'app-1');

      const result = await bots.list();

      expect(bots.path).toBe('app/app-1/bot');
      expect(result).toEqual({
        data: [{ id: 'bot-1', app: 'app-1', agent: 'agent-1' }],
      });
      expect(platform.calls[0]?.url).toBe(`${API_ROOT}/app/app-1/bot`);
    });

    it('should encode the app id into the path', () => {
      expect(createAppBots(api, 'app 2').path).toBe('app/app%202/bot');
    });

    it('should require an app id', () => {
      expect(() => createAppBots(api, '')).toThrow('app: appId is required');
    });
  });
});
