/**
 * LLM Client Adapter Tests
 *
 * Error classification, the OpenAI adapter against a stubbed chat API, and
 * the scripted client.
 */

import vm from 'vm';
import OpenAI from 'openai';
import {
  ConfigurationError,
  FatalProviderError,
  OpenAiLlmClient,
  ScriptedLlmClient,
  TransientProviderError,
  classifyProviderError,
  createLlmClient,
  loadConfig,
} from '@docmeta/shared';
import { StubCompletions, completion } from './helpers';

describe('classifyProviderError', () => {
  it('treats a connection timeout as transient', () => {
    const classified = classifyProviderError(new OpenAI.APIConnectionTimeoutError());

    expect(classified).toBeInstanceOf(TransientProviderError);
    expect(classified instanceof TransientProviderError && classified.kind).toBe('timeout');
  });

  it('treats a connection failure as a transient network error', () => {
    const classified = classifyProviderError(new OpenAI.APIConnectionError({ message: 'socket hang up' }));

    expect(classified).toBeInstanceOf(TransientProviderError);
    expect(classified instanceof TransientProviderError && classified.kind).toBe('network');
    expect(classified.message).toBe('Connection error: socket hang up');
  });

  it.each([
    [429, 'rate-limit'],
    [408, 'timeout'],
    [409, 'server'],
    [500, 'server'],
    [503, 'server'],
  ])('treats HTTP %i as transient (%s)', (status, kind) => {
    const classified = classifyProviderError(new OpenAI.APIError(status, undefined, 'provider said no', {}));

    expect(classified).toBeInstanceOf(TransientProviderError);
    expect(classified instanceof TransientProviderError && classified.kind).toBe(kind);
  });

  it.each([400, 401, 403, 404, 422])('treats HTTP %i as fatal', (status) => {
    const classified = classifyProviderError(new OpenAI.APIError(status, undefined, 'rejected', {}));

    expect(classified).toBeInstanceOf(FatalProviderError);
    expect(classified instanceof FatalProviderError && classified.status).toBe(status);
  });

  it('keeps the provider message on an authentication rejection', () => {
    const classified = classifyProviderError(new OpenAI.AuthenticationError(401, undefined, 'invalid key', {}));

    expect(classified.message).toBe('Provider rejected request (401): 401 invalid key');
  });

  it('treats socket error codes as transient', () => {
    const error = Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });
    const classified = classifyProviderError(error);

    expect(classified instanceof TransientProviderError && classified.kind).toBe('network');
    expect(classified.message).toBe('Network error ECONNRESET: read ECONNRESET');
  });

  it('recognises socket errors raised in another realm', () => {
    const error: unknown = vm.runInNewContext('Object.assign(new Error("socket hang up"), { code: "ECONNRESET" })');
    const classified = classifyProviderError(error);

    expect(classified instanceof TransientProviderError && classified.kind).toBe('network');
    expect(classified.message).toBe('Network error ECONNRESET: socket hang up');
  });

  it('treats anything unrecognised as fatal', () => {
    const classified = classifyProviderError(new Error('weird'));

    expect(classified).toBeInstanceOf(FatalProviderError);
    expect(classified.message).toBe('Unexpected provider error: weird');
  });

  it('passes already classified errors through', () => {
    const error = new TransientProviderError('slow', 'timeout');

    expect(classifyProviderError(error)).toBe(error);
  });
});

describe('OpenAiLlmClient', () => {
  const options = { apiKey: 'test-secret', model: 'gpt-4o-mini', timeoutMs: 5000 };

  it('requires an API key', () => {
    expect(() => new OpenAiLlmClient({ ...options, apiKey: '' })).toThrow(ConfigurationError);
  });

  it('sends system and user messages with the generation parameters', async () => {
    const stub = new StubCompletions(async () => completion('{"title": "A"}'));
    const client = new OpenAiLlmClient(options, stub);

    const text = await client.complete({
      system: 'Be precise.',
      prompt: 'Extract: text',
      params: { temperature: 0.2, maxTokens: 300 },
    });

    expect(text).toBe('{"title": "A"}');
    expect(stub.calls).toEqual([
      {
        body: {
          model: 'gpt-4o-mini',
          messages: [
            { role: 'system', content: 'Be precise.' },
            { role: 'user', content: 'Extract: text' },
          ],
          temperature: 0.2,
          max_tokens: 300,
        },
        options: { timeout: 5000 },
      },
    ]);
  });

  it('omits an empty system prompt', async () => {
    const stub = new StubCompletions(async () => completion('ok'));
    const client = new OpenAiLlmClient(options, stub);

    await client.complete({ system: '', prompt: 'Hi' });

    expect(stub.calls[0].body.messages).toEqual([{ role: 'user', content: 'Hi' }]);
  });

  it('treats an empty completion as transient', async () => {
    const client = new OpenAiLlmClient(options, new StubCompletions(async () => completion(null)));

    await expect(client.complete({ prompt: 'Hi' })).rejects.toMatchObject({
      name: 'TransientProviderError',
      kind: 'empty-response',
      message: 'Empty response from OpenAI',
    });
  });

  it('classifies SDK errors', async () => {
    const stub = new StubCompletions(async () => {
      throw new OpenAI.AuthenticationError(401, undefined, 'invalid key', {});
    });
    const client = new OpenAiLlmClient(options, stub);

    await expect(client.complete({ prompt: 'Hi' })).rejects.toBeInstanceOf(FatalProviderError);
  });
});

describe('ScriptedLlmClient', () => {
  it('replays the script and then repeats the last entry', async () => {
    const client = new ScriptedLlmClient(['first', 'second']);

    expect(await client.complete({ prompt: 'a' })).toBe('first');
    expect(await client.complete({ prompt: 'b' })).toBe('second');
    expect(await client.complete({ prompt: 'c' })).toBe('second');
    expect(client.callCount).toBe(3);
    expect(client.requests.map((r) => r.prompt)).toEqual(['a', 'b', 'c']);
  });

  it('throws scripted errors and calls scripted functions', async () => {
    const failure = new Error('scripted failure');
    const client = new ScriptedLlmClient([failure, (request) => `echo: ${request.prompt}`]);

    await expect(client.complete({ prompt: 'x' })).rejects.toBe(failure);
    expect(await client.complete({ prompt: 'y' })).toBe('echo: y');
  });

  it('needs at least one entry', () => {
    expect(() => new ScriptedLlmClient([])).toThrow('ScriptedLlmClient needs at least one scripted response');
  });
});

describe('createLlmClient', () => {
  it('creates the mock client', () => {
    const client = createLlmClient(loadConfig({ LLM_PROVIDER: 'mock' }));

    expect(client.provider).toBe('mock');
    expect(client.model).toBe('mock');
  });

  it('creates the OpenAI client when a key is configured', () => {
    const client = createLlmClient(loadConfig({ OPENAI_API_KEY: 'test-secret', LLM_MODEL: 'gpt-4o' }));

    expect(client.provider).toBe('openai');
    expect(client.model).toBe('gpt-4o');
  });

  it('rejects the OpenAI provider without a key', () => {
    expect(() => createLlmClient(loadConfig({ LLM_PROVIDER: 'openai' }))).toThrow(
      'OpenAI API key not provided. Set OPENAI_API_KEY or choose LLM_PROVIDER=mock.'
    );
  });
});
