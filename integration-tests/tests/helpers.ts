/**
 * Test Helpers
 *
 * Fixtures and stand-ins shared by the test suites. Nothing here touches the
 * network: LLM calls go to a ScriptedLlmClient or a stubbed chat API.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type OpenAI from 'openai';
import type { ChatCompletionsApi, DocumentStore, OrchestratorSettings, StoreAck } from '@docmeta/shared';

/**
 * A payload that satisfies the metadata schema. Fresh copy on every call so
 * tests can mutate it.
 */
export function validPayload(): Record<string, unknown> {
  return {
    title: 'The Quiet Harbour',
    summary: 'A short essay about a fishing town.',
    author_style: 'Concise',
    tone: 'Reflective',
    language: 'English',
    domain: 'Travel',
    estimated_date: '1998',
    rarity: '🟢 Common',
    author_profile: {
      name: 'A. Writer',
      profession: 'Journalist',
      writing_style: 'Plain',
      possible_age_range: '40-50',
      location_guess: 'Coastal town',
    },
  };
}

export function validResponse(): string {
  return JSON.stringify(validPayload());
}

/** Valid payload with author_profile.name removed */
export function responseMissingAuthorName(): string {
  const payload = validPayload();
  payload.author_profile = {
    profession: 'Journalist',
    writing_style: 'Plain',
    possible_age_range: '40-50',
    location_guess: 'Coastal town',
  };
  return JSON.stringify(payload);
}

export const TEST_SETTINGS: OrchestratorSettings = {
  maxRetries: 3,
  retryDelayMs: 0,
  timeoutMs: 1000,
  generation: { temperature: 0.1, maxTokens: 2000 },
  recalculateRarity: false,
};

export function makeTempDir(prefix = 'docmeta-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function completion(content: string | null): OpenAI.Chat.ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 1700000000,
    model: 'gpt-4o-mini',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null },
      },
    ],
    usage: { prompt_tokens: 10, completion_tokens: 20, total_tokens: 30 },
  };
}

/**
 * Stand-in for `openai.chat.completions` that records every call.
 */
export class StubCompletions implements ChatCompletionsApi {
  readonly calls: Array<{
    body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;
    options?: { timeout?: number };
  }> = [];

  constructor(private readonly respond: () => Promise<OpenAI.Chat.ChatCompletion>) {}

  async create(
    body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
    options?: { timeout?: number }
  ): Promise<OpenAI.Chat.ChatCompletion> {
    this.calls.push({ body, options });
    return this.respond();
  }
}

/**
 * In-memory DocumentStore.
 */
export class MemoryStore implements DocumentStore {
  readonly documents = new Map<string, string>();

  async fetch(identifier: string): Promise<string> {
    const text = this.documents.get(identifier);
    if (text === undefined) {
      throw new Error(`No document stored under ${identifier}`);
    }
    return text;
  }

  async store(identifier: string, bytes: Buffer): Promise<StoreAck> {
    this.documents.set(identifier, bytes.toString('utf-8'));
    return { identifier, bytes: bytes.length };
  }
}
