/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 * loadConfig() builds an explicit Config that callers hand to the
 * orchestrator and plugins; nothing reads the environment at call time.
 */

import { ConfigurationError } from './errors';
import { isLogLevel, type LogLevel } from './logger';

export type LlmProvider = 'openai' | 'mock';

export interface Config {
  // LLM
  llmProvider: LlmProvider;
  llmModel: string;
  llmRequestTimeoutMs: number;
  llmTemperature: number;
  llmMaxTokens: number;
  openaiApiKey: string;
  openaiBaseUrl?: string;

  // Extraction
  maxRetries: number;
  retryDelayMs: number;
  defaultTemplate: string;
  recalculateRarity: boolean;

  // Output
  outputDir: string;

  // API
  port: number;

  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function parseInteger(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${key} must be an integer >= ${min}, got "${raw}"`, { key, value: raw });
  }
  return value;
}

function parseNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${key} must be a non-negative number, got "${raw}"`, { key, value: raw });
  }
  return value;
}

function parseProvider(raw: string | undefined): LlmProvider {
  const value = (raw || 'openai').toLowerCase();
  if (value === 'openai' || value === 'mock') return value;
  throw new ConfigurationError(`LLM_PROVIDER must be "openai" or "mock", got "${raw}"`, { key: 'LLM_PROVIDER' });
}

function parseLogLevel(raw: string | undefined): LogLevel {
  const value = (raw || 'info').toLowerCase();
  return isLogLevel(value) ? value : 'info';
}

export function loadConfig(env: Env = process.env): Config {
  return {
    // LLM
    llmProvider: parseProvider(env.LLM_PROVIDER),
    llmModel: env.LLM_MODEL || 'gpt-4o-mini',
    llmRequestTimeoutMs: parseInteger(env, 'LLM_REQUEST_TIMEOUT_MS', 60000, 1),
    llmTemperature: parseNumber(env, 'LLM_TEMPERATURE', 0.1),
    llmMaxTokens: parseInteger(env, 'LLM_MAX_TOKENS', 2000, 1),
    openaiApiKey: env.OPENAI_API_KEY || '',
    openaiBaseUrl: env.OPENAI_BASE_URL || undefined,

    // Extraction
    maxRetries: parseInteger(env, 'MAX_RETRIES', 3, 0),
    retryDelayMs: parseInteger(env, 'RETRY_DELAY_MS', 1000, 0),
    defaultTemplate: env.DEFAULT_PROMPT_TEMPLATE || 'generic',
    recalculateRarity: env.RECALCULATE_RARITY !== 'false',

    // Output
    outputDir: env.OUTPUT_DIR || './output',

    // API
    port: parseInteger(env, 'PORT', 8080, 1),

    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
