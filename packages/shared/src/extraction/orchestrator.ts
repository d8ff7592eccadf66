/**
 * Extraction Orchestrator
 *
 * Drives the extraction state machine for one document: render the prompt,
 * call the model, parse, validate, and on failure repair and retry until the
 * budget runs out. Every path ends in exactly one ExtractionResult; nothing
 * thrown by the leaves escapes.
 *
 * One call is strictly sequential. Independent calls may run concurrently:
 * all per-call state lives in local variables of extract().
 */

import type { Config } from '../config';
import { ensureContextAsync } from '../context';
import { ConfigurationError, FatalProviderError, TransientProviderError, errorMessage } from '../errors';
import { logger } from '../logger';
import { extractionAttemptsHistogram, extractionDurationHistogram, extractionsCounter } from '../metrics';
import { DEFAULT_REPAIR_POLICY, GENERIC_TEMPLATE, renderTemplate } from '../templates';
import type { ExtractionTemplate, RepairPolicy } from '../templates';
import type { ExtractionAttempt, ExtractionResult, Metadata, PromptContext } from '../types';
import type { GenerationParams, LlmClient } from './llm-client';
import { classifyProviderError } from './llm-client';
import { calculateRarity, normalizeRarity } from './rarity';
import { buildRepairPrompt } from './repair';
import { parseResponse } from './response-parser';
import { METADATA_SCHEMA, assertValidSchema } from './schema-definition';
import type { ExtractionState, RenderedPrompt, StepOutcome, TerminalState } from './state-machine';
import { isTerminal, transition } from './state-machine';
import { toMetadata, validatePayload } from './validator';

export interface OrchestratorSettings {
  /** Default retry budget when a call does not set one */
  maxRetries: number;
  /** Delay before re-calling after a transient provider failure */
  retryDelayMs: number;
  /** Upper bound on one LLM call */
  timeoutMs: number;
  generation: GenerationParams;
  recalculateRarity: boolean;
  repairPolicy?: RepairPolicy;
}

export function settingsFromConfig(config: Config): OrchestratorSettings {
  return {
    maxRetries: config.maxRetries,
    retryDelayMs: config.retryDelayMs,
    timeoutMs: config.llmRequestTimeoutMs,
    generation: { temperature: config.llmTemperature, maxTokens: config.llmMaxTokens },
    recalculateRarity: config.recalculateRarity,
  };
}

export interface ExtractionOptions {
  template?: ExtractionTemplate;
  /** Extra template variables; `content` is always set from the document */
  variables?: Record<string, string>;
  /** Retry budget for this call, overriding the settings */
  retries?: number;
  repairPolicy?: RepairPolicy;
  /** Checked between attempts; an aborted call ends as `cancelled` */
  signal?: AbortSignal;
  sourceId?: string;
  /** Log full prompts and responses at info level */
  verbose?: boolean;
}

type ActiveState = Exclude<ExtractionState, TerminalState>;

/** Mutable bookkeeping for one extract() call */
interface RunState {
  template: ExtractionTemplate;
  context: PromptContext;
  repairPolicy: RepairPolicy;
  signal?: AbortSignal;
  verbose: boolean;
  attempts: number;
  /** The attempt in flight; only the latest one is kept */
  attempt?: ExtractionAttempt;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(
      () => reject(new TransientProviderError(`LLM call exceeded ${timeoutMs} ms`, 'timeout')),
      timeoutMs
    );
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function resolveBudget(retries: number | undefined, fallback: number): number {
  const budget = retries ?? fallback;
  if (!Number.isInteger(budget) || budget < 0) {
    throw new ConfigurationError(`retries must be a non-negative integer, got ${budget}`);
  }
  return budget;
}

export class ExtractionOrchestrator {
  private readonly repairPolicy: RepairPolicy;

  constructor(
    readonly client: LlmClient,
    private readonly settings: OrchestratorSettings
  ) {
    assertValidSchema(METADATA_SCHEMA);
    this.repairPolicy = settings.repairPolicy ?? DEFAULT_REPAIR_POLICY;
  }

  /**
   * Extract metadata from document text. Never rejects.
   */
  async extract(content: string, options: ExtractionOptions = {}): Promise<ExtractionResult> {
    const sourceId = options.sourceId ?? 'inline';
    return ensureContextAsync(sourceId, () => this.run(content, options));
  }

  private async run(content: string, options: ExtractionOptions): Promise<ExtractionResult> {
    const startTime = Date.now();
    const template = options.template ?? GENERIC_TEMPLATE;
    const repairPolicy = options.repairPolicy ?? this.repairPolicy;
    const context: PromptContext = { ...options.variables, content };

    let budget: number;
    try {
      budget = resolveBudget(options.retries, this.settings.maxRetries);
    } catch (error) {
      return this.finish({ name: 'EXHAUSTED', reason: 'configuration-error', detail: errorMessage(error) }, 0, startTime);
    }

    logger.info('Starting extraction', {
      template: template.name,
      provider: this.client.provider,
      model: this.client.model,
      retries: budget,
      content_length: content.length,
    });

    const run: RunState = {
      template,
      context,
      repairPolicy,
      signal: options.signal,
      verbose: options.verbose === true,
      attempts: 0,
    };
    let state: ExtractionState = { name: 'RENDER' };

    while (!isTerminal(state)) {
      const outcome = await this.step(state, run);
      const attempt = run.attempt;

      if (attempt && (outcome.type === 'parse-failed' || outcome.type === 'invalid')) {
        logger.warn('Attempt rejected', {
          attempt: attempt.index,
          parse_failure: attempt.parseFailure?.reason,
          violations: attempt.violations.map((v) => v.path || '(root)'),
          remaining_retries: budget,
        });
      }

      const next = transition(state, outcome, budget);
      if (next.consumesBudget) budget--;
      if (next.backoff && this.settings.retryDelayMs > 0) {
        await sleep(this.settings.retryDelayMs);
      }
      state = next.next;
    }

    return this.finish(state, run.attempts, startTime);
  }

  private async step(state: ActiveState, run: RunState): Promise<StepOutcome> {
    switch (state.name) {
      case 'RENDER':
        return this.render(run.template, run.context);

      case 'CALL': {
        if (run.signal?.aborted) return { type: 'cancelled' };
        run.attempts++;
        const attempt: ExtractionAttempt = { index: run.attempts, violations: [] };
        run.attempt = attempt;
        return this.call(state.prompt, attempt, run.verbose);
      }

      case 'PARSE': {
        const parsed = parseResponse(state.response);
        if (parsed.ok) {
          if (run.attempt) run.attempt.payload = parsed.payload;
          return { type: 'parsed', payload: parsed.payload };
        }
        if (run.attempt) run.attempt.parseFailure = parsed.failure;
        return { type: 'parse-failed', failure: parsed.failure };
      }

      case 'VALIDATE': {
        const payload = normalizeRarity(state.payload);
        const violations = validatePayload(payload, METADATA_SCHEMA);
        if (run.attempt) run.attempt.violations = violations;
        const metadata = violations.length === 0 ? toMetadata(payload) : undefined;
        return metadata ? { type: 'valid', metadata: this.applyRarity(metadata) } : { type: 'invalid', violations };
      }

      case 'REPAIR':
        try {
          return {
            type: 'rendered',
            prompt: buildRepairPrompt(state.original, state.response, state.problem, run.repairPolicy, METADATA_SCHEMA),
          };
        } catch (error) {
          return { type: 'configuration-error', message: errorMessage(error) };
        }
    }
  }

  private render(template: ExtractionTemplate, context: PromptContext): StepOutcome {
    try {
      return {
        type: 'rendered',
        prompt: { system: template.systemPrompt, user: renderTemplate(template.userPromptTemplate, context) },
      };
    } catch (error) {
      return { type: 'configuration-error', message: errorMessage(error) };
    }
  }

  private async call(prompt: RenderedPrompt, attempt: ExtractionAttempt, verbose: boolean): Promise<StepOutcome> {
    logger.info('Sending prompt to LLM', { attempt: attempt.index, model: this.client.model });
    if (verbose) {
      logger.info('Prompt', { attempt: attempt.index, system: prompt.system, prompt: prompt.user });
    }

    try {
      const response = await withTimeout(
        this.client.complete({ system: prompt.system, prompt: prompt.user, params: this.settings.generation }),
        this.settings.timeoutMs
      );
      attempt.response = response;
      if (verbose) {
        logger.info('LLM response', { attempt: attempt.index, response });
      }
      return { type: 'responded', response };
    } catch (error) {
      const classified = error instanceof ConfigurationError ? error : classifyProviderError(error);
      attempt.providerError = classified.message;

      if (classified instanceof TransientProviderError) {
        logger.warn('Transient LLM failure', { attempt: attempt.index, kind: classified.kind, error: classified.message });
        return { type: 'transient-error', message: classified.message };
      }
      if (classified instanceof FatalProviderError) {
        logger.error('Fatal LLM failure', classified, { attempt: attempt.index, status: classified.status });
      }
      return { type: 'fatal-error', message: classified.message };
    }
  }

  private applyRarity(metadata: Metadata): Metadata {
    if (!this.settings.recalculateRarity) return metadata;

    const rarity = calculateRarity(metadata.summary);
    if (rarity !== metadata.rarity) {
      logger.info('Overriding model rarity with calculated rarity', { model_rarity: metadata.rarity, rarity });
      return { ...metadata, rarity };
    }
    return metadata;
  }

  private finish(state: TerminalState, attempts: number, startTime: number): ExtractionResult {
    const durationSeconds = (Date.now() - startTime) / 1000;
    extractionAttemptsHistogram.observe(attempts);

    if (state.name === 'SUCCESS') {
      extractionsCounter.inc({ outcome: 'success', reason: 'none' });
      extractionDurationHistogram.observe({ outcome: 'success' }, durationSeconds);
      logger.info('Extraction succeeded', { attempts, duration_ms: Math.round(durationSeconds * 1000) });
      return { success: true, metadata: state.metadata, attempts };
    }

    extractionsCounter.inc({ outcome: 'failure', reason: state.reason });
    extractionDurationHistogram.observe({ outcome: 'failure' }, durationSeconds);
    logger.warn('Extraction failed', { reason: state.reason, detail: state.detail, attempts });

    const problem = state.problem;
    return {
      success: false,
      reason: state.reason,
      attempts,
      violations: problem?.kind === 'validation' ? problem.violations : [],
      parseFailure: problem?.kind === 'parse' ? problem.failure : undefined,
      detail: state.detail,
    };
  }
}
