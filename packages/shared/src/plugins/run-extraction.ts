/**
 * Extraction Entry Points
 *
 * Resolve the template, run the orchestrator and package the result, all
 * inside one correlation context. Shared by the plugin, the CLI and the API;
 * extractMetadata() is the headless entry for callers that already hold the
 * document text.
 */

import { loadConfig } from '../config';
import type { Config } from '../config';
import { ensureContextAsync, getCorrelationId } from '../context';
import { ConfigurationError } from '../errors';
import { createLlmClient } from '../extraction/llm-client';
import type { LlmClient } from '../extraction/llm-client';
import { ExtractionOrchestrator, settingsFromConfig } from '../extraction/orchestrator';
import { packageResult } from '../extraction/result-packager';
import { logger } from '../logger';
import { validateMetadataRecord } from '../schemas';
import { resolveTemplate } from '../templates';
import type { ExtractionTemplate, RepairPolicy } from '../templates';
import type { ExtractionFailure, ExtractionResult, MetadataRecord } from '../types';

export interface ExtractionOutcome {
  result: ExtractionResult;
  record: MetadataRecord;
}

export interface RunExtractionOptions {
  /** Built-in template name or literal template text */
  template: string;
  sourceId: string;
  retries?: number;
  signal?: AbortSignal;
  verbose?: boolean;
  repairPolicy?: RepairPolicy;
}

function configurationFailure(error: ConfigurationError): ExtractionFailure {
  return {
    success: false,
    reason: 'configuration-error',
    attempts: 0,
    violations: [],
    detail: error.message,
  };
}

function finalize(
  result: ExtractionResult,
  sourceId: string,
  provider: string,
  model: string,
  template: string
): ExtractionOutcome {
  const record = packageResult(result, {
    correlationId: getCorrelationId(),
    sourceId,
    provider,
    model,
    template,
  });

  const validation = validateMetadataRecord(record);
  if (!validation.valid) {
    throw new Error(`MetadataRecord failed contract validation: ${(validation.errors ?? []).join('; ')}`);
  }

  return { result, record };
}

/**
 * Run one extraction through an existing orchestrator.
 */
export async function runExtraction(
  orchestrator: ExtractionOrchestrator,
  content: string,
  options: RunExtractionOptions
): Promise<ExtractionOutcome> {
  const { provider, model } = orchestrator.client;

  return ensureContextAsync(options.sourceId, async () => {
    let template: ExtractionTemplate;
    try {
      template = resolveTemplate(options.template);
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      logger.warn('Template could not be resolved', { error: error.message });
      return finalize(configurationFailure(error), options.sourceId, provider, model, options.template);
    }

    const result = await orchestrator.extract(content, {
      template,
      retries: options.retries,
      signal: options.signal,
      sourceId: options.sourceId,
      verbose: options.verbose,
      repairPolicy: options.repairPolicy,
    });

    return finalize(result, options.sourceId, provider, model, template.name);
  });
}

export interface ExtractMetadataOptions {
  /** Defaults to loadConfig() */
  config?: Config;
  /** Defaults to the client selected by the configuration */
  client?: LlmClient;
  /** Defaults to the configured default template */
  template?: string;
  retries?: number;
  sourceId?: string;
  signal?: AbortSignal;
  verbose?: boolean;
  repairPolicy?: RepairPolicy;
}

/**
 * Extract metadata from document text. Setup problems (bad configuration,
 * missing credentials, unknown template) come back as a configuration-error
 * result rather than a rejection.
 */
export async function extractMetadata(
  content: string,
  options: ExtractMetadataOptions = {}
): Promise<ExtractionOutcome> {
  const sourceId = options.sourceId ?? 'inline';

  return ensureContextAsync(sourceId, async () => {
    let config: Config;
    let client: LlmClient;
    try {
      config = options.config ?? loadConfig();
      client = options.client ?? createLlmClient(config);
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      logger.error('Extraction setup failed', error);
      return finalize(
        configurationFailure(error),
        sourceId,
        options.client?.provider ?? options.config?.llmProvider ?? 'unconfigured',
        options.client?.model ?? options.config?.llmModel ?? 'unconfigured',
        options.template ?? options.config?.defaultTemplate ?? 'generic'
      );
    }

    const orchestrator = new ExtractionOrchestrator(client, settingsFromConfig(config));
    logger.debug('Headless extraction', { provider: client.provider, model: client.model });

    return runExtraction(orchestrator, content, {
      template: options.template ?? config.defaultTemplate,
      sourceId,
      retries: options.retries,
      signal: options.signal,
      verbose: options.verbose,
      repairPolicy: options.repairPolicy,
    });
  });
}
