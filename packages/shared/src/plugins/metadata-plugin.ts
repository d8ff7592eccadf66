/**
 * Metadata Plugin
 *
 * Reads a document from the store, extracts its metadata and stores the
 * resulting record beside the other outputs. Extraction failures are still
 * stored: the record carries the failure detail.
 */

import type { Config } from '../config';
import { ConfigurationError } from '../errors';
import { createLlmClient } from '../extraction/llm-client';
import type { LlmClient } from '../extraction/llm-client';
import { ExtractionOrchestrator, settingsFromConfig } from '../extraction/orchestrator';
import { logger } from '../logger';
import { LocalFileStore, defaultOutputPath } from '../storage';
import type { DocumentStore } from '../storage';
import { runExtraction } from './run-extraction';
import type { ProcessFileOptions, ProcessFileResult, ToolPlugin } from './types';

export const METADATA_PLUGIN_NAME = 'metadata';

export interface MetadataPluginDeps {
  config: Config;
  /** Defaults to a LocalFileStore rooted at the working directory */
  store?: DocumentStore;
  /** Defaults to the client selected by the configuration */
  client?: LlmClient;
}

export class MetadataPlugin implements ToolPlugin {
  readonly name = METADATA_PLUGIN_NAME;
  readonly version = '1.0.0';
  readonly description = 'Extracts structured metadata from text documents with an LLM';

  private readonly store: DocumentStore;
  private orchestrator: ExtractionOrchestrator | undefined;

  constructor(private readonly deps: MetadataPluginDeps) {
    this.store = deps.store ?? new LocalFileStore();
  }

  async initialize(): Promise<void> {
    if (this.orchestrator) return;

    const client = this.deps.client ?? createLlmClient(this.deps.config);
    this.orchestrator = new ExtractionOrchestrator(client, settingsFromConfig(this.deps.config));

    logger.info('Plugin initialized', {
      plugin: this.name,
      provider: client.provider,
      model: client.model,
    });
  }

  isAvailable(): boolean {
    return this.orchestrator !== undefined;
  }

  /**
   * @throws ConfigurationError when the plugin has not been initialized
   */
  async processFile(
    identifier: string,
    outputPath?: string,
    options: ProcessFileOptions = {}
  ): Promise<ProcessFileResult> {
    const orchestrator = this.orchestrator;
    if (!orchestrator) {
      throw new ConfigurationError(`Plugin "${this.name}" is not initialized`);
    }

    const content = await this.store.fetch(identifier);
    const target = outputPath ?? defaultOutputPath(identifier, this.deps.config.outputDir);

    const { result, record } = await runExtraction(orchestrator, content, {
      template: options.template ?? this.deps.config.defaultTemplate,
      sourceId: identifier,
      retries: options.retries,
      signal: options.signal,
      verbose: options.verbose,
      repairPolicy: options.repairPolicy,
    });

    if (options.dryRun) {
      logger.info('Dry run, record not stored', { output_path: target, success: result.success });
      return { report: result, record, outputPath: target, persisted: false };
    }

    await this.store.store(target, Buffer.from(`${JSON.stringify(record, null, 2)}\n`, 'utf-8'));
    return { report: result, record, outputPath: target, persisted: true };
  }
}
