/**
 * Tool Plugin Types
 *
 * A plugin takes a document identifier, runs it through the extraction
 * pipeline and hands back the record it produced.
 */

import type { RepairPolicy } from '../templates/types';
import type { ExtractionResult, MetadataRecord } from '../types';

export interface ProcessFileOptions {
  /** Built-in template name or literal template text */
  template?: string;
  retries?: number;
  /** Run the extraction but do not store the record */
  dryRun?: boolean;
  verbose?: boolean;
  signal?: AbortSignal;
  repairPolicy?: RepairPolicy;
}

export interface ProcessFileResult {
  report: ExtractionResult;
  record: MetadataRecord;
  /** Where the record was (or, under dry-run, would have been) stored */
  outputPath: string;
  persisted: boolean;
}

export interface ToolPlugin {
  readonly name: string;
  readonly version: string;
  readonly description: string;

  /**
   * Prepare the plugin for use. Safe to call more than once.
   *
   * @throws ConfigurationError when the plugin cannot be configured
   */
  initialize(): Promise<void>;

  isAvailable(): boolean;

  processFile(identifier: string, outputPath?: string, options?: ProcessFileOptions): Promise<ProcessFileResult>;
}
