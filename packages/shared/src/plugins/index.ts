/**
 * Plugins
 */

export type { ToolPlugin, ProcessFileOptions, ProcessFileResult } from './types';

export {
  registerPlugin,
  getPlugin,
  getPluginOrThrow,
  hasPlugin,
  getRegisteredPlugins,
  clearRegistry,
} from './registry';

export { MetadataPlugin, METADATA_PLUGIN_NAME, type MetadataPluginDeps } from './metadata-plugin';

export {
  runExtraction,
  extractMetadata,
  type ExtractionOutcome,
  type RunExtractionOptions,
  type ExtractMetadataOptions,
} from './run-extraction';
