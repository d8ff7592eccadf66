/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  ensureContextAsync,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, isLogLevel, setLogLevel, getLogLevel, type LogContext, type LogLevel } from './logger';

// Config
export { loadConfig, type Config, type LlmProvider } from './config';

// Errors
export {
  ConfigurationError,
  TransientProviderError,
  FatalProviderError,
  errorMessage,
  isError,
  type TransientErrorKind,
} from './errors';

// Types
export * from './types';

// Metrics
export {
  register,
  collectDefaultMetrics,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  extractionsCounter,
  extractionAttemptsHistogram,
  extractionDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export { validateMetadataRecord, type ValidationResult } from './schemas';

// Templates
export {
  getTemplate,
  getAvailableTemplates,
  resolveTemplate,
  literalTemplate,
  renderTemplate,
  findPlaceholders,
  GENERIC_TEMPLATE,
  REPAIR_TEMPLATE,
  DEFAULT_REPAIR_POLICY,
  type ExtractionTemplate,
  type RepairPolicy,
} from './templates';

// Storage
export { LocalFileStore, defaultOutputPath, type DocumentStore, type StoreAck } from './storage';

// Extraction core
export * from './extraction';

// Plugins
export * from './plugins';
