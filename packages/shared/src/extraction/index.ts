/**
 * Extraction Core
 *
 * Renderer → LLM client → parser → validator, driven by the orchestrator's
 * retry/repair state machine and packaged into a MetadataRecord.
 */

// Schema
export {
  METADATA_SCHEMA,
  AUTHOR_PROFILE_SCHEMA,
  assertValidSchema,
  describeFields,
  type FieldType,
  type FieldDescriptor,
  type SchemaDefinition,
} from './schema-definition';

// Validator
export { validatePayload, toMetadata, isPlainObject } from './validator';

// Parser
export { parseResponse, findBalancedObject, findObjectSpans, truncateCodePoints } from './response-parser';

// LLM client
export {
  classifyProviderError,
  createLlmClient,
  OpenAiLlmClient,
  ScriptedLlmClient,
  MOCK_RESPONSE,
  type LlmClient,
  type LlmRequest,
  type GenerationParams,
  type ChatCompletionsApi,
  type OpenAiClientOptions,
  type ScriptEntry,
} from './llm-client';

// State machine
export {
  transition,
  isTerminal,
  type ExtractionState,
  type TerminalState,
  type StepOutcome,
  type Transition,
  type RenderedPrompt,
  type RepairProblem,
  type AttemptProblem,
} from './state-machine';

// Repair
export { buildRepairPrompt, describeProblem, formatViolation, formatObserved } from './repair';

// Rarity
export { calculateRarity, canonicalRarity, normalizeRarity } from './rarity';

// Orchestrator
export {
  ExtractionOrchestrator,
  settingsFromConfig,
  type OrchestratorSettings,
  type ExtractionOptions,
} from './orchestrator';

// Packager
export { packageResult, describeFailure, type Provenance } from './result-packager';
