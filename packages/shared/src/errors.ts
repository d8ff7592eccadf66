/**
 * Error Taxonomy
 *
 * Thrown by the leaves of the pipeline (renderer, LLM client, config loader).
 * The extraction orchestrator turns every one of these into an
 * ExtractionResult value; none of them crosses the core boundary.
 */

import { types } from 'util';

/**
 * Fatal setup problem: unresolved template placeholder, missing credentials,
 * invalid schema or option values. Retrying cannot fix it.
 */
export class ConfigurationError extends Error {
  readonly name = 'ConfigurationError';

  constructor(message: string, readonly details: Record<string, unknown> = {}) {
    super(message);
  }
}

export type TransientErrorKind = 'network' | 'rate-limit' | 'timeout' | 'server' | 'empty-response';

/**
 * Provider failure that may succeed on a later call. Consumes one unit of the
 * retry budget.
 */
export class TransientProviderError extends Error {
  readonly name = 'TransientProviderError';

  constructor(
    message: string,
    readonly kind: TransientErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Provider rejected the request outright (authentication, malformed request).
 */
export class FatalProviderError extends Error {
  readonly name = 'FatalProviderError';

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Also true for errors created in another realm (a vm context, a test
 * sandbox), which fail `instanceof Error`.
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error || types.isNativeError(value);
}

export function errorMessage(error: unknown): string {
  return isError(error) ? error.message : String(error);
}
