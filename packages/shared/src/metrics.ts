/**
 * Prometheus Metrics
 *
 * Metrics for LLM calls, extraction outcomes and the HTTP API.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

/**
 * Default metrics (CPU, memory, etc.). Only long-running processes call this;
 * wrapped to avoid crashes on Alpine/restricted environments.
 */
export function collectDefaultMetrics(): void {
  try {
    promClient.collectDefaultMetrics({ register });
  } catch (err) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

// ============================================================================
// LLM Metrics
// ============================================================================

export const llmRequestsCounter = new promClient.Counter({
  name: 'docmeta_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'docmeta_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

// ============================================================================
// Extraction Metrics
// ============================================================================

export const extractionsCounter = new promClient.Counter({
  name: 'docmeta_extractions_total',
  help: 'Total number of extraction calls by terminal outcome',
  labelNames: ['outcome', 'reason'],
  registers: [register],
});

export const extractionAttemptsHistogram = new promClient.Histogram({
  name: 'docmeta_extraction_attempts',
  help: 'LLM calls used per extraction',
  buckets: [1, 2, 3, 4, 5, 8, 11],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'docmeta_extraction_duration_seconds',
  help: 'Duration of a full extraction call',
  labelNames: ['outcome'],
  buckets: [1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'docmeta_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'docmeta_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
