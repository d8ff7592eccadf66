/**
 * Extraction API
 *
 * POST /extract runs one extraction over the posted text and returns the
 * MetadataRecord. Records are stored unless the request asks for a dry run.
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  ExtractionOrchestrator,
  defaultOutputPath,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  isPlainObject,
  logger,
  runExtraction,
  runWithContext,
  type Config,
  type DocumentStore,
  type ErrorEnvelope,
  type ExtractionResult,
  type HealthResponse,
  type MetadataRecord,
} from '@docmeta/shared';

export interface ApiDeps {
  config: Config;
  orchestrator: ExtractionOrchestrator;
  /** Records are not stored when absent */
  store?: DocumentStore;
}

export interface ExtractRequest {
  content: string;
  source_id?: string;
  template?: string;
  retries?: number;
  dry_run?: boolean;
}

export interface ApiResponse {
  status: number;
  body: MetadataRecord | ErrorEnvelope;
}

function invalidRequest(message: string): ApiResponse {
  return {
    status: 400,
    body: {
      error: {
        code: 'invalid_request',
        message,
        correlation_id: getCorrelationId(),
      },
    },
  };
}

type BodyParse = { ok: true; request: ExtractRequest } | { ok: false; message: string };

export function parseExtractRequest(body: unknown): BodyParse {
  if (!isPlainObject(body)) {
    return { ok: false, message: 'Request body must be a JSON object' };
  }

  const { content, source_id, template, retries, dry_run } = body;

  if (typeof content !== 'string' || content.trim() === '') {
    return { ok: false, message: 'content must be a non-empty string' };
  }
  if (source_id !== undefined && (typeof source_id !== 'string' || source_id === '')) {
    return { ok: false, message: 'source_id must be a non-empty string' };
  }
  if (template !== undefined && (typeof template !== 'string' || template === '')) {
    return { ok: false, message: 'template must be a non-empty string' };
  }
  if (retries !== undefined && (typeof retries !== 'number' || !Number.isInteger(retries) || retries < 0)) {
    return { ok: false, message: 'retries must be a non-negative integer' };
  }
  if (dry_run !== undefined && typeof dry_run !== 'boolean') {
    return { ok: false, message: 'dry_run must be a boolean' };
  }

  return { ok: true, request: { content, source_id, template, retries, dry_run } };
}

export function statusForResult(result: ExtractionResult): number {
  if (result.success) return 200;

  switch (result.reason) {
    case 'max-retries-exceeded':
    case 'cancelled':
      return 422;
    case 'fatal-provider-error':
      return 502;
    case 'configuration-error':
      return 400;
  }
}

/**
 * Handle a POST /extract body. Never rejects for extraction failures; those
 * are part of the returned record.
 */
export async function handleExtractRequest(body: unknown, deps: ApiDeps): Promise<ApiResponse> {
  const parsed = parseExtractRequest(body);
  if (!parsed.ok) {
    return invalidRequest(parsed.message);
  }

  const request = parsed.request;
  const sourceId = request.source_id ?? `api-${ulid()}`;

  const { result, record } = await runExtraction(deps.orchestrator, request.content, {
    template: request.template ?? deps.config.defaultTemplate,
    sourceId,
    retries: request.retries,
  });

  if (deps.store && request.dry_run !== true) {
    const target = defaultOutputPath(sourceId, deps.config.outputDir);
    await deps.store.store(target, Buffer.from(`${JSON.stringify(record, null, 2)}\n`, 'utf-8'));
  }

  return { status: statusForResult(result), body: record };
}

export function createApp(deps: ApiDeps): express.Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: '5mb' }));

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.get('x-correlation-id') || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path = req.route?.path || req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    const health: HealthResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      provider: deps.orchestrator.client.provider,
      model: deps.orchestrator.client.model,
    };
    res.json(health);
  });

  // Metrics endpoint
  app.get('/metrics', async (_req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * POST /extract
   * Extracts metadata from the posted document text
   */
  app.post('/extract', async (req: Request, res: Response) => {
    try {
      const response = await handleExtractRequest(req.body, deps);
      res.status(response.status).json(response.body);
    } catch (error) {
      logger.error('Extraction request failed', error);

      const errorResponse: ErrorEnvelope = {
        error: {
          code: 'internal_error',
          message: 'Failed to extract metadata',
          correlation_id: getCorrelationId(),
        },
      };
      res.status(500).json(errorResponse);
    }
  });

  // Malformed JSON bodies
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (!(error instanceof SyntaxError)) {
      next(error);
      return;
    }
    res.status(400).json(invalidRequest('Request body is not valid JSON').body);
  });

  return app;
}
