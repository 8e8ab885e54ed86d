/**
 * Attestation API
 *
 * Upload endpoint for absence attestations, plus health and metrics.
 */

import express, { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  getMessage,
  parseLanguage,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  validateAttestationResult,
  DETAIL_LABELS,
  type AttestationResult,
  type ErrorEnvelope,
  type Language,
} from '@attestation/shared';
import { processAttestation, type WorkflowDependencies, type WorkflowOptions } from './lib/workflow';

export interface AppDependencies extends WorkflowDependencies {
  workflowOptions: WorkflowOptions;
  /** Resolves when the database answers; rejects otherwise */
  healthCheck: () => Promise<void>;
  maxUploadBytes?: number;
  defaultLanguage?: Language;
}

function readCorrelationId(res: Response): string {
  const header = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : ulid();
}

function errorEnvelope(code: string, message: string, correlationId: string): ErrorEnvelope {
  return { error: { code, message, correlation_id: correlationId } };
}

export function formatFileSize(bytes: number): string {
  return `${(bytes / 1024).toFixed(2)} KB`;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  const defaultLanguage = deps.defaultLanguage ?? config.defaultLanguage;
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.maxUploadBytes ?? config.maxUploadBytes, files: 1 },
  });

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header ? header : ulid();
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
  app.get('/api/health', async (req: Request, res: Response) => {
    try {
      await deps.healthCheck();

      res.json({
        status: 'healthy',
        service: 'attestation-api',
        database: 'connected',
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'attestation-api',
        database: 'disconnected',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * POST /api/process-attestation
   * multipart/form-data with a `file` part; language from the `language`
   * field or the `lang` query parameter.
   */
  app.post('/api/process-attestation', upload.single('file'), async (req: Request, res: Response) => {
    const correlationId = readCorrelationId(res);
    const body: unknown = req.body;
    const formLanguage =
      typeof body === 'object' && body !== null && 'language' in body ? body.language : undefined;
    const language = parseLanguage(formLanguage ?? req.query.lang, defaultLanguage);

    const file = req.file;
    if (!file) {
      res.status(400).json(errorEnvelope('invalid_request', getMessage('no_file_uploaded', language), correlationId));
      return;
    }

    try {
      const result = await runWithContext({ correlationId, fileName: file.originalname, language }, () =>
        processAttestation(
          { file: file.buffer, fileName: file.originalname, language },
          deps,
          deps.workflowOptions
        )
      );

      const response: AttestationResult = {
        ...result,
        details: { ...result.details, [DETAIL_LABELS.fileSize]: formatFileSize(file.size) },
      };

      const validation = validateAttestationResult(response);
      if (!validation.valid) {
        logger.warn('AttestationResult validation failed', { errors: validation.errors });
      }

      res.status(response.status_code).json(response);
    } catch (error) {
      logger.error('Failed to process attestation', error);
      res
        .status(500)
        .json(errorEnvelope('internal_error', getMessage('file_processing_error', language), correlationId));
    }
  });

  // Upload errors raised by multer
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const correlationId = readCorrelationId(res);
    const language = parseLanguage(req.query.lang, defaultLanguage);

    if (error instanceof multer.MulterError) {
      const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      logger.warn('Upload rejected', { code: error.code });
      res.status(status).json(errorEnvelope('invalid_request', error.message, correlationId));
      return;
    }

    logger.error('Unhandled request error', error);
    res
      .status(500)
      .json(errorEnvelope('internal_error', getMessage('file_processing_error', language), correlationId));
  });

  return app;
}
