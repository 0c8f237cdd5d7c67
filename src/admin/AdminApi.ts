import express, { Router, Request, Response } from 'express';
import { z } from 'zod';
import { logger } from '../config';
import { DatabaseService } from '../database/DatabaseService';
import { requireApiKey } from '../middleware/auth';
import { IngestionReport, MaintenanceReport, RunStatus } from '../types';
import { PipelineErrorCode, errorMessage, isPipelineError } from '../utils/errors';
import { metrics } from '../utils/metrics';
import { MaintenanceRunOptions } from '../modules/MaintenanceJob';

export interface PassRunner {
  runIngestion(): Promise<IngestionReport>;
  runMaintenance(options?: MaintenanceRunOptions): Promise<MaintenanceReport>;
}

export interface AdminApiOptions {
  apiKeys: string[];
  maxStoreSizeBytes?: number;
}

const recordIdSchema = z.coerce.number().int().positive();

const maintenanceBodySchema = z.object({
  checkOnly: z.boolean().default(false),
});

const pendingQuerySchema = z.object({
  kind: z.string().min(1).max(64),
  recordKind: z.enum(['job', 'chat']).optional(),
});

const artifactBodySchema = z.object({
  providerKind: z
    .string()
    .min(1)
    .max(64)
    .regex(/^[^,]+$/, 'must not contain commas'),
  provider: z.string().min(1).max(128),
  text: z.string().min(1),
  generatedAt: z.coerce.date().optional(),
});

const auditQuerySchema = z.object({
  entityType: z.string().min(1).optional(),
  entityId: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

function reportStatusCode(report: { status: RunStatus; reason?: PipelineErrorCode }): number {
  if (report.status !== 'aborted') {
    return 200;
  }
  return report.reason === 'StoreBusy' ? 409 : 503;
}

function sendFailure(res: Response, error: unknown, message: string): void {
  if (isPipelineError(error, 'StoreUnavailable')) {
    res.status(503).json({ error: error.message, code: error.code });
    return;
  }
  if (isPipelineError(error, 'ConstraintViolation')) {
    res.status(422).json({ error: error.message, code: error.code });
    return;
  }
  logger.error({ error: errorMessage(error) }, message);
  res.status(500).json({ error: message });
}

/**
 * JSON admin surface mounted under /admin. Every route requires an API key.
 */
export class AdminApi {
  private router: Router;
  private database: DatabaseService;
  private runner: PassRunner;
  private options: AdminApiOptions;

  constructor(database: DatabaseService, runner: PassRunner, options: AdminApiOptions) {
    this.router = express.Router();
    this.database = database;
    this.runner = runner;
    this.options = options;
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.router.use(requireApiKey(this.options.apiKeys));

    // Trigger one ingestion pass
    this.router.post('/ingest', async (_req: Request, res: Response) => {
      try {
        logger.info('Manual ingestion triggered');
        const report = await this.runner.runIngestion();
        res.status(reportStatusCode(report)).json(report);
      } catch (error) {
        sendFailure(res, error, 'Ingestion failed');
      }
    });

    // Trigger a maintenance run, optionally check-only
    this.router.post('/maintenance', async (req: Request, res: Response) => {
      const parsed = maintenanceBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ error: 'Validation failed', details: parsed.error.flatten() });
        return;
      }

      try {
        const report = await this.runner.runMaintenance({ checkOnly: parsed.data.checkOnly });
        res.status(reportStatusCode(report)).json(report);
      } catch (error) {
        sendFailure(res, error, 'Maintenance failed');
      }
    });

    this.router.get('/health', async (_req: Request, res: Response) => {
      try {
        const [health, duplicates] = await Promise.all([
          this.database.getHealth(this.options.maxStoreSizeBytes),
          this.database.getDuplicateStats(),
        ]);
        res.json({ health, duplicates });
      } catch (error) {
        sendFailure(res, error, 'Failed to read store health');
      }
    });

    // Oldest record still waiting for an artifact of the given kind
    this.router.get('/records/pending', async (req: Request, res: Response) => {
      const parsed = pendingQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: 'Validation failed', details: parsed.error.flatten() });
        return;
      }

      try {
        const record = await this.database.findLatestWithoutArtifact(parsed.data.kind, parsed.data.recordKind);
        res.json({ record });
      } catch (error) {
        sendFailure(res, error, 'Failed to find pending record');
      }
    });

    this.router.post('/records/:id/artifacts', async (req: Request, res: Response) => {
      const id = recordIdSchema.safeParse(req.params.id);
      const body = artifactBodySchema.safeParse(req.body ?? {});
      if (!id.success || !body.success) {
        res.status(400).json({
          error: 'Validation failed',
          details: id.success ? body.error?.flatten() : id.error.flatten(),
        });
        return;
      }

      try {
        const record = await this.database.getRecordById(id.data);
        if (!record) {
          res.status(404).json({ error: 'Record not found' });
          return;
        }

        const artifact = await this.database.addArtifact(id.data, body.data);
        metrics.artifactsStored.labels({ provider_kind: artifact.providerKind }).inc();
        res.status(201).json(artifact);
      } catch (error) {
        sendFailure(res, error, 'Failed to store artifact');
      }
    });

    this.router.delete('/records/:id', async (req: Request, res: Response) => {
      const id = recordIdSchema.safeParse(req.params.id);
      if (!id.success) {
        res.status(400).json({ error: 'Validation failed', details: id.error.flatten() });
        return;
      }

      try {
        const removed = await this.database.deleteRecord(id.data);
        if (!removed) {
          res.status(404).json({ error: 'Record not found' });
          return;
        }
        res.status(204).end();
      } catch (error) {
        sendFailure(res, error, 'Failed to delete record');
      }
    });

    this.router.get('/audit', async (req: Request, res: Response) => {
      const parsed = auditQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ error: 'Validation failed', details: parsed.error.flatten() });
        return;
      }

      try {
        const logs = await this.database.getAuditLogs(
          parsed.data.entityType,
          parsed.data.entityId,
          parsed.data.limit
        );
        res.json(logs);
      } catch (error) {
        sendFailure(res, error, 'Failed to load audit logs');
      }
    });
  }

  getRouter(): Router {
    return this.router;
  }
}
