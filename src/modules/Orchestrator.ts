import * as cron from 'node-cron';
import { Server } from 'http';
import express, { Express, Request, Response } from 'express';
import helmet from 'helmet';
import { AppConfig, logger } from '../config';
import { register } from '../utils/metrics';
import { rateLimit } from '../middleware/auth';
import { DatabaseService } from '../database/DatabaseService';
import { AdminApi, PassRunner } from '../admin/AdminApi';
import { IngestionReport, MaintenanceReport } from '../types';
import { BrowserConnector, BrowserSessionClient, connectOverCdp } from './BrowserSession';
import { IngestionPipeline } from './IngestionPipeline';
import { MaintenanceJob, MaintenanceRunOptions } from './MaintenanceJob';

export interface OrchestratorDeps {
  database?: DatabaseService;
  connector?: BrowserConnector;
}

/**
 * Wires the store, the browser client and both jobs together. Runs them once on
 * demand, on cron schedules, or behind the HTTP admin surface.
 */
export class Orchestrator implements PassRunner {
  private app: Express;
  private config: AppConfig;
  private database: DatabaseService;
  private pipeline: IngestionPipeline;
  private maintenance: MaintenanceJob;
  private cronJobs: cron.ScheduledTask[] = [];
  private server: Server | null = null;
  private isShuttingDown = false;

  constructor(config: AppConfig, deps: OrchestratorDeps = {}) {
    this.config = config;

    this.database =
      deps.database ??
      new DatabaseService({
        path: config.store.path,
        synchronize: config.store.synchronize,
        lockTtlMs: config.store.lockTtlMs,
      });

    const browser = new BrowserSessionClient(config.browser, deps.connector ?? connectOverCdp);
    this.pipeline = new IngestionPipeline(this.database, browser, {
      ruleSet: config.extraction.ruleSet,
    });
    this.maintenance = new MaintenanceJob(this.database, config.retention);

    this.app = express();

    // Security middleware
    this.app.use(helmet());
    this.app.use(express.json());
    this.app.use(rateLimit(60000, 100));

    this.setupRoutes();
  }

  get store(): DatabaseService {
    return this.database;
  }

  get httpApp(): Express {
    return this.app;
  }

  async initialize(): Promise<void> {
    await this.database.initialize();
  }

  async runIngestion(): Promise<IngestionReport> {
    return this.pipeline.run();
  }

  async runMaintenance(options: MaintenanceRunOptions = {}): Promise<MaintenanceReport> {
    return this.maintenance.run(options);
  }

  private setupRoutes(): void {
    // Health check endpoints
    this.app.get('/livez', (_req: Request, res: Response) => {
      res.status(200).json({ status: 'alive' });
    });

    this.app.get('/readyz', async (_req: Request, res: Response) => {
      try {
        await this.database.ping();
        res.status(200).json({ status: 'ready' });
      } catch (error) {
        logger.error({ error }, 'Readiness check failed');
        res.status(503).json({ status: 'not ready', error: 'Store unavailable' });
      }
    });

    // Metrics endpoint
    this.app.get('/metrics', async (_req: Request, res: Response) => {
      try {
        res.set('Content-Type', register.contentType);
        res.end(await register.metrics());
      } catch (error) {
        logger.error({ error }, 'Failed to generate metrics');
        res.status(500).end();
      }
    });

    const { maxStoreSizeMb } = this.config.retention;
    const adminApi = new AdminApi(this.database, this, {
      apiKeys: this.config.server.apiKeys,
      maxStoreSizeBytes: maxStoreSizeMb > 0 ? maxStoreSizeMb * 1024 * 1024 : undefined,
    });
    this.app.use('/admin', adminApi.getRouter());
  }

  // Starts the cron schedules and the HTTP server
  async start(): Promise<void> {
    try {
      logger.info('Starting scrape ingest service');

      await this.initialize();
      this.schedule();

      const { host, port } = this.config.server;
      await new Promise<void>((resolve, reject) => {
        const server = this.app.listen(port, host, () => resolve());
        server.once('error', reject);
        this.server = server;
      });
      logger.info({ host, port }, 'HTTP server started');
    } catch (error) {
      logger.error({ error }, 'Failed to start orchestrator');
      throw error;
    }
  }

  async stop(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }
    this.isShuttingDown = true;

    for (const job of this.cronJobs) {
      job.stop();
    }
    this.cronJobs = [];

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
      this.server = null;
      logger.info('HTTP server closed');
    }

    await this.database.close();
    logger.info('Shutdown complete');
  }

  private schedule(): void {
    const { ingest, maintenance } = this.config.schedule;

    if (ingest) {
      this.cronJobs.push(cron.schedule(ingest, () => this.runScheduled('ingestion', () => this.runIngestion())));
      logger.info({ schedule: ingest }, 'Ingestion scheduled');
    }

    if (maintenance) {
      this.cronJobs.push(
        cron.schedule(maintenance, () => this.runScheduled('maintenance', () => this.runMaintenance()))
      );
      logger.info({ schedule: maintenance }, 'Maintenance scheduled');
    }
  }

  private async runScheduled(
    name: string,
    run: () => Promise<IngestionReport | MaintenanceReport>
  ): Promise<void> {
    try {
      const report = await run();
      if (report.reason === 'StoreBusy') {
        logger.info({ job: name }, 'Store busy, skipping scheduled run');
      }
    } catch (error) {
      logger.error({ error, job: name }, 'Scheduled run failed');
    }
  }
}
