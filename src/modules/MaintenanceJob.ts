import { logger, RetentionSettings } from '../config';
import { DatabaseService, lockOwner } from '../database/DatabaseService';
import { MaintenanceReport, RetentionRule, StoreHealth } from '../types';
import { metrics, recordDuration } from '../utils/metrics';
import { traced, addSpanAttributes } from '../utils/tracing';
import { errorMessage, isPipelineError } from '../utils/errors';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface MaintenanceRunOptions {
  checkOnly?: boolean;
  /** Prefix of the lock owner token */
  lockLabel?: string;
}

/**
 * Retention rules in the order they are applied. A snapshot window of 0 days
 * disables age-based snapshot pruning; unset limits add no rule.
 */
export function retentionRules(settings: RetentionSettings): RetentionRule[] {
  const rules: RetentionRule[] = [];

  if (settings.snapshotRetentionDays > 0) {
    rules.push({ target: 'snapshots', maxAgeMs: settings.snapshotRetentionDays * DAY_MS });
  }
  if (settings.maxSnapshotCount !== undefined) {
    rules.push({ target: 'snapshots', maxCount: settings.maxSnapshotCount });
  }
  if (settings.recordRetentionDays !== undefined) {
    rules.push({ target: 'records', maxAgeMs: settings.recordRetentionDays * DAY_MS });
  }
  if (settings.maxRecordCount !== undefined) {
    rules.push({ target: 'records', maxCount: settings.maxRecordCount });
  }

  return rules;
}

export class MaintenanceJob {
  private database: DatabaseService;
  private settings: RetentionSettings;
  private rules: RetentionRule[];

  constructor(database: DatabaseService, settings: RetentionSettings) {
    this.database = database;
    this.settings = settings;
    this.rules = retentionRules(settings);
  }

  private get maxSizeBytes(): number | undefined {
    return this.settings.maxStoreSizeMb > 0 ? this.settings.maxStoreSizeMb * 1024 * 1024 : undefined;
  }

  @traced('MaintenanceJob.run')
  async run(options: MaintenanceRunOptions = {}): Promise<MaintenanceReport> {
    const startedAt = Date.now();
    const checkOnly = options.checkOnly ?? false;
    const mode = checkOnly ? 'check' : 'full';
    const endTimer = recordDuration(metrics.maintenanceDuration);
    let locked = false;

    const report: MaintenanceReport = {
      status: 'completed',
      checkOnly,
      duplicates: null,
      dedupe: null,
      pruned: [],
      orphansRemoved: 0,
      staleSessionsMarked: 0,
      optimized: false,
      health: null,
      durationMs: 0,
    };

    try {
      if (checkOnly) {
        report.duplicates = await this.database.getDuplicateStats();
        report.health = await this.database.getHealth(this.maxSizeBytes);
      } else {
        await this.database.withLock(lockOwner(options.lockLabel ?? 'maintenance'), () => {
          locked = true;
          return this.sweep(report);
        });
        await this.compactIfFragmented(report);
      }

      if (report.health) {
        this.recordHealth(report.health);
        if (!report.health.integrityOk || report.health.sizeLimitExceeded) {
          report.status = 'degraded';
        }
      }
    } catch (error) {
      if (!isPipelineError(error)) {
        throw error;
      }
      report.status = 'aborted';
      report.reason = error.code;
      report.error = error.message;
      logger.error({ reason: error.code, error: error.message }, 'Maintenance run aborted');
    } finally {
      endTimer();
    }

    report.durationMs = Date.now() - startedAt;
    metrics.maintenanceRuns.labels({ status: report.status, mode }).inc();
    addSpanAttributes({ 'maintenance.status': report.status, 'maintenance.mode': mode });

    // Check-only runs and runs refused the lock leave the store untouched
    if (locked) {
      await this.database.createAuditLog(`maintenance_${report.status}`, 'maintenance', mode, {
        dedupe: report.dedupe,
        pruned: report.pruned,
        orphansRemoved: report.orphansRemoved,
        staleSessionsMarked: report.staleSessionsMarked,
        optimized: report.optimized,
        reason: report.reason,
      });
    }

    logger.info(
      {
        status: report.status,
        mode,
        recordsRemoved: report.dedupe?.recordsRemoved ?? 0,
        pruned: report.pruned.reduce((sum, outcome) => sum + outcome.removed, 0),
        orphansRemoved: report.orphansRemoved,
        staleSessionsMarked: report.staleSessionsMarked,
        optimized: report.optimized,
        durationMs: report.durationMs,
      },
      'Maintenance run finished'
    );

    return report;
  }

  private async sweep(report: MaintenanceReport): Promise<void> {
    report.duplicates = await this.database.getDuplicateStats();

    report.dedupe = await this.database.dedupe();
    metrics.duplicatesRemoved.inc(report.dedupe.recordsRemoved);

    for (const rule of this.rules) {
      const removed = await this.database.prune(rule);
      report.pruned.push({ rule, removed });
      metrics.rowsPruned.labels({ table: rule.target }).inc(removed);
    }

    // Records outlive their snapshots by at most one snapshot window
    if (this.settings.snapshotRetentionDays > 0) {
      report.orphansRemoved = await this.database.pruneOrphanRecords(this.settings.snapshotRetentionDays * DAY_MS);
      metrics.rowsPruned.labels({ table: 'records' }).inc(report.orphansRemoved);
    }

    report.staleSessionsMarked = await this.database.markStaleSessions(
      this.settings.sessionIncompleteThresholdDays * DAY_MS
    );

    report.health = await this.database.getHealth(this.maxSizeBytes);

    if (!report.health.integrityOk) {
      logger.error({ integrity: report.health.integrity }, 'Store integrity check failed');
    }
    if (report.health.sizeLimitExceeded) {
      logger.warn(
        { sizeBytes: report.health.sizeBytes, limitBytes: report.health.sizeLimitBytes },
        'Store exceeds its size limit'
      );
    }
  }

  // VACUUM rewrites the whole file, so it runs after the lock is released
  private async compactIfFragmented(report: MaintenanceReport): Promise<void> {
    const health = report.health;
    if (!health || health.freePages === 0 || health.fragmentation < this.settings.vacuumFragmentationRatio) {
      return;
    }

    try {
      await this.database.optimize();
      report.optimized = true;
      report.health = await this.database.getHealth(this.maxSizeBytes);
    } catch (error) {
      if (!isPipelineError(error)) {
        throw error;
      }
      report.status = 'degraded';
      logger.warn({ error: errorMessage(error) }, 'Store compaction failed');
    }
  }

  private recordHealth(health: StoreHealth): void {
    metrics.storeSizeBytes.set(health.sizeBytes);
    metrics.storeFragmentation.set(health.fragmentation);
    metrics.storeRows.labels({ table: 'records' }).set(health.records);
    metrics.storeRows.labels({ table: 'snapshots' }).set(health.snapshots);
    metrics.storeRows.labels({ table: 'artifacts' }).set(health.artifacts);
  }
}
