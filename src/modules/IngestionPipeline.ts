import { logger, RuleSetChoice } from '../config';
import { DatabaseService, lockOwner } from '../database/DatabaseService';
import { IngestionReport, CapturedDocument } from '../types';
import { metrics, recordDuration } from '../utils/metrics';
import { traced, addSpanAttributes } from '../utils/tracing';
import { errorMessage, isPipelineError } from '../utils/errors';
import { BrowserSessionClient, CaptureOptions } from './BrowserSession';
import { ExtractedRecord, extractRecords, resolveRuleSet } from './Extractor';

export interface IngestionOptions {
  ruleSet: RuleSetChoice;
  /** Prefix of the lock owner token recorded while the pass writes */
  lockLabel?: string;
  capture?: CaptureOptions;
}

function emptyReport(): IngestionReport {
  return {
    status: 'completed',
    ruleSet: null,
    processed: 0,
    created: 0,
    updated: 0,
    duplicatesSkipped: 0,
    dropped: 0,
    failed: 0,
    snapshotId: null,
    source: null,
    durationMs: 0,
  };
}

/**
 * One ingestion pass: capture the current page, extract candidates, upsert them and
 * keep the raw document as a snapshot. Always resolves with a report; capture and store
 * failures end the pass as `aborted`.
 */
export class IngestionPipeline {
  private database: DatabaseService;
  private browser: BrowserSessionClient;
  private options: IngestionOptions;

  constructor(database: DatabaseService, browser: BrowserSessionClient, options: IngestionOptions) {
    this.database = database;
    this.browser = browser;
    this.options = options;
  }

  @traced('IngestionPipeline.run')
  async run(): Promise<IngestionReport> {
    const startedAt = Date.now();
    const endTimer = recordDuration(metrics.ingestionDuration);
    const report = emptyReport();
    let locked = false;

    try {
      const document = await this.browser.capture(this.options.capture);
      report.source = {
        url: document.url,
        title: document.title,
        contentLength: document.content.length,
      };

      await this.database.withLock(lockOwner(this.options.lockLabel ?? 'ingest'), () => {
        locked = true;
        return this.ingest(document, report);
      });
    } catch (error) {
      if (!isPipelineError(error)) {
        throw error;
      }
      report.status = 'aborted';
      report.reason = error.code;
      report.error = error.message;
      logger.error({ reason: error.code, error: error.message }, 'Ingestion pass aborted');
    } finally {
      endTimer();
    }

    report.durationMs = Date.now() - startedAt;
    metrics.ingestionRuns.labels({ status: report.status, reason: report.reason ?? 'none' }).inc();
    addSpanAttributes({
      'ingest.status': report.status,
      'ingest.created': report.created,
      'ingest.updated': report.updated,
    });

    // A pass that never held the lock has not touched the store
    if (locked) {
      await this.database.createAuditLog(`ingestion_${report.status}`, 'ingestion', report.source?.url ?? 'unknown', {
        ...report,
      });
    }

    logger.info(
      {
        status: report.status,
        ruleSet: report.ruleSet,
        created: report.created,
        updated: report.updated,
        duplicatesSkipped: report.duplicatesSkipped,
        dropped: report.dropped,
        failed: report.failed,
        durationMs: report.durationMs,
      },
      'Ingestion pass finished'
    );

    return report;
  }

  private async ingest(document: CapturedDocument, report: IngestionReport): Promise<void> {
    const ruleSet = resolveRuleSet(this.options.ruleSet, document.content, document.url);
    report.ruleSet = ruleSet.name;

    let candidates: Iterable<ExtractedRecord> = [];
    try {
      candidates = extractRecords(document.content, ruleSet, {
        baseUrl: document.url || undefined,
        onDrop: () => {
          report.dropped++;
          metrics.recordsIngested.labels({ outcome: 'dropped' }).inc();
        },
      });
    } catch (error) {
      if (!isPipelineError(error, 'MalformedDocument')) {
        throw error;
      }
      report.status = 'degraded';
      report.reason = error.code;
      report.error = error.message;
      logger.warn({ url: document.url, error: error.message }, 'Captured document could not be parsed');
    }

    const seen = new Set<string>();
    let firstCreatedId: number | null = null;

    for (const candidate of candidates) {
      report.processed++;

      if (seen.has(candidate.naturalKey)) {
        report.duplicatesSkipped++;
        metrics.recordsIngested.labels({ outcome: 'duplicate' }).inc();
        continue;
      }
      seen.add(candidate.naturalKey);

      try {
        const { record, created } = await this.database.upsertRecord(candidate);
        if (created) {
          report.created++;
          if (firstCreatedId === null) {
            firstCreatedId = record.id;
          }
        } else {
          report.updated++;
        }
        metrics.recordsIngested.labels({ outcome: created ? 'created' : 'updated' }).inc();
      } catch (error) {
        if (!isPipelineError(error, 'ConstraintViolation')) {
          throw error;
        }
        report.failed++;
        metrics.recordsIngested.labels({ outcome: 'failed' }).inc();
        logger.warn({ naturalKey: candidate.naturalKey, error: errorMessage(error) }, 'Record rejected by store');
      }
    }

    const snapshot = await this.database.addSnapshot({
      recordId: firstCreatedId,
      content: document.content,
      capturedAt: document.capturedAt,
      sourceUrl: document.url || null,
      pageTitle: document.title || null,
    });
    report.snapshotId = snapshot.id;
    metrics.snapshotsWritten.labels({ linked: String(firstCreatedId !== null) }).inc();
  }
}
