import { register, Counter, Gauge, Histogram, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

// Initialize default metrics collection
if (config.features.metrics) {
  collectDefaultMetrics({ register });
}

// Custom metrics
export const metrics = {
  // Ingestion metrics
  ingestionRuns: new Counter({
    name: 'ingestion_runs_total',
    help: 'Total number of ingestion passes by outcome',
    labelNames: ['status', 'reason'],
  }),

  recordsIngested: new Counter({
    name: 'records_ingested_total',
    help: 'Candidate records handled by the ingestion pipeline',
    labelNames: ['outcome'],
  }),

  snapshotsWritten: new Counter({
    name: 'snapshots_written_total',
    help: 'Total number of raw page snapshots stored',
    labelNames: ['linked'],
  }),

  ingestionDuration: new Histogram({
    name: 'ingestion_duration_seconds',
    help: 'Duration of one ingestion pass',
    buckets: [0.5, 1, 2, 5, 10, 30, 60],
  }),

  // Browser metrics
  captureFailures: new Counter({
    name: 'browser_capture_failures_total',
    help: 'Page captures that aborted an ingestion pass',
    labelNames: ['reason'],
  }),

  capturedContentLength: new Histogram({
    name: 'browser_captured_content_length_chars',
    help: 'Length of captured page documents',
    buckets: [1000, 10_000, 100_000, 500_000, 1_000_000, 5_000_000],
  }),

  // Maintenance metrics
  maintenanceRuns: new Counter({
    name: 'maintenance_runs_total',
    help: 'Total number of maintenance runs by outcome',
    labelNames: ['status', 'mode'],
  }),

  rowsPruned: new Counter({
    name: 'rows_pruned_total',
    help: 'Rows deleted by retention rules',
    labelNames: ['table'],
  }),

  duplicatesRemoved: new Counter({
    name: 'duplicate_records_removed_total',
    help: 'Records collapsed by the dedup sweep',
  }),

  maintenanceDuration: new Histogram({
    name: 'maintenance_duration_seconds',
    help: 'Duration of one maintenance run',
    buckets: [0.1, 0.5, 1, 5, 10, 30, 60],
  }),

  // Store metrics
  storeSizeBytes: new Gauge({
    name: 'store_size_bytes',
    help: 'Size of the SQLite store file as reported by the page counters',
  }),

  storeFragmentation: new Gauge({
    name: 'store_fragmentation_ratio',
    help: 'Share of free pages in the SQLite store',
  }),

  storeRows: new Gauge({
    name: 'store_rows',
    help: 'Row counts per table',
    labelNames: ['table'],
  }),

  artifactsStored: new Counter({
    name: 'artifacts_stored_total',
    help: 'Generated artifacts attached to records',
    labelNames: ['provider_kind'],
  }),
};

// Export the registry for use in Express endpoint
export { register };

// Helper function to record duration
export function recordDuration(
  histogram: Histogram<string>,
  labels: Record<string, string> = {}
): () => void {
  const start = Date.now();
  return () => {
    const duration = (Date.now() - start) / 1000;
    histogram.labels(labels).observe(duration);
  };
}
