import { MaintenanceJob, retentionRules } from '../../src/modules/MaintenanceJob';
import { DatabaseService, lockOwner } from '../../src/database/DatabaseService';
import { RetentionSettings } from '../../src/config';
import { RecordInput } from '../../src/types';

const DAY = 24 * 60 * 60 * 1000;
const START = Date.parse('2024-06-01T00:00:00Z');

const baseSettings: RetentionSettings = {
  snapshotRetentionDays: 30,
  sessionIncompleteThresholdDays: 1,
  maxStoreSizeMb: 500,
  vacuumFragmentationRatio: 1,
};

function record(naturalKey: string, kind: RecordInput['kind'] = 'job'): RecordInput {
  return { naturalKey, kind, title: naturalKey, description: '', sourceUrl: null, fields: {} };
}

describe('retentionRules', () => {
  it('should build rules in application order', () => {
    expect(
      retentionRules({ ...baseSettings, maxSnapshotCount: 100, recordRetentionDays: 90, maxRecordCount: 5000 })
    ).toEqual([
      { target: 'snapshots', maxAgeMs: 30 * DAY },
      { target: 'snapshots', maxCount: 100 },
      { target: 'records', maxAgeMs: 90 * DAY },
      { target: 'records', maxCount: 5000 },
    ]);
  });

  it('should skip the snapshot age rule when retention is zero days', () => {
    expect(retentionRules({ ...baseSettings, snapshotRetentionDays: 0 })).toEqual([]);
  });
});

describe('MaintenanceJob', () => {
  let now: number;
  let store: DatabaseService;

  beforeEach(async () => {
    now = START;
    store = new DatabaseService({ path: ':memory:', clock: () => new Date(now) });
    await store.initialize();
  });

  afterEach(async () => {
    await store.close();
  });

  async function seed(): Promise<void> {
    await store.upsertRecord(record('chat:web:Jane:1', 'chat'));
    await store.upsertRecord(record('https://example.com/jobs/1'));
    await store.addSnapshot({ recordId: null, content: '<html>old</html>', capturedAt: new Date(START - 40 * DAY) });
    now += 2 * DAY;
    await store.upsertRecord(record('https://example.com/jobs/1/?utm_source=mail'));
    await store.addSnapshot({ recordId: null, content: '<html>new</html>' });
  }

  it('should dedupe, prune and flag stale sessions in a full run', async () => {
    await seed();
    const job = new MaintenanceJob(store, baseSettings);

    const report = await job.run({ lockLabel: 'maintenance:test' });

    expect(report).toMatchObject({
      status: 'completed',
      checkOnly: false,
      duplicates: { totalRecords: 3, duplicateGroups: 1, potentialDuplicates: 1 },
      dedupe: { groups: 1, recordsRemoved: 1, snapshotsRelinked: 0, artifactsRelinked: 0 },
      pruned: [{ rule: { target: 'snapshots', maxAgeMs: 30 * DAY }, removed: 1 }],
      orphansRemoved: 0,
      staleSessionsMarked: 1,
      optimized: false,
    });
    expect(report.health).toMatchObject({ records: 2, snapshots: 1, integrityOk: true, sizeLimitExceeded: false });
    expect((await store.getRecordByKey('chat:web:Jane:1'))?.status).toBe('incomplete');

    const [audit] = await store.getAuditLogs('maintenance');
    expect(audit.action).toBe('maintenance_completed');
    expect(audit.entityId).toBe('full');
  });

  it('should only report in check-only mode', async () => {
    await seed();
    const job = new MaintenanceJob(store, baseSettings);

    const report = await job.run({ checkOnly: true });

    expect(report).toMatchObject({
      status: 'completed',
      checkOnly: true,
      duplicates: { totalRecords: 3, duplicateGroups: 1, potentialDuplicates: 1 },
      dedupe: null,
      pruned: [],
      staleSessionsMarked: 0,
    });
    expect(report.health?.snapshots).toBe(2);
    expect(await store.listRecords()).toHaveLength(3);
    expect(await store.getAuditLogs('maintenance')).toEqual([]);
  });

  it('should run checks even while another pass holds the lock', async () => {
    await store.acquireLock('ingest:other');
    const job = new MaintenanceJob(store, baseSettings);

    expect((await job.run({ checkOnly: true })).status).toBe('completed');

    const full = await job.run();
    expect(full.status).toBe('aborted');
    expect(full.reason).toBe('StoreBusy');
    expect(full.health).toBeNull();
    expect(await store.getAuditLogs('maintenance')).toEqual([]);
  });

  it('should refuse a second run while the first still holds the lock', async () => {
    const job = new MaintenanceJob(store, baseSettings);

    const nested = await store.withLock(lockOwner('maintenance'), () => job.run());

    expect(nested.status).toBe('aborted');
    expect(nested.reason).toBe('StoreBusy');
    expect((await job.run()).status).toBe('completed');
  });

  it('should remove job records left without snapshots or artifacts', async () => {
    await store.upsertRecord(record('https://example.com/jobs/forgotten'));
    const kept = await store.upsertRecord(record('https://example.com/jobs/with-reply'));
    await store.addArtifact(kept.record.id, { providerKind: 'reply', provider: 'test', text: 'Thanks' });
    await store.upsertRecord(record('chat:web:Sam', 'chat'));
    now += 40 * DAY;
    await store.upsertRecord(record('https://example.com/jobs/recent'));
    const job = new MaintenanceJob(store, baseSettings);

    const report = await job.run();

    expect(report.orphansRemoved).toBe(1);
    expect((await store.listRecords()).map((row) => row.naturalKey)).toEqual([
      'https://example.com/jobs/with-reply',
      'chat:web:Sam',
      'https://example.com/jobs/recent',
    ]);
  });

  it('should compact the store once free pages pass the threshold', async () => {
    await store.addSnapshot({ recordId: null, content: 'x'.repeat(200_000), capturedAt: new Date(START - 40 * DAY) });
    const job = new MaintenanceJob(store, { ...baseSettings, vacuumFragmentationRatio: 0.01 });

    const report = await job.run();

    expect(report.pruned[0].removed).toBe(1);
    expect(report.optimized).toBe(true);
    expect(report.health?.freePages).toBe(0);
  });

  it('should degrade when the store is over its size limit', async () => {
    const job = new MaintenanceJob(store, { ...baseSettings, maxStoreSizeMb: 0.001 });

    const report = await job.run({ checkOnly: true });

    expect(report.status).toBe('degraded');
    expect(report.health?.sizeLimitExceeded).toBe(true);
  });

  it('should abort when the store is closed', async () => {
    await store.close();
    const job = new MaintenanceJob(store, baseSettings);

    const report = await job.run({ checkOnly: true });

    expect(report.status).toBe('aborted');
    expect(report.reason).toBe('StoreUnavailable');
  });
});
