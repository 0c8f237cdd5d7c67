import 'reflect-metadata';
import { randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { DataSource, EntityManager, In, QueryFailedError } from 'typeorm';
import { logger } from '../config';
import { entities, ScrapedRecord, Snapshot, Artifact, AuditLog, StoreLock } from './entities';
import {
  ArtifactInput,
  DedupeResult,
  DuplicateStats,
  RecordFields,
  RecordInput,
  RecordKind,
  RetentionRule,
  SnapshotInput,
  StoreHealth,
} from '../types';
import {
  ConstraintViolationError,
  StoreBusyError,
  StoreUnavailableError,
  errorMessage,
  isPipelineError,
} from '../utils/errors';
import { keyFingerprint } from '../utils/url';

export interface StoreOptions {
  /** SQLite file path, or ':memory:' */
  path: string;
  synchronize?: boolean;
  logging?: boolean;
  lockTtlMs?: number;
  clock?: () => Date;
}

export interface UpsertResult {
  record: ScrapedRecord;
  created: boolean;
}

const STORE_LOCK = 'store';
const ID_CHUNK_SIZE = 500;

const UNAVAILABLE_CODES = [
  'SQLITE_CANTOPEN',
  'SQLITE_IOERR',
  'SQLITE_READONLY',
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'SQLITE_CORRUPT',
  'SQLITE_NOTADB',
  'SQLITE_FULL',
  'SQLITE_PERM',
];

function sqliteErrorCode(error: unknown): string | undefined {
  const driverError = error instanceof QueryFailedError ? error.driverError : error;
  if (typeof driverError === 'object' && driverError !== null && 'code' in driverError) {
    return typeof driverError.code === 'string' ? driverError.code : undefined;
  }
  return undefined;
}

/** Lock owner token for one pass; two passes never share one, even in the same process */
export function lockOwner(label: string): string {
  return `${label}:${process.pid}:${randomUUID()}`;
}

function chunk<T>(items: T[], size = ID_CHUNK_SIZE): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

function groupByFingerprint(records: ScrapedRecord[]): ScrapedRecord[][] {
  const groups = new Map<string, ScrapedRecord[]>();
  for (const record of records) {
    const fingerprint = keyFingerprint(record.naturalKey);
    const group = groups.get(fingerprint);
    if (group) {
      group.push(record);
    } else {
      groups.set(fingerprint, [record]);
    }
  }
  return [...groups.values()];
}

// A rescrape of a chat session keeps earlier messages and appends the unseen ones
function mergeMessages(previous: RecordFields, next: RecordFields): RecordFields {
  const before = previous.messages;
  const after = next.messages;
  if (!Array.isArray(before) || !Array.isArray(after)) {
    return next;
  }

  const seen = new Set(before);
  return { ...next, messages: [...before, ...after.filter((message) => !seen.has(message))] };
}

function firstColumnValues(rows: unknown): unknown[] {
  if (!Array.isArray(rows)) {
    return [];
  }
  return rows.map((row: unknown) => {
    if (typeof row !== 'object' || row === null) {
      return undefined;
    }
    const values: unknown[] = Object.values(row);
    return values[0];
  });
}

/**
 * Record, snapshot and artifact store on a single SQLite file.
 * Every mutating operation runs in its own transaction.
 */
export class DatabaseService {
  private dataSource: DataSource;
  private isInitialized = false;
  private readonly storePath: string;
  private readonly lockTtlMs: number;
  private readonly now: () => Date;

  constructor(options: StoreOptions) {
    this.storePath = options.path;
    this.lockTtlMs = options.lockTtlMs ?? 3_600_000;
    this.now = options.clock ?? (() => new Date());

    this.dataSource = new DataSource({
      type: 'better-sqlite3',
      database: options.path,
      entities,
      synchronize: options.synchronize ?? true,
      logging: options.logging ?? false,
      enableWAL: options.path !== ':memory:',
    });
  }

  async initialize(): Promise<void> {
    if (this.isInitialized) {
      return;
    }

    try {
      if (this.storePath !== ':memory:') {
        await fs.mkdir(path.dirname(path.resolve(this.storePath)), { recursive: true });
      }
      await this.dataSource.initialize();
      this.isInitialized = true;
      logger.info({ path: this.storePath }, 'Store opened');
    } catch (error) {
      logger.error({ error, path: this.storePath }, 'Failed to open store');
      throw new StoreUnavailableError(
        `Cannot open store at ${this.storePath}: ${errorMessage(error)}`,
        error
      );
    }
  }

  async close(): Promise<void> {
    if (this.isInitialized) {
      await this.dataSource.destroy();
      this.isInitialized = false;
      logger.info({ path: this.storePath }, 'Store closed');
    }
  }

  async ping(): Promise<void> {
    await this.run('ping', (manager) => manager.query('SELECT 1'), false);
  }

  // Record operations

  /**
   * Inserts the record, or refreshes the mutable fields of the row holding the same
   * natural key. Identity key and creation time are never rewritten, and a chat
   * session only gains messages.
   */
  async upsertRecord(input: RecordInput): Promise<UpsertResult> {
    const now = this.now();

    return this.run('upsertRecord', async (manager) => {
      const repository = manager.getRepository(ScrapedRecord);
      const existing = await repository.findOne({ where: { naturalKey: input.naturalKey } });

      if (existing) {
        existing.title = input.title;
        existing.description = input.description;
        existing.sourceUrl = input.sourceUrl ?? existing.sourceUrl;
        existing.fields = existing.kind === 'chat' ? mergeMessages(existing.fields, input.fields) : input.fields;
        existing.lastSeenAt = now;
        existing.updatedAt = now;
        return { record: await repository.save(existing), created: false };
      }

      const record = repository.create({
        naturalKey: input.naturalKey,
        kind: input.kind,
        title: input.title,
        description: input.description,
        sourceUrl: input.sourceUrl,
        fields: input.fields,
        status: 'active',
        artifactKinds: [],
        createdAt: now,
        updatedAt: now,
        lastSeenAt: now,
      });
      return { record: await repository.save(record), created: true };
    });
  }

  async getRecordById(id: number): Promise<ScrapedRecord | null> {
    return this.run('getRecordById', (manager) => manager.findOne(ScrapedRecord, { where: { id } }), false);
  }

  async getRecordByKey(naturalKey: string): Promise<ScrapedRecord | null> {
    return this.run(
      'getRecordByKey',
      (manager) => manager.findOne(ScrapedRecord, { where: { naturalKey } }),
      false
    );
  }

  async listRecords(): Promise<ScrapedRecord[]> {
    return this.run(
      'listRecords',
      (manager) => manager.find(ScrapedRecord, { order: { createdAt: 'ASC', id: 'ASC' } }),
      false
    );
  }

  /**
   * Oldest-created record still missing an artifact of `providerKind`.
   * Ties on creation time go to the lower row id, so every record is eventually covered.
   */
  async findLatestWithoutArtifact(
    providerKind: string,
    recordKind?: RecordKind
  ): Promise<ScrapedRecord | null> {
    return this.run(
      'findLatestWithoutArtifact',
      async (manager) => {
        const query = manager
          .createQueryBuilder(ScrapedRecord, 'record')
          .where((qb) => {
            const subQuery = qb
              .subQuery()
              .select('1')
              .from(Artifact, 'artifact')
              .where('artifact.recordId = record.id')
              .andWhere('artifact.providerKind = :providerKind')
              .getQuery();
            return `NOT EXISTS ${subQuery}`;
          })
          .setParameter('providerKind', providerKind);

        if (recordKind) {
          query.andWhere('record.kind = :recordKind', { recordKind });
        }

        return query
          .orderBy('record.createdAt', 'ASC')
          .addOrderBy('record.id', 'ASC')
          .limit(1)
          .getOne();
      },
      false
    );
  }

  async deleteRecord(id: number): Promise<boolean> {
    const removed = await this.run('deleteRecord', (manager) => this.deleteRecordsCascade(manager, [id]));
    if (removed > 0) {
      await this.createAuditLog('record_deleted', 'record', String(id));
    }
    return removed > 0;
  }

  // Snapshot operations

  async addSnapshot(input: SnapshotInput): Promise<Snapshot> {
    return this.run(
      'addSnapshot',
      (manager) =>
        manager.save(
          manager.create(Snapshot, {
            recordId: input.recordId,
            content: input.content,
            contentLength: input.content.length,
            sourceUrl: input.sourceUrl ?? null,
            pageTitle: input.pageTitle ?? null,
            capturedAt: input.capturedAt ?? this.now(),
          })
        ),
      false
    );
  }

  async listSnapshots(): Promise<Snapshot[]> {
    return this.run(
      'listSnapshots',
      (manager) => manager.find(Snapshot, { order: { capturedAt: 'ASC', id: 'ASC' } }),
      false
    );
  }

  // Artifact operations

  async addArtifact(recordId: number, input: ArtifactInput): Promise<Artifact> {
    if (input.providerKind.includes(',')) {
      throw new ConstraintViolationError(`Provider kind "${input.providerKind}" must not contain commas`);
    }

    const artifact = await this.run('addArtifact', async (manager) => {
      const record = await manager.findOne(ScrapedRecord, { where: { id: recordId } });
      if (!record) {
        throw new ConstraintViolationError(`Record ${recordId} does not exist`);
      }

      const saved = await manager.save(
        manager.create(Artifact, {
          recordId,
          providerKind: input.providerKind,
          provider: input.provider,
          text: input.text,
          generatedAt: input.generatedAt ?? this.now(),
        })
      );

      if (!record.artifactKinds.includes(input.providerKind)) {
        record.artifactKinds = [...record.artifactKinds, input.providerKind];
        await manager.save(record);
      }

      return saved;
    });

    await this.createAuditLog('artifact_added', 'record', String(recordId), {
      artifactId: artifact.id,
      providerKind: artifact.providerKind,
      provider: artifact.provider,
    });

    return artifact;
  }

  async listArtifacts(recordId: number): Promise<Artifact[]> {
    return this.run(
      'listArtifacts',
      (manager) => manager.find(Artifact, { where: { recordId }, order: { generatedAt: 'ASC', id: 'ASC' } }),
      false
    );
  }

  // Maintenance operations

  /**
   * Collapses records whose natural keys share a fingerprint into the earliest-created
   * row. Snapshots and artifacts of the removed rows move to the kept row.
   */
  async dedupe(): Promise<DedupeResult> {
    return this.run('dedupe', async (manager) => {
      const records = await manager.find(ScrapedRecord, {
        select: { id: true, naturalKey: true, createdAt: true, lastSeenAt: true, artifactKinds: true },
        order: { createdAt: 'ASC', id: 'ASC' },
      });

      const result: DedupeResult = { groups: 0, recordsRemoved: 0, snapshotsRelinked: 0, artifactsRelinked: 0 };

      for (const group of groupByFingerprint(records)) {
        if (group.length < 2) {
          continue;
        }

        const [keeper, ...duplicates] = group;
        const ids = duplicates.map((record) => record.id);

        result.groups++;
        result.snapshotsRelinked += await manager.count(Snapshot, { where: { recordId: In(ids) } });
        result.artifactsRelinked += await manager.count(Artifact, { where: { recordId: In(ids) } });

        for (const part of chunk(ids)) {
          await manager
            .createQueryBuilder()
            .update(Snapshot)
            .set({ recordId: keeper.id })
            .where('recordId IN (:...ids)', { ids: part })
            .execute();
          await manager
            .createQueryBuilder()
            .update(Artifact)
            .set({ recordId: keeper.id })
            .where('recordId IN (:...ids)', { ids: part })
            .execute();
        }

        const artifactKinds = [...new Set(group.flatMap((record) => record.artifactKinds))];
        const lastSeenAt = new Date(Math.max(...group.map((record) => record.lastSeenAt.getTime())));
        await manager.update(ScrapedRecord, { id: keeper.id }, { artifactKinds, lastSeenAt });

        result.recordsRemoved += await this.deleteRecordsCascade(manager, ids);

        logger.info(
          { keep: keeper.naturalKey, removed: duplicates.map((record) => record.naturalKey) },
          'Collapsed duplicate records'
        );
      }

      return result;
    });
  }

  async getDuplicateStats(): Promise<DuplicateStats> {
    return this.run(
      'getDuplicateStats',
      async (manager) => {
        const records = await manager.find(ScrapedRecord, { select: { id: true, naturalKey: true } });
        const duplicates = groupByFingerprint(records).filter((group) => group.length > 1);

        return {
          totalRecords: records.length,
          duplicateGroups: duplicates.length,
          potentialDuplicates: duplicates.reduce((sum, group) => sum + group.length - 1, 0),
        };
      },
      false
    );
  }

  /**
   * Applies one retention rule. Snapshots age by capture time, records by the last
   * time a pass saw them. Removing a record removes its snapshots and artifacts too.
   */
  async prune(rule: RetentionRule): Promise<number> {
    const now = this.now();

    return this.run(`prune:${rule.target}`, async (manager) => {
      const ids = await this.selectPruneIds(manager, rule, now);
      if (ids.length === 0) {
        return 0;
      }

      if (rule.target === 'records') {
        return this.deleteRecordsCascade(manager, ids);
      }

      for (const part of chunk(ids)) {
        await manager.createQueryBuilder().delete().from(Snapshot).where('id IN (:...ids)', { ids: part }).execute();
      }
      return ids.length;
    });
  }

  async markStaleSessions(thresholdMs: number): Promise<number> {
    const now = this.now();
    const cutoff = now.getTime() - thresholdMs;

    return this.run('markStaleSessions', async (manager) => {
      const stale = await manager
        .createQueryBuilder(ScrapedRecord, 'record')
        .select('record.id', 'id')
        .where('record.kind = :kind', { kind: 'chat' })
        .andWhere('record.status = :status', { status: 'active' })
        .andWhere('record.lastSeenAt < :cutoff', { cutoff })
        .getRawMany<{ id: number }>();

      const ids = stale.map((row) => Number(row.id));
      for (const part of chunk(ids)) {
        await manager.update(ScrapedRecord, { id: In(part) }, { status: 'incomplete', updatedAt: now });
      }
      return ids.length;
    });
  }

  /**
   * Removes job records that nothing in the store refers to any more: no snapshot,
   * no artifact, and not seen within `maxAgeMs`.
   */
  async pruneOrphanRecords(maxAgeMs: number): Promise<number> {
    const cutoff = this.now().getTime() - maxAgeMs;

    return this.run('pruneOrphanRecords', async (manager) => {
      const orphans = await manager
        .createQueryBuilder(ScrapedRecord, 'record')
        .select('record.id', 'id')
        .where('record.kind = :kind', { kind: 'job' })
        .andWhere('record.lastSeenAt < :cutoff', { cutoff })
        .andWhere((qb) => {
          const subQuery = qb
            .subQuery()
            .select('1')
            .from(Snapshot, 'snapshot')
            .where('snapshot.recordId = record.id')
            .getQuery();
          return `NOT EXISTS ${subQuery}`;
        })
        .andWhere((qb) => {
          const subQuery = qb
            .subQuery()
            .select('1')
            .from(Artifact, 'artifact')
            .where('artifact.recordId = record.id')
            .getQuery();
          return `NOT EXISTS ${subQuery}`;
        })
        .getRawMany<{ id: number }>();

      const ids = orphans.map((row) => Number(row.id));
      return ids.length > 0 ? this.deleteRecordsCascade(manager, ids) : 0;
    });
  }

  async getHealth(maxSizeBytes?: number): Promise<StoreHealth> {
    return this.run(
      'getHealth',
      async (manager) => {
        const [records, snapshots, orphanSnapshots, artifacts] = await Promise.all([
          manager.count(ScrapedRecord),
          manager.count(Snapshot),
          manager.createQueryBuilder(Snapshot, 'snapshot').where('snapshot.recordId IS NULL').getCount(),
          manager.count(Artifact),
        ]);

        const pageCount = Number(firstColumnValues(await manager.query('PRAGMA page_count'))[0] ?? 0);
        const pageSize = Number(firstColumnValues(await manager.query('PRAGMA page_size'))[0] ?? 0);
        const freePages = Number(firstColumnValues(await manager.query('PRAGMA freelist_count'))[0] ?? 0);
        const integrity = firstColumnValues(await manager.query('PRAGMA integrity_check')).map(String);

        const sizeBytes = pageCount * pageSize;
        const sizeLimitBytes = maxSizeBytes ?? null;

        return {
          records,
          snapshots,
          orphanSnapshots,
          artifacts,
          sizeBytes,
          pageCount,
          freePages,
          fragmentation: pageCount > 0 ? freePages / pageCount : 0,
          integrity,
          integrityOk: integrity.length === 1 && integrity[0] === 'ok',
          sizeLimitBytes,
          sizeLimitExceeded: sizeLimitBytes !== null && sizeBytes > sizeLimitBytes,
        };
      },
      false
    );
  }

  // Rebuilds the file to drop free pages; cannot run inside a transaction
  async optimize(): Promise<void> {
    await this.run('optimize', (manager) => manager.query('VACUUM'), false);
    logger.info({ path: this.storePath }, 'Store compacted');
  }

  // Lock operations

  async acquireLock(owner: string, name: string = STORE_LOCK): Promise<void> {
    const now = this.now();

    try {
      await this.run('acquireLock', async (manager) => {
        const repository = manager.getRepository(StoreLock);
        const current = await repository.findOne({ where: { name } });

        // Not re-entrant: a live lock refuses its own owner too
        if (current && current.expiresAt.getTime() > now.getTime()) {
          throw new StoreBusyError(name, current.owner);
        }

        if (current) {
          logger.warn({ name, previousOwner: current.owner, owner }, 'Taking over expired store lock');
          await repository.delete({ name });
        }

        await repository.insert({
          name,
          owner,
          acquiredAt: now,
          expiresAt: new Date(now.getTime() + this.lockTtlMs),
        });
      });
    } catch (error) {
      // Another writer inserted the row between our read and write
      if (isPipelineError(error, 'ConstraintViolation')) {
        throw new StoreBusyError(name, 'another process');
      }
      throw error;
    }
  }

  async releaseLock(owner: string, name: string = STORE_LOCK): Promise<void> {
    await this.run('releaseLock', async (manager) => {
      await manager.delete(StoreLock, { name, owner });
    });
  }

  async withLock<T>(owner: string, fn: () => Promise<T>): Promise<T> {
    await this.acquireLock(owner);
    try {
      return await fn();
    } finally {
      await this.releaseLock(owner);
    }
  }

  // Audit operations

  async createAuditLog(
    action: string,
    entityType: string,
    entityId: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    try {
      await this.run(
        'createAuditLog',
        (manager) =>
          manager.save(
            manager.create(AuditLog, {
              action,
              entityType,
              entityId,
              metadata: metadata ?? null,
              createdAt: this.now(),
            })
          ),
        false
      );
    } catch (error) {
      logger.error({ error, action, entityType, entityId }, 'Failed to create audit log');
    }
  }

  async getAuditLogs(entityType?: string, entityId?: string, limit: number = 100): Promise<AuditLog[]> {
    return this.run(
      'getAuditLogs',
      (manager) => {
        const query = manager.createQueryBuilder(AuditLog, 'audit');

        if (entityType) {
          query.andWhere('audit.entityType = :entityType', { entityType });
        }

        if (entityId) {
          query.andWhere('audit.entityId = :entityId', { entityId });
        }

        return query.orderBy('audit.createdAt', 'DESC').addOrderBy('audit.id', 'DESC').limit(limit).getMany();
      },
      false
    );
  }

  // Helper methods

  private async run<T>(
    operation: string,
    fn: (manager: EntityManager) => Promise<T>,
    transactional = true
  ): Promise<T> {
    if (!this.isInitialized) {
      throw new StoreUnavailableError(`Store at ${this.storePath} is not open (${operation})`);
    }

    try {
      return transactional ? await this.dataSource.transaction(fn) : await fn(this.dataSource.manager);
    } catch (error) {
      throw this.translateError(operation, error);
    }
  }

  private translateError(operation: string, error: unknown): unknown {
    if (isPipelineError(error)) {
      return error;
    }

    const code = sqliteErrorCode(error);
    if (code?.startsWith('SQLITE_CONSTRAINT')) {
      return new ConstraintViolationError(`${operation}: ${errorMessage(error)}`, error);
    }
    if (code && UNAVAILABLE_CODES.some((prefix) => code.startsWith(prefix))) {
      return new StoreUnavailableError(`${operation}: ${errorMessage(error)}`, error);
    }
    return error;
  }

  private async selectPruneIds(manager: EntityManager, rule: RetentionRule, now: Date): Promise<number[]> {
    const query =
      rule.target === 'records'
        ? manager
            .createQueryBuilder(ScrapedRecord, 'row')
            .select('row.id', 'id')
            .orderBy('row.lastSeenAt', 'DESC')
        : manager
            .createQueryBuilder(Snapshot, 'row')
            .select('row.id', 'id')
            .orderBy('row.capturedAt', 'DESC');
    const column = rule.target === 'records' ? 'row.lastSeenAt' : 'row.capturedAt';

    if ('maxAgeMs' in rule) {
      query.where(`${column} < :cutoff`, { cutoff: now.getTime() - rule.maxAgeMs });
    }

    const rows = await query.addOrderBy('row.id', 'DESC').getRawMany<{ id: number }>();
    const ids = rows.map((row) => Number(row.id));

    return 'maxCount' in rule ? ids.slice(rule.maxCount) : ids;
  }

  private async deleteRecordsCascade(manager: EntityManager, ids: number[]): Promise<number> {
    const existing = await manager.count(ScrapedRecord, { where: { id: In(ids) } });

    for (const part of chunk(ids)) {
      await manager.createQueryBuilder().delete().from(Snapshot).where('recordId IN (:...ids)', { ids: part }).execute();
      await manager.createQueryBuilder().delete().from(Artifact).where('recordId IN (:...ids)', { ids: part }).execute();
      await manager.createQueryBuilder().delete().from(ScrapedRecord).where('id IN (:...ids)', { ids: part }).execute();
    }

    return existing;
  }
}
