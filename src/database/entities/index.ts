import { ScrapedRecord } from './ScrapedRecord';
import { Snapshot } from './Snapshot';
import { Artifact } from './Artifact';
import { AuditLog } from './AuditLog';
import { StoreLock } from './StoreLock';

export { ScrapedRecord, Snapshot, Artifact, AuditLog, StoreLock };

export const entities = [ScrapedRecord, Snapshot, Artifact, AuditLog, StoreLock];
