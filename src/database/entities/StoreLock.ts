import { Entity, PrimaryColumn, Column } from 'typeorm';
import { epochMillis } from './transformers';

// Advisory mutex row; ingestion and maintenance hold it for the length of a pass
@Entity('store_locks')
export class StoreLock {
  @PrimaryColumn('varchar', { length: 64 })
  name!: string;

  @Column('varchar', { length: 128 })
  owner!: string;

  @Column('integer', { transformer: epochMillis })
  acquiredAt!: Date;

  @Column('integer', { transformer: epochMillis })
  expiresAt!: Date;
}
