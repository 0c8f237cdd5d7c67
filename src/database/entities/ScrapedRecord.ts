import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import { RecordFields, RecordKind, RecordStatus } from '../../types';
import { epochMillis } from './transformers';

@Entity('records')
@Index(['kind', 'createdAt'])
@Index(['lastSeenAt'])
export class ScrapedRecord {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index({ unique: true })
  @Column('text')
  naturalKey!: string;

  @Column('varchar', { length: 16, default: 'job' })
  kind!: RecordKind;

  @Column('text', { default: '' })
  title!: string;

  @Column('text', { default: '' })
  description!: string;

  @Column('text', { nullable: true })
  sourceUrl!: string | null;

  @Column('simple-json')
  fields!: RecordFields;

  @Column('varchar', { length: 16, default: 'active' })
  status!: RecordStatus;

  // Provider kinds that have at least one stored artifact for this record
  @Column('simple-array', { default: '' })
  artifactKinds!: string[];

  @Column('integer', { transformer: epochMillis })
  createdAt!: Date;

  @Column('integer', { transformer: epochMillis })
  updatedAt!: Date;

  @Column('integer', { transformer: epochMillis })
  lastSeenAt!: Date;
}
