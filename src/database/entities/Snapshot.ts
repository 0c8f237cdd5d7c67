import { Entity, PrimaryGeneratedColumn, Column, Index, ManyToOne, JoinColumn } from 'typeorm';
import { ScrapedRecord } from './ScrapedRecord';
import { epochMillis } from './transformers';

@Entity('snapshots')
@Index(['capturedAt'])
export class Snapshot {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column('integer', { nullable: true })
  recordId!: number | null;

  @ManyToOne(() => ScrapedRecord, { nullable: true, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'recordId' })
  record?: ScrapedRecord | null;

  @Column('text')
  content!: string;

  @Column('integer')
  contentLength!: number;

  @Column('text', { nullable: true })
  sourceUrl!: string | null;

  @Column('text', { nullable: true })
  pageTitle!: string | null;

  @Column('integer', { transformer: epochMillis })
  capturedAt!: Date;
}
