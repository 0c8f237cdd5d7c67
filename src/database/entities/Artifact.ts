import { Entity, PrimaryGeneratedColumn, Column, Index, ManyToOne, JoinColumn } from 'typeorm';
import { ScrapedRecord } from './ScrapedRecord';
import { epochMillis } from './transformers';

// Generated text (cover letter, chat reply) attached to a record by an external generator
@Entity('artifacts')
@Index(['recordId', 'providerKind'])
export class Artifact {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column('integer')
  recordId!: number;

  @ManyToOne(() => ScrapedRecord, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'recordId' })
  record?: ScrapedRecord;

  @Column('varchar', { length: 64 })
  providerKind!: string;

  @Column('varchar', { length: 128 })
  provider!: string;

  @Column('text')
  text!: string;

  @Column('integer', { transformer: epochMillis })
  generatedAt!: Date;
}
