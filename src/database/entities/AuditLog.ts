import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import { epochMillis } from './transformers';

@Entity('audit_logs')
@Index(['action', 'createdAt'])
@Index(['entityType', 'entityId'])
export class AuditLog {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column('varchar', { length: 64 })
  action!: string;

  @Column('varchar', { length: 32 })
  entityType!: string;

  @Column('varchar', { length: 64 })
  entityId!: string;

  @Column('simple-json', { nullable: true })
  metadata!: Record<string, unknown> | null;

  @Column('integer', { transformer: epochMillis })
  createdAt!: Date;
}
