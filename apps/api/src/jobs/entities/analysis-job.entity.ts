import {
  Column,
  CreateDateColumn,
  Entity,
  PrimaryColumn,
  UpdateDateColumn,
} from 'typeorm';
import type { AggregateResult } from '../../aggregation/aggregate';
import type { JobStatus, Post } from '../jobs.types';

@Entity('analysis_jobs')
export class AnalysisJobEntity {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 128 })
  campaign_id!: string;

  @Column({ type: 'varchar', length: 128 })
  creator_id!: string;

  @Column({ type: 'varchar', length: 32, default: 'PENDING' })
  status!: JobStatus;

  @Column({ type: 'jsonb' })
  posts!: Post[];

  @Column({ type: 'jsonb', nullable: true })
  aggregate_json!: AggregateResult | null;

  @Column({ type: 'text', nullable: true })
  summary!: string | null;

  @Column({ type: 'text', nullable: true })
  error_message!: string | null;

  @Column({ type: 'int', default: 0 })
  version!: number;

  @Column({ type: 'int', default: 0 })
  generation!: number;

  @CreateDateColumn()
  created_at!: Date;

  @UpdateDateColumn()
  updated_at!: Date;
}
