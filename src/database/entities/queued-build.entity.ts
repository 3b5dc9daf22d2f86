import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

/**
 * Host build queue: one waiting build per row. A row becomes runnable at not_before
 * (created_at + quiet period); the build executor is outside this service.
 */
@Entity('build_queue')
@Index(['project_name', 'status'])
export class QueuedBuild {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 255 })
  project_name!: string;

  /** Serialized PushCause */
  @Column('jsonb', { nullable: true })
  cause!: Record<string, unknown> | null;

  /** Commit the build is pinned to, when pass-through is on */
  @Column({ length: 100, nullable: true })
  revision!: string | null;

  @Column({ type: 'int', default: 0 })
  quiet_period!: number;

  @Column({ type: 'timestamptz' })
  not_before!: Date;

  @Column({ length: 50, default: 'waiting' })
  status!: string;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;
}
