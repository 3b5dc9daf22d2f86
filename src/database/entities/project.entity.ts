import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';

export type ProjectKind = 'freestyle' | 'pipeline';

/**
 * A buildable project and its push-trigger settings.
 * `kind` selects the adapter the catalog builds for it.
 */
@Entity('projects')
export class ProjectEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index({ unique: true })
  @Column({ length: 255 })
  name!: string;

  @Column({ length: 500 })
  repository!: string;

  @Column({ length: 50, default: 'freestyle' })
  kind!: ProjectKind;

  /** Seconds a scheduled build waits before it may start */
  @Column({ type: 'int', default: 0 })
  quiet_period!: number;

  @Column({ default: false })
  pass_through_git_commit!: boolean;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;
}
