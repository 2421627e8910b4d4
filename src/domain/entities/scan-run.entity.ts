import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { ScanMode } from '../types/scan-mode.type';

@Entity('scan_runs')
export class ScanRun {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'text' })
  symbol!: string;

  @Index()
  @Column({ type: 'text' })
  mode!: ScanMode;

  @Column({ name: 'series_length', type: 'integer' })
  seriesLength!: number;

  @Column({ name: 'window_size', type: 'integer' })
  windowSize!: number;

  @Column({ name: 'min_period', type: 'integer' })
  minPeriod!: number;

  @Column({ name: 'max_period', type: 'integer' })
  maxPeriod!: number;

  @Column({ name: 'window_count', type: 'integer' })
  windowCount!: number;

  @Column({ name: 'duration_ms', type: 'integer' })
  durationMs!: number;

  @CreateDateColumn({ name: 'created_at', type: 'datetime' })
  createdAt!: Date;
}
