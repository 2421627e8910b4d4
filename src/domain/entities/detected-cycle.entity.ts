import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { SignificanceTier } from '../../modules/cycle-scanner/interfaces/interfaces';

@Entity('detected_cycles')
export class DetectedCycle {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ name: 'run_id', type: 'integer' })
  runId!: number;

  @Column({ name: 'window_offset', type: 'integer' })
  windowOffset!: number;

  @Column({ type: 'integer' })
  rank!: number;

  @Column({ type: 'integer' })
  period!: number;

  @Column({ type: 'real' })
  power!: number;

  @Column({ type: 'text' })
  tier!: SignificanceTier;
}
