// src/domain/interfaces/repositories.interface.ts

import { DetectedCycle } from '../entities/detected-cycle.entity';
import { ScanRun } from '../entities/scan-run.entity';
import { ScanMode } from '../types/scan-mode.type';
import { ScanOutcome } from '../types/scan-outcome.type';

export interface IPriceSeriesRepository {
  readonly source: string;
  /** Oldest first. Rejects with PriceSeriesLoadError. */
  load(): Promise<number[]>;
}

export interface IScanResultRepository {
  saveRun(outcome: ScanOutcome): Promise<ScanRun>;
  findLatestRun(mode: ScanMode): Promise<ScanRun | null>;
  findCycles(runId: number): Promise<DetectedCycle[]>;
  getLatestOutcome(mode: ScanMode): ScanOutcome | null;
}
