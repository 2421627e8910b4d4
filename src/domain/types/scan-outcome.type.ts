import { PeriodBand, WindowResult } from '../../modules/cycle-scanner';
import { ScanMode } from './scan-mode.type';

/** Everything one analysis run produced, as handed to persistence and reporting. */
export type ScanOutcome = {
  mode: ScanMode;
  symbol: string;
  seriesLength: number;
  windowSize: number;
  band: PeriodBand;
  stepDays: number;
  maxOffset: number; // 0 for a single scan
  results: WindowResult[]; // ascending offset
  durationMs: number;
  completedAt: Date;
};
