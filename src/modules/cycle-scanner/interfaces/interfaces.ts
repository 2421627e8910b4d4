export type SignificanceTier = 'PRIMARY' | 'SECONDARY' | 'TERTIARY' | 'NONE';

/** Complex kernel stored as parallel real/imaginary parts. */
export type Kernel = {
  period: number;
  re: Float64Array;
  im: Float64Array;
};

export type PeriodBand = {
  minPeriod: number; // trading days, inclusive
  maxPeriod: number; // trading days, inclusive
};

/** One power value per integer period of the band, ascending by period. */
export type Spectrum = {
  periods: number[];
  power: number[];
};

export type Peak = {
  period: number;
  power: number; // 0..1 after normalisation
  tier: SignificanceTier;
};

export type WindowResult = {
  offset: number; // steps back from the most recent bar
  startIndex: number; // inclusive index into the price series
  endIndex: number; // exclusive
  spectrum: Spectrum;
  peaks: Peak[];
};

export type WindowScanOptions = {
  band: PeriodBand;
  peakThreshold: number;
};

export type SingleScanOptions = WindowScanOptions & {
  windowSize: number;
};

export type RollingScanOptions = SingleScanOptions & {
  stepDays: number;
  maxOffset: number;
  onWindow?: (result: WindowResult) => void;
};

/** `peaks` spreads ranked peaks over nearby rows; `spectrum` keeps the processed power. */
export type SurfaceKind = 'peaks' | 'spectrum';

/**
 * Time-vs-period intensity grid. `z[row][column]`: row follows `periods`,
 * column follows `offsets` (oldest window first, offset 0 last).
 */
export type CycleSurface = {
  periods: number[];
  offsets: number[];
  z: number[][];
};
