import { Injectable } from '../../shared/decorators';
import { detrendLogLinear } from './detrend';
import {
  Peak,
  RollingScanOptions,
  SingleScanOptions,
  Spectrum,
  WindowResult,
  WindowScanOptions,
} from './interfaces/interfaces';
import { PeakDetector } from './peak-detector';
import { PowerEstimator } from './power-estimator';
import { SpectralPostProcessor } from './spectral-post-processor';

// detrend -> scan band -> post-process -> peaks, for one or many historical windows
@Injectable()
export class RollingWindowAnalyzer {
  constructor(
    private readonly estimator: PowerEstimator = new PowerEstimator(),
    private readonly postProcessor: SpectralPostProcessor = new SpectralPostProcessor(),
    private readonly peakDetector: PeakDetector = new PeakDetector(),
  ) {}

  scanDetrended(data: readonly number[], options: WindowScanOptions): { spectrum: Spectrum; peaks: Peak[] } {
    const raw = this.estimator.scan(data, options.band);
    const spectrum: Spectrum = { periods: raw.periods, power: this.postProcessor.process(raw.power) };
    const peaks = this.peakDetector.detect(spectrum, options.peakThreshold);
    return { spectrum, peaks };
  }

  analyzeSlice(
    prices: readonly number[],
    startIndex: number,
    endIndex: number,
    offset: number,
    options: WindowScanOptions,
  ): WindowResult {
    const detrended = detrendLogLinear(prices.slice(startIndex, endIndex));
    const { spectrum, peaks } = this.scanDetrended(detrended, options);
    return { offset, startIndex, endIndex, spectrum, peaks };
  }

  /** Most recent `min(windowSize, prices.length)` bars. */
  analyzeLatest(prices: readonly number[], options: SingleScanOptions): WindowResult {
    const size = Math.min(options.windowSize, prices.length);
    return this.analyzeSlice(prices, prices.length - size, prices.length, 0, options);
  }

  /**
   * One result per offset 0..maxOffset, ascending. Offsets whose window would
   * start before the first bar are left out.
   */
  analyzeRolling(prices: readonly number[], options: RollingScanOptions): WindowResult[] {
    const results: WindowResult[] = [];
    for (let offset = 0; offset <= options.maxOffset; offset++) {
      const end = prices.length - offset * options.stepDays;
      const start = end - options.windowSize;
      if (start < 0) continue;

      const result = this.analyzeSlice(prices, start, end, offset, options);
      options.onWindow?.(result);
      results.push(result);
    }
    return results;
  }
}
