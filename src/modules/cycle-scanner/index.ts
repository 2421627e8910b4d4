/**
 * Cycle Scanner Module
 *
 * Wavelet power spectrum over a band of candidate periods, spectral
 * clean-up, ranked peak extraction and a rolling driver over history.
 */

// Building blocks
export { buildKernel } from './kernel';
export { detrendLogLinear } from './detrend';
export { PowerEstimator } from './power-estimator';
export { SpectralPostProcessor, type PostProcessorConfig } from './spectral-post-processor';
export { PeakDetector, DEFAULT_PEAK_THRESHOLD } from './peak-detector';

// Orchestration
export { RollingWindowAnalyzer } from './rolling-window.analyzer';
export {
  buildCycleSurface,
  buildSpectrumSurface,
  buildSurface,
  isSurfaceKind,
  SURFACE_KINDS,
} from './cycle-surface';

// Types
export {
  type CycleSurface,
  type Kernel,
  type Peak,
  type PeriodBand,
  type RollingScanOptions,
  type SignificanceTier,
  type SingleScanOptions,
  type Spectrum,
  type SurfaceKind,
  type WindowResult,
  type WindowScanOptions,
} from './interfaces/interfaces';

// Utilities
export { clamp, gaussianWeight, mean, median, neighborhood, weightedAverage } from './utilities';
