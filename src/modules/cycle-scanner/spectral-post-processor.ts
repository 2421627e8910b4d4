import { gaussianWeight, mean, median, neighborhood, weightedAverage } from './utilities';

export interface PostProcessorConfig {
  medianWindow: number;
  smoothWindow: number;
  enhanceFactor: number;
  finalSmoothWindow: number;
  adaptiveThreshold: number; // compared against the pre-normalisation scale
  adaptiveWindow: number;
  adaptiveSigma: number;
  adaptivePasses: number;
}

const DEFAULT_CONFIG: PostProcessorConfig = {
  medianWindow: 3,
  smoothWindow: 10,
  enhanceFactor: 2.0,
  finalSmoothWindow: 5,
  adaptiveThreshold: 0.3,
  adaptiveWindow: 5,
  adaptiveSigma: 2,
  adaptivePasses: 2,
};

// Denoise/enhance chain applied to a raw spectrum. Output is scaled so its max is 1 (or left all-zero).
export class SpectralPostProcessor {
  private cfg: PostProcessorConfig = { ...DEFAULT_CONFIG };

  constructor(cfg?: Partial<PostProcessorConfig>) {
    if (cfg) Object.assign(this.cfg, cfg);
  }

  process(raw: readonly number[]): number[] {
    let spectrum = SpectralPostProcessor.medianFilter(raw, this.cfg.medianWindow);
    spectrum = SpectralPostProcessor.gaussianSmooth(spectrum, this.cfg.smoothWindow);
    spectrum = SpectralPostProcessor.enhancePeaks(spectrum, this.cfg.enhanceFactor);
    spectrum = SpectralPostProcessor.gaussianSmooth(spectrum, this.cfg.finalSmoothWindow);
    for (let pass = 0; pass < this.cfg.adaptivePasses; pass++) {
      spectrum = this.adaptiveSmooth(spectrum);
    }
    return SpectralPostProcessor.normalize(spectrum);
  }

  static medianFilter(values: readonly number[], window: number): number[] {
    return values.map((_, i) => median(neighborhood(values, i, window).map((n) => n.value)));
  }

  static gaussianSmooth(values: readonly number[], window: number): number[] {
    const sigma = window / 3;
    return values.map((_, i) =>
      weightedAverage(neighborhood(values, i, window), (offset) => gaussianWeight(offset, sigma)),
    );
  }

  // one-sided contrast stretch: only entries strictly above the mean move
  static enhancePeaks(values: readonly number[], factor: number): number[] {
    const m = mean(values);
    return values.map((v) => (v > m ? m + (v - m) * factor : v));
  }

  static normalize(values: readonly number[]): number[] {
    const max = values.reduce((a, b) => Math.max(a, b), -Infinity);
    if (!(max > 0)) return values.slice();
    return values.map((v) => v / max);
  }

  // smooths only the valleys; the outer `adaptiveWindow` entries on each side stay as they are
  private adaptiveSmooth(values: readonly number[]): number[] {
    const { adaptiveWindow: window, adaptiveThreshold: threshold, adaptiveSigma: sigma } = this.cfg;
    const out = values.slice();
    for (let i = window; i < values.length - window; i++) {
      if (values[i] < threshold) {
        out[i] = weightedAverage(neighborhood(values, i, window), (offset) => gaussianWeight(offset, sigma));
      }
    }
    return out;
  }
}
