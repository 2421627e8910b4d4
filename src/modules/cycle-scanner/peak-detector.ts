import { Peak, SignificanceTier, Spectrum } from './interfaces/interfaces';

export const DEFAULT_PEAK_THRESHOLD = 0.05;

export class PeakDetector {
  constructor(private readonly radius: number = 10) {}

  static classify(power: number): SignificanceTier {
    if (power > 0.25) return 'PRIMARY';
    if (power > 0.15) return 'SECONDARY';
    if (power > 0.08) return 'TERTIARY';
    return 'NONE';
  }

  /**
   * Local maxima over ±radius entries (ties allowed) whose power exceeds
   * `threshold`, strongest first. Entries closer than `radius` to either end
   * are never candidates.
   */
  detect(spectrum: Spectrum, threshold: number = DEFAULT_PEAK_THRESHOLD): Peak[] {
    const { power, periods } = spectrum;
    const peaks: Peak[] = [];

    for (let i = this.radius; i < power.length - this.radius; i++) {
      let isPeak = true;
      for (let j = -this.radius; j <= this.radius; j++) {
        if (j !== 0 && power[i + j] > power[i]) {
          isPeak = false;
          break;
        }
      }
      if (isPeak && power[i] > threshold) {
        peaks.push({ period: periods[i], power: power[i], tier: PeakDetector.classify(power[i]) });
      }
    }

    // Array.prototype.sort is stable, ties keep scan order
    return peaks.sort((a, b) => b.power - a.power);
  }
}
