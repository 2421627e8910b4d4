import { buildKernel } from './kernel';
import { PeriodBand, Spectrum } from './interfaces/interfaces';
import { clamp } from './utilities';

export class PowerEstimator {
  private cfg = {
    minCycles: 4,
    maxCycles: 8,
    stepDivisor: 8, // scan stride = period / 8
  };

  // RMS of |<data, conj(kernel)>| over every kernel position that fits in the window
  estimate(data: readonly number[], period: number): number {
    const n = data.length;
    // need at least two full cycles in the window
    if (period > Math.floor(n / 2)) return 0;

    const cycles = clamp(Math.floor(n / period), this.cfg.minCycles, this.cfg.maxCycles);
    const len = Math.min(n, period * cycles);
    const kernel = buildKernel(period, len);
    const half = Math.floor(len / 2);
    const step = Math.max(1, Math.floor(period / this.cfg.stepDivisor));

    let totalPower = 0;
    let count = 0;

    for (let center = half; center <= n - half; center += step) {
      const first = center - half;
      let sumRe = 0, sumIm = 0;
      for (let i = 0; i < len; i++) {
        const idx = first + i;
        if (idx < 0 || idx >= n) continue;
        sumRe += data[idx] * kernel.re[i];
        sumIm -= data[idx] * kernel.im[i];
      }
      totalPower += sumRe * sumRe + sumIm * sumIm;
      count++;
    }

    return count > 0 ? Math.sqrt(totalPower / count) : 0;
  }

  scan(data: readonly number[], band: PeriodBand): Spectrum {
    const periods: number[] = [];
    const power: number[] = [];
    for (let period = band.minPeriod; period <= band.maxPeriod; period++) {
      periods.push(period);
      power.push(this.estimate(data, period));
    }
    return { periods, power };
  }
}
