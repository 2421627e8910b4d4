import { Kernel } from './interfaces/interfaces';

/**
 * Gaussian-windowed complex oscillation tuned to `period`, scaled to unit energy.
 * Q grows with frequency, so short periods get a relatively narrower passband.
 */
export function buildKernel(period: number, length: number): Kernel {
  const freq = 1 / period;
  const q = 15 + 50 * freq;
  const sigma = q / (2 * Math.PI * freq);

  const re = new Float64Array(length);
  const im = new Float64Array(length);
  let energy = 0;

  for (let i = 0; i < length; i++) {
    const t = i - length / 2;
    const envelope = Math.exp((-t * t) / (2 * sigma * sigma));
    const phase = 2 * Math.PI * freq * t;
    re[i] = envelope * Math.cos(phase);
    im[i] = envelope * Math.sin(phase);
    energy += re[i] * re[i] + im[i] * im[i];
  }

  const norm = Math.sqrt(energy);
  for (let i = 0; i < length; i++) {
    re[i] /= norm;
    im[i] /= norm;
  }

  return { period, re, im };
}
