import { CycleSurface, PeriodBand, SurfaceKind, WindowResult } from './interfaces/interfaces';

export const SURFACE_KINDS = ['peaks', 'spectrum'] as const satisfies readonly SurfaceKind[];

export function isSurfaceKind(value: string): value is SurfaceKind {
  return (SURFACE_KINDS as readonly string[]).includes(value);
}

function emptySurface(band: PeriodBand, maxOffset: number): CycleSurface {
  const rows = band.maxPeriod - band.minPeriod + 1;
  const columns = maxOffset + 1;
  return {
    periods: Array.from({ length: rows }, (_, i) => band.minPeriod + i),
    offsets: Array.from({ length: columns }, (_, i) => maxOffset - i),
    z: Array.from({ length: rows }, () => new Array<number>(columns).fill(0)),
  };
}

/**
 * Spreads every window's peaks over neighbouring period rows and lays the
 * windows out oldest to newest. Offsets with no result stay zero.
 */
export function buildCycleSurface(
  results: readonly WindowResult[],
  band: PeriodBand,
  maxOffset: number,
): CycleSurface {
  const surface = emptySurface(band, maxOffset);
  const rows = surface.periods.length;
  const { z } = surface;

  for (const result of results) {
    const column = maxOffset - result.offset;
    if (column < 0 || column > maxOffset) continue;

    for (const peak of result.peaks) {
      const row = peak.period - band.minPeriod;
      if (row < 0 || row >= rows) continue;

      const spread = Math.max(2, Math.floor(peak.power * 5));
      for (let r = Math.max(0, row - spread); r <= Math.min(rows - 1, row + spread); r++) {
        const distance = r - row;
        const intensity = peak.power * Math.exp(-(distance * distance) / (spread * spread));
        z[r][column] = Math.max(z[r][column], intensity);
      }
    }
  }

  return surface;
}

/** Same layout, but each cell is the processed spectrum value itself. */
export function buildSpectrumSurface(
  results: readonly WindowResult[],
  band: PeriodBand,
  maxOffset: number,
): CycleSurface {
  const surface = emptySurface(band, maxOffset);
  const rows = surface.periods.length;

  for (const result of results) {
    const column = maxOffset - result.offset;
    if (column < 0 || column > maxOffset) continue;

    result.spectrum.periods.forEach((period, i) => {
      const row = period - band.minPeriod;
      if (row >= 0 && row < rows) surface.z[row][column] = result.spectrum.power[i];
    });
  }

  return surface;
}

export function buildSurface(
  kind: SurfaceKind,
  results: readonly WindowResult[],
  band: PeriodBand,
  maxOffset: number,
): CycleSurface {
  return kind === 'spectrum'
    ? buildSpectrumSurface(results, band, maxOffset)
    : buildCycleSurface(results, band, maxOffset);
}
