import { buildCycleSurface, buildSpectrumSurface, buildSurface, isSurfaceKind } from '../cycle-surface';
import { WindowResult } from '../interfaces/interfaces';

const windowAt = (offset: number, peaks: WindowResult['peaks']): WindowResult => ({
  offset,
  startIndex: 0,
  endIndex: 0,
  spectrum: { periods: [], power: [] },
  peaks,
});

describe('buildCycleSurface', () => {
  const band = { minPeriod: 100, maxPeriod: 120 };

  it('orders columns oldest first with the latest window last', () => {
    const surface = buildCycleSurface([], band, 2);
    expect(surface.offsets).toEqual([2, 1, 0]);
    expect(surface.periods).toHaveLength(21);
    expect(surface.z.every((row) => row.every((v) => v === 0))).toBe(true);
  });

  it('spreads a peak over neighbouring periods', () => {
    const surface = buildCycleSurface([windowAt(0, [{ period: 110, power: 0.5, tier: 'PRIMARY' }])], band, 2);

    // spread = max(2, floor(0.5 * 5)) = 2
    expect(surface.z[10][2]).toBeCloseTo(0.5, 12);
    expect(surface.z[9][2]).toBeCloseTo(0.5 * Math.exp(-1 / 4), 12);
    expect(surface.z[12][2]).toBeCloseTo(0.5 * Math.exp(-1), 12);
    expect(surface.z[13][2]).toBe(0);
    expect(surface.z[10][0]).toBe(0);
    expect(surface.z[10][1]).toBe(0);
  });

  it('keeps the stronger intensity where spreads overlap', () => {
    const surface = buildCycleSurface(
      [
        windowAt(1, [
          { period: 104, power: 1, tier: 'PRIMARY' },
          { period: 106, power: 0.2, tier: 'SECONDARY' },
        ]),
      ],
      band,
      1,
    );
    // spread for power 1 is 5
    expect(surface.z[6][0]).toBeCloseTo(Math.exp(-4 / 25), 12);
  });

  it('ignores peaks outside the band and offsets past the last column', () => {
    const surface = buildCycleSurface(
      [windowAt(0, [{ period: 150, power: 0.9, tier: 'PRIMARY' }]), windowAt(5, [{ period: 110, power: 0.9, tier: 'PRIMARY' }])],
      band,
      2,
    );
    expect(surface.z.every((row) => row.every((v) => v === 0))).toBe(true);
  });
});

describe('buildSpectrumSurface', () => {
  const band = { minPeriod: 10, maxPeriod: 13 };
  const spectrumAt = (offset: number, power: number[]): WindowResult => ({
    offset,
    startIndex: 0,
    endIndex: 0,
    spectrum: { periods: [10, 11, 12, 13], power },
    peaks: [],
  });

  it('copies each window spectrum into its column with offset 0 last', () => {
    const surface = buildSpectrumSurface(
      [spectrumAt(0, [0.1, 0.2, 0.3, 0.4]), spectrumAt(2, [1, 0.5, 0.25, 0])],
      band,
      2,
    );

    expect(surface.offsets).toEqual([2, 1, 0]);
    expect(surface.z).toEqual([
      [1, 0, 0.1],
      [0.5, 0, 0.2],
      [0.25, 0, 0.3],
      [0, 0, 0.4],
    ]);
  });

  it('leaves skipped offsets as zero columns', () => {
    const surface = buildSpectrumSurface([spectrumAt(1, [1, 1, 1, 1])], band, 3);
    expect(surface.z.map((row) => row[0])).toEqual([0, 0, 0, 0]);
    expect(surface.z.map((row) => row[1])).toEqual([0, 0, 0, 0]);
    expect(surface.z.map((row) => row[2])).toEqual([1, 1, 1, 1]);
    expect(surface.z.map((row) => row[3])).toEqual([0, 0, 0, 0]);
  });

  it('is selected by kind', () => {
    const results = [
      {
        ...spectrumAt(0, [0.3, 1, 0.3, 0]),
        peaks: [{ period: 11, power: 1, tier: 'PRIMARY' as const }],
      },
    ];
    expect(buildSurface('spectrum', results, band, 0).z.map((row) => row[0])).toEqual([0.3, 1, 0.3, 0]);
    expect(buildSurface('peaks', results, band, 0).z[0][0]).toBeCloseTo(Math.exp(-1 / 25), 12);
    expect(isSurfaceKind('spectrum')).toBe(true);
    expect(isSurfaceKind('heat')).toBe(false);
  });
});
