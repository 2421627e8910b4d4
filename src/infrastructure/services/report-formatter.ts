import { CycleSurface, Peak, SignificanceTier, Spectrum, WindowResult } from '../../modules/cycle-scanner';

const TIER_LABELS: Record<SignificanceTier, string> = {
  PRIMARY: ' *** PRIMARY',
  SECONDARY: ' ** SECONDARY',
  TERTIARY: ' * TERTIARY',
  NONE: '',
};

// six significant digits, trailing zeros dropped
function sig6(x: number): string {
  return String(Number(x.toPrecision(6)));
}

export function toCalendarDays(period: number, factor: number): number {
  return Math.trunc(period * factor);
}

export function formatSpectrumTable(spectrum: Spectrum, factor: number): string {
  const lines = ['# Wavelength_Trading Wavelength_Calendar Power'];
  spectrum.periods.forEach((period, i) => {
    lines.push(`${period} ${sig6(period * factor)} ${sig6(spectrum.power[i])}`);
  });
  return lines.join('\n') + '\n';
}

export function formatPeakLine(peak: Peak, rank: number, factor: number): string {
  const calendar = toCalendarDays(peak.period, factor);
  const pct = (peak.power * 100).toFixed(1);
  return (
    `${String(rank).padStart(2)}. ${String(peak.period).padStart(4)} trading = ` +
    `${String(calendar).padStart(4)} calendar days  [${pct}%]${TIER_LABELS[peak.tier]}`
  );
}

export function formatPeakList(peaks: readonly Peak[], factor: number): string {
  return peaks.map((peak, i) => formatPeakLine(peak, i + 1, factor)).join('\n') + '\n';
}

/** `Week   3: 529d(100.0%) 1001d(45.2%)`, listing only peaks above `minPower`. */
export function formatRollingLine(result: WindowResult, factor: number, minPower = 0.2): string {
  const entries = result.peaks
    .filter((p) => p.power > minPower)
    .map((p) => `${toCalendarDays(p.period, factor)}d(${(p.power * 100).toFixed(1)}%)`);
  return `Week ${String(result.offset).padStart(3)}: ${entries.join(' ')}`.trimEnd();
}

export function formatSurfaceCsv(surface: CycleSurface, factor: number): string {
  const header = ['period', 'calendar_days', ...surface.offsets.map((o) => (o === 0 ? 'now' : `-${o}`))];
  const rows = surface.periods.map((period, r) =>
    [String(period), String(toCalendarDays(period, factor)), ...surface.z[r].map((v) => sig6(v))].join(','),
  );
  return [header.join(','), ...rows].join('\n') + '\n';
}
