export const SCAN_MODES = ['single', 'rolling'] as const;

export type ScanMode = (typeof SCAN_MODES)[number];

export function isScanMode(value: string): value is ScanMode {
  return (SCAN_MODES as readonly string[]).includes(value);
}
