import { loadScannerConfig } from '../config';
import { ScanConfigError } from '../../domain/errors/errors';

function violationsOf(env: Record<string, string>): string[] {
  try {
    loadScannerConfig(env);
  } catch (error) {
    if (error instanceof ScanConfigError) return error.violations;
    throw error;
  }
  throw new Error('expected ScanConfigError');
}

describe('loadScannerConfig', () => {
  it('falls back to the documented defaults', () => {
    const config = loadScannerConfig({});
    expect(config.pricesFile).toBe('prices.txt');
    expect(config.symbol).toBe('TLT');
    expect(config.modes).toEqual(['single', 'rolling']);
    expect(config.single).toMatchObject({ windowSize: 2000, minPeriod: 30, maxPeriod: 1000, peakThreshold: 0.05 });
    expect(config.rolling).toMatchObject({
      windowSize: 4000,
      minPeriod: 100,
      maxPeriod: 800,
      stepDays: 5,
      maxOffset: 260,
    });
    expect(config.calendarFactor).toBe(1.451);
    expect(config.serveHttp).toBe(true);
    expect(config.port).toBe(8000);
  });

  it('reads overrides from the environment', () => {
    const config = loadScannerConfig({
      SCAN_MODES: ' Rolling ',
      ROLLING_WINDOW_SIZE: '1000',
      ROLLING_MAX_OFFSET: '0',
      SERVE_HTTP: 'false',
    });
    expect(config.modes).toEqual(['rolling']);
    expect(config.rolling.windowSize).toBe(1000);
    expect(config.rolling.maxOffset).toBe(0);
    expect(config.serveHttp).toBe(false);
  });

  it('rejects a band whose minimum is not below its maximum', () => {
    expect(violationsOf({ SINGLE_MIN_PERIOD: '500', SINGLE_MAX_PERIOD: '400' })).toEqual([
      'single: minPeriod must be below maxPeriod',
    ]);
  });

  it('accepts thresholds up to but excluding 1', () => {
    expect(loadScannerConfig({ PEAK_THRESHOLD: '0.995' }).rolling.peakThreshold).toBe(0.995);
    expect(violationsOf({ PEAK_THRESHOLD: '1' })).toEqual([
      'single: peakThreshold must be below 1',
      'rolling: peakThreshold must be below 1',
    ]);
  });

  it('rejects unknown scan modes', () => {
    expect(violationsOf({ SCAN_MODES: 'single,weekly' })).toEqual(['modes: unknown scan mode "weekly"']);
  });

  it('reports nested constraint failures with their path', () => {
    expect(violationsOf({ ROLLING_STEP_DAYS: 'abc' })).toContain(
      'rolling.stepDays: Rolling step must be an integer number of trading days',
    );
  });

  it('throws a ScanConfigError', () => {
    expect(() => loadScannerConfig({ PORT: '0' })).toThrow(ScanConfigError);
  });
});
