import { DataSource } from 'typeorm';
import { createDataSource } from '../database/database.module';
import { ScanResultRepository } from '../repositories/scan-result.repository';
import { ScanRun } from '../../domain/entities/scan-run.entity';
import { ScanOutcome } from '../../domain/types/scan-outcome.type';

function outcome(mode: ScanOutcome['mode'], symbol = 'TEST'): ScanOutcome {
  return {
    mode,
    symbol,
    seriesLength: 500,
    windowSize: 300,
    band: { minPeriod: 20, maxPeriod: 80 },
    stepDays: mode === 'rolling' ? 5 : 0,
    maxOffset: mode === 'rolling' ? 1 : 0,
    results: [
      {
        offset: 0,
        startIndex: 200,
        endIndex: 500,
        spectrum: { periods: [20, 21], power: [1, 0.5] },
        peaks: [
          { period: 40, power: 1, tier: 'PRIMARY' },
          { period: 65, power: 0.12, tier: 'TERTIARY' },
        ],
      },
      {
        offset: 1,
        startIndex: 195,
        endIndex: 495,
        spectrum: { periods: [20, 21], power: [0.3, 1] },
        peaks: [{ period: 41, power: 1, tier: 'PRIMARY' }],
      },
    ],
    durationMs: 12.4,
    completedAt: new Date('2024-01-02T00:00:00Z'),
  };
}

describe('ScanResultRepository', () => {
  let dataSource: DataSource;
  let repository: ScanResultRepository;

  beforeEach(async () => {
    dataSource = createDataSource();
    await dataSource.initialize();
    repository = new ScanResultRepository(dataSource);
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('persists a run with one row per peak per window', async () => {
    const run = await repository.saveRun(outcome('rolling'));

    expect(run.id).toBeGreaterThan(0);
    expect(run.windowCount).toBe(2);
    expect(run.durationMs).toBe(12);

    const cycles = await repository.findCycles(run.id);
    expect(cycles.map((c) => [c.windowOffset, c.rank, c.period, c.tier])).toEqual([
      [0, 1, 40, 'PRIMARY'],
      [0, 2, 65, 'TERTIARY'],
      [1, 1, 41, 'PRIMARY'],
    ]);
  });

  it('rolls the run back when its cycles cannot be stored', async () => {
    await dataSource.query('DROP TABLE detected_cycles');

    await expect(repository.saveRun(outcome('rolling'))).rejects.toThrow();
    expect(await dataSource.getRepository(ScanRun).count()).toBe(0);
    expect(repository.getLatestOutcome('rolling')).toBeNull();
  });

  it('finds the most recent run of a mode', async () => {
    await repository.saveRun(outcome('rolling', 'FIRST'));
    await repository.saveRun(outcome('single', 'OTHER'));
    await repository.saveRun(outcome('rolling', 'SECOND'));

    expect((await repository.findLatestRun('rolling'))?.symbol).toBe('SECOND');
    expect((await repository.findLatestRun('single'))?.symbol).toBe('OTHER');
  });

  it('returns null when nothing has been scanned', async () => {
    expect(await repository.findLatestRun('single')).toBeNull();
    expect(repository.getLatestOutcome('single')).toBeNull();
  });

  it('keeps the latest outcome of each mode in memory', async () => {
    const latest = outcome('single');
    await repository.saveRun(latest);
    expect(repository.getLatestOutcome('single')).toBe(latest);
    expect(repository.getLatestOutcome('rolling')).toBeNull();
  });
});
