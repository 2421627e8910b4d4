import { DataSource, Repository } from 'typeorm';
import { Injectable } from '../../shared/decorators';
import { DetectedCycle } from '../../domain/entities/detected-cycle.entity';
import { ScanRun } from '../../domain/entities/scan-run.entity';
import { IScanResultRepository } from '../../domain/interfaces/repositories.interface';
import { ScanMode } from '../../domain/types/scan-mode.type';
import { ScanOutcome } from '../../domain/types/scan-outcome.type';

@Injectable()
export class ScanResultRepository implements IScanResultRepository {
  private readonly runs: Repository<ScanRun>;
  private readonly cycles: Repository<DetectedCycle>;
  // spectra are only kept in memory, for the most recent run of each mode
  private latestOutcomes = new Map<ScanMode, ScanOutcome>();

  constructor(private readonly dataSource: DataSource) {
    this.runs = dataSource.getRepository(ScanRun);
    this.cycles = dataSource.getRepository(DetectedCycle);
  }

  public async saveRun(outcome: ScanOutcome): Promise<ScanRun> {
    // the run and its cycles land together or not at all
    const run = await this.dataSource.transaction(async (manager) => {
      const runs = manager.getRepository(ScanRun);
      const cycles = manager.getRepository(DetectedCycle);

      const saved = await runs.save(
        runs.create({
          symbol: outcome.symbol,
          mode: outcome.mode,
          seriesLength: outcome.seriesLength,
          windowSize: outcome.windowSize,
          minPeriod: outcome.band.minPeriod,
          maxPeriod: outcome.band.maxPeriod,
          windowCount: outcome.results.length,
          durationMs: Math.round(outcome.durationMs),
        }),
      );

      const rows = outcome.results.flatMap((result) =>
        result.peaks.map((peak, index) =>
          cycles.create({
            runId: saved.id,
            windowOffset: result.offset,
            rank: index + 1,
            period: peak.period,
            power: peak.power,
            tier: peak.tier,
          }),
        ),
      );
      if (rows.length > 0) {
        await cycles.save(rows, { chunk: 500 });
      }
      return saved;
    });

    this.latestOutcomes.set(outcome.mode, outcome);
    return run;
  }

  public async findLatestRun(mode: ScanMode): Promise<ScanRun | null> {
    return this.runs.findOne({ where: { mode }, order: { id: 'DESC' } });
  }

  public async findCycles(runId: number): Promise<DetectedCycle[]> {
    return this.cycles.find({ where: { runId }, order: { windowOffset: 'ASC', rank: 'ASC' } });
  }

  public getLatestOutcome(mode: ScanMode): ScanOutcome | null {
    return this.latestOutcomes.get(mode) ?? null;
  }
}
