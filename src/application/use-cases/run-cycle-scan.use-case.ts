import { Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';
import { ScannerConfig } from '../../shared/config';
import { IPriceSeriesRepository, IScanResultRepository } from '../../domain/interfaces/repositories.interface';
import { IReportWriter } from '../../domain/interfaces/services.interface';
import { ScanMode } from '../../domain/types/scan-mode.type';
import { ScanOutcome } from '../../domain/types/scan-outcome.type';
import { Peak, RollingWindowAnalyzer, WindowResult } from '../../modules/cycle-scanner';
import { formatDuration } from '../../infrastructure/services/uptime.service';

export interface ScanSummary {
  runId: number;
  mode: ScanMode;
  windowCount: number;
  topPeaks: Peak[]; // strongest peaks of the most recent window
  reports: string[];
  durationMs: number;
}

@Injectable()
export class RunCycleScanUseCase {
  private readonly logger = new Logger(RunCycleScanUseCase.name);

  constructor(
    private readonly priceSeriesRepository: IPriceSeriesRepository,
    private readonly scanResultRepository: IScanResultRepository,
    private readonly reportWriter: IReportWriter,
    private readonly analyzer: RollingWindowAnalyzer,
    private readonly config: ScannerConfig,
  ) {}

  public async execute(mode: ScanMode): Promise<ScanSummary> {
    try {
      const prices = await this.priceSeriesRepository.load();
      const outcome = this.analyze(mode, prices);

      const run = await this.scanResultRepository.saveRun(outcome);
      const reports = await this.reportWriter.write(outcome);

      const topPeaks = outcome.results[0]?.peaks.slice(0, 5) ?? [];
      this.logger.info(
        `${mode} scan #${run.id}: ${outcome.results.length} window(s) in ${formatDuration(outcome.durationMs)}`,
        { topPeaks: topPeaks.map((p) => `${p.period}d ${(p.power * 100).toFixed(1)}% ${p.tier}`) },
      );

      return {
        runId: run.id,
        mode,
        windowCount: outcome.results.length,
        topPeaks,
        reports,
        durationMs: outcome.durationMs,
      };
    } catch (error) {
      this.logger.error(`${mode} scan failed:`, error);
      throw error;
    }
  }

  private analyze(mode: ScanMode, prices: number[]): ScanOutcome {
    const started = Date.now();
    const settings = mode === 'single' ? this.config.single : this.config.rolling;
    const band = { minPeriod: settings.minPeriod, maxPeriod: settings.maxPeriod };

    this.logger.info(
      `Running ${mode} scan over ${prices.length} bars, window ${settings.windowSize}, periods ${band.minPeriod}-${band.maxPeriod}`,
    );

    let results: WindowResult[];
    let stepDays = 0;
    let maxOffset = 0;

    if (mode === 'single') {
      results = [
        this.analyzer.analyzeLatest(prices, {
          windowSize: settings.windowSize,
          band,
          peakThreshold: settings.peakThreshold,
        }),
      ];
    } else {
      const rolling = this.config.rolling;
      stepDays = rolling.stepDays;
      maxOffset = rolling.maxOffset;
      results = this.analyzer.analyzeRolling(prices, {
        windowSize: rolling.windowSize,
        band,
        peakThreshold: rolling.peakThreshold,
        stepDays,
        maxOffset,
        onWindow: (result) => {
          if (result.offset % 20 === 0) this.logger.debug(`Processed offset ${result.offset}`);
        },
      });
      const skipped = maxOffset + 1 - results.length;
      if (skipped > 0) {
        this.logger.warn(`${skipped} offset(s) skipped: not enough history for a ${rolling.windowSize}-bar window`);
      }
    }

    return {
      mode,
      symbol: this.config.symbol,
      seriesLength: prices.length,
      windowSize: Math.min(settings.windowSize, prices.length),
      band,
      stepDays,
      maxOffset,
      results,
      durationMs: Date.now() - started,
      completedAt: new Date(),
    };
  }
}
