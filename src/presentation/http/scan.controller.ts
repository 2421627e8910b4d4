import { Injectable } from '../../shared/decorators';
import { GetCycleSurfaceUseCase } from '../../application/use-cases/get-cycle-surface.use-case';
import { GetLatestScanUseCase } from '../../application/use-cases/get-latest-scan.use-case';
import { GetScanHistoryUseCase } from '../../application/use-cases/get-scan-history.use-case';
import { UptimeService } from '../../infrastructure/services/uptime.service';
import { toCalendarDays } from '../../infrastructure/services/report-formatter';
import { isScanMode } from '../../domain/types/scan-mode.type';
import { SignificanceTier, isSurfaceKind } from '../../modules/cycle-scanner';

export type HttpResult = { status: number; body: unknown };

type PeakView = { period: number; calendarDays: number; power: number; tier: SignificanceTier };

function notFound(message: string): HttpResult {
  return { status: 404, body: { error: message } };
}

function badMode(mode: string): HttpResult {
  return { status: 400, body: { error: `Unknown scan mode: ${mode}` } };
}

// Framework-free handlers; http.server.ts maps them onto express routes
@Injectable()
export class ScanController {
  constructor(
    private readonly getLatestScan: GetLatestScanUseCase,
    private readonly getScanHistory: GetScanHistoryUseCase,
    private readonly getCycleSurface: GetCycleSurfaceUseCase,
    private readonly uptime: UptimeService,
    private readonly calendarFactor: number,
  ) {}

  health(): HttpResult {
    return { status: 200, body: { status: 'ok', uptime: this.uptime.getUptime() } };
  }

  latest(mode: string): HttpResult {
    if (!isScanMode(mode)) return badMode(mode);
    const outcome = this.getLatestScan.execute(mode);
    if (!outcome) return notFound(`No ${mode} scan has completed yet`);

    return {
      status: 200,
      body: {
        mode: outcome.mode,
        symbol: outcome.symbol,
        completedAt: outcome.completedAt.toISOString(),
        windowSize: outcome.windowSize,
        band: outcome.band,
        windows: outcome.results.map((r) => ({
          offset: r.offset,
          startIndex: r.startIndex,
          endIndex: r.endIndex,
          spectrum: r.spectrum.periods.map((period, i) => [period, r.spectrum.power[i]]),
          peaks: r.peaks.map(
            (p): PeakView => ({ ...p, calendarDays: toCalendarDays(p.period, this.calendarFactor) }),
          ),
        })),
      },
    };
  }

  async history(mode: string): Promise<HttpResult> {
    if (!isScanMode(mode)) return badMode(mode);
    const history = await this.getScanHistory.execute(mode);
    if (!history) return notFound(`No ${mode} scan has been recorded`);
    return { status: 200, body: history };
  }

  surface(kind = 'peaks'): HttpResult {
    if (!isSurfaceKind(kind)) return { status: 400, body: { error: `Unknown surface kind: ${kind}` } };
    const surface = this.getCycleSurface.execute(kind);
    if (!surface) return notFound('No rolling scan has completed yet');
    return { status: 200, body: surface };
  }
}
