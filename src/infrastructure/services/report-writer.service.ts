import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';
import { IReportWriter } from '../../domain/interfaces/services.interface';
import { ScanOutcome } from '../../domain/types/scan-outcome.type';
import { buildCycleSurface, buildSpectrumSurface } from '../../modules/cycle-scanner';
import {
  formatPeakList,
  formatRollingLine,
  formatSpectrumTable,
  formatSurfaceCsv,
} from './report-formatter';

@Injectable()
export class ReportWriterService implements IReportWriter {
  private readonly logger = new Logger(ReportWriterService.name);

  constructor(
    private readonly reportDir: string,
    private readonly calendarFactor: number,
  ) {}

  public async write(outcome: ScanOutcome): Promise<string[]> {
    await mkdir(this.reportDir, { recursive: true });
    const prefix = `${outcome.symbol.toLowerCase()}_${outcome.mode}`;
    const files = new Map<string, string>();

    if (outcome.mode === 'single') {
      const latest = outcome.results[0];
      if (latest) {
        files.set(`${prefix}_spectrum.txt`, formatSpectrumTable(latest.spectrum, this.calendarFactor));
        files.set(`${prefix}_peaks.txt`, formatPeakList(latest.peaks, this.calendarFactor));
      }
    } else {
      const lines = outcome.results.map((r) => formatRollingLine(r, this.calendarFactor));
      files.set(`${prefix}_peaks.txt`, lines.join('\n') + '\n');
      const surface = buildCycleSurface(outcome.results, outcome.band, outcome.maxOffset);
      files.set(`${prefix}_surface.csv`, formatSurfaceCsv(surface, this.calendarFactor));
      const spectra = buildSpectrumSurface(outcome.results, outcome.band, outcome.maxOffset);
      files.set(`${prefix}_spectrum_surface.csv`, formatSurfaceCsv(spectra, this.calendarFactor));
    }

    const written: string[] = [];
    for (const [name, content] of files) {
      const target = path.join(this.reportDir, name);
      await writeFile(target, content, 'utf8');
      written.push(target);
    }

    this.logger.info(`Wrote ${written.length} report(s) to ${this.reportDir}`);
    return written;
  }
}
