import { Injectable } from './shared/decorators';
import { Logger } from './shared/logger';
import { ScannerConfig } from './shared/config';
import { RunCycleScanUseCase } from './application/use-cases/run-cycle-scan.use-case';
import { IHttpServer } from './domain/interfaces/services.interface';

@Injectable()
export class CycleScannerApp {
  private readonly logger = new Logger(CycleScannerApp.name);

  constructor(
    private readonly config: ScannerConfig,
    private readonly runCycleScan: RunCycleScanUseCase,
    private readonly httpServer: IHttpServer,
  ) {}

  public async start(): Promise<void> {
    this.logger.info(`Starting cycle scanner for ${this.config.symbol} (${this.config.modes.join(', ')})`);
    try {
      for (const mode of this.config.modes) {
        const summary = await this.runCycleScan.execute(mode);
        this.logger.info(`${mode} scan complete: ${summary.windowCount} window(s), reports: ${summary.reports.join(', ')}`);
      }

      if (this.config.serveHttp) {
        await this.httpServer.listen(this.config.port);
      }
    } catch (error) {
      this.logger.error('Failed to run cycle scanner:', error);
      throw error;
    }
  }

  public async stop(): Promise<void> {
    this.logger.info('Stopping cycle scanner...');
    await this.httpServer.close();
    this.logger.info('Cycle scanner stopped.');
  }
}
