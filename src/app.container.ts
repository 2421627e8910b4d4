import { DIContainer } from './shared/container';
import { ScannerConfig } from './shared/config';
import { Logger } from './shared/logger';
import { DatabaseModule } from './infrastructure/database/database.module';
import { FilePriceSeriesRepository } from './infrastructure/repositories/price-series.repository';
import { ScanResultRepository } from './infrastructure/repositories/scan-result.repository';
import { ReportWriterService } from './infrastructure/services/report-writer.service';
import { UptimeService } from './infrastructure/services/uptime.service';

import { RunCycleScanUseCase } from './application/use-cases/run-cycle-scan.use-case';
import { GetLatestScanUseCase } from './application/use-cases/get-latest-scan.use-case';
import { GetScanHistoryUseCase } from './application/use-cases/get-scan-history.use-case';
import { GetCycleSurfaceUseCase } from './application/use-cases/get-cycle-surface.use-case';

import { ScanController } from './presentation/http/scan.controller';
import { HttpServer } from './presentation/http/http.server';
import { CycleScannerApp } from './app';

import {
  PeakDetector,
  PowerEstimator,
  RollingWindowAnalyzer,
  SpectralPostProcessor,
} from './modules/cycle-scanner';
import { IPriceSeriesRepository, IScanResultRepository } from './domain/interfaces/repositories.interface';
import { IReportWriter } from './domain/interfaces/services.interface';

const logger = new Logger('DependencyContainer');

export function registerDependencies(config: ScannerConfig): void {
  const container = DIContainer.getInstance();

  container.bind('ScannerConfig', () => config);

  // --- Register Repositories ---
  container.bind('IPriceSeriesRepository', () => new FilePriceSeriesRepository(config.pricesFile));
  container.bind(
    'IScanResultRepository',
    () => new ScanResultRepository(DatabaseModule.getDataSource(config.databasePath)),
  );

  // --- Register Services ---
  container.bind('IReportWriter', () => new ReportWriterService(config.reportDir, config.calendarFactor));
  container.bind(UptimeService, () => new UptimeService());

  // --- Register Cycle Scanner ---
  container.bind(
    RollingWindowAnalyzer,
    () => new RollingWindowAnalyzer(new PowerEstimator(), new SpectralPostProcessor(), new PeakDetector()),
  );

  // --- Register Use Cases ---
  container.bind(
    RunCycleScanUseCase,
    () =>
      new RunCycleScanUseCase(
        container.get<IPriceSeriesRepository>('IPriceSeriesRepository'),
        container.get<IScanResultRepository>('IScanResultRepository'),
        container.get<IReportWriter>('IReportWriter'),
        container.get(RollingWindowAnalyzer),
        config,
      ),
  );
  container.bind(
    GetLatestScanUseCase,
    () => new GetLatestScanUseCase(container.get<IScanResultRepository>('IScanResultRepository')),
  );
  container.bind(
    GetScanHistoryUseCase,
    () => new GetScanHistoryUseCase(container.get<IScanResultRepository>('IScanResultRepository')),
  );
  container.bind(
    GetCycleSurfaceUseCase,
    () => new GetCycleSurfaceUseCase(container.get<IScanResultRepository>('IScanResultRepository')),
  );

  // --- Register HTTP ---
  container.bind(
    ScanController,
    () =>
      new ScanController(
        container.get(GetLatestScanUseCase),
        container.get(GetScanHistoryUseCase),
        container.get(GetCycleSurfaceUseCase),
        container.get(UptimeService),
        config.calendarFactor,
      ),
  );
  container.bind(HttpServer, () => new HttpServer(container.get(ScanController)));

  // --- Register Main App ---
  container.bind(
    CycleScannerApp,
    () => new CycleScannerApp(config, container.get(RunCycleScanUseCase), container.get(HttpServer)),
  );

  logger.debug('Dependencies registered', { modes: config.modes, pricesFile: config.pricesFile });
}
