import 'reflect-metadata';

import { config } from 'dotenv';
import { DIContainer } from './shared/container';
import { loadScannerConfig } from './shared/config';
import { Logger } from './shared/logger';
import { DatabaseModule } from './infrastructure/database/database.module';
import { registerDependencies } from './app.container';
import { CycleScannerApp } from './app';

// Load environment variables
config();

const logger = new Logger('Main');

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection:', reason);
  process.exit(1);
});

async function bootstrap(): Promise<void> {
  let app: CycleScannerApp | null = null;
  try {
    const scannerConfig = loadScannerConfig();

    registerDependencies(scannerConfig);
    await DatabaseModule.initialize(scannerConfig.databasePath);

    app = DIContainer.getInstance().get(CycleScannerApp);
    await app.start();

    if (!scannerConfig.serveHttp) {
      await DatabaseModule.close();
      return;
    }

    // Graceful shutdown
    let isShuttingDown = false;
    const running = app;
    const shutdown = async (signal: string): Promise<void> => {
      if (isShuttingDown) return;
      isShuttingDown = true;
      logger.info(`Received ${signal}, shutting down gracefully...`);
      try {
        await running.stop();
      } finally {
        await DatabaseModule.close();
        process.exit(0);
      }
    };

    process.once('SIGINT', () => void shutdown('SIGINT'));
    process.once('SIGTERM', () => void shutdown('SIGTERM'));
  } catch (error) {
    logger.error('Failed to start application:', error);
    await app?.stop();
    await DatabaseModule.close();
    process.exit(1);
  }
}

void bootstrap();
