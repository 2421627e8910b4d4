import { DataSource } from 'typeorm';
import { DetectedCycle } from '../../domain/entities/detected-cycle.entity';
import { ScanRun } from '../../domain/entities/scan-run.entity';
import { Logger } from '../../shared/logger';

const logger = new Logger('DatabaseModule');

/**
 * sql.js keeps the database in memory; with a `location` it is loaded from
 * and saved back to that file after every write.
 */
export function createDataSource(location?: string): DataSource {
  return new DataSource({
    type: 'sqljs',
    location,
    autoSave: location !== undefined,
    synchronize: true,
    logging: false,
    entities: [ScanRun, DetectedCycle],
    migrations: [],
    subscribers: [],
  });
}

export class DatabaseModule {
  private static dataSource: DataSource | null = null;

  static getDataSource(databasePath: string): DataSource {
    if (!DatabaseModule.dataSource) {
      DatabaseModule.dataSource = createDataSource(databasePath);
    }
    return DatabaseModule.dataSource;
  }

  static async initialize(databasePath: string): Promise<void> {
    const dataSource = DatabaseModule.getDataSource(databasePath);
    if (dataSource.isInitialized) return;
    try {
      await dataSource.initialize();
      logger.info(`Database connection established (${databasePath})`);
    } catch (error) {
      logger.error('Database connection failed:', error);
      throw error;
    }
  }

  static async close(): Promise<void> {
    if (DatabaseModule.dataSource?.isInitialized) {
      await DatabaseModule.dataSource.destroy();
    }
    DatabaseModule.dataSource = null;
  }
}
