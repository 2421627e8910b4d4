import {
  ArrayNotEmpty,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsPositive,
  Max,
  Min,
  ValidateNested,
  ValidationError,
  validateSync,
} from 'class-validator';
import { RollingScanSettingsDto, SingleScanSettingsDto } from '../application/dto/scan-settings.dto';
import { ScanConfigError } from '../domain/errors/errors';
import { SCAN_MODES, ScanMode, isScanMode } from '../domain/types/scan-mode.type';

export class ScannerConfig {
  @IsNotEmpty({ message: 'PRICES_FILE must not be empty' })
  pricesFile!: string;

  @IsNotEmpty()
  symbol!: string;

  @ArrayNotEmpty({ message: `SCAN_MODES must name at least one of ${SCAN_MODES.join(', ')}` })
  modes!: ScanMode[];

  @ValidateNested()
  single!: SingleScanSettingsDto;

  @ValidateNested()
  rolling!: RollingScanSettingsDto;

  @IsPositive({ message: 'CALENDAR_FACTOR must be positive' })
  calendarFactor!: number;

  @IsNotEmpty()
  reportDir!: string;

  @IsNotEmpty()
  databasePath!: string;

  @IsBoolean()
  serveHttp!: boolean;

  @IsInt()
  @Min(1)
  @Max(65535)
  port!: number;
}

type Env = Record<string, string | undefined>;

function num(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  return raw ? Number(raw) : fallback;
}

function str(env: Env, key: string, fallback: string): string {
  return env[key]?.trim() || fallback;
}

function flattenErrors(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((e) => {
    const path = prefix ? `${prefix}.${e.property}` : e.property;
    const own = Object.values(e.constraints ?? {}).map((msg) => `${path}: ${msg}`);
    return [...own, ...flattenErrors(e.children ?? [], path)];
  });
}

/**
 * Builds the scanner configuration from environment variables (see .env.example)
 * and validates it. Throws ScanConfigError listing every violation.
 */
export function loadScannerConfig(env: Env = process.env): ScannerConfig {
  const single = Object.assign(new SingleScanSettingsDto(), {
    windowSize: num(env, 'SINGLE_WINDOW_SIZE', 2000),
    minPeriod: num(env, 'SINGLE_MIN_PERIOD', 30),
    maxPeriod: num(env, 'SINGLE_MAX_PERIOD', 1000),
    peakThreshold: num(env, 'PEAK_THRESHOLD', 0.05),
  });

  const rolling = Object.assign(new RollingScanSettingsDto(), {
    windowSize: num(env, 'ROLLING_WINDOW_SIZE', 4000),
    minPeriod: num(env, 'ROLLING_MIN_PERIOD', 100),
    maxPeriod: num(env, 'ROLLING_MAX_PERIOD', 800),
    peakThreshold: num(env, 'PEAK_THRESHOLD', 0.05),
    stepDays: num(env, 'ROLLING_STEP_DAYS', 5),
    maxOffset: num(env, 'ROLLING_MAX_OFFSET', 260),
  });

  const modes = str(env, 'SCAN_MODES', 'single,rolling')
    .split(',')
    .map((m) => m.trim().toLowerCase())
    .filter(Boolean);

  const config = Object.assign(new ScannerConfig(), {
    pricesFile: str(env, 'PRICES_FILE', 'prices.txt'),
    symbol: str(env, 'SYMBOL', 'TLT'),
    modes: modes.filter(isScanMode),
    single,
    rolling,
    calendarFactor: num(env, 'CALENDAR_FACTOR', 1.451),
    reportDir: str(env, 'REPORT_DIR', 'reports'),
    databasePath: str(env, 'DATABASE_PATH', 'database.sqlite'),
    serveHttp: str(env, 'SERVE_HTTP', 'true').toLowerCase() !== 'false',
    port: num(env, 'PORT', 8000),
  });

  const violations = flattenErrors(validateSync(config));
  for (const unknown of modes.filter((m) => !isScanMode(m))) {
    violations.push(`modes: unknown scan mode "${unknown}"`);
  }
  for (const [name, settings] of [['single', single], ['rolling', rolling]] as const) {
    if (settings.minPeriod >= settings.maxPeriod) {
      violations.push(`${name}: minPeriod must be below maxPeriod`);
    }
    if (settings.peakThreshold === 1) {
      violations.push(`${name}: peakThreshold must be below 1`);
    }
  }

  if (violations.length > 0) throw new ScanConfigError(violations);
  return config;
}
