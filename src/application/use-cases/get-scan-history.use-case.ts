import { Injectable } from '../../shared/decorators';
import { DetectedCycle } from '../../domain/entities/detected-cycle.entity';
import { ScanRun } from '../../domain/entities/scan-run.entity';
import { IScanResultRepository } from '../../domain/interfaces/repositories.interface';
import { ScanMode } from '../../domain/types/scan-mode.type';

@Injectable()
export class GetScanHistoryUseCase {
  constructor(private readonly scanResultRepository: IScanResultRepository) {}

  public async execute(mode: ScanMode): Promise<{ run: ScanRun; cycles: DetectedCycle[] } | null> {
    const run = await this.scanResultRepository.findLatestRun(mode);
    if (!run) return null;
    const cycles = await this.scanResultRepository.findCycles(run.id);
    return { run, cycles };
  }
}
