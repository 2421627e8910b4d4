import { Injectable } from '../../shared/decorators';
import { IScanResultRepository } from '../../domain/interfaces/repositories.interface';
import { ScanMode } from '../../domain/types/scan-mode.type';
import { ScanOutcome } from '../../domain/types/scan-outcome.type';

@Injectable()
export class GetLatestScanUseCase {
  constructor(private readonly scanResultRepository: IScanResultRepository) {}

  public execute(mode: ScanMode): ScanOutcome | null {
    return this.scanResultRepository.getLatestOutcome(mode);
  }
}
