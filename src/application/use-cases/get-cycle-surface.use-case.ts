import { Injectable } from '../../shared/decorators';
import { IScanResultRepository } from '../../domain/interfaces/repositories.interface';
import { CycleSurface, SurfaceKind, buildSurface } from '../../modules/cycle-scanner';

@Injectable()
export class GetCycleSurfaceUseCase {
  constructor(private readonly scanResultRepository: IScanResultRepository) {}

  public execute(kind: SurfaceKind = 'peaks'): CycleSurface | null {
    const outcome = this.scanResultRepository.getLatestOutcome('rolling');
    if (!outcome) return null;
    return buildSurface(kind, outcome.results, outcome.band, outcome.maxOffset);
  }
}
