import { readFile } from 'fs/promises';
import { Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';
import { PriceSeriesLoadError } from '../../domain/errors/errors';
import { IPriceSeriesRepository } from '../../domain/interfaces/repositories.interface';

/** Whitespace-separated prices, one bar per token, oldest first. */
export function parsePriceText(text: string, source: string): number[] {
  const tokens = text.split(/\s+/).filter(Boolean);
  const prices: number[] = [];

  for (const [i, token] of tokens.entries()) {
    const price = Number(token);
    if (!Number.isFinite(price) || price <= 0) {
      throw new PriceSeriesLoadError(`Invalid price "${token}" at position ${i + 1}`, source);
    }
    prices.push(price);
  }

  if (prices.length === 0) {
    throw new PriceSeriesLoadError('Price file contains no prices', source);
  }
  return prices;
}

@Injectable()
export class FilePriceSeriesRepository implements IPriceSeriesRepository {
  private readonly logger = new Logger(FilePriceSeriesRepository.name);

  constructor(public readonly source: string) {}

  public async load(): Promise<number[]> {
    let text: string;
    try {
      text = await readFile(this.source, 'utf8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PriceSeriesLoadError(`Cannot open ${this.source}: ${reason}`, this.source);
    }

    const prices = parsePriceText(text, this.source);
    this.logger.info(`Loaded ${prices.length} prices from ${this.source}`);
    return prices;
  }
}
