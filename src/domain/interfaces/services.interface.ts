import { ScanOutcome } from '../types/scan-outcome.type';

export interface IReportWriter {
  /** Writes the text reports for `outcome`; resolves with the written paths. */
  write(outcome: ScanOutcome): Promise<string[]>;
}

export interface IHttpServer {
  listen(port: number): Promise<void>;
  close(): Promise<void>;
}
