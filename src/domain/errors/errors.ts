/** Input series could not be obtained. Fatal for the whole run. */
export class PriceSeriesLoadError extends Error {
  constructor(
    message: string,
    public readonly source: string,
  ) {
    super(message);
    this.name = 'PriceSeriesLoadError';
  }
}

export class ScanConfigError extends Error {
  constructor(public readonly violations: string[]) {
    super(`Invalid scan configuration: ${violations.join('; ')}`);
    this.name = 'ScanConfigError';
  }
}
