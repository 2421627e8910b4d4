import { IsInt, IsNumber, Max, Min } from 'class-validator';

export class SingleScanSettingsDto {
  @IsInt({ message: 'Single scan window size must be an integer' })
  @Min(2)
  windowSize!: number;

  @IsInt({ message: 'Minimum period must be an integer' })
  @Min(2)
  minPeriod!: number;

  @IsInt({ message: 'Maximum period must be an integer' })
  @Min(3)
  maxPeriod!: number;

  @IsNumber({}, { message: 'Peak threshold must be a number' })
  @Min(0)
  @Max(1)
  peakThreshold!: number;
}

export class RollingScanSettingsDto extends SingleScanSettingsDto {
  @IsInt({ message: 'Rolling step must be an integer number of trading days' })
  @Min(1)
  stepDays!: number;

  @IsInt({ message: 'Maximum offset must be an integer' })
  @Min(0)
  maxOffset!: number;
}
