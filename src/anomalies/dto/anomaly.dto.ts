import {
  IsEnum,
  IsISO8601,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import {
  AnomalySeverity,
  AnomalyStatus,
  AnomalyType,
} from '../interfaces/anomaly.interface';

export class ListAnomaliesQueryDto {
  @IsOptional()
  @IsEnum(AnomalyStatus)
  status?: AnomalyStatus;

  @IsOptional()
  @IsEnum(AnomalySeverity)
  severity?: AnomalySeverity;

  @IsOptional()
  @IsEnum(AnomalyType)
  type?: AnomalyType;

  /** ISO 8601, inclusive */
  @IsOptional()
  @IsISO8601()
  from?: string;

  /** ISO 8601, inclusive */
  @IsOptional()
  @IsISO8601()
  to?: string;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  streamId?: string;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  trackId?: string;
}

export class UpdateAnomalyStatusDto {
  @IsEnum(AnomalyStatus)
  status!: AnomalyStatus;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  actor?: string;

  @IsOptional()
  @IsString()
  @MaxLength(2000)
  note?: string;
}

export class SeedDwellBaselineDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  location!: string;

  /** Average dwell at the location, ms */
  @IsNumber()
  @Min(1)
  averageDwellMs!: number;
}
