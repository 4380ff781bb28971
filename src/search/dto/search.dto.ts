import {
  IsBoolean,
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

export class TimeRangeDto {
  @IsOptional()
  @IsISO8601()
  from?: string;

  @IsOptional()
  @IsISO8601()
  to?: string;
}

export class ContentFlagsFilterDto {
  @IsOptional()
  @IsBoolean()
  hasFaces?: boolean;

  @IsOptional()
  @IsBoolean()
  hasVehicles?: boolean;

  @IsOptional()
  @IsBoolean()
  motionDetected?: boolean;
}

export class SearchFiltersDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  cameraId?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  location?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  videoId?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => TimeRangeDto)
  timeRange?: TimeRangeDto;

  @IsOptional()
  @ValidateNested()
  @Type(() => ContentFlagsFilterDto)
  contentFlags?: ContentFlagsFilterDto;
}

/**
 * DTO for semantic search
 */
export class SearchDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  query!: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => SearchFiltersDto)
  filters?: SearchFiltersDto;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  topK?: number = 10;

  @IsOptional()
  @IsNumber()
  @Min(-1)
  @Max(1)
  scoreThreshold?: number = 0.5;
}
