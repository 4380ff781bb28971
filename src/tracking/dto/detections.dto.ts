import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsIn,
  IsISO8601,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { SegmentFieldsDto } from '../../segments/dto';

export class PositionDto {
  @IsNumber()
  x!: number;

  @IsNumber()
  y!: number;
}

class SightingDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  cameraId!: string;

  /** ISO 8601 */
  @IsISO8601()
  timestamp!: string;

  @ValidateNested()
  @Type(() => PositionDto)
  position!: PositionDto;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  segmentId?: string;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  location?: string;
}

export class DetectionDto extends SightingDto {
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(4096)
  @IsNumber({}, { each: true })
  appearance!: number[];
}

export class StationaryObjectDto extends SightingDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  objectId!: string;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  ownerTrackId?: string;
}

export class IngestDetectionsDto {
  @IsArray()
  @ArrayMaxSize(1000)
  @ValidateNested({ each: true })
  @Type(() => DetectionDto)
  detections!: DetectionDto[];

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(1000)
  @ValidateNested({ each: true })
  @Type(() => StationaryObjectDto)
  objects?: StationaryObjectDto[];

  /** Segments the detections came from, checked for after-hours activity */
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(100)
  @ValidateNested({ each: true })
  @Type(() => SegmentFieldsDto)
  segments?: SegmentFieldsDto[];
}

export class FlushStreamDto {
  /** ISO 8601; defaults to just past the track timeout */
  @IsOptional()
  @IsISO8601()
  now?: string;
}

export class ListTracksQueryDto {
  @IsOptional()
  @IsString()
  streamId?: string;

  @IsOptional()
  @IsString()
  cameraId?: string;

  @IsOptional()
  @IsIn(['open', 'closed'])
  state?: 'open' | 'closed';

  @IsOptional()
  @IsISO8601()
  from?: string;

  @IsOptional()
  @IsISO8601()
  to?: string;
}
