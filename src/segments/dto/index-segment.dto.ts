import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsBase64,
  IsBoolean,
  IsISO8601,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { Transform, TransformFnParams, Type } from 'class-transformer';

/**
 * Multipart fields arrive as strings; implicit conversion would turn
 * "false" into true
 */
export function toBoolean({ value }: TransformFnParams): unknown {
  if (value === true || value === 'true' || value === '1') return true;
  if (value === false || value === 'false' || value === '0') return false;
  return value;
}

/**
 * Segment fields as produced by the segmentation step
 */
export class SegmentFieldsDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  segmentId!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  videoId!: string;

  /** Seconds from the start of the video */
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  startOffset!: number;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  endOffset!: number;

  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  cameraId!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(500)
  location!: string;

  /** Wall-clock start of the segment */
  @IsISO8601()
  timestamp!: string;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  hasFaces?: boolean = false;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  hasVehicles?: boolean = false;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  motionDetected?: boolean = false;
}

/**
 * DTO for indexing an uploaded segment file
 */
export class IndexSegmentDto extends SegmentFieldsDto {}

/**
 * One segment of a batch, content inlined as base64
 */
export class BatchSegmentDto extends SegmentFieldsDto {
  @IsBase64()
  @IsNotEmpty()
  contentBase64!: string;

  @IsString()
  @Matches(/^[\w.+-]+\/[\w.+-]+$/, { message: 'mimeType must be a MIME type' })
  mimeType!: string;
}

export class IndexSegmentBatchDto {
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(100)
  @ValidateNested({ each: true })
  @Type(() => BatchSegmentDto)
  segments!: BatchSegmentDto[];
}
