import { BadRequestException } from '@nestjs/common';
import { SegmentFieldsDto } from './dto';
import { roundOffset, Segment } from './interfaces/segment.interface';

/**
 * Build a segment from validated request fields
 */
export function toSegment(dto: SegmentFieldsDto): Segment {
  const timestamp = Date.parse(dto.timestamp);
  const startOffset = roundOffset(dto.startOffset);
  const endOffset = roundOffset(dto.endOffset);

  if (Number.isNaN(timestamp)) {
    throw new BadRequestException(`Invalid timestamp "${dto.timestamp}"`);
  }
  if (endOffset <= startOffset) {
    throw new BadRequestException(
      `Segment ${dto.segmentId} must end after it starts (${startOffset}s → ${endOffset}s)`,
    );
  }

  return {
    id: dto.segmentId,
    videoId: dto.videoId,
    startOffset,
    endOffset,
    cameraId: dto.cameraId,
    location: dto.location,
    timestamp,
    contentFlags: {
      hasFaces: dto.hasFaces ?? false,
      hasVehicles: dto.hasVehicles ?? false,
      motionDetected: dto.motionDetected ?? false,
    },
  };
}
