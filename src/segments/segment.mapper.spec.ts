import { BadRequestException } from '@nestjs/common';
import { SegmentFieldsDto } from './dto';
import { toSegment } from './segment.mapper';

function fields(overrides: Partial<SegmentFieldsDto> = {}): SegmentFieldsDto {
  return Object.assign(new SegmentFieldsDto(), {
    segmentId: 'seg-1',
    videoId: 'video-1',
    startOffset: 12.34567,
    endOffset: 27.0004,
    cameraId: 'CAM-1',
    location: 'lobby',
    timestamp: '2024-03-04T12:00:00Z',
    hasFaces: true,
    hasVehicles: undefined,
    motionDetected: false,
    ...overrides,
  });
}

describe('toSegment', () => {
  it('rounds offsets to milliseconds and defaults missing flags', () => {
    expect(toSegment(fields())).toEqual({
      id: 'seg-1',
      videoId: 'video-1',
      startOffset: 12.346,
      endOffset: 27,
      cameraId: 'CAM-1',
      location: 'lobby',
      timestamp: Date.UTC(2024, 2, 4, 12, 0, 0),
      contentFlags: { hasFaces: true, hasVehicles: false, motionDetected: false },
    });
  });

  it('rejects a segment that ends before it starts', () => {
    expect(() => toSegment(fields({ startOffset: 10, endOffset: 10 }))).toThrow(
      BadRequestException,
    );
  });

  it('rejects an unreadable timestamp', () => {
    expect(() => toSegment(fields({ timestamp: 'yesterday' }))).toThrow(
      'Invalid timestamp "yesterday"',
    );
  });
});
