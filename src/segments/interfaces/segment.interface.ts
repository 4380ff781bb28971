/**
 * Content flags set by the segmentation step
 */
export interface ContentFlags {
  hasFaces: boolean;
  hasVehicles: boolean;
  motionDetected: boolean;
}

export type ContentFlag = keyof ContentFlags;

export const CONTENT_FLAGS: readonly ContentFlag[] = [
  'hasFaces',
  'hasVehicles',
  'motionDetected',
];

/**
 * A short video segment produced by the external segmentation step.
 * Immutable once embedded.
 */
export interface Segment {
  /** Segment identifier */
  id: string;
  /** Owning video */
  videoId: string;
  /** Offset of the segment start within the video, seconds (3 decimals) */
  startOffset: number;
  /** Offset of the segment end within the video, seconds (3 decimals) */
  endOffset: number;
  cameraId: string;
  /** Human-readable location label */
  location: string;
  /** Wall-clock time the segment starts, epoch milliseconds */
  timestamp: number;
  contentFlags: ContentFlags;
}

export type IndexStatus = 'indexed' | 'queued';

/**
 * Outcome of indexing one segment
 */
export interface IndexSegmentResult {
  status: IndexStatus;
  segmentId: string;
  pointId: string;
  fingerprint: string;
  /** Whether the embedding came from the cache */
  cacheHit: boolean;
  latencyMs: number;
}

/**
 * Segment registry record: the segment and the index point it maps to
 */
export interface RegisteredSegment {
  segment: Segment;
  pointId: string;
  fingerprint: string;
  indexedAt: string;
}

/**
 * Round an offset to millisecond precision
 */
export function roundOffset(seconds: number): number {
  return Math.round(seconds * 1000) / 1000;
}

/**
 * Wall-clock end of a segment, epoch milliseconds
 */
export function segmentEndTime(segment: Segment): number {
  return (
    segment.timestamp +
    Math.round((segment.endOffset - segment.startOffset) * 1000)
  );
}

export function hasActivity(flags: ContentFlags): boolean {
  return flags.hasFaces || flags.hasVehicles || flags.motionDetected;
}

/**
 * Per-item outcome of a batch index request
 */
export type BatchItemResult =
  | IndexSegmentResult
  | {
      status: 'failed';
      segmentId: string;
      error: string;
      /** HTTP status the same failure would have produced on its own */
      statusCode: number;
    };

export interface RetryQueueResult {
  attempted: number;
  indexed: string[];
  remaining: number;
}

export interface RemoveSegmentResult {
  segmentId: string;
  /** Point removed from the index, absent when the segment was only queued */
  pointId?: string;
  dequeued: boolean;
  /** Drain of the retry queue into the freed capacity */
  retry?: RetryQueueResult;
}
