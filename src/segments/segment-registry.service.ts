import { Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { RegisteredSegment, Segment } from './interfaces/segment.interface';

/**
 * Segment details and the segment → index point mapping. Search results
 * are enriched from here, and re-indexing a segment reuses its point id so
 * the old vector is replaced rather than duplicated.
 */
@Injectable()
export class SegmentRegistryService {
  private readonly segments = new Map<string, RegisteredSegment>();
  // point ids handed out before the insert succeeded
  private readonly reservedPointIds = new Map<string, string>();

  /**
   * Point id for a segment: the existing one, or a new reservation
   */
  pointIdFor(segmentId: string): string {
    const registered = this.segments.get(segmentId);
    if (registered) {
      return registered.pointId;
    }

    let reserved = this.reservedPointIds.get(segmentId);
    if (!reserved) {
      reserved = uuidv4();
      this.reservedPointIds.set(segmentId, reserved);
    }
    return reserved;
  }

  register(segment: Segment, pointId: string, fingerprint: string): RegisteredSegment {
    const record: RegisteredSegment = Object.freeze({
      segment: Object.freeze({
        ...segment,
        contentFlags: Object.freeze({ ...segment.contentFlags }),
      }),
      pointId,
      fingerprint,
      indexedAt: new Date().toISOString(),
    });
    this.segments.set(segment.id, record);
    this.reservedPointIds.delete(segment.id);
    return record;
  }

  remove(segmentId: string): RegisteredSegment | undefined {
    const registered = this.segments.get(segmentId);
    this.segments.delete(segmentId);
    this.reservedPointIds.delete(segmentId);
    return registered;
  }

  get(segmentId: string): RegisteredSegment | undefined {
    return this.segments.get(segmentId);
  }

  list(): RegisteredSegment[] {
    return [...this.segments.values()];
  }

  count(): number {
    return this.segments.size;
  }
}
