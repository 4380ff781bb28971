export interface Timestamped {
  cameraId: string;
  timestamp: number;
}

function byTimeThenCamera(a: Timestamped, b: Timestamped): number {
  if (a.timestamp !== b.timestamp) {
    return a.timestamp - b.timestamp;
  }
  return a.cameraId < b.cameraId ? -1 : a.cameraId > b.cameraId ? 1 : 0;
}

/**
 * Holds items until they fall behind the newest timestamp seen by the
 * grace window, then releases them in timestamp order.
 *
 * An item older than the last one released for its camera can no longer
 * be placed in order and is dropped.
 */
export class ReorderBuffer<T extends Timestamped> {
  private pending: T[] = [];
  private maxSeen = Number.NEGATIVE_INFINITY;
  private readonly lastReleased = new Map<string, number>();
  private droppedCount = 0;

  constructor(private readonly graceMs: number) {}

  /**
   * Returns false when the item arrived too late and was dropped
   */
  push(item: T): boolean {
    const last = this.lastReleased.get(item.cameraId);
    if (last !== undefined && item.timestamp < last) {
      this.droppedCount++;
      return false;
    }

    this.pending.push(item);
    this.maxSeen = Math.max(this.maxSeen, item.timestamp);
    return true;
  }

  /**
   * Release everything at or behind the watermark
   */
  drain(): T[] {
    const watermark = this.maxSeen - this.graceMs;
    return this.release((item) => item.timestamp <= watermark);
  }

  flush(): T[] {
    return this.release(() => true);
  }

  get size(): number {
    return this.pending.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  private release(isReady: (item: T) => boolean): T[] {
    const ready: T[] = [];
    const waiting: T[] = [];
    for (const item of this.pending) {
      (isReady(item) ? ready : waiting).push(item);
    }
    this.pending = waiting;

    ready.sort(byTimeThenCamera);
    for (const item of ready) {
      const last = this.lastReleased.get(item.cameraId);
      if (last === undefined || item.timestamp > last) {
        this.lastReleased.set(item.cameraId, item.timestamp);
      }
    }
    return ready;
  }
}
