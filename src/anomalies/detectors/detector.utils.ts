import { Track } from '../../tracking/interfaces/track.interface';
import { DetectionContext } from '../interfaces/anomaly.interface';

/**
 * Open tracks, and closed tracks within the recent window
 */
export function isEligible(track: Track, ctx: DetectionContext): boolean {
  if (track.state === 'open') return true;
  const closedAt = track.closedAt ?? track.lastSeenAt;
  return ctx.now - closedAt <= ctx.config.recentWindowMs;
}

/**
 * 0.5 at the threshold, rising linearly to 1 at twice the threshold
 */
export function exceedanceConfidence(value: number, threshold: number): number {
  if (threshold <= 0) return 1;
  return Math.min(1, 0.5 + (0.5 * (value - threshold)) / threshold);
}

export function formatDuration(ms: number): string {
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}
