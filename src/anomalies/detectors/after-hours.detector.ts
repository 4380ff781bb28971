import { hasActivity, Segment } from '../../segments/interfaces/segment.interface';
import { Track } from '../../tracking/interfaces/track.interface';
import {
  AnomalyCandidate,
  AnomalyType,
  DetectionContext,
  OperatingHours,
} from '../interfaces/anomaly.interface';
import { isEligible } from './detector.utils';

const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})$/;

/**
 * Minutes since midnight for an HH:mm string
 */
export function parseClock(value: string): number {
  const match = CLOCK_PATTERN.exec(value.trim());
  const hours = match ? Number(match[1]) : NaN;
  const minutes = match ? Number(match[2]) : NaN;
  if (!(hours >= 0 && hours <= 23 && minutes >= 0 && minutes <= 59)) {
    throw new Error(`Invalid clock time "${value}", expected HH:mm`);
  }
  return hours * 60 + minutes;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Local minutes since midnight of an instant in the given zone
 */
export function minutesOfDay(timestamp: number, timeZone: string): number {
  let hours = 0;
  let minutes = 0;
  for (const part of formatterFor(timeZone).formatToParts(timestamp)) {
    if (part.type === 'hour') hours = Number(part.value) % 24;
    if (part.type === 'minute') minutes = Number(part.value);
  }
  return hours * 60 + minutes;
}

/**
 * Start inclusive, end exclusive. An end before the start wraps past
 * midnight; equal bounds mean always open.
 */
export function isWithinOperatingHours(
  timestamp: number,
  hours: OperatingHours,
): boolean {
  const start = parseClock(hours.start);
  const end = parseClock(hours.end);
  if (start === end) return true;

  const minute = minutesOfDay(timestamp, hours.timeZone);
  return start < end
    ? minute >= start && minute < end
    : minute >= start || minute < end;
}

function describeWindow(hours: OperatingHours): string {
  return `${hours.start}-${hours.end} ${hours.timeZone}`;
}

export function detectAfterHoursTracks(
  tracks: readonly Track[],
  ctx: DetectionContext,
): AnomalyCandidate[] {
  const hours = ctx.config.operatingHours;
  const candidates: AnomalyCandidate[] = [];

  for (const track of tracks) {
    if (!isEligible(track, ctx)) continue;

    const first = track.observations.find(
      (observation) => !isWithinOperatingHours(observation.timestamp, hours),
    );
    if (!first) continue;

    candidates.push({
      dedupeKey: `after-hours:track:${track.id}`,
      type: AnomalyType.AFTER_HOURS_ACCESS,
      confidence: 1,
      source: { kind: 'track', trackId: track.id, streamId: track.streamId },
      detectedAt: first.timestamp,
      cameraId: first.cameraId,
      location: first.location,
      description: `Track ${track.id} seen at ${first.location} outside operating hours (${describeWindow(hours)})`,
      evidence: {
        observedAt: new Date(first.timestamp).toISOString(),
        operatingHours: describeWindow(hours),
      },
    });
  }
  return candidates;
}

export function detectAfterHoursSegment(
  segment: Segment,
  ctx: DetectionContext,
): AnomalyCandidate[] {
  const hours = ctx.config.operatingHours;
  if (isWithinOperatingHours(segment.timestamp, hours)) return [];

  const what = hasActivity(segment.contentFlags) ? 'Activity' : 'Footage';

  return [
    {
      dedupeKey: `after-hours:segment:${segment.id}`,
      type: AnomalyType.AFTER_HOURS_ACCESS,
      confidence: 1,
      source: { kind: 'segment', segmentId: segment.id, videoId: segment.videoId },
      detectedAt: segment.timestamp,
      cameraId: segment.cameraId,
      location: segment.location,
      description: `${what} at ${segment.location} outside operating hours (${describeWindow(hours)})`,
      evidence: {
        observedAt: new Date(segment.timestamp).toISOString(),
        operatingHours: describeWindow(hours),
        hasFaces: segment.contentFlags.hasFaces,
        hasVehicles: segment.contentFlags.hasVehicles,
        motionDetected: segment.contentFlags.motionDetected,
      },
    },
  ];
}
