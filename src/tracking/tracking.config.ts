import { ConfigService } from '@nestjs/config';
import { getNumber } from '../config/config.helpers';
import { TrackingConfig } from './interfaces/track.interface';

export const DEFAULT_TRACKING_CONFIG: TrackingConfig = {
  reorderGraceMs: 2000,
  similarityThreshold: 0.8,
  maxSpeed: 5,
  positionTolerance: 2,
  maxHandoffDelayMs: 30000,
  trackTimeoutMs: 60000,
  ownerAssociationRadius: 3,
};

export function loadTrackingConfig(config: ConfigService): TrackingConfig {
  const d = DEFAULT_TRACKING_CONFIG;
  const trackTimeoutMs = getNumber(config, 'TRACK_TIMEOUT_MS', d.trackTimeoutMs);
  if (trackTimeoutMs < 30000 || trackTimeoutMs > 120000) {
    throw new Error(
      `Configuration TRACK_TIMEOUT_MS must be between 30000 and 120000, got ${trackTimeoutMs}`,
    );
  }

  return {
    reorderGraceMs: getNumber(config, 'TRACK_REORDER_GRACE_MS', d.reorderGraceMs),
    similarityThreshold: getNumber(
      config,
      'TRACK_SIMILARITY_THRESHOLD',
      d.similarityThreshold,
    ),
    maxSpeed: getNumber(config, 'TRACK_MAX_SPEED', d.maxSpeed),
    positionTolerance: getNumber(
      config,
      'TRACK_POSITION_TOLERANCE',
      d.positionTolerance,
    ),
    maxHandoffDelayMs: getNumber(
      config,
      'TRACK_MAX_HANDOFF_DELAY_MS',
      d.maxHandoffDelayMs,
    ),
    trackTimeoutMs,
    ownerAssociationRadius: getNumber(
      config,
      'TRACK_OWNER_ASSOCIATION_RADIUS',
      d.ownerAssociationRadius,
    ),
  };
}
