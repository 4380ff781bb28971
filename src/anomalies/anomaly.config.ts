import { ConfigService } from '@nestjs/config';
import { getNumber, getString } from '../config/config.helpers';
import { parseClock } from './detectors/after-hours.detector';
import { AnomalyConfig } from './interfaces/anomaly.interface';

const MINUTE_MS = 60 * 1000;

export const DEFAULT_ANOMALY_CONFIG: AnomalyConfig = {
  loiterRadius: 5,
  loiterBaselineMultiple: 5,
  loiterFloorMs: 15 * MINUTE_MS,
  recentWindowMs: 10 * MINUTE_MS,
  crowdThreshold: 10,
  crowdLowWatermark: 5,
  crowdRiseWindowMs: 60 * 1000,
  abandonDistance: 10,
  abandonDurationMs: 5 * MINUTE_MS,
  operatingHours: { start: '06:00', end: '22:00', timeZone: 'UTC' },
  movementZThreshold: 3,
  movementMinSamples: 30,
};

export function loadAnomalyConfig(config: ConfigService): AnomalyConfig {
  const d = DEFAULT_ANOMALY_CONFIG;
  const operatingHours = {
    start: getString(config, 'OPERATING_HOURS_START', d.operatingHours.start),
    end: getString(config, 'OPERATING_HOURS_END', d.operatingHours.end),
    timeZone: getString(
      config,
      'OPERATING_HOURS_TIMEZONE',
      d.operatingHours.timeZone,
    ),
  };
  // fail at startup rather than on the first evaluation
  parseClock(operatingHours.start);
  parseClock(operatingHours.end);
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: operatingHours.timeZone });
  } catch {
    throw new Error(
      `Configuration OPERATING_HOURS_TIMEZONE is not a known time zone: "${operatingHours.timeZone}"`,
    );
  }

  const crowdThreshold = getNumber(
    config,
    'ANOMALY_CROWD_THRESHOLD',
    d.crowdThreshold,
  );
  const crowdLowWatermark = getNumber(
    config,
    'ANOMALY_CROWD_LOW_WATERMARK',
    d.crowdLowWatermark,
  );
  if (crowdLowWatermark >= crowdThreshold) {
    throw new Error(
      'Configuration ANOMALY_CROWD_LOW_WATERMARK must be below ANOMALY_CROWD_THRESHOLD',
    );
  }

  return {
    loiterRadius: getNumber(config, 'ANOMALY_LOITER_RADIUS', d.loiterRadius),
    loiterBaselineMultiple: getNumber(
      config,
      'ANOMALY_LOITER_BASELINE_MULTIPLE',
      d.loiterBaselineMultiple,
    ),
    loiterFloorMs: getNumber(config, 'ANOMALY_LOITER_FLOOR_MS', d.loiterFloorMs),
    recentWindowMs: getNumber(
      config,
      'ANOMALY_RECENT_WINDOW_MS',
      d.recentWindowMs,
    ),
    crowdThreshold,
    crowdLowWatermark,
    crowdRiseWindowMs: getNumber(
      config,
      'ANOMALY_CROWD_RISE_WINDOW_MS',
      d.crowdRiseWindowMs,
    ),
    abandonDistance: getNumber(
      config,
      'ANOMALY_ABANDON_DISTANCE',
      d.abandonDistance,
    ),
    abandonDurationMs: getNumber(
      config,
      'ANOMALY_ABANDON_DURATION_MS',
      d.abandonDurationMs,
    ),
    operatingHours,
    movementZThreshold: getNumber(
      config,
      'ANOMALY_MOVEMENT_Z_THRESHOLD',
      d.movementZThreshold,
    ),
    movementMinSamples: getNumber(
      config,
      'ANOMALY_MOVEMENT_MIN_SAMPLES',
      d.movementMinSamples,
    ),
  };
}
