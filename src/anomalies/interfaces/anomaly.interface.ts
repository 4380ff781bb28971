export enum AnomalyType {
  LOITERING = 'loitering',
  CROWD_FORMATION = 'crowd_formation',
  OBJECT_ABANDONMENT = 'object_abandonment',
  AFTER_HOURS_ACCESS = 'after_hours_access',
  UNUSUAL_MOVEMENT = 'unusual_movement',
}

/**
 * Ordered low to critical
 */
export enum AnomalySeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export enum AnomalyStatus {
  NEW = 'new',
  ACKNOWLEDGED = 'acknowledged',
  INVESTIGATING = 'investigating',
  RESOLVED = 'resolved',
  FALSE_POSITIVE = 'false_positive',
}

export type AnomalySource =
  | { kind: 'track'; trackId: string; streamId: string }
  | { kind: 'segment'; segmentId: string; videoId: string }
  | { kind: 'location'; location: string; streamId: string };

export type EvidenceValue = string | number | boolean | null | readonly string[];

/**
 * What a detector emits. The store turns it into an Anomaly unless an
 * anomaly with the same dedupe key already exists.
 */
export interface AnomalyCandidate {
  /** Deterministic for the same input history */
  dedupeKey: string;
  type: AnomalyType;
  /** 0..1 */
  confidence: number;
  source: AnomalySource;
  /** Epoch ms of the observation that triggered it */
  detectedAt: number;
  cameraId?: string;
  location?: string;
  description: string;
  evidence: Readonly<Record<string, EvidenceValue>>;
}

export interface StatusChange {
  from: AnomalyStatus | null;
  to: AnomalyStatus;
  /** Epoch ms */
  at: number;
  actor?: string;
  note?: string;
}

export interface Anomaly extends AnomalyCandidate {
  id: string;
  severity: AnomalySeverity;
  status: AnomalyStatus;
  statusHistory: readonly StatusChange[];
  /** Epoch ms */
  createdAt: number;
}

export interface MovementStats {
  count: number;
  mean: number;
  stdDev: number;
}

export type MovementMetric = 'speed' | 'turn_rate';

export type CameraMovementBaseline = Readonly<Record<MovementMetric, MovementStats>>;

/**
 * Baselines as they stood when an evaluation started
 */
export interface BaselineSnapshot {
  /** Rolling average dwell per location, ms */
  dwellMs: ReadonlyMap<string, number>;
  /** Movement statistics per camera */
  movement: ReadonlyMap<string, CameraMovementBaseline>;
}

export interface OperatingHours {
  /** HH:mm */
  start: string;
  /** HH:mm; earlier than start for overnight windows */
  end: string;
  /** IANA zone */
  timeZone: string;
}

export interface AnomalyConfig {
  loiterRadius: number;
  loiterBaselineMultiple: number;
  loiterFloorMs: number;
  /** Closed tracks stay eligible this long after closing */
  recentWindowMs: number;
  crowdThreshold: number;
  crowdLowWatermark: number;
  crowdRiseWindowMs: number;
  abandonDistance: number;
  abandonDurationMs: number;
  operatingHours: OperatingHours;
  movementZThreshold: number;
  movementMinSamples: number;
}

export interface DetectionContext {
  /** Evaluation time on the stream's data clock, epoch ms */
  now: number;
  config: AnomalyConfig;
  baselines: BaselineSnapshot;
}

export interface AnomalyQuery {
  status?: AnomalyStatus;
  severity?: AnomalySeverity;
  type?: AnomalyType;
  /** Epoch ms, inclusive, on detectedAt */
  from?: number;
  /** Epoch ms, inclusive, on detectedAt */
  to?: number;
  streamId?: string;
  trackId?: string;
}
