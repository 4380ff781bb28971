import { AnomalySeverity, AnomalyType } from './interfaces/anomaly.interface';

const SEVERITY_ORDER: readonly AnomalySeverity[] = [
  AnomalySeverity.LOW,
  AnomalySeverity.MEDIUM,
  AnomalySeverity.HIGH,
  AnomalySeverity.CRITICAL,
];

const BASE_SEVERITY: Record<AnomalyType, AnomalySeverity> = {
  [AnomalyType.LOITERING]: AnomalySeverity.MEDIUM,
  [AnomalyType.CROWD_FORMATION]: AnomalySeverity.HIGH,
  [AnomalyType.OBJECT_ABANDONMENT]: AnomalySeverity.HIGH,
  [AnomalyType.AFTER_HOURS_ACCESS]: AnomalySeverity.MEDIUM,
  [AnomalyType.UNUSUAL_MOVEMENT]: AnomalySeverity.LOW,
};

export const ESCALATION_CONFIDENCE = 0.9;

/**
 * Base severity of the type, one level higher at high confidence
 */
export function severityFor(type: AnomalyType, confidence: number): AnomalySeverity {
  const base = SEVERITY_ORDER.indexOf(BASE_SEVERITY[type]);
  const level = confidence >= ESCALATION_CONFIDENCE ? base + 1 : base;
  return SEVERITY_ORDER[Math.min(level, SEVERITY_ORDER.length - 1)];
}
