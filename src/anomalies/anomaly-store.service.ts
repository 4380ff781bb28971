import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  Anomaly,
  AnomalyCandidate,
  AnomalyQuery,
  AnomalyStatus,
  AnomalyType,
  StatusChange,
} from './interfaces/anomaly.interface';
import { severityFor } from './severity';

const TRANSITIONS: Record<AnomalyStatus, readonly AnomalyStatus[]> = {
  [AnomalyStatus.NEW]: [
    AnomalyStatus.ACKNOWLEDGED,
    AnomalyStatus.INVESTIGATING,
    AnomalyStatus.RESOLVED,
    AnomalyStatus.FALSE_POSITIVE,
  ],
  [AnomalyStatus.ACKNOWLEDGED]: [
    AnomalyStatus.INVESTIGATING,
    AnomalyStatus.RESOLVED,
    AnomalyStatus.FALSE_POSITIVE,
  ],
  [AnomalyStatus.INVESTIGATING]: [
    AnomalyStatus.RESOLVED,
    AnomalyStatus.FALSE_POSITIVE,
  ],
  [AnomalyStatus.RESOLVED]: [AnomalyStatus.INVESTIGATING],
  [AnomalyStatus.FALSE_POSITIVE]: [AnomalyStatus.INVESTIGATING],
};

export function canTransition(from: AnomalyStatus, to: AnomalyStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

function sourceMatches(anomaly: Anomaly, query: AnomalyQuery): boolean {
  const { source } = anomaly;
  if (query.streamId !== undefined) {
    if (source.kind === 'segment' || source.streamId !== query.streamId) {
      return false;
    }
  }
  if (query.trackId !== undefined) {
    if (source.kind !== 'track' || source.trackId !== query.trackId) {
      return false;
    }
  }
  return true;
}

/**
 * Append-only anomaly store. Records are frozen; an operator status
 * change stores a new version carrying the extended history.
 */
@Injectable()
export class AnomalyStoreService {
  private readonly logger = new Logger(AnomalyStoreService.name);
  private readonly anomalies = new Map<string, Anomaly>();
  private readonly byDedupeKey = new Map<string, string>();

  /**
   * Store the candidates not seen before; returns the new anomalies
   */
  append(candidates: readonly AnomalyCandidate[]): Anomaly[] {
    const created: Anomaly[] = [];

    for (const candidate of candidates) {
      if (this.byDedupeKey.has(candidate.dedupeKey)) continue;

      const createdAt = Date.now();
      const initial: StatusChange = { from: null, to: AnomalyStatus.NEW, at: createdAt };
      const anomaly: Anomaly = {
        ...candidate,
        evidence: Object.freeze({ ...candidate.evidence }),
        source: Object.freeze({ ...candidate.source }),
        id: uuidv4(),
        severity: severityFor(candidate.type, candidate.confidence),
        status: AnomalyStatus.NEW,
        statusHistory: Object.freeze([Object.freeze(initial)]),
        createdAt,
      };

      Object.freeze(anomaly);
      this.anomalies.set(anomaly.id, anomaly);
      this.byDedupeKey.set(anomaly.dedupeKey, anomaly.id);
      created.push(anomaly);
      this.logger.log(
        `Anomaly ${anomaly.id}: ${anomaly.type} (${anomaly.severity}, confidence ${anomaly.confidence.toFixed(2)}) - ${anomaly.description}`,
      );
    }
    return created;
  }

  get(id: string): Anomaly {
    const anomaly = this.anomalies.get(id);
    if (!anomaly) {
      throw new NotFoundException(`Anomaly ${id} not found`);
    }
    return anomaly;
  }

  /**
   * Newest detection first
   */
  list(query: AnomalyQuery = {}): Anomaly[] {
    return [...this.anomalies.values()]
      .filter(
        (a) =>
          (query.status === undefined || a.status === query.status) &&
          (query.severity === undefined || a.severity === query.severity) &&
          (query.type === undefined || a.type === query.type) &&
          (query.from === undefined || a.detectedAt >= query.from) &&
          (query.to === undefined || a.detectedAt <= query.to) &&
          sourceMatches(a, query),
      )
      .sort((a, b) => b.detectedAt - a.detectedAt || a.createdAt - b.createdAt);
  }

  hasAnomalyForTrack(trackId: string, types?: readonly AnomalyType[]): boolean {
    return this.list({ trackId }).some(
      (anomaly) => types === undefined || types.includes(anomaly.type),
    );
  }

  updateStatus(
    id: string,
    to: AnomalyStatus,
    details: { actor?: string; note?: string } = {},
  ): Anomaly {
    const current = this.get(id);
    if (!canTransition(current.status, to)) {
      throw new ConflictException(
        `Anomaly ${id} cannot move from ${current.status} to ${to}`,
      );
    }

    const change: StatusChange = {
      from: current.status,
      to,
      at: Date.now(),
      actor: details.actor,
      note: details.note,
    };
    const updated: Anomaly = {
      ...current,
      status: to,
      statusHistory: Object.freeze([...current.statusHistory, Object.freeze(change)]),
    };

    Object.freeze(updated);
    this.anomalies.set(id, updated);
    this.logger.log(`Anomaly ${id} moved ${current.status} -> ${to}`);
    return updated;
  }

  count(): number {
    return this.anomalies.size;
  }

  countsByStatus(): Record<AnomalyStatus, number> {
    const counts: Record<AnomalyStatus, number> = {
      [AnomalyStatus.NEW]: 0,
      [AnomalyStatus.ACKNOWLEDGED]: 0,
      [AnomalyStatus.INVESTIGATING]: 0,
      [AnomalyStatus.RESOLVED]: 0,
      [AnomalyStatus.FALSE_POSITIVE]: 0,
    };
    for (const anomaly of this.anomalies.values()) {
      counts[anomaly.status]++;
    }
    return counts;
  }
}
