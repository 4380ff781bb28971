import { FilterValidationError } from '../common/errors/pipeline.errors';
import { column, sqlString } from '../lancedb/lancedb.rows';
import {
  CONTENT_FLAGS,
  ContentFlags,
} from '../segments/interfaces/segment.interface';
import {
  FilterPredicate,
  IndexPointMetadata,
} from './interfaces/vector-index.interface';

/**
 * Filter set accepted at the search boundary
 */
export interface SearchFilters {
  cameraId?: string;
  location?: string;
  videoId?: string;
  /** Selects segments whose time span overlaps [from, to] (epoch ms) */
  timeRange?: { from?: number; to?: number };
  contentFlags?: Partial<ContentFlags>;
}

function isFlagName(name: string): name is keyof ContentFlags {
  return CONTENT_FLAGS.some((flag) => flag === name);
}

/**
 * Validate a filter set and compile it into predicates.
 * Throws FilterValidationError listing every problem found.
 */
export function compileFilters(filters: SearchFilters = {}): FilterPredicate[] {
  const problems: string[] = [];
  const predicates: FilterPredicate[] = [];

  const equality: Array<['cameraId' | 'location' | 'videoId', unknown]> = [
    ['cameraId', filters.cameraId],
    ['location', filters.location],
    ['videoId', filters.videoId],
  ];
  for (const [field, value] of equality) {
    if (value === undefined) continue;
    if (typeof value !== 'string' || value.trim() === '') {
      problems.push(`${field} must be a non-empty string`);
      continue;
    }
    predicates.push({ kind: 'eq', field, value: value.trim() });
  }

  if (filters.timeRange !== undefined) {
    const { from, to } = filters.timeRange;
    if (from === undefined && to === undefined) {
      problems.push('timeRange needs at least one of from/to');
    }
    if (from !== undefined && !Number.isFinite(from)) {
      problems.push('timeRange.from must be a finite timestamp');
    }
    if (to !== undefined && !Number.isFinite(to)) {
      problems.push('timeRange.to must be a finite timestamp');
    }
    if (from !== undefined && to !== undefined && from > to) {
      problems.push('timeRange.from must not be after timeRange.to');
    }
    if (from !== undefined && Number.isFinite(from)) {
      predicates.push({ kind: 'range', field: 'endTime', gte: from });
    }
    if (to !== undefined && Number.isFinite(to)) {
      predicates.push({ kind: 'range', field: 'startTime', lte: to });
    }
  }

  if (filters.contentFlags !== undefined) {
    for (const [name, value] of Object.entries(filters.contentFlags)) {
      if (value === undefined) continue;
      if (!isFlagName(name)) {
        problems.push(`unknown content flag "${name}"`);
        continue;
      }
      if (typeof value !== 'boolean') {
        problems.push(`contentFlags.${name} must be a boolean`);
        continue;
      }
      predicates.push({ kind: 'flag', field: name, value });
    }
  }

  if (problems.length > 0) {
    throw new FilterValidationError(problems);
  }
  return predicates;
}

/**
 * Validate search parameters other than the filters
 */
export function validateSearchParameters(
  topK: number,
  scoreThreshold: number,
  maxTopK: number,
): void {
  const problems: string[] = [];
  if (!Number.isInteger(topK) || topK < 1 || topK > maxTopK) {
    problems.push(`topK must be an integer between 1 and ${maxTopK}`);
  }
  if (!Number.isFinite(scoreThreshold) || scoreThreshold < -1 || scoreThreshold > 1) {
    problems.push('scoreThreshold must be between -1 and 1');
  }
  if (problems.length > 0) {
    throw new FilterValidationError(problems);
  }
}

export function matchesPredicate(
  metadata: IndexPointMetadata,
  predicate: FilterPredicate,
): boolean {
  switch (predicate.kind) {
    case 'eq':
      return metadata[predicate.field] === predicate.value;
    case 'flag':
      return metadata[predicate.field] === predicate.value;
    case 'range': {
      const value = metadata[predicate.field];
      if (predicate.gte !== undefined && value < predicate.gte) return false;
      if (predicate.lte !== undefined && value > predicate.lte) return false;
      return true;
    }
  }
}

export function matchesFilters(
  metadata: IndexPointMetadata,
  predicates: readonly FilterPredicate[],
): boolean {
  return predicates.every((predicate) => matchesPredicate(metadata, predicate));
}

function canonicalPredicate(predicate: FilterPredicate): string {
  switch (predicate.kind) {
    case 'eq':
      return `eq:${predicate.field}=${JSON.stringify(predicate.value)}`;
    case 'flag':
      return `flag:${predicate.field}=${predicate.value}`;
    case 'range':
      return `range:${predicate.field}:${predicate.gte ?? ''}:${predicate.lte ?? ''}`;
  }
}

/**
 * Order-independent representation of a predicate set
 */
export function canonicalizePredicates(
  predicates: readonly FilterPredicate[],
): string[] {
  return [...new Set(predicates.map(canonicalPredicate))].sort();
}

/**
 * Compile predicates into a LanceDB SQL filter
 */
export function toLanceDbWhere(
  predicates: readonly FilterPredicate[],
): string | undefined {
  const clauses: string[] = [];

  for (const predicate of predicates) {
    const name = column(predicate.field);
    switch (predicate.kind) {
      case 'eq':
        clauses.push(`${name} = ${sqlString(predicate.value)}`);
        break;
      case 'flag':
        clauses.push(`${name} = ${predicate.value ? 'true' : 'false'}`);
        break;
      case 'range':
        if (predicate.gte !== undefined) {
          clauses.push(`${name} >= ${predicate.gte}`);
        }
        if (predicate.lte !== undefined) {
          clauses.push(`${name} <= ${predicate.lte}`);
        }
        break;
    }
  }

  return clauses.length > 0 ? clauses.join(' AND ') : undefined;
}
