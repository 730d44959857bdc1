/**
 * @fileoverview Runtime shape checks for data read back from JSON files.
 */
import {
  SCORE_FIELDS,
  type DetailRecord,
  type LabelledValues,
  type RankEntry,
  type Subject,
} from './types.js';

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNullableNumber(value: unknown): value is number | null {
  return value === null || (typeof value === 'number' && Number.isFinite(value));
}

export function isLabelledValues(value: unknown): value is LabelledValues {
  return isObject(value) && Object.values(value).every((v) => typeof v === 'string');
}

export function isSubject(value: unknown): value is Subject {
  return (
    isObject(value) &&
    typeof value.category === 'string' &&
    typeof value.name === 'string' &&
    (value.rank === undefined || typeof value.rank === 'string') &&
    (value.score === undefined || typeof value.score === 'string')
  );
}

export function isRankEntry(value: unknown): value is RankEntry {
  return (
    isObject(value) &&
    isNullableNumber(value.rank) &&
    typeof value.name === 'string' &&
    typeof value.country === 'string' &&
    (value.detailUrl === null || typeof value.detailUrl === 'string') &&
    SCORE_FIELDS.every((field) => isNullableNumber(value[field]))
  );
}

export function isDetailRecord(value: unknown): value is DetailRecord {
  if (!isObject(value) || typeof value.url !== 'string') {
    return false;
  }
  if (value.status === 'error') {
    return typeof value.error === 'string';
  }
  return (
    value.status === 'success' &&
    typeof value.name === 'string' &&
    isLabelledValues(value.rankingData) &&
    isLabelledValues(value.keyStats) &&
    Array.isArray(value.subjects) &&
    value.subjects.every(isSubject) &&
    isLabelledValues(value.additionalInfo)
  );
}
