/**
 * @fileoverview Shared data model. Ranking rows, detail-page records, their
 * joined form and the per-batch result all live here so extraction,
 * orchestration and combination import one definition.
 */

/**
 * The six sub-score columns of the rankings table.
 */
export const SCORE_FIELDS = [
  'overall',
  'teaching',
  'research',
  'citations',
  'industryIncome',
  'internationalOutlook',
] as const;

export type ScoreField = (typeof SCORE_FIELDS)[number];

export type ScoreSet = Record<ScoreField, number | null>;

/**
 * One parsed row of the rankings table. Tied ranks may repeat; entries keep
 * the source table order.
 */
export interface RankEntry extends ScoreSet {
  /** Lower bound for banded ranks (`"=401-500"` → 401); null when unparsable. */
  rank: number | null;
  name: string;
  /** May be empty when the row carries no location. */
  country: string;
  /** Absolute detail-page URL, or null when the row has no link. */
  detailUrl: string | null;
}

/**
 * A subject listed on a detail page.
 * @example { category: 'Engineering', name: 'Civil Engineering', rank: '12' }
 */
export interface Subject {
  category: string;
  name: string;
  rank?: string;
  score?: string;
}

/** Label → value mapping whose keys are discovered from the page. */
export type LabelledValues = Record<string, string>;

/**
 * Detail-page data for one institution.
 */
export interface DetailRecordSuccess {
  status: 'success';
  url: string;
  name: string;
  rankingData: LabelledValues;
  keyStats: LabelledValues;
  subjects: Subject[];
  additionalInfo: LabelledValues;
}

/**
 * Detail-page outcome when nothing could be retrieved or extracted.
 */
export interface DetailRecordFailure {
  status: 'error';
  url: string;
  error: string;
}

/**
 * Tagged result for one detail URL: a populated record or an error marker,
 * never both.
 */
export type DetailRecord = DetailRecordSuccess | DetailRecordFailure;

/**
 * A rank entry optionally enriched with the matched detail record's fields.
 */
export interface CompositeRecord extends RankEntry {
  detailedRankingData?: LabelledValues;
  keyStats?: LabelledValues;
  subjects?: Subject[];
  additionalInfo?: LabelledValues;
}

export type BatchStatus = 'completed' | 'failed';

/**
 * Outcome of one checkpointed batch.
 */
export interface BatchResult {
  /** 1-based batch number. */
  batchId: number;
  status: BatchStatus;
  records: DetailRecord[];
  successCount: number;
  failureCount: number;
  /** Set when the batch was interrupted by an unexpected exception. */
  error?: string;
}

/**
 * Warning produced when a row, field, section or strategy could not be
 * extracted. Resolves locally to null or omission.
 */
export interface ExtractionWarning {
  scope: 'row' | 'field' | 'section' | 'strategy';
  target: string;
  message: string;
}

export function isSuccessRecord(
  record: DetailRecord
): record is DetailRecordSuccess {
  return record.status === 'success';
}
