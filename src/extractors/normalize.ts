/**
 * @fileoverview Value normalizers shared by the rankings-table and detail-page
 * extractors. All functions are pure; unparsable input yields null.
 */

/** Placeholders the site prints in place of a missing score. */
const SCORE_SENTINELS = new Set(['', 'n/a', 'na', '-', '–', '—']);

/** Words dropped when turning a label into a key. */
const LABEL_STOP_WORDS = new Set([
  'a', 'an', 'and', 'at', 'by', 'for', 'in', 'of', 'on', 'per', 'the', 'to', 'with',
]);

/**
 * `=57`, `401–500`, `1,001-1,200` and `1501+` all match; the first number is kept.
 */
const RANK_PATTERN = /^=?\s*(\d+)\s*(?:[-–—]\s*\d+|\+)?$/;

const ORDINAL_SUFFIX = /(\d)(?:st|nd|rd|th)\b/gi;

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Parses a rank cell. Tied and banded ranks resolve to their lower bound.
 * @example normalizeRank('=401–500') // 401
 */
export function normalizeRank(text: string): number | null {
  const cleaned = collapseWhitespace(text).replace(/,/g, '');
  const match = RANK_PATTERN.exec(cleaned);
  return match ? parseInt(match[1], 10) : null;
}

/**
 * True for empty cells and dash-like placeholders, which mean "no value"
 * rather than "unparsable value".
 */
export function isMissingValue(text: string): boolean {
  return SCORE_SENTINELS.has(collapseWhitespace(text).toLowerCase());
}

/**
 * Parses a score in [0, 100]. Placeholders give null silently; anything else
 * that does not parse, or falls outside the range, gives null and a call to
 * `onWarning`.
 */
export function normalizeScore(
  text: string,
  onWarning?: (message: string) => void
): number | null {
  if (isMissingValue(text)) {
    return null;
  }
  const stripped = text.replace(/[^0-9.]/g, '');
  if (!/^\d+(?:\.\d+)?$/.test(stripped)) {
    onWarning?.(`Unparsable score "${collapseWhitespace(text)}"`);
    return null;
  }
  const value = parseFloat(stripped);
  if (value < 0 || value > 100) {
    onWarning?.(`Score ${value} is outside [0, 100]`);
    return null;
  }
  return value;
}

/**
 * Turns a label into a key: lower case, stop words dropped, punctuation
 * removed, words joined by underscores. Hyphens and slashes separate words.
 * @example normalizeLabelKey('Number of FTE students') // 'number_fte_students'
 */
export function normalizeLabelKey(label: string): string {
  return label
    .toLowerCase()
    .replace(/[-/–—]/g, ' ')
    .replace(/[^a-z0-9\s]/g, '')
    .split(/\s+/)
    .filter((word) => word && !LABEL_STOP_WORDS.has(word))
    .join('_');
}

/**
 * Strips "Rank", "Position", "#" and "No." prefixes and ordinal suffixes.
 * Tie markers (`=`) and bands are kept.
 * @example cleanRankText('Rank #45th') // '45'
 */
export function cleanRankText(text: string): string {
  return collapseWhitespace(text)
    .replace(/^(?:rank(?:ed|ing)?|position|no\.)\s*:?\s*/i, '')
    .replace(/^#\s*/, '')
    .replace(ORDINAL_SUFFIX, '$1')
    .trim();
}

/**
 * Keeps the numeric part of a score, or the trimmed text when it has none.
 * Placeholders become null.
 */
export function cleanScoreText(text: string): string | null {
  if (isMissingValue(text)) {
    return null;
  }
  const match = /\d+(?:\.\d+)?/.exec(text);
  return match ? match[0] : collapseWhitespace(text);
}

/**
 * Collapses whitespace and drops a trailing colon left over from a label.
 */
export function cleanStatValue(text: string): string {
  return collapseWhitespace(text).replace(/^:\s*/, '');
}

export type MetricValue =
  | { kind: 'score'; value: string }
  | { kind: 'rank'; value: string };

/**
 * A plain number in [0, 100] is a score; anything else carrying digits is a
 * rank with its ordinal suffix stripped.
 * @example classifyMetricValue('87.3') // { kind: 'score', value: '87.3' }
 * @example classifyMetricValue('45th') // { kind: 'rank', value: '45' }
 */
export function classifyMetricValue(text: string): MetricValue | null {
  const cleaned = collapseWhitespace(text);
  if (!/\d/.test(cleaned)) {
    return null;
  }
  if (/^\d+(?:\.\d+)?$/.test(cleaned)) {
    const value = Number(cleaned);
    if (value >= 0 && value <= 100) {
      return { kind: 'score', value: cleaned };
    }
  }
  return { kind: 'rank', value: cleanRankText(cleaned) };
}

/**
 * The first non-empty line of a block of text.
 */
export function firstLine(text: string): string {
  for (const line of text.split(/\r?\n/)) {
    const trimmed = collapseWhitespace(line);
    if (trimmed) {
      return trimmed;
    }
  }
  return '';
}

/**
 * Shortens long text to `max` characters followed by an ellipsis.
 */
export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
