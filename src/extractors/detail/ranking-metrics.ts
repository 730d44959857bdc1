/**
 * @fileoverview Ranking metrics of a detail page as `normalized_label → value`.
 * Keys end in `_rank` or `_score` depending on how the value classifies.
 */
import type { CheerioAPI } from 'cheerio';
import type { LabelledValues } from '../../common/types.js';
import type { ExtractionStrategy } from '../cascade.js';
import {
  classifyMetricValue,
  cleanRankText,
  cleanScoreText,
  collapseWhitespace,
  normalizeLabelKey,
} from '../normalize.js';

/** Longest phrases first so "research environment" wins over "research". */
export const METRIC_PHRASES = [
  'world university rankings',
  'international outlook',
  'research environment',
  'research quality',
  'industry income',
  'world rank',
  'overall',
  'teaching',
  'research',
  'citations',
  'industry',
  'reputation',
] as const;

const RANK_ELEMENTS = [
  { selector: '.world-rank', key: 'world_rank' },
  { selector: '.overall-rank', key: 'overall_rank' },
  { selector: '.reputation-rank', key: 'reputation_rank' },
  { selector: '.global-rank', key: 'global_rank' },
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function metricKey(label: string, kind: 'rank' | 'score'): string {
  const key = normalizeLabelKey(label);
  return key.endsWith(`_${kind}`) ? key : `${key}_${kind}`;
}

/**
 * The first known metric phrase contained in a label, if any.
 */
export function matchMetricPhrase(label: string): string | null {
  const lower = label.toLowerCase();
  return METRIC_PHRASES.find((phrase) => new RegExp(`\\b${escapeRegExp(phrase)}\\b`).test(lower)) ?? null;
}

/**
 * Pairs of (label, value) from `.label` + `.value` siblings and `dt` + `dd`.
 */
export function labelValuePairs($: CheerioAPI): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  $('.label').each((_, el) => {
    const label = $(el);
    const value = label.nextAll('.value').first();
    if (value.length > 0) {
      pairs.push([collapseWhitespace(label.text()), collapseWhitespace(value.text())]);
    }
  });
  $('dt').each((_, el) => {
    const term = $(el);
    const value = term.next('dd');
    if (value.length > 0) {
      pairs.push([collapseWhitespace(term.text()), collapseWhitespace(value.text())]);
    }
  });
  return pairs;
}

function fromCards($: CheerioAPI): LabelledValues | null {
  const data: LabelledValues = {};
  $('.ranking-card, .rank-card, .profile-ranking, .university-ranking').each((_, el) => {
    const card = $(el);
    const title = collapseWhitespace(card.find('.card-title, h3, h4, .ranking-title, .title').first().text());
    const prefix = normalizeLabelKey(title) || 'general';

    const rank = cleanRankText(card.find('.rank, .ranking-number, .position, .rank-position').first().text());
    if (rank) {
      data[`${prefix}_rank`] = rank;
    }
    const score = cleanScoreText(card.find('.score, .ranking-score, .points').first().text());
    if (score) {
      data[`${prefix}_score`] = score;
    }
    const year = collapseWhitespace(card.find('.year, .ranking-year, .period').first().text());
    if (year) {
      data[`${prefix}_year`] = year;
    }
  });
  return data;
}

function fromRankElements($: CheerioAPI): LabelledValues | null {
  const data: LabelledValues = {};
  for (const { selector, key } of RANK_ELEMENTS) {
    const rank = cleanRankText($(selector).first().text());
    if (rank) {
      data[key] = rank;
    }
  }
  return data;
}

function fromLabelledValues($: CheerioAPI): LabelledValues | null {
  const data: LabelledValues = {};
  for (const [label, value] of labelValuePairs($)) {
    if (!matchMetricPhrase(label)) {
      continue;
    }
    const metric = classifyMetricValue(value);
    if (metric) {
      const key = metricKey(label, metric.kind);
      data[key] ??= metric.value;
    }
  }
  return data;
}

/**
 * Scans the page text for "<phrase> [score|rank][:] <number>" and the
 * document title for "Ranked <n>" or "#<n>".
 */
function fromTextPatterns($: CheerioAPI): LabelledValues | null {
  const data: LabelledValues = {};
  const text = collapseWhitespace($('body').text());
  for (const phrase of METRIC_PHRASES) {
    const pattern = new RegExp(
      `\\b${escapeRegExp(phrase)}(?:\\s+(?:score|rank(?:ing)?))?\\s*[:\\-–]?\\s*(=?#?\\d+(?:\\.\\d+)?(?:st|nd|rd|th)?)(?!\\d|\\.\\d)`,
      'i'
    );
    const match = pattern.exec(text);
    const metric = match ? classifyMetricValue(match[1].replace(/^#/, '')) : null;
    if (metric) {
      data[metricKey(phrase, metric.kind)] ??= metric.value;
    }
  }
  const title = $('title').first().text();
  const ranked = /\branked\s+(?:#\s*)?(\d+)(?:st|nd|rd|th)?\b/i.exec(title) ?? /#(\d+)\b/.exec(title);
  if (ranked) {
    data.title_rank = ranked[1];
  }
  return data;
}

export const rankingMetricStrategies: ExtractionStrategy<LabelledValues>[] = [
  { name: 'ranking-cards', extract: fromCards },
  { name: 'rank-elements', extract: fromRankElements },
  { name: 'labelled-values', extract: fromLabelledValues },
  { name: 'text-patterns', extract: fromTextPatterns },
];
