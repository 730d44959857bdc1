import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { LabelledValues } from '../../common/types.js';
import type { ExtractionStrategy } from '../cascade.js';
import { cleanStatValue, collapseWhitespace, normalizeLabelKey } from '../normalize.js';

const STAT_ELEMENTS = [
  { selector: '.student-count, .students', key: 'total_students' },
  { selector: '.faculty-count, .staff', key: 'faculty_count' },
  { selector: '.established, .founded, .year-established', key: 'established' },
  { selector: '.campus-size, .campus', key: 'campus_size' },
  { selector: '.international-students', key: 'international_students' },
  { selector: '.student-faculty-ratio', key: 'student_faculty_ratio' },
];

/** Label fragments that mark a "Label: value" line as a statistic. */
const STAT_PHRASES = [
  'students',
  'staff',
  'ratio',
  'international',
  'female',
  'male',
  'established',
  'founded',
  'campus',
];

const COLON_LINE = /^([^:]{2,60}):\s*(.+)$/;

/**
 * Splits a stat item into name and value: dedicated child elements first,
 * then a "name: value" text, then the first two child elements.
 */
function parseStatItem($: CheerioAPI, item: Cheerio<Element>): [string, string] | null {
  const name = collapseWhitespace(item.find('.stat-name, .label, .key, .metric-name').first().text());
  const value = collapseWhitespace(item.find('.stat-value, .value, .metric-value').first().text());
  if (name && value) {
    return [name, value];
  }

  const colon = COLON_LINE.exec(collapseWhitespace(item.text()));
  if (colon) {
    return [colon[1], colon[2]];
  }

  const parts = item
    .children()
    .toArray()
    .map((child) => collapseWhitespace($(child).text()))
    .filter(Boolean);
  return parts.length >= 2 ? [parts[0], parts[1]] : null;
}

function addStat(stats: LabelledValues, label: string, value: string): void {
  const key = normalizeLabelKey(label);
  const cleaned = cleanStatValue(value);
  if (key && cleaned && !(key in stats)) {
    stats[key] = cleaned;
  }
}

function fromStatContainers($: CheerioAPI): LabelledValues | null {
  const stats: LabelledValues = {};
  $('.key-stats, .university-stats, .profile-stats, .stats-container, .facts-figures')
    .find('.stat-item, .key-stat, .metric, .fact')
    .each((_, el) => {
      const pair = parseStatItem($, $(el));
      if (pair) {
        addStat(stats, pair[0], pair[1]);
      }
    });
  return stats;
}

function fromDefinitionLists($: CheerioAPI): LabelledValues | null {
  const stats: LabelledValues = {};
  $('dl').each((_, dl) => {
    const terms = $(dl).find('dt').toArray();
    const values = $(dl).find('dd').toArray();
    terms.forEach((term, index) => {
      const value = values[index];
      if (value) {
        addStat(stats, $(term).text(), $(value).text());
      }
    });
  });
  return stats;
}

function fromStatElements($: CheerioAPI): LabelledValues | null {
  const stats: LabelledValues = {};
  for (const { selector, key } of STAT_ELEMENTS) {
    const value = cleanStatValue($(selector).first().text());
    if (value) {
      stats[key] = value;
    }
  }
  return stats;
}

function fromLabelledLines($: CheerioAPI): LabelledValues | null {
  const stats: LabelledValues = {};
  $('li, p').each((_, el) => {
    const match = COLON_LINE.exec(collapseWhitespace($(el).text()));
    if (match && STAT_PHRASES.some((phrase) => match[1].toLowerCase().includes(phrase))) {
      addStat(stats, match[1], match[2]);
    }
  });
  return stats;
}

/**
 * Key statistics as `normalized_label → value`.
 */
export const keyStatsStrategies: ExtractionStrategy<LabelledValues>[] = [
  { name: 'stat-containers', extract: fromStatContainers },
  { name: 'definition-lists', extract: fromDefinitionLists },
  { name: 'stat-elements', extract: fromStatElements },
  { name: 'labelled-lines', extract: fromLabelledLines },
];
