/**
 * @fileoverview Subjects offered by an institution, grouped by category.
 * Names are de-duplicated case-insensitively, first occurrence kept; items
 * without a known category get `general`.
 */
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { Subject } from '../../common/types.js';
import type { ExtractionStrategy } from '../cascade.js';
import { cleanRankText, cleanScoreText, collapseWhitespace, firstLine } from '../normalize.js';

export const DEFAULT_SUBJECT_CATEGORY = 'general';

const CONTAINER_SELECTOR =
  '.subjects-section, .subject-rankings, .disciplines, .academic-areas, .subject-area';
const ITEM_SELECTOR = '.subject-item, .discipline, .subject-rank, .subject';
const SUBJECTS_LABEL = /\bsubjects?\b/i;
const SUBJECTS_LINE = /^subjects?(?:\s+(?:taught|offered|covered))?\s*:\s*(.+)$/i;

export function dedupeSubjects(subjects: Subject[]): Subject[] {
  const seen = new Set<string>();
  return subjects.filter((subject) => {
    const key = subject.name.toLowerCase();
    if (!key || seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

function headingLevel(el: Element): number | null {
  const match = /^h([1-6])$/.exec(el.tagName.toLowerCase());
  return match ? Number(match[1]) : null;
}

function parseSubjectItem(item: Cheerio<Element>, category: string): Subject | null {
  const name =
    collapseWhitespace(item.find('.subject-name, .discipline-name, h3, h4, .name').first().text()) ||
    firstLine(item.text());
  if (!name) {
    return null;
  }
  const subject: Subject = {
    category: collapseWhitespace(item.attr('data-category') ?? '') || category,
    name,
  };
  const rank = cleanRankText(item.find('.subject-rank, .rank, .position').first().text());
  if (rank) {
    subject.rank = rank;
  }
  const score = cleanScoreText(item.find('.subject-score, .score').first().text());
  if (score) {
    subject.score = score;
  }
  return subject;
}

function fromContainers($: CheerioAPI): Subject[] | null {
  const subjects: Subject[] = [];
  $(CONTAINER_SELECTOR).each((_, el) => {
    const container = $(el);
    const category =
      collapseWhitespace(container.attr('data-category') ?? '') ||
      collapseWhitespace(container.children('h2, h3, .category-title').first().text()) ||
      DEFAULT_SUBJECT_CATEGORY;
    container.find(ITEM_SELECTOR).each((__, itemEl) => {
      const item = $(itemEl);
      if (item.parents(ITEM_SELECTOR).length > 0) {
        return;
      }
      const subject = parseSubjectItem(item, category);
      if (subject) {
        subjects.push(subject);
      }
    });
  });
  return dedupeSubjects(subjects);
}

function listItems($: CheerioAPI, node: Cheerio<Element>, category: string): Subject[] {
  return node
    .find('li')
    .addBack('li')
    .toArray()
    .map((li) => firstLine(collapseWhitespace($(li).text())))
    .filter(Boolean)
    .map((name) => ({ category, name }));
}

/**
 * A "Subjects" heading followed by lists, optionally split by sub-headings
 * that name the category. Also reads a "Subjects" `dt` with its `dd`.
 */
function fromHeadingLists($: CheerioAPI): Subject[] | null {
  const subjects: Subject[] = [];
  $('h2, h3, h4, h5, h6, dt, strong').each((_, el) => {
    const label = collapseWhitespace($(el).text());
    if (label.length > 60 || !SUBJECTS_LABEL.test(label)) {
      return;
    }
    if (el.tagName.toLowerCase() === 'dt') {
      const dd = $(el).next('dd');
      const items = listItems($, dd, DEFAULT_SUBJECT_CATEGORY);
      subjects.push(
        ...(items.length > 0 ? items : splitNames(dd.text(), DEFAULT_SUBJECT_CATEGORY))
      );
      return;
    }

    const level = headingLevel(el) ?? 7;
    const start = headingLevel(el) === null && $(el).parent().is('p') ? $(el).parent() : $(el);
    let category = DEFAULT_SUBJECT_CATEGORY;
    for (const sibling of start.nextAll().toArray()) {
      const siblingLevel = headingLevel(sibling);
      if (siblingLevel !== null && siblingLevel <= level) {
        break;
      }
      const node = $(sibling);
      if (siblingLevel !== null || node.is('strong, .category, .subject-category')) {
        category = collapseWhitespace(node.text()) || category;
        continue;
      }
      subjects.push(...listItems($, node, category));
    }
  });
  return dedupeSubjects(subjects);
}

function splitNames(text: string, category: string): Subject[] {
  return text
    .split(/[,;]/)
    .map((name) => collapseWhitespace(name))
    .filter(Boolean)
    .map((name) => ({ category, name }));
}

/**
 * "Subjects taught: Law, Medicine, History" in a paragraph or list item.
 */
function fromColonText($: CheerioAPI): Subject[] | null {
  const subjects: Subject[] = [];
  $('p, li, span').each((_, el) => {
    const match = SUBJECTS_LINE.exec(collapseWhitespace($(el).text()));
    if (match) {
      subjects.push(...splitNames(match[1], DEFAULT_SUBJECT_CATEGORY));
    }
  });
  return dedupeSubjects(subjects);
}

export const subjectStrategies: ExtractionStrategy<Subject[]>[] = [
  { name: 'subject-containers', extract: fromContainers },
  { name: 'heading-lists', extract: fromHeadingLists },
  { name: 'colon-text', extract: fromColonText },
];
