import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { cleanDetailRecord, extractDetailRecord, NO_SECTIONS_ERROR } from '../detail-page.js';
import type { DetailRecord } from '../../common/types.js';

const DETAIL_URL = 'https://www.timeshighereducation.com/world-university-rankings/example-university';
const fixture = readFileSync(new URL('./fixtures/detail-page.html', import.meta.url), 'utf8');

function page(body: string, head = ''): string {
  return `<html><head>${head}</head><body>${body}</body></html>`;
}

function success(record: DetailRecord) {
  if (record.status !== 'success') {
    throw new Error(`expected a success record, got: ${record.error}`);
  }
  return record;
}

describe('extractDetailRecord', () => {
  it('extracts every section from the structured layout', () => {
    const { record, warnings, strategies } = extractDetailRecord(fixture, DETAIL_URL);

    expect(warnings).toEqual([]);
    expect(strategies).toEqual({
      name: 'profile-header',
      rankingData: 'ranking-cards',
      keyStats: 'stat-containers',
      subjects: 'subject-containers',
      additionalInfo: 'profile-elements',
    });
    expect(record).toEqual({
      status: 'success',
      url: DETAIL_URL,
      name: 'Example University',
      rankingData: {
        world_university_rankings_2025_rank: '=45',
        world_university_rankings_2025_score: '78.4',
        world_university_rankings_2025_year: '2025',
      },
      keyStats: {
        number_fte_students: '20,415',
        student_staff_ratio: '11.2',
      },
      subjects: [
        { category: 'Engineering', name: 'Civil Engineering', rank: '12' },
        { category: 'Engineering', name: 'Mechanical Engineering', score: '81.5' },
      ],
      additionalInfo: {
        location: 'Exampleton, United Kingdom',
        website: 'https://www.example.ac.uk/',
        description:
          'Example University is a public research university founded to serve its region.',
      },
    });
  });

  it('falls back to heading and list text for subjects', () => {
    const html = page(`
      <h1>Sample Institute</h1>
      <h2>Subjects taught</h2>
      <h3>Arts and Humanities</h3>
      <ul><li>History</li><li>Philosophy</li></ul>
      <h3>Physical Sciences</h3>
      <ul><li>Chemistry</li><li>History</li></ul>
      <h2>Contact</h2>
      <p>Write to the registry office.</p>`);

    const { record, strategies } = extractDetailRecord(html, DETAIL_URL);

    expect(strategies.subjects).toBe('heading-lists');
    expect(success(record).subjects).toEqual([
      { category: 'Arts and Humanities', name: 'History' },
      { category: 'Arts and Humanities', name: 'Philosophy' },
      { category: 'Physical Sciences', name: 'Chemistry' },
    ]);
  });

  it('reads colon-delimited subject lists with the general category', () => {
    const { record, strategies } = extractDetailRecord(
      page('<h1>Colon College</h1><p>Subjects: Law, Medicine; law</p>'),
      DETAIL_URL
    );
    expect(strategies.subjects).toBe('colon-text');
    expect(success(record).subjects).toEqual([
      { category: 'general', name: 'Law' },
      { category: 'general', name: 'Medicine' },
    ]);
  });

  it('classifies labelled metrics as scores or ranks', () => {
    const { record, strategies } = extractDetailRecord(
      page(`<h1>Metric University</h1>
        <dl>
          <dt>Overall score</dt><dd>87.3</dd>
          <dt>World rank</dt><dd>45th</dd>
          <dt>Teaching</dt><dd>92.1</dd>
          <dt>Founded</dt><dd>1850</dd>
        </dl>`),
      DETAIL_URL
    );
    expect(strategies.rankingData).toBe('labelled-values');
    expect(success(record).rankingData).toEqual({
      overall_score: '87.3',
      world_rank: '45',
      teaching_score: '92.1',
    });
  });

  it('matches known metric phrases in free text and the title', () => {
    const { record, strategies } = extractDetailRecord(
      page(
        '<p>The overall score: 71.5 and citations 88.0. Ranked by peers.</p>',
        '<title>Ranked 150th in the world</title>'
      ),
      DETAIL_URL
    );
    expect(strategies.rankingData).toBe('text-patterns');
    expect(success(record).rankingData).toEqual({
      overall_score: '71.5',
      citations_score: '88.0',
      title_rank: '150',
    });
  });

  it('reads statistics from labelled list items', () => {
    const { record, strategies } = extractDetailRecord(
      page('<h1>Stats University</h1><ul><li>International students: 35%</li><li>Motto: Lux</li></ul>'),
      DETAIL_URL
    );
    expect(strategies.keyStats).toBe('labelled-lines');
    expect(success(record).keyStats).toEqual({ international_students: '35%' });
  });

  it('keeps the sections that succeeded when others fail', () => {
    const { record, warnings } = extractDetailRecord(
      page('', '<title>Lonely University | Rankings</title>'),
      DETAIL_URL
    );
    expect(record).toEqual({
      status: 'success',
      url: DETAIL_URL,
      name: 'Lonely University',
      rankingData: {},
      keyStats: {},
      subjects: [],
      additionalInfo: {},
    });
    expect(warnings.map((w) => w.target)).toEqual([
      `${DETAIL_URL} rankingData`,
      `${DETAIL_URL} keyStats`,
      `${DETAIL_URL} subjects`,
      `${DETAIL_URL} additionalInfo`,
    ]);
  });

  it('names the record Unknown when only the name is missing', () => {
    const { record } = extractDetailRecord(page('<div class="world-rank">#12</div>'), DETAIL_URL);
    expect(success(record).name).toBe('Unknown');
    expect(success(record).rankingData).toEqual({ world_rank: '12' });
  });

  it('degrades to an error record when every section fails', () => {
    const { record, warnings } = extractDetailRecord(page('<p>Nothing</p>'), DETAIL_URL);
    expect(record).toEqual({ status: 'error', url: DETAIL_URL, error: NO_SECTIONS_ERROR });
    expect(warnings).toHaveLength(5);
  });
});

describe('cleanDetailRecord', () => {
  it('trims identifiers and drops empty values', () => {
    const cleaned = cleanDetailRecord({
      status: 'success',
      url: ` ${DETAIL_URL} `,
      name: '  Trim University ',
      rankingData: { overall_score: ' 80 ', world_rank: ' ' },
      keyStats: { students: '' },
      subjects: [{ category: 'general', name: ' ' }, { category: 'general', name: ' Law ' }],
      additionalInfo: {},
    });
    expect(cleaned).toEqual({
      status: 'success',
      url: DETAIL_URL,
      name: 'Trim University',
      rankingData: { overall_score: '80' },
      keyStats: {},
      subjects: [{ category: 'general', name: 'Law' }],
      additionalInfo: {},
    });
  });
});
