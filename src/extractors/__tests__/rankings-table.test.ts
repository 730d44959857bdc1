import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { extractRankEntries } from '../rankings-table.js';
import { createTestLogger } from '../../__tests__/helpers/test-logger.js';

const fixture = readFileSync(new URL('./fixtures/rankings-table.html', import.meta.url), 'utf8');

function table(rows: string, attributes = 'id="datatable-1"'): string {
  return `<html><body><table ${attributes}><tbody>${rows}</tbody></table></body></html>`;
}

describe('extractRankEntries', () => {
  it('skips exactly the malformed row and warns once', () => {
    const { logger, messagesAt } = createTestLogger();

    const result = extractRankEntries(fixture, { logger });

    expect(result.table).toBe('table-id');
    expect(result.entries).toHaveLength(3);
    expect(result.warnings).toEqual([
      { scope: 'row', target: 'row 4', message: 'Row has fewer than 2 cells' },
    ]);
    expect(messagesAt('warn')).toEqual([
      'Extraction warning [row] row 4: Row has fewer than 2 cells',
    ]);
  });

  it('parses names, locations, links and scores', () => {
    const [first, second, third] = extractRankEntries(fixture).entries;

    expect(first).toEqual({
      rank: 1,
      name: 'First Example University',
      country: 'United Kingdom',
      detailUrl: 'https://www.timeshighereducation.com/world-university-rankings/first-example-university',
      overall: 98.5,
      teaching: 96.2,
      research: 100,
      citations: 99.1,
      industryIncome: null,
      internationalOutlook: 97.8,
    });
    expect(second).toMatchObject({
      rank: 401,
      name: 'Example Institute of Technology',
      country: 'Japan',
      teaching: null,
      research: 38,
    });
    expect(third).toEqual({
      rank: null,
      name: 'Sample College',
      country: '',
      detailUrl: null,
      overall: 70.4,
      teaching: null,
      research: null,
      citations: null,
      industryIncome: null,
      internationalOutlook: null,
    });
  });

  it('returns no entries and one warning when there is no table', () => {
    const result = extractRankEntries('<html><body><p>Maintenance</p></body></html>');
    expect(result.entries).toEqual([]);
    expect(result.table).toBeNull();
    expect(result.warnings).toEqual([
      { scope: 'section', target: 'rankings-table', message: 'No rankings table found' },
    ]);
  });

  it('falls back to the table class and then to a large table', () => {
    const row = '<tr><td>7</td><td><a href="/world-university-rankings/x-university">X University</a></td></tr>';
    expect(extractRankEntries(table(row, 'class="data-table"')).table).toBe('table-class');

    const rows = Array.from({ length: 6 }, () => row).join('');
    const result = extractRankEntries(table(rows, 'class="plain"'), { minRows: 5 });
    expect(result.table).toBe('large-table');
    expect(result.entries).toHaveLength(6);
    expect(result.entries[0].detailUrl).toBe(
      'https://www.timeshighereducation.com/world-university-rankings/x-university'
    );
  });

  it('skips rows with an unparsable rank or no name', () => {
    const result = extractRankEntries(
      table('<tr><td>Reporter</td><td>Some University</td></tr><tr><td>2</td><td> </td></tr>')
    );
    expect(result.entries).toEqual([]);
    expect(result.warnings).toEqual([
      { scope: 'row', target: 'row 1', message: 'Unparsable rank "Reporter"' },
      { scope: 'row', target: 'row 2', message: 'Row has no institution name' },
    ]);
  });

  it('nulls out-of-range scores with a field warning', () => {
    const result = extractRankEntries(table('<tr><td>3</td><td>Z University</td><td>105</td></tr>'));
    expect(result.entries[0].overall).toBeNull();
    expect(result.warnings).toEqual([
      { scope: 'field', target: 'row 1.overall', message: 'Score 105 is outside [0, 100]' },
    ]);
  });
});
