import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import {
  extractUrlsFromContent,
  findEntryList,
  loadDetailRecordsFile,
  loadDetailUrls,
  loadRankEntriesFile,
} from '../url-loader.js';
import { AppError } from '../../common/AppError.js';
import { createTestLogger } from '../../__tests__/helpers/test-logger.js';

const A = 'https://www.timeshighereducation.com/world-university-rankings/alpha-university';
const B = 'https://www.timeshighereducation.com/world-university-rankings/beta-college';

describe('findEntryList', () => {
  it('accepts a bare list, a known key or the first list value', () => {
    expect(findEntryList([1])).toEqual([1]);
    expect(findEntryList({ meta: {}, universities: [2] })).toEqual([2]);
    expect(findEntryList({ meta: {}, items: [3] })).toEqual([3]);
    expect(findEntryList({ meta: {} })).toBeNull();
    expect(findEntryList('text')).toBeNull();
  });
});

describe('extractUrlsFromContent', () => {
  const { logger } = createTestLogger();

  it('reads URL fields from JSON entries in preference order', () => {
    const content = JSON.stringify({
      rankings: [{ detailUrl: A, url: 'ignored' }, { detail_url: B }, { name: 'no link' }, A],
    });
    expect(extractUrlsFromContent('ranks.json', content, logger)).toEqual([A, B]);
  });

  it('reads the first CSV column and skips the header', () => {
    const content = `url,name\n${A},Alpha\n ${B} ,Beta\n\n`;
    expect(extractUrlsFromContent('urls.csv', content, logger)).toEqual([A, B]);
  });

  it('reads one URL per line and ignores comments', () => {
    const content = `# detail pages\n${A}\r\n\n  ${B}  \n${A}\n`;
    expect(extractUrlsFromContent('urls.txt', content, logger)).toEqual([A, B]);
  });

  it('rejects malformed JSON', () => {
    expect(() => extractUrlsFromContent('bad.json', '{', logger)).toThrow(AppError);
  });
});

describe('file loaders', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'loader-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const filePath = path.join(dir, name);
    writeFileSync(filePath, content);
    return filePath;
  }

  it('loads detail URLs from a text file', async () => {
    const { logger, messagesAt } = createTestLogger();
    const filePath = write('urls.txt', `${A}\n${B}\n`);

    await expect(loadDetailUrls(filePath, logger)).resolves.toEqual([A, B]);
    expect(messagesAt('info')).toEqual([`Loaded 2 URLs from ${filePath}`]);
  });

  it('loads rank entries and skips malformed ones', async () => {
    const { logger, messagesAt } = createTestLogger();
    const valid = {
      rank: 1,
      name: 'Alpha University',
      country: 'Testland',
      detailUrl: A,
      overall: 95.2,
      teaching: null,
      research: null,
      citations: null,
      industryIncome: null,
      internationalOutlook: null,
    };
    const filePath = write('rankings.json', JSON.stringify([valid, { name: 'broken' }]));

    await expect(loadRankEntriesFile(filePath, logger)).resolves.toEqual([valid]);
    expect(messagesAt('warn')).toEqual([`Skipped 1 malformed rank entries in ${filePath}`]);
  });

  it('loads success and error detail records', async () => {
    const { logger } = createTestLogger();
    const records = [
      {
        status: 'success',
        url: A,
        name: 'Alpha University',
        rankingData: {},
        keyStats: {},
        subjects: [{ category: 'general', name: 'Law' }],
        additionalInfo: {},
      },
      { status: 'error', url: B, error: 'timeout' },
      { status: 'success', url: B },
    ];
    const filePath = write('details.json', JSON.stringify(records));

    const loaded = await loadDetailRecordsFile(filePath, logger);
    expect(loaded.map((record) => record.status)).toEqual(['success', 'error']);
  });

  it('fails on a file with no list', async () => {
    const { logger } = createTestLogger();
    const filePath = write('empty.json', '{"meta": {}}');
    await expect(loadRankEntriesFile(filePath, logger)).rejects.toThrow(
      `No rank entries list found in ${filePath}`
    );
  });
});
