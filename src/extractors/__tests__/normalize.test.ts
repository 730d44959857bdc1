import { describe, it, expect, vi } from 'vitest';
import {
  classifyMetricValue,
  cleanRankText,
  cleanScoreText,
  normalizeLabelKey,
  normalizeRank,
  normalizeScore,
  truncate,
} from '../normalize.js';

describe('normalizeRank', () => {
  it.each([
    ['=401-500', 401],
    ['=401–500', 401],
    ['=57', 57],
    ['1,001–1,200', 1001],
    ['1501+', 1501],
    [' 12 ', 12],
  ])('parses %j as %d', (text, expected) => {
    expect(normalizeRank(text)).toBe(expected);
  });

  it.each(['—', '', 'Reporter'])('returns null for %j', (text) => {
    expect(normalizeRank(text)).toBeNull();
  });
});

describe('normalizeScore', () => {
  it.each(['n/a', '–', '', 'N/A', '-', '—'])('treats %j as missing without a warning', (text) => {
    const onWarning = vi.fn();
    expect(normalizeScore(text, onWarning)).toBeNull();
    expect(onWarning).not.toHaveBeenCalled();
  });

  it('parses decimal scores', () => {
    expect(normalizeScore('87.3')).toBe(87.3);
    expect(normalizeScore(' 100.0 ')).toBe(100);
  });

  it('warns on unparsable text', () => {
    const onWarning = vi.fn();
    expect(normalizeScore('pending', onWarning)).toBeNull();
    expect(onWarning).toHaveBeenCalledWith('Unparsable score "pending"');
  });

  it('warns on scores outside [0, 100]', () => {
    const onWarning = vi.fn();
    expect(normalizeScore('105', onWarning)).toBeNull();
    expect(onWarning).toHaveBeenCalledWith('Score 105 is outside [0, 100]');
  });
});

describe('normalizeLabelKey', () => {
  it('drops stop words and punctuation', () => {
    expect(normalizeLabelKey('Number of FTE students')).toBe('number_fte_students');
    expect(normalizeLabelKey('Student-to-staff ratio')).toBe('student_staff_ratio');
    expect(normalizeLabelKey('  % International Students ')).toBe('international_students');
  });
});

describe('value cleaners', () => {
  it('strips rank prefixes and ordinal suffixes but keeps ties', () => {
    expect(cleanRankText('Rank #45th')).toBe('45');
    expect(cleanRankText('=12th')).toBe('=12');
    expect(cleanRankText('Position: 3rd')).toBe('3');
  });

  it('keeps the numeric part of a score', () => {
    expect(cleanScoreText('Score 81.5 / 100')).toBe('81.5');
    expect(cleanScoreText('n/a')).toBeNull();
  });

  it('truncates long text with an ellipsis', () => {
    expect(truncate('abcdef', 4)).toBe('abcd...');
    expect(truncate('abc', 4)).toBe('abc');
  });
});

describe('classifyMetricValue', () => {
  it('classifies numbers in [0, 100] as scores', () => {
    expect(classifyMetricValue('87.3')).toEqual({ kind: 'score', value: '87.3' });
    expect(classifyMetricValue('100')).toEqual({ kind: 'score', value: '100' });
  });

  it('classifies everything else with digits as a rank', () => {
    expect(classifyMetricValue('150')).toEqual({ kind: 'rank', value: '150' });
    expect(classifyMetricValue('45th')).toEqual({ kind: 'rank', value: '45' });
    expect(classifyMetricValue('=57')).toEqual({ kind: 'rank', value: '=57' });
  });

  it('ignores values without digits', () => {
    expect(classifyMetricValue('n/a')).toBeNull();
  });
});
