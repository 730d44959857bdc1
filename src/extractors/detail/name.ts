import type { ExtractionStrategy } from '../cascade.js';
import { collapseWhitespace } from '../normalize.js';

const HEADER_SELECTORS = [
  'h1.profile-header__title',
  'h1.hero-title',
  '.profile-header h1',
  '.university-name',
  '.institution-name',
  'h1',
];

/**
 * Institution name: profile header, then Open Graph title, then the document
 * title up to its first separator.
 */
export const nameStrategies: ExtractionStrategy<string>[] = [
  {
    name: 'profile-header',
    extract: ($) => {
      for (const selector of HEADER_SELECTORS) {
        const text = collapseWhitespace($(selector).first().text());
        if (text) {
          return text;
        }
      }
      return null;
    },
  },
  {
    name: 'og-title',
    extract: ($) => collapseWhitespace($('meta[property="og:title"]').attr('content') ?? '') || null,
  },
  {
    name: 'document-title',
    extract: ($) => {
      const title = collapseWhitespace($('title').first().text());
      return collapseWhitespace(title.split(/\s+[|–—-]\s+/)[0]) || null;
    },
  },
];
