import type { CheerioAPI } from 'cheerio';
import type { LabelledValues } from '../../common/types.js';
import { SITE_DOMAIN } from '../../config/app-config.js';
import type { ExtractionStrategy } from '../cascade.js';
import { collapseWhitespace, truncate } from '../normalize.js';

const MAX_DESCRIPTION = 500;
const MIN_DESCRIPTION = 50;

function fromProfileElements($: CheerioAPI): LabelledValues | null {
  const info: LabelledValues = {};
  const location = collapseWhitespace($('.location, .address, .country').first().text());
  if (location) {
    info.location = location;
  }
  const website = $('a[href*="www."]')
    .toArray()
    .map((el) => $(el).attr('href') ?? '')
    .find((href) => href && !href.includes(SITE_DOMAIN));
  if (website) {
    info.website = website;
  }
  const description = collapseWhitespace($('.description, .about, .overview').first().text());
  if (description.length > MIN_DESCRIPTION) {
    info.description = truncate(description, MAX_DESCRIPTION);
  }
  return info;
}

function fromMetaTags($: CheerioAPI): LabelledValues | null {
  const info: LabelledValues = {};
  const description = collapseWhitespace(
    $('meta[name="description"]').attr('content') ??
      $('meta[property="og:description"]').attr('content') ??
      ''
  );
  if (description) {
    info.description = truncate(description, MAX_DESCRIPTION);
  }
  const canonical = $('link[rel="canonical"]').attr('href');
  if (canonical) {
    info.canonical_url = canonical;
  }
  return info;
}

/**
 * Free-text profile information: location, external website and description.
 */
export const additionalInfoStrategies: ExtractionStrategy<LabelledValues>[] = [
  { name: 'profile-elements', extract: fromProfileElements },
  { name: 'meta-tags', extract: fromMetaTags },
];
