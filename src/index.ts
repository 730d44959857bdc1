export * from './common/AppError.js';
export * from './common/types.js';
export * from './common/guards.js';
export * from './config/app-config.js';
export { extractRankEntries } from './extractors/rankings-table.js';
export type { RankingsExtraction, RankingsExtractionOptions } from './extractors/rankings-table.js';
export { extractDetailRecord, cleanDetailRecord } from './extractors/detail-page.js';
export type { DetailExtraction, DetailSection } from './extractors/detail-page.js';
export { runCascade } from './extractors/cascade.js';
export type { ExtractionStrategy, CascadeOutcome } from './extractors/cascade.js';
export { normalizeRank, normalizeScore, normalizeLabelKey, classifyMetricValue } from './extractors/normalize.js';
export { validateDetailUrl, validateDetailUrls } from './utils/url-validator.js';
export { BatchOrchestrator, createDetailProcessor, partitionIntoBatches } from './utils/batch-orchestrator.js';
export type { DetailProcessor } from './utils/batch-orchestrator.js';
export { BrowserSession, withBrowserSession } from './utils/browser-session.js';
export type { BrowserHandle, BrowserLauncher, PageHandle } from './utils/browser-session.js';
export { PageFetcher } from './utils/page-fetcher.js';
export type { FetchOptions, PageSource } from './utils/page-fetcher.js';
export { PuppeteerLauncher } from './utils/puppeteer-driver.js';
export { CheckpointStore } from './utils/checkpoint-store.js';
export { combineDatasets } from './utils/dataset-combiner.js';
export * from './scraper.js';
