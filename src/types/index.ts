/**
 * Barrel export for all shared types.
 */
export type { ArticleRecord, DerivedFeatures, ArticleRow, ArticleColumn } from './article.js';
export { ARTICLE_COLUMNS } from './article.js';
export { DEFAULT_CONFIG } from './config.js';
export type { HarvestConfig, LogLevel, ExportFormat } from './config.js';
export type { Transport } from './transport.js';
