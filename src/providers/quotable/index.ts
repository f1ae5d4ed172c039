export { QuotableQuote, type QuotableQuoteInit } from './quote.js';
export { QuotableService } from './service.js';
export { QuotableModelConverter } from './converter.js';
export { TagExpression, type TagOperator } from './tag-expression.js';
export {
  QuotableDownloader,
  createQuotableGenerator,
  type QuotableDownloaderOptions,
  type QuotableGeneratorOptions,
} from './generator.js';
export * from './models.js';
export * from './search.js';
