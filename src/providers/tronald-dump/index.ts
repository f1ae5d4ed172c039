export { TronaldDumpQuote, type TronaldDumpQuoteInit } from './quote.js';
export { TronaldDumpService } from './service.js';
export { TronaldDumpModelConverter } from './converter.js';
export {
  TronaldDumpDownloader,
  createTronaldDumpGenerator,
  type TronaldDumpDownloaderOptions,
  type TronaldDumpGeneratorOptions,
} from './generator.js';
export * from './models.js';
export { QuoteSearchSchema as TronaldDumpSearchSchema, type QuoteSearchInput as TronaldDumpSearchInput } from './search.js';
