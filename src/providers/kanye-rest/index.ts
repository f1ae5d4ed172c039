export { KanyeRestQuote } from './quote.js';
export { KanyeRestService } from './service.js';
export { KanyeRestDownloader, createKanyeRestGenerator, type KanyeRestGeneratorOptions } from './generator.js';
export { KanyeRestResponseSchema, KanyeRestDatabaseSchema, type KanyeRestResponse } from './models.js';
