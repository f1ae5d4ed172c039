import { describe, it, expect } from 'vitest';
import { DEFAULT_HTTP_CONFIG, loadHttpConfig } from '../../config/http.js';
import { QuoteErrorCode } from '../../errors.js';
import { captureQuoteError } from '../helpers.js';

describe('loadHttpConfig', () => {
  it('falls back to defaults', () => {
    expect(loadHttpConfig({})).toEqual(DEFAULT_HTTP_CONFIG);
  });

  it('treats empty variables as unset', () => {
    expect(loadHttpConfig({ QUOTES_HTTP_TIMEOUT_MS: '', QUOTES_USER_AGENT: '' })).toEqual(DEFAULT_HTTP_CONFIG);
  });

  it('reads every setting', () => {
    const config = loadHttpConfig({
      QUOTES_HTTP_TIMEOUT_MS: '2500',
      QUOTES_HTTP_CONCURRENCY: '8',
      QUOTES_USER_AGENT: 'test-agent/0.1',
    });

    expect(config).toEqual({ timeoutMs: 2500, concurrency: 8, userAgent: 'test-agent/0.1' });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('rejects out-of-range values', () => {
    const error = captureQuoteError(() => loadHttpConfig({ QUOTES_HTTP_CONCURRENCY: '32' }));

    expect(error.code).toBe(QuoteErrorCode.INVALID_ARGUMENT);
    expect(error.message.startsWith('Invalid HTTP configuration: QUOTES_HTTP_CONCURRENCY')).toBe(true);
  });

  it('rejects non-numeric timeouts', () => {
    expect(() => loadHttpConfig({ QUOTES_HTTP_TIMEOUT_MS: 'soon' })).toThrow(/QUOTES_HTTP_TIMEOUT_MS/);
  });
});
