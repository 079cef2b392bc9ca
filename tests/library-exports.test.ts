import { describe, expect, it } from 'vitest';
import {
  DeepLApiError,
  DeepLClient,
  decodeGlossaryEntries,
  encodeGlossaryEntries,
  fetchTransport,
  isDeepLError,
  Languages,
  sourceLang,
} from '../src/index.js';

describe('library exports', () => {
  it('exposes primary library surface', () => {
    expect(typeof DeepLClient).toBe('function');
    expect(typeof DeepLApiError).toBe('function');
    expect(typeof isDeepLError).toBe('function');
    expect(typeof fetchTransport).toBe('function');
    expect(typeof sourceLang).toBe('function');
    expect(typeof encodeGlossaryEntries).toBe('function');
    expect(typeof decodeGlossaryEntries).toBe('function');
    expect(Languages.Japanese).toBe('JA');
  });
});
