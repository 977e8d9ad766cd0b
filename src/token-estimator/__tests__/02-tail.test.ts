/**
 * Token Estimator - Tail Window Tests
 */

import { TokenEstimator } from '../TokenEstimator';

function buildDocument(words: number): string {
  return Array.from({ length: words }, (_, i) => `word${i}`).join(' ');
}

describe('TokenEstimator.tail', () => {
  let estimator: TokenEstimator;

  beforeAll(() => {
    estimator = new TokenEstimator();
  });

  afterAll(() => {
    estimator.dispose();
  });

  it('should return the whole text when it already fits', () => {
    const text = 'Short enough.';
    const window = estimator.tail(text, 1000);

    expect(window.text).toBe(text);
    expect(window.truncated).toBe(false);
    expect(window.tokenCount).toBe(window.totalTokens);
  });

  it('should keep a trailing window of exactly the limit for ASCII text', () => {
    const document = buildDocument(3000);
    const window = estimator.tail(document, 1000);

    expect(window.truncated).toBe(true);
    expect(window.totalTokens).toBeGreaterThan(1000);
    expect(window.tokenCount).toBe(1000);
    expect(document.endsWith(window.text)).toBe(true);
    expect(window.text.length).toBeLessThan(document.length);
  });

  it('should favour the end of the document', () => {
    const document = buildDocument(3000);
    const window = estimator.tail(document, 50);

    expect(window.text.endsWith('word2999')).toBe(true);
    expect(window.text).not.toContain('word0 ');
  });

  it('should always return a suffix for multi-byte text', () => {
    const document = '雨が降っている。'.repeat(200) + ' 終わり';
    const window = estimator.tail(document, 37);

    expect(window.tokenCount).toBeLessThanOrEqual(37);
    expect(document.endsWith(window.text)).toBe(true);
  });

  it('should return an empty window for a zero budget', () => {
    const window = estimator.tail('Some text here.', 0);

    expect(window.text).toBe('');
    expect(window.tokenCount).toBe(0);
    expect(window.truncated).toBe(true);
  });
});
