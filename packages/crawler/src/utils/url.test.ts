import { describe, it, expect } from 'vitest';
import { isValidUrl, resolveUrl } from './url.js';

describe('url utils', () => {
  it('isValidUrl accepts absolute urls only', () => {
    expect(isValidUrl('https://example.com/a')).toBe(true);
    expect(isValidUrl('/relative/path')).toBe(false);
  });

  it('resolveUrl joins relative links onto the base', () => {
    expect(resolveUrl('https://example.com/list/page-1', 'detail/42')).toBe(
      'https://example.com/list/detail/42',
    );
    expect(resolveUrl('https://example.com/list/page-1', '/detail/42')).toBe(
      'https://example.com/detail/42',
    );
    expect(
      resolveUrl('https://example.com/list', 'https://other.example/x'),
    ).toBe('https://other.example/x');
  });

  it('resolveUrl returns the target when the base is unusable', () => {
    expect(resolveUrl('not a url', 'detail/42')).toBe('detail/42');
  });
});
