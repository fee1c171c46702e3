import { describe, it, expect } from 'vitest';
import { getUrlExtension, sanitizeFilename } from '../path.js';

describe('sanitizeFilename', () => {
  it('should replace reserved characters and trim dots', () => {
    expect(sanitizeFilename('..a/b:c?.jpg')).toBe('a_b_c_.jpg');
    expect(sanitizeFilename('  clip.mp4 ')).toBe('clip.mp4');
  });
});

describe('getUrlExtension', () => {
  it('should read the extension of the URL path only', () => {
    expect(getUrlExtension('https://cdn.test/p/photo.JPG?x=1.png')).toBe('jpg');
    expect(getUrlExtension('https://cdn.test/p/photo')).toBe('');
    expect(getUrlExtension('not a url')).toBe('');
  });
});
