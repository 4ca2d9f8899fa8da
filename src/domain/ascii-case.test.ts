import { describe, expect, it } from 'vitest';

import { asciiLowercase, containsUppercase } from './ascii-case';

describe('ascii-case', () => {
  it('folds ASCII letters only', () => {
    expect(asciiLowercase('Xorg(1)')).toBe('xorg(1)');
    expect(asciiLowercase('ÄBC İx')).toBe('Äbc İx');
  });

  it('treats non-ASCII capitals as caseless', () => {
    expect(containsUppercase('Ä')).toBe(false);
    expect(containsUppercase('äB')).toBe(true);
  });
});
