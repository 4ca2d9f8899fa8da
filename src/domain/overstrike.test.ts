import { describe, expect, it } from 'vitest';

import { decodeOverstrike, styledRuns } from './overstrike';

function bytesOf(text: string): number[] {
  return Array.from(text, (character) => character.charCodeAt(0));
}

describe('overstrike', () => {
  it('leaves text without backspaces unchanged', () => {
    expect(decodeOverstrike(bytesOf('plain text, no emphasis'))).toBe('plain text, no emphasis');
  });

  it('collapses bold, italic and dim overstrikes to the last glyph', () => {
    expect(decodeOverstrike(bytesOf('X\bX'))).toBe('X');
    expect(decodeOverstrike(bytesOf('_\bY'))).toBe('Y');
    expect(decodeOverstrike(bytesOf('A\bB'))).toBe('B');
    expect(decodeOverstrike(bytesOf('N\bNA\bAM\bME\bE'))).toBe('NAME');
  });

  it('ignores a backspace at the start of the stream', () => {
    expect(decodeOverstrike(bytesOf('\bab'))).toBe('ab');
  });

  it('truncates the decoded text at the limit', () => {
    expect(decodeOverstrike(bytesOf('abcdef'), 4)).toBe('abcd');
  });

  it('splits overstrikes into styled runs', () => {
    const runs = styledRuns(bytesOf('b\bbo\bol\bld\bd and _\bi_\bt dim A\bB'));
    expect(runs).toEqual([
      { style: 'bold', text: 'bold' },
      { style: 'plain', text: ' and ' },
      { style: 'italic', text: 'it' },
      { style: 'plain', text: ' dim ' },
      { style: 'dim', text: 'B' },
    ]);
  });

  it('drops a dangling overstrike at the end of the stream', () => {
    expect(styledRuns(bytesOf('ab\b'))).toEqual([{ style: 'plain', text: 'a' }]);
  });
});
