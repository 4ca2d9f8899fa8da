export const BACKSPACE = 0x08;
const UNDERSCORE = 0x5f;

export type RunStyle = 'plain' | 'bold' | 'italic' | 'dim';

export interface StyledRun {
  style: RunStyle;
  text: string;
}

/**
 * Collapses overstrike sequences into plain text. A backspace removes the
 * character emitted just before it, so `X\bX`, `_\bY` and `A\bB` all decode to
 * their last glyph.
 *
 * `limit` bounds the decoded length; bytes are consumed only while the write
 * cursor is below it.
 */
export function decodeOverstrike(bytes: ArrayLike<number>, limit = Number.POSITIVE_INFINITY): string {
  const output: number[] = [];
  let cursor = 0;
  for (let index = 0; index < bytes.length && cursor < limit; index += 1) {
    const byte = bytes[index];
    if (byte === BACKSPACE) {
      if (cursor > 0) {
        cursor -= 1;
      }
      continue;
    }
    output[cursor] = byte;
    cursor += 1;
  }
  return bytesToText(output, cursor);
}

export function styledRuns(bytes: ArrayLike<number>): StyledRun[] {
  const runs: StyledRun[] = [];
  let index = 0;

  while (index < bytes.length) {
    let style: RunStyle = 'plain';
    if (bytes[index + 1] === BACKSPACE) {
      const current = bytes[index];
      const overlay = bytes[index + 2];
      if (overlay === current) {
        style = 'bold';
      } else if (current === UNDERSCORE) {
        style = 'italic';
      } else {
        style = 'dim';
      }

      index += 2;
      if (index >= bytes.length) {
        break;
      }
    }

    appendGlyph(runs, style, bytes[index]);
    index += 1;
  }

  return runs;
}

export function bytesToText(bytes: ArrayLike<number>, length = bytes.length): string {
  let text = '';
  for (let index = 0; index < length; index += 1) {
    text += String.fromCharCode(bytes[index]);
  }
  return text;
}

function appendGlyph(runs: StyledRun[], style: RunStyle, byte: number): void {
  const glyph = String.fromCharCode(byte);
  const last = runs.at(-1);
  if (last && last.style === style) {
    last.text += glyph;
    return;
  }
  runs.push({ style, text: glyph });
}
