import { translateCodePoint, type TranslationResult } from './character-translator';
import { decodeOverstrike, styledRuns, type StyledRun } from './overstrike';

export type SpanKind = 'title' | 'text' | 'section' | 'link' | 'url';

export const INITIAL_SPAN_CAPACITY = 32;
export const INITIAL_LINE_CAPACITY = 256;

export class Span {
  /** Reserved style tag; nothing reads it yet. */
  kind: SpanKind | null = null;
  private buffer: Uint8Array = new Uint8Array(0);
  private used = 0;

  get length(): number {
    return this.used;
  }

  get capacity(): number {
    return this.buffer.length;
  }

  append(bytes: readonly number[]): void {
    if (bytes.length === 0) {
      return;
    }

    if (this.buffer.length === 0) {
      this.buffer = new Uint8Array(INITIAL_SPAN_CAPACITY);
    }
    while (this.used + bytes.length >= this.buffer.length) {
      const grown = new Uint8Array(this.buffer.length * 2);
      grown.set(this.buffer.subarray(0, this.used));
      this.buffer = grown;
    }

    for (const byte of bytes) {
      this.buffer[this.used] = byte;
      this.used += 1;
    }
  }

  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.used);
  }

  runs(): StyledRun[] {
    return styledRuns(this.bytes());
  }
}

export class Line {
  readonly spans: Span[] = [];

  lastSpan(): Span {
    const last = this.spans.at(-1);
    if (last) {
      return last;
    }
    const created = new Span();
    this.spans.push(created);
    return created;
  }

  isBlank(): boolean {
    if (this.spans.length === 0) {
      return true;
    }
    return this.spans.length === 1 && this.spans[0].length === 0;
  }

  bytes(): number[] {
    const bytes: number[] = [];
    for (const span of this.spans) {
      for (const byte of span.bytes()) {
        bytes.push(byte);
      }
    }
    return bytes;
  }

  /** Decoded text of every span, sharing one write cursor. */
  plainText(limit?: number): string {
    return decodeOverstrike(this.bytes(), limit);
  }
}

export class DocumentContent {
  private readonly storage: Line[] = [];
  private lineCapacity = 0;

  get lineCount(): number {
    return this.storage.length;
  }

  get capacity(): number {
    return this.lineCapacity;
  }

  get lines(): readonly Line[] {
    return this.storage;
  }

  line(index: number): Line | null {
    return this.storage[index] ?? null;
  }

  startLine(): Line {
    if (this.lineCapacity === 0) {
      this.lineCapacity = INITIAL_LINE_CAPACITY;
    } else if (this.storage.length >= this.lineCapacity) {
      this.lineCapacity *= 2;
    }

    const line = new Line();
    line.lastSpan();
    this.storage.push(line);
    return line;
  }

  currentLine(): Line {
    return this.storage.at(-1) ?? this.startLine();
  }

  appendCodePoint(codePoint: number): TranslationResult {
    const translated = translateCodePoint(codePoint);
    if (translated.type === 'mapped') {
      this.currentLine().lastSpan().append(translated.bytes);
    }
    return translated;
  }

  appendBytes(bytes: readonly number[]): void {
    this.currentLine().lastSpan().append(bytes);
  }

  /** Drops a trailing blank line left behind by the formatter, keeping at least one line. */
  trimTrailingBlankLine(): boolean {
    if (this.storage.length <= 1) {
      return false;
    }
    const last = this.storage.at(-1);
    if (!last || !last.isBlank()) {
      return false;
    }
    this.storage.pop();
    return true;
  }

  plainText(): string[] {
    return this.storage.map((line) => line.plainText());
  }
}
