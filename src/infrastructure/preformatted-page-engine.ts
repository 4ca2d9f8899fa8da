import { execFileSync } from 'node:child_process';
import { readFileSync } from 'node:fs';
import { gunzipSync } from 'node:zlib';

import type { TypesettingCallbacks, TypesettingLayout } from '../application/formatter-bridge';
import { basename, dirname, isCompressedPath } from '../application/path-utils';
import type { MacroSet, ParsedManSource, TypesettingEngine } from '../application/ports';

const TAB_STOP = 8;
const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;
const TAB = 0x09;
const BACKSPACE = 0x08;
const PREFORMATTED_EXTENSION = '.0';

export interface ManSourceFile extends ParsedManSource {
  directory: string;
  text: string;
  preformatted: boolean;
}

export interface FormatterCommandRequest {
  source: string;
  directory: string;
  layout: TypesettingLayout;
}

interface PreformattedPageEngineDeps {
  readFile?: (path: string) => Uint8Array;
  runFormatter?: (request: FormatterCommandRequest) => string;
}

export function detectMacroSet(text: string): MacroSet {
  return /^\.Dd\b/m.test(text) ? 'mdoc' : 'man';
}

/** Pages under a `cat<section>` directory or named `*.0` are already rendered. */
export function isPreformattedPath(path: string): boolean {
  const fileName = basename(path);
  const stripped = isCompressedPath(fileName) ? fileName.slice(0, -'.gz'.length) : fileName;
  return stripped.endsWith(PREFORMATTED_EXTENSION) || /^cat/.test(basename(dirname(path)));
}

export function runMandoc(request: FormatterCommandRequest): string {
  const { width, indent } = request.layout;
  return execFileSync('mandoc', ['-T', 'ascii', '-O', `width=${width},indent=${indent}`], {
    cwd: request.directory,
    input: request.source,
    encoding: 'utf8',
    maxBuffer: 64 * 1024 * 1024,
  });
}

/** Feeds rendered terminal text through the typesetting callbacks. */
export function replayRenderedText(text: string, callbacks: TypesettingCallbacks): void {
  callbacks.begin();
  let column = 0;
  for (const character of text) {
    const codePoint = character.codePointAt(0) ?? 0;
    if (codePoint === NEWLINE) {
      callbacks.endline();
      column = 0;
    } else if (codePoint === TAB) {
      const columns = TAB_STOP - (column % TAB_STOP);
      callbacks.advance(columns);
      column += columns;
    } else if (codePoint === CARRIAGE_RETURN) {
      continue;
    } else if (codePoint === BACKSPACE) {
      callbacks.letter(codePoint);
      column = Math.max(column - 1, 0);
    } else {
      callbacks.letter(codePoint);
      column += callbacks.width(codePoint);
    }
  }
  callbacks.end();
}

/**
 * Typesetting engine for files on disk. Preformatted pages are replayed as
 * they are; roff sources go through an external terminal formatter first.
 */
export class PreformattedPageEngine implements TypesettingEngine<ManSourceFile> {
  private readonly readFile: (path: string) => Uint8Array;
  private readonly runFormatter: (request: FormatterCommandRequest) => string;

  constructor(deps: PreformattedPageEngineDeps = {}) {
    this.readFile = deps.readFile ?? ((path) => readFileSync(path));
    this.runFormatter = deps.runFormatter ?? runMandoc;
  }

  parse(path: string, directory: string): ManSourceFile {
    const raw = this.readFile(path);
    const bytes = isCompressedPath(path) ? gunzipSync(raw) : raw;
    const text = new TextDecoder('utf-8').decode(bytes);
    return {
      path,
      directory,
      text,
      macroSet: detectMacroSet(text),
      preformatted: isPreformattedPath(path),
    };
  }

  typesetMdoc(source: ManSourceFile, callbacks: TypesettingCallbacks, layout: TypesettingLayout): void {
    this.render(source, callbacks, layout);
  }

  typesetMan(source: ManSourceFile, callbacks: TypesettingCallbacks, layout: TypesettingLayout): void {
    this.render(source, callbacks, layout);
  }

  private render(source: ManSourceFile, callbacks: TypesettingCallbacks, layout: TypesettingLayout): void {
    const rendered = source.preformatted
      ? source.text
      : this.runFormatter({ source: source.text, directory: source.directory, layout });
    replayRenderedText(rendered, callbacks);
  }
}
