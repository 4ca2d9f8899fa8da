import { gzipSync } from 'node:zlib';
import { describe, expect, it, vi } from 'vitest';

import { FormatterBridge, glyphWidth, type TypesettingCallbacks } from '../application/formatter-bridge';
import {
  PreformattedPageEngine,
  detectMacroSet,
  isPreformattedPath,
  replayRenderedText,
  type FormatterCommandRequest,
} from './preformatted-page-engine';

function createLogger() {
  return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function filesFrom(files: Record<string, Uint8Array>) {
  return (path: string): Uint8Array => {
    const bytes = files[path];
    if (!bytes) {
      throw new Error(`ENOENT: no such file or directory, open '${path}'`);
    }
    return bytes;
  };
}

function encode(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

function recordingCallbacks(events: string[]): TypesettingCallbacks {
  return {
    begin: () => events.push('begin'),
    end: () => events.push('end'),
    letter: (codePoint) => events.push(`letter ${codePoint}`),
    advance: (columns) => events.push(`advance ${columns}`),
    endline: () => events.push('endline'),
    width: glyphWidth,
    hspan: () => 0,
  };
}

describe('preformatted-page-engine', () => {
  it('recognises preformatted page paths', () => {
    expect(isPreformattedPath('/usr/share/man/cat1/ls.0')).toBe(true);
    expect(isPreformattedPath('/usr/share/man/cat3/printf.3')).toBe(true);
    expect(isPreformattedPath('/usr/share/man/man1/ls.0.gz')).toBe(true);
    expect(isPreformattedPath('/usr/share/man/man1/ls.1.gz')).toBe(false);
  });

  it('detects mdoc sources by their date request', () => {
    expect(detectMacroSet('.\\" comment\n.Dd March 3, 2024\n.Dt LS 1\n')).toBe('mdoc');
    expect(detectMacroSet('.TH LS 1\n.SH NAME\n')).toBe('man');
  });

  it('replays tabs against the column count', () => {
    const events: string[] = [];
    replayRenderedText('ab\tc\r\n', recordingCallbacks(events));

    expect(events).toEqual(['begin', 'letter 97', 'letter 98', 'advance 6', 'letter 99', 'endline', 'end']);
  });

  it('steps the column back on a backspace', () => {
    const events: string[] = [];
    replayRenderedText('a\bb\tc', recordingCallbacks(events));

    expect(events).toEqual(['begin', 'letter 97', 'letter 8', 'letter 98', 'advance 7', 'letter 99', 'end']);
  });

  it('formats a preformatted page without running the formatter', () => {
    const runFormatter = vi.fn((_request: FormatterCommandRequest) => '');
    const engine = new PreformattedPageEngine({
      readFile: filesFrom({ '/man/cat1/ls.0': encode('N\bNA\bAM\bME\bE\n     ls\tx\n') }),
      runFormatter,
    });
    const bridge = new FormatterBridge({ engine, logger: createLogger() });

    const result = bridge.format('/man/cat1/ls.0', '/man');

    expect(result.type).toBe('formatted');
    if (result.type !== 'formatted') return;
    expect(result.content.plainText()).toEqual(['NAME', '     ls x']);
    expect(result.content.lines[0].spans[0].runs()).toEqual([{ style: 'bold', text: 'NAME' }]);
    expect(result.source.macroSet).toBe('man');
    expect(runFormatter).not.toHaveBeenCalled();
  });

  it('renders roff sources through the formatter command', () => {
    const source = '.Dd March 3, 2024\n.Dt LS 1\n';
    const runFormatter = vi.fn((_request: FormatterCommandRequest) => 'LS(1)\n');
    const engine = new PreformattedPageEngine({
      readFile: filesFrom({ '/man/man1/ls.1': encode(source) }),
      runFormatter,
    });
    const bridge = new FormatterBridge({ engine, logger: createLogger() });

    const result = bridge.format('/man/man1/ls.1', '/man');

    expect(runFormatter).toHaveBeenCalledWith({
      source,
      directory: '/man',
      layout: { width: 78, indent: 5 },
    });
    expect(result.type).toBe('formatted');
    if (result.type !== 'formatted') return;
    expect(result.content.plainText()).toEqual(['LS(1)']);
    expect(result.source.macroSet).toBe('mdoc');
  });

  it('decompresses gzip pages', () => {
    const engine = new PreformattedPageEngine({
      readFile: filesFrom({ '/man/cat1/cat.0.gz': gzipSync(encode('cat - concatenate\n')) }),
    });

    const parsed = engine.parse('/man/cat1/cat.0.gz', '/man');

    expect(parsed.text).toBe('cat - concatenate\n');
    expect(parsed.preformatted).toBe(true);
  });

  it('turns read and formatter errors into failed results', () => {
    const engine = new PreformattedPageEngine({
      readFile: filesFrom({ '/man/man1/ls.1': encode('.TH LS 1\n') }),
      runFormatter: () => {
        throw new Error('spawnSync mandoc ENOENT');
      },
    });
    const bridge = new FormatterBridge({ engine, logger: createLogger() });

    expect(bridge.format('/man/man1/ls.1', '/man')).toEqual({
      type: 'failed',
      message: 'spawnSync mandoc ENOENT',
    });
    expect(bridge.format('/man/man1/missing.1', '/man')).toEqual({
      type: 'failed',
      message: "ENOENT: no such file or directory, open '/man/man1/missing.1'",
    });
  });
});
