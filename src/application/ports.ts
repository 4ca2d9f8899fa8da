import type { ScannedPage } from './catalog';
import type { TypesettingCallbacks, TypesettingLayout } from './formatter-bridge';
import type { ViewerSettings } from './settings';

export type MacroSet = 'mdoc' | 'man';

export interface ParsedManSource {
  path: string;
  macroSet: MacroSet;
}

/**
 * A roff formatter. `parse` throws when the file cannot be opened or read;
 * the terminal renderers drive the callbacks synchronously and return when the
 * page is fully typeset.
 */
export interface TypesettingEngine<TSource extends ParsedManSource = ParsedManSource> {
  parse(path: string, directory: string): TSource;
  typesetMdoc(source: TSource, callbacks: TypesettingCallbacks, layout: TypesettingLayout): void;
  typesetMan(source: TSource, callbacks: TypesettingCallbacks, layout: TypesettingLayout): void;
}

export interface CatalogSource {
  scan(roots: readonly string[], sections: readonly string[]): ScannedPage[];
}

export interface ManPathResolver {
  resolveManPaths(fallback: readonly string[]): string[];
}

export interface ViewerSettingsStore {
  load(): ViewerSettings;
}

export interface DiagnosticsLogger {
  debug(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
