import { asciiLowercase, type CatalogEntry } from '../domain';
import { basename, dirname, isCompressedPath } from './path-utils';

/** A page file found under one of the catalog roots. */
export interface ScannedPage {
  path: string;
  /** The catalog root the file was found under. */
  directory: string;
}

export interface PageFileName {
  name: string;
  section: string;
}

export interface Catalog {
  entries: ReadonlyMap<string, CatalogEntry>;
  /** Keys sorted by code unit, duplicates removed. */
  names: readonly string[];
  /** `names` with ASCII letters lowercased, index for index. */
  lowercaseNames: readonly string[];
}

export type OpenTarget =
  | { type: 'entry'; entry: CatalogEntry }
  | { type: 'missing'; message: string };

export function parsePageFileName(path: string): PageFileName | null {
  let fileName = basename(path);
  if (isCompressedPath(fileName)) {
    fileName = fileName.slice(0, -'.gz'.length);
  }

  const dot = fileName.lastIndexOf('.');
  if (dot < 0) {
    return null;
  }
  return { name: fileName.slice(0, dot), section: fileName.slice(dot + 1) };
}

export function catalogKey(name: string, section: string): string {
  return `${name}(${section})`;
}

export function createEmptyCatalog(): Catalog {
  return { entries: new Map(), names: [], lowercaseNames: [] };
}

export function buildCatalog(pages: readonly ScannedPage[]): Catalog {
  const entries = new Map<string, CatalogEntry>();
  for (const page of pages) {
    const parsed = parsePageFileName(page.path);
    if (!parsed) {
      continue;
    }
    const key = catalogKey(parsed.name, parsed.section);
    entries.set(key, { key, path: page.path, directory: page.directory });
  }

  const names = [...entries.keys()].sort(compareCodeUnits);
  return {
    entries,
    names,
    lowercaseNames: names.map(asciiLowercase),
  };
}

export function lookupCatalogKey(catalog: Catalog, key: string): CatalogEntry | null {
  return catalog.entries.get(key) ?? null;
}

/**
 * Finds `name` in `section`, or in the first section of `sectionOrder` that
 * has it when no section is given.
 */
export function lookupCatalogPage(
  catalog: Catalog,
  name: string,
  section: string | null,
  sectionOrder: readonly string[]
): CatalogEntry | null {
  if (section) {
    return lookupCatalogKey(catalog, catalogKey(name, section));
  }
  for (const candidate of sectionOrder) {
    const entry = lookupCatalogKey(catalog, catalogKey(name, candidate));
    if (entry) {
      return entry;
    }
  }
  return null;
}

export function missingPageMessage(name: string, section: string | null): string {
  if (section) {
    return `No entry for ${name} in section ${section} of the manual.`;
  }
  return `No entry for ${name} in the manual.`;
}

export function resolveOpenTarget(input: {
  catalog: Catalog;
  name: string;
  section: string | null;
  sectionOrder: readonly string[];
}): OpenTarget {
  const entry = lookupCatalogPage(input.catalog, input.name, input.section, input.sectionOrder);
  if (entry) {
    return { type: 'entry', entry };
  }
  return { type: 'missing', message: missingPageMessage(input.name, input.section) };
}

/** An entry for a file opened by path; its directory is the file's own. */
export function entryForFile(path: string): CatalogEntry {
  const parsed = parsePageFileName(path);
  return {
    key: parsed ? catalogKey(parsed.name, parsed.section) : '',
    path,
    directory: dirname(path),
  };
}

function compareCodeUnits(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}
