const COMPRESSED_EXTENSION = '.gz';

export function normalizeSeparators(path: string): string {
  return path.replaceAll('\\', '/');
}

export function basename(path: string): string {
  const normalized = normalizeSeparators(path);
  const slashIndex = normalized.lastIndexOf('/');
  return slashIndex === -1 ? normalized : normalized.slice(slashIndex + 1);
}

export function dirname(path: string): string {
  const normalized = normalizeSeparators(path);
  const slashIndex = normalized.lastIndexOf('/');
  if (slashIndex === -1) {
    return '.';
  }
  return slashIndex === 0 ? '/' : normalized.slice(0, slashIndex);
}

export function joinPath(...segments: string[]): string {
  const joined = segments
    .filter((segment) => segment.length > 0)
    .map((segment, index) => {
      const normalized = normalizeSeparators(segment);
      return index === 0 ? normalized.replace(/\/+$/, '') : normalized.replace(/^\/+|\/+$/g, '');
    })
    .join('/');
  return joined || '.';
}

export function isCompressedPath(path: string): boolean {
  return path.toLowerCase().endsWith(COMPRESSED_EXTENSION);
}
