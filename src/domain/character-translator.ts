export type TranslationResult =
  | { type: 'mapped'; bytes: readonly number[] }
  | { type: 'unmappable'; codePoint: number };

const DISPLAYABLE_LIMIT = 256;

const HYPHEN = 0x2d;
const VERTICAL_BAR = 0x7c;
const PLUS = 0x2b;
const SPACE = 0x20;
const DOUBLE_QUOTE = 0x22;
const SINGLE_QUOTE = 0x27;
const LESS_THAN = 0x3c;
const GREATER_THAN = 0x3e;
const EQUALS = 0x3d;

const SINGLE_CODE_POINTS = new Map<number, number>([
  [0x00a0, SPACE],
  [0x2002, SPACE],
  [0x2010, HYPHEN],
  [0x2013, HYPHEN],
  [0x2014, HYPHEN],
  [0x2022, HYPHEN],
  [0x2212, HYPHEN],
  [0x2018, SINGLE_QUOTE],
  [0x2019, SINGLE_QUOTE],
  [0x201c, DOUBLE_QUOTE],
  [0x201d, DOUBLE_QUOTE],
  [0x27e8, LESS_THAN],
  [0x27e9, GREATER_THAN],
]);

const PAIRED_CODE_POINTS = new Map<number, readonly [number, number]>([
  [0x2264, [LESS_THAN, EQUALS]],
  [0x2265, [GREATER_THAN, EQUALS]],
]);

interface CodePointRange {
  first: number;
  last: number;
  byte: number;
}

// Box drawing: light/heavy horizontals, verticals, then every corner and cross.
const RANGES: readonly CodePointRange[] = [
  { first: 0x2500, last: 0x2501, byte: HYPHEN },
  { first: 0x2502, last: 0x2503, byte: VERTICAL_BAR },
  { first: 0x250c, last: 0x254b, byte: PLUS },
];

export function translateCodePoint(codePoint: number): TranslationResult {
  const paired = PAIRED_CODE_POINTS.get(codePoint);
  if (paired) {
    return { type: 'mapped', bytes: paired };
  }

  const single = SINGLE_CODE_POINTS.get(codePoint) ?? rangeByte(codePoint);
  if (single !== null) {
    return { type: 'mapped', bytes: [single] };
  }

  if (Number.isInteger(codePoint) && codePoint >= 0 && codePoint < DISPLAYABLE_LIMIT) {
    return { type: 'mapped', bytes: [codePoint] };
  }

  return { type: 'unmappable', codePoint };
}

export function describeCodePoint(codePoint: number): string {
  const hex = codePoint.toString(16).toUpperCase().padStart(4, '0');
  return `U+${hex}`;
}

function rangeByte(codePoint: number): number | null {
  for (const range of RANGES) {
    if (codePoint >= range.first && codePoint <= range.last) {
      return range.byte;
    }
  }
  return null;
}
