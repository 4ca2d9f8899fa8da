export type ColorRole =
  | 'background'
  | 'foreground'
  | 'bold'
  | 'italic'
  | 'dim'
  | 'scrollbarBackground'
  | 'scrollbarThumb'
  | 'scrollbarThumbHover'
  | 'link'
  | 'gui1'
  | 'gui2'
  | 'error'
  | 'searches'
  | 'searchSelected';

export type ColorPalette = Record<ColorRole, string>;

export interface ViewerSettings {
  fontFile: string;
  fontSize: number;
  guiScale: number;
  lineSpacing: number;
  initialWindowRows: number;
  colors: ColorPalette;
  manPaths: string[];
  sections: string[];
  verbose: boolean;
  searchMatchLimit: number;
  catalogResultLimit: number;
  positionPenalty: number;
  scrollMarginLines: number;
}

export const COLOR_ROLES: readonly ColorRole[] = [
  'background',
  'foreground',
  'bold',
  'italic',
  'dim',
  'scrollbarBackground',
  'scrollbarThumb',
  'scrollbarThumbHover',
  'link',
  'gui1',
  'gui2',
  'error',
  'searches',
  'searchSelected',
];

export const DEFAULT_MAN_PATHS: readonly string[] = ['/usr/share/man', '/usr/X11R6/man', '/usr/local/man'];

// Lookup order when a page is requested without a section.
export const DEFAULT_SECTIONS: readonly string[] = ['1', '8', '6', '2', '3', '5', '7', '4', '9', '3p'];

export const DEFAULT_SETTINGS: ViewerSettings = {
  fontFile: '',
  fontSize: 10,
  guiScale: 1,
  lineSpacing: 1,
  initialWindowRows: 40,
  colors: {
    background: '#151515',
    foreground: '#fdfde8',
    bold: '#a4d4f1',
    italic: '#ffce79',
    dim: '#7b7b7b',
    scrollbarBackground: '#262626',
    scrollbarThumb: '#454545',
    scrollbarThumbHover: '#545454',
    link: '#4815ff',
    gui1: '#ebb470',
    gui2: '#8fbfdc',
    error: '#ff1515',
    searches: '#1515b4',
    searchSelected: '#15c815',
  },
  manPaths: [...DEFAULT_MAN_PATHS],
  sections: [...DEFAULT_SECTIONS],
  verbose: false,
  searchMatchLimit: 100,
  catalogResultLimit: 100,
  positionPenalty: 100,
  scrollMarginLines: 3,
};

const FONT_SIZE_RANGE = { min: 4, max: 96 };
const GUI_SCALE_RANGE = { min: 0.5, max: 4 };
const LINE_SPACING_RANGE = { min: 0.5, max: 4 };
const WINDOW_ROWS_RANGE = { min: 5, max: 400 };
const RESULT_LIMIT_RANGE = { min: 1, max: 1000 };
const POSITION_PENALTY_RANGE = { min: 0, max: 100_000 };
const SCROLL_MARGIN_RANGE = { min: 0, max: 50 };
const HEX_COLOR_PATTERN = /^#[0-9a-f]{6}$/;

export function mergeViewerSettings(parsed: unknown): ViewerSettings {
  const source = asRecord(parsed);
  const colorSource = asRecord(source.colors);
  const colors = { ...DEFAULT_SETTINGS.colors };

  for (const role of COLOR_ROLES) {
    colors[role] = asColor(colorSource[role], DEFAULT_SETTINGS.colors[role]);
  }

  return {
    ...DEFAULT_SETTINGS,
    fontFile: typeof source.fontFile === 'string' ? source.fontFile.trim() : DEFAULT_SETTINGS.fontFile,
    fontSize: asNumberInRange(
      source.fontSize,
      DEFAULT_SETTINGS.fontSize,
      FONT_SIZE_RANGE.min,
      FONT_SIZE_RANGE.max,
      true
    ),
    guiScale: asNumberInRange(
      source.guiScale,
      DEFAULT_SETTINGS.guiScale,
      GUI_SCALE_RANGE.min,
      GUI_SCALE_RANGE.max
    ),
    lineSpacing: asNumberInRange(
      source.lineSpacing,
      DEFAULT_SETTINGS.lineSpacing,
      LINE_SPACING_RANGE.min,
      LINE_SPACING_RANGE.max
    ),
    initialWindowRows: asNumberInRange(
      source.initialWindowRows,
      DEFAULT_SETTINGS.initialWindowRows,
      WINDOW_ROWS_RANGE.min,
      WINDOW_ROWS_RANGE.max,
      true
    ),
    colors,
    manPaths: asStringList(source.manPaths, DEFAULT_SETTINGS.manPaths),
    sections: asStringList(source.sections, DEFAULT_SETTINGS.sections),
    verbose: asBoolean(source.verbose, DEFAULT_SETTINGS.verbose),
    searchMatchLimit: asNumberInRange(
      source.searchMatchLimit,
      DEFAULT_SETTINGS.searchMatchLimit,
      RESULT_LIMIT_RANGE.min,
      RESULT_LIMIT_RANGE.max,
      true
    ),
    catalogResultLimit: asNumberInRange(
      source.catalogResultLimit,
      DEFAULT_SETTINGS.catalogResultLimit,
      RESULT_LIMIT_RANGE.min,
      RESULT_LIMIT_RANGE.max,
      true
    ),
    positionPenalty: asNumberInRange(
      source.positionPenalty,
      DEFAULT_SETTINGS.positionPenalty,
      POSITION_PENALTY_RANGE.min,
      POSITION_PENALTY_RANGE.max,
      true
    ),
    scrollMarginLines: asNumberInRange(
      source.scrollMarginLines,
      DEFAULT_SETTINGS.scrollMarginLines,
      SCROLL_MARGIN_RANGE.min,
      SCROLL_MARGIN_RANGE.max,
      true
    ),
  };
}

export function isHexColor(value: string): boolean {
  return HEX_COLOR_PATTERN.test(value);
}

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }
  return value as Record<string, unknown>;
}

function asBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function asColor(value: unknown, fallback: string): string {
  if (typeof value !== 'string') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  return isHexColor(normalized) ? normalized : fallback;
}

function asStringList(value: unknown, fallback: readonly string[]): string[] {
  if (!Array.isArray(value)) {
    return [...fallback];
  }
  const entries = value
    .filter((entry): entry is string => typeof entry === 'string')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return entries.length > 0 ? Array.from(new Set(entries)) : [...fallback];
}

function asNumberInRange(
  value: unknown,
  fallback: number,
  min: number,
  max: number,
  round = false
): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  const clamped = Math.min(max, Math.max(min, value));
  return round ? Math.round(clamped) : clamped;
}
