import {
  DEFAULT_SETTINGS,
  isHexColor,
  mergeViewerSettings,
  type ColorRole,
  type ViewerSettings,
} from './settings';

export interface SettingsFileEntry {
  name: string;
  value: string;
  lineNumber: number;
}

export interface SettingsFileResult {
  settings: ViewerSettings;
  warnings: string[];
}

type NumericSettingKey =
  | 'fontSize'
  | 'guiScale'
  | 'lineSpacing'
  | 'initialWindowRows'
  | 'searchMatchLimit'
  | 'catalogResultLimit'
  | 'positionPenalty'
  | 'scrollMarginLines';

const INTEGER_KEYS = new Map<string, NumericSettingKey>([
  ['font_size', 'fontSize'],
  ['initial_window_rows', 'initialWindowRows'],
  ['search_match_limit', 'searchMatchLimit'],
  ['catalog_result_limit', 'catalogResultLimit'],
  ['position_penalty', 'positionPenalty'],
  ['scroll_margin_lines', 'scrollMarginLines'],
]);

const DECIMAL_KEYS = new Map<string, NumericSettingKey>([
  ['gui_scale', 'guiScale'],
  ['line_spacing', 'lineSpacing'],
]);

const COLOR_KEYS = new Map<string, ColorRole>([
  ['color_background', 'background'],
  ['color_foreground', 'foreground'],
  ['color_bold', 'bold'],
  ['color_italic', 'italic'],
  ['color_dim', 'dim'],
  ['color_scrollbar_background', 'scrollbarBackground'],
  ['color_scrollbar_thumb', 'scrollbarThumb'],
  ['color_scrollbar_thumb_hover', 'scrollbarThumbHover'],
  ['color_link', 'link'],
  ['color_gui_1', 'gui1'],
  ['color_gui_2', 'gui2'],
  ['color_error', 'error'],
  ['color_searches', 'searches'],
  ['color_search_selected', 'searchSelected'],
]);

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export function parseSettingsText(text: string): { entries: SettingsFileEntry[]; warnings: string[] } {
  const entries: SettingsFileEntry[] = [];
  const warnings: string[] = [];
  const lines = text.split('\n');

  lines.forEach((rawLine, index) => {
    const lineNumber = index + 1;
    const line = rawLine.replace(/^[ \t]+/, '');
    if (!line.trim() || line.startsWith('#')) {
      return;
    }

    const separator = line.indexOf(':');
    if (separator < 0) {
      warnings.push(`line ${lineNumber}: expected "name: value"`);
      return;
    }

    const name = line.slice(0, separator).split(' ')[0] ?? '';
    const value = line.slice(separator + 1).trim();
    if (!name || !value) {
      return;
    }
    entries.push({ name, value, lineNumber });
  });

  return { entries, warnings };
}

export function settingsFromFileText(
  text: string,
  base: ViewerSettings = DEFAULT_SETTINGS
): SettingsFileResult {
  const parsed = parseSettingsText(text);
  const warnings = [...parsed.warnings];
  const draft: ViewerSettings = {
    ...base,
    colors: { ...base.colors },
    manPaths: [...base.manPaths],
    sections: [...base.sections],
  };

  for (const entry of parsed.entries) {
    const problem = applyEntry(draft, entry);
    if (problem) {
      warnings.push(`line ${entry.lineNumber}: ${problem}`);
    }
  }

  return {
    settings: mergeViewerSettings(draft),
    warnings,
  };
}

function applyEntry(draft: ViewerSettings, entry: SettingsFileEntry): string | null {
  const { name, value } = entry;

  if (name === 'font') {
    draft.fontFile = value;
    return null;
  }

  const integerKey = INTEGER_KEYS.get(name);
  if (integerKey) {
    const parsed = Number.parseInt(value, 10);
    if (Number.isNaN(parsed)) {
      return `failed to read value "${value}" for ${name}`;
    }
    draft[integerKey] = parsed;
    return null;
  }

  const decimalKey = DECIMAL_KEYS.get(name);
  if (decimalKey) {
    const parsed = Number.parseFloat(value);
    if (Number.isNaN(parsed)) {
      return `failed to read value "${value}" for ${name}`;
    }
    draft[decimalKey] = parsed;
    return null;
  }

  const colorRole = COLOR_KEYS.get(name);
  if (colorRole) {
    const normalized = value.toLowerCase();
    if (!isHexColor(normalized)) {
      return `expected a #rrggbb color for ${name}, got "${value}"`;
    }
    draft.colors[colorRole] = normalized;
    return null;
  }

  if (name === 'man_paths') {
    draft.manPaths = value.split(':').map((path) => path.trim()).filter(Boolean);
    return null;
  }

  if (name === 'sections') {
    draft.sections = value.split(/[\s,]+/).filter(Boolean);
    return null;
  }

  if (name === 'verbose') {
    const normalized = value.toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      draft.verbose = true;
      return null;
    }
    if (FALSE_VALUES.has(normalized)) {
      draft.verbose = false;
      return null;
    }
    return `expected a boolean for verbose, got "${value}"`;
  }

  return `unknown setting "${name}"`;
}
