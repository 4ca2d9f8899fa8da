import { describe, expect, it } from 'vitest';

import { DEFAULT_SETTINGS } from './settings';
import { parseSettingsText, settingsFromFileText } from './settings-file';

describe('settings-file', () => {
  it('parses name/value lines and skips comments and blanks', () => {
    const parsed = parseSettingsText(
      ['# viewer settings', '', '  font_size : 12  ', 'font: Iosevka Term', 'gui_scale:'].join('\n')
    );

    expect(parsed.entries).toEqual([
      { name: 'font_size', value: '12', lineNumber: 3 },
      { name: 'font', value: 'Iosevka Term', lineNumber: 4 },
    ]);
    expect(parsed.warnings).toEqual([]);
  });

  it('warns about lines without a separator', () => {
    const parsed = parseSettingsText('font_size 12\n');
    expect(parsed.entries).toEqual([]);
    expect(parsed.warnings).toEqual(['line 1: expected "name: value"']);
  });

  it('builds settings from a settings file', () => {
    const result = settingsFromFileText(
      [
        'font_size: 14',
        'line_spacing: 1.25',
        'initial_window_rows: 30',
        'color_background: #000000',
        'color_link: #00FF00',
        'man_paths: /usr/share/man:/opt/local/man',
        'sections: 1, 3 8',
        'verbose: yes',
        'position_penalty: 50',
      ].join('\n')
    );

    expect(result.warnings).toEqual([]);
    expect(result.settings.fontSize).toBe(14);
    expect(result.settings.lineSpacing).toBe(1.25);
    expect(result.settings.initialWindowRows).toBe(30);
    expect(result.settings.colors.background).toBe('#000000');
    expect(result.settings.colors.link).toBe('#00ff00');
    expect(result.settings.manPaths).toEqual(['/usr/share/man', '/opt/local/man']);
    expect(result.settings.sections).toEqual(['1', '3', '8']);
    expect(result.settings.verbose).toBe(true);
    expect(result.settings.positionPenalty).toBe(50);
  });

  it('keeps previous values and reports unreadable entries', () => {
    const result = settingsFromFileText(
      ['gui_scale: big', 'color_dim: grey', 'unknown_key: 1', 'verbose: maybe'].join('\n')
    );

    expect(result.settings).toEqual(DEFAULT_SETTINGS);
    expect(result.warnings).toEqual([
      'line 1: failed to read value "big" for gui_scale',
      'line 2: expected a #rrggbb color for color_dim, got "grey"',
      'line 3: unknown setting "unknown_key"',
      'line 4: expected a boolean for verbose, got "maybe"',
    ]);
  });
});
