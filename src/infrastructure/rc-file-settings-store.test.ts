import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { DEFAULT_SETTINGS } from '../application/settings';
import { RcFileSettingsStore } from './rc-file-settings-store';

function createLogger() {
  return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('RcFileSettingsStore', () => {
  let directory = '';

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), 'manview-rc-'));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it('returns the defaults when the file does not exist', () => {
    const logger = createLogger();
    const store = new RcFileSettingsStore({ logger, path: join(directory, '.manviewrc') });

    expect(store.load()).toEqual(DEFAULT_SETTINGS);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('reads settings and logs problems with their line numbers', () => {
    const path = join(directory, '.manviewrc');
    writeFileSync(path, '# viewer\nfont_size: 14\ncolor_link: blue\nverbose: yes\n');
    const logger = createLogger();
    const store = new RcFileSettingsStore({ logger, path });

    const settings = store.load();

    expect(settings.fontSize).toBe(14);
    expect(settings.verbose).toBe(true);
    expect(settings.colors.link).toBe(DEFAULT_SETTINGS.colors.link);
    expect(logger.warn).toHaveBeenCalledWith(
      `${path}: line 3: expected a #rrggbb color for color_link, got "blue"`
    );
  });
});
