import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { errorMessage } from '../application/formatter-bridge';
import type { DiagnosticsLogger, ViewerSettingsStore } from '../application/ports';
import { settingsFromFileText } from '../application/settings-file';
import { mergeViewerSettings, type ViewerSettings } from '../application/settings';

export const SETTINGS_FILE_NAME = '.manviewrc';

interface RcFileSettingsStoreDeps {
  logger: DiagnosticsLogger;
  path?: string;
}

export class RcFileSettingsStore implements ViewerSettingsStore {
  private readonly logger: DiagnosticsLogger;
  readonly path: string;

  constructor(deps: RcFileSettingsStoreDeps) {
    this.logger = deps.logger;
    this.path = deps.path ?? join(homedir(), SETTINGS_FILE_NAME);
  }

  load(): ViewerSettings {
    let text: string;
    try {
      text = readFileSync(this.path, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.warn(`${this.path}: ${errorMessage(error)}`);
      }
      return mergeViewerSettings(undefined);
    }

    const { settings, warnings } = settingsFromFileText(text);
    for (const warning of warnings) {
      this.logger.warn(`${this.path}: ${warning}`);
    }
    return settings;
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
