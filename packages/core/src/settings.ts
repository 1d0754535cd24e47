import { promises as fs } from 'node:fs';
import path from 'node:path';

import { isMissingFileError } from './fs-utils.js';
import { settingsSchema, type Settings } from './schema.js';

export const SETTINGS_FILE_NAME = 'smokerun.config.json';

/**
 * Loads settings from a JSON file. A missing file yields the defaults; relative paths
 * inside the file resolve against the file's directory.
 */
export async function loadSettings(
  filePath: string = process.env.SMOKE_SETTINGS ?? SETTINGS_FILE_NAME
): Promise<Settings> {
  let input: unknown = {};
  try {
    input = JSON.parse(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    if (!isMissingFileError(error)) {
      throw error;
    }
  }

  const settings = settingsSchema.parse(input);
  const baseDir = path.dirname(path.resolve(filePath));
  return {
    ...settings,
    runnerDir: path.resolve(baseDir, settings.runnerDir),
    stateFile: path.resolve(baseDir, settings.stateFile),
    declarations: settings.declarations.map((file) => path.resolve(baseDir, file))
  };
}
