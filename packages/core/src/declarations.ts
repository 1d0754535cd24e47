import { promises as fs } from 'node:fs';
import path from 'node:path';

import * as yaml from 'js-yaml';

import { SUITES_DIR_NAME } from './constants.js';
import { isMissingFileError, pathExists } from './fs-utils.js';
import { silentLogger, type Logger } from './logger.js';
import { specFileName } from './naming.js';
import { suiteDeclarationFileSchema, type SuiteDeclaration } from './schema.js';
import type { SuiteDefinition } from './types.js';

export const DECLARATION_FILE_NAME = 'smoke.suites.yml';
export const DEFAULT_DECLARED_WEIGHT = 100;

function defaultLabel(suiteId: string): string {
  const spaced = suiteId.replaceAll('_', ' ');
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}

async function resolveSpecLocator(
  suiteId: string,
  declaration: SuiteDeclaration,
  baseDir: string
): Promise<string | undefined> {
  if (declaration.spec_path) {
    return path.resolve(baseDir, declaration.spec_path);
  }

  const candidates = [
    path.join(baseDir, 'playwright', SUITES_DIR_NAME, specFileName(suiteId)),
    path.join(baseDir, 'tests', 'playwright', specFileName(suiteId))
  ];
  for (const candidate of candidates) {
    if (await pathExists(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

export async function parseSuiteDeclarations(
  source: string,
  baseDir: string,
  providerId = path.basename(baseDir)
): Promise<SuiteDefinition[]> {
  const parsed = suiteDeclarationFileSchema.parse(yaml.load(source) ?? {});
  const definitions: SuiteDefinition[] = [];

  for (const [suiteId, declaration] of Object.entries(parsed)) {
    const definition: SuiteDefinition = {
      id: suiteId,
      label: declaration.label ?? defaultLabel(suiteId),
      description: declaration.description ?? '',
      weight: declaration.weight ?? DEFAULT_DECLARED_WEIGHT,
      dependencies: declaration.dependencies,
      detected: false,
      providerId,
      metadata: {}
    };
    const specLocator = await resolveSpecLocator(suiteId, declaration, baseDir);
    if (specLocator) {
      definition.specLocator = specLocator;
    }
    definitions.push(definition);
  }

  return definitions;
}

/**
 * Loads declared suites from YAML files. Files that are missing or invalid are logged
 * and skipped so one bad declaration does not hide the others.
 */
export async function loadSuiteDeclarations(files: string[], logger: Logger = silentLogger): Promise<SuiteDefinition[]> {
  const definitions: SuiteDefinition[] = [];

  for (const file of files) {
    let source: string;
    try {
      source = await fs.readFile(file, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        logger.debug(`No suite declarations at ${file}`);
        continue;
      }
      throw error;
    }

    try {
      definitions.push(...(await parseSuiteDeclarations(source, path.dirname(path.resolve(file)))));
    } catch (error) {
      logger.warn(`Failed to parse ${file}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  return definitions;
}
