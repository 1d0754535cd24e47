import path from 'node:path';

import { BUILT_IN_SUITES, BUILTIN_PROVIDER, isBuiltInAvailable, type BuiltInSuite } from './built-in-suites.js';
import { SUITES_DIR_NAME } from './constants.js';
import { isDirectory, pathExists } from './fs-utils.js';
import { silentLogger, type Logger } from './logger.js';
import { specFileName, toSpecName } from './naming.js';
import type { FeatureDetector, SuiteDefinition } from './types.js';

export interface SuiteRegistryOptions {
  runnerDir: string;
  features: FeatureDetector;
  /** Suites declared outside the built-in set, as loaded by `loadSuiteDeclarations`. */
  declared?: SuiteDefinition[];
  logger?: Logger;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function byWeightThenId(left: SuiteDefinition, right: SuiteDefinition): number {
  return left.weight - right.weight || left.id.localeCompare(right.id);
}

export class SuiteRegistry {
  private readonly runnerDir: string;
  private readonly features: FeatureDetector;
  private readonly declared: SuiteDefinition[];
  private readonly logger: Logger;

  constructor(options: SuiteRegistryOptions) {
    this.runnerDir = options.runnerDir;
    this.features = options.features;
    this.declared = options.declared ?? [];
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Resolves every known suite, keyed by id. Built-in suites win over declared ones
   * with the same id; a declared suite whose spec is missing is left out.
   */
  async detect(): Promise<Record<string, SuiteDefinition>> {
    const resolved = new Map<string, SuiteDefinition>();

    for (const builtIn of BUILT_IN_SUITES) {
      resolved.set(builtIn.id, this.resolveBuiltIn(builtIn));
    }

    for (const declared of this.declared) {
      if (resolved.has(declared.id)) {
        this.logger.debug(`Declared suite "${declared.id}" from ${declared.providerId} is shadowed by a built-in suite`);
        continue;
      }
      const suite = await this.resolveDeclared(declared);
      if (suite) {
        resolved.set(suite.id, suite);
      }
    }

    return Object.fromEntries([...resolved.values()].sort(byWeightThenId).map((suite) => [suite.id, suite]));
  }

  async labels(): Promise<Record<string, string>> {
    const suites = await this.detect();
    return Object.fromEntries(Object.values(suites).map((suite) => [suite.id, suite.label]));
  }

  async getSpecPath(suiteId: string): Promise<string | undefined> {
    const suites = await this.detect();
    const suite = suites[suiteId];
    if (!suite) {
      return undefined;
    }

    if (suite.specLocator && (await pathExists(suite.specLocator))) {
      return suite.specLocator;
    }

    const base = path.join(this.runnerDir, SUITES_DIR_NAME);
    const specFile = path.join(base, specFileName(suiteId));
    if (await pathExists(specFile)) {
      return specFile;
    }

    const specDir = path.join(base, toSpecName(suiteId));
    if (await isDirectory(specDir)) {
      return specDir;
    }

    return undefined;
  }

  private resolveBuiltIn(builtIn: BuiltInSuite): SuiteDefinition {
    const suite: SuiteDefinition = {
      id: builtIn.id,
      label: builtIn.label,
      description: builtIn.description,
      weight: builtIn.weight,
      dependencies: [...builtIn.anyOf],
      detected: false,
      providerId: BUILTIN_PROVIDER,
      metadata: {}
    };

    try {
      suite.detected = isBuiltInAvailable(builtIn, this.features);
      if (suite.detected) {
        suite.metadata = this.features.metadataFor(builtIn.id);
      }
    } catch (error) {
      suite.detected = false;
      this.logger.warn(`Detection failed for suite "${builtIn.id}": ${errorMessage(error)}`);
    }

    return suite;
  }

  private async resolveDeclared(declared: SuiteDefinition): Promise<SuiteDefinition | undefined> {
    try {
      if (!declared.specLocator || !(await pathExists(declared.specLocator))) {
        return undefined;
      }
      const detected = declared.dependencies.every((flag) => this.features.hasCapability(flag));
      return {
        ...declared,
        detected,
        metadata: detected ? { ...declared.metadata, ...this.features.metadataFor(declared.id) } : declared.metadata
      };
    } catch (error) {
      this.logger.warn(`Detection failed for declared suite "${declared.id}": ${errorMessage(error)}`);
      return undefined;
    }
  }
}
