import type { FeatureDetector } from './types.js';

/** Feature detector backed by a fixed capability list, as configured in settings. */
export class StaticFeatureDetector implements FeatureDetector {
  private readonly capabilities: ReadonlySet<string>;

  constructor(
    capabilities: Iterable<string>,
    private readonly metadata: Record<string, Record<string, unknown>> = {}
  ) {
    this.capabilities = new Set(capabilities);
  }

  hasCapability(flag: string): boolean {
    return this.capabilities.has(flag);
  }

  metadataFor(suiteId: string): Record<string, unknown> {
    return { ...(this.metadata[suiteId] ?? {}) };
  }
}
