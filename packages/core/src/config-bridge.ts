import { promises as fs } from 'node:fs';
import path from 'node:path';

import { AUTH_SUITE_ID, BOT_USERNAME, BRIDGE_FILE_NAME, DEFAULT_TIMEOUT_MS } from './constants.js';
import { silentLogger, type Logger } from './logger.js';
import { bridgeConfigSchema, type Settings } from './schema.js';
import type { BridgeSuite, ConfigBridge, RemoteCredentials, SecretStore, SuiteDefinition } from './types.js';

/** Anything that can list resolved suites; normally a `SuiteRegistry`. */
export interface SuiteSource {
  detect(): Promise<Record<string, SuiteDefinition>>;
}

export type BridgeSettings = Pick<Settings, 'runnerDir' | 'baseUrl' | 'siteTitle' | 'timeout' | 'customUrls' | 'suites'>;

export interface ConfigBridgeWriterOptions {
  registry: SuiteSource;
  settings: BridgeSettings;
  secrets: SecretStore;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export function bridgePath(runnerDir: string): string {
  return path.join(runnerDir, BRIDGE_FILE_NAME);
}

export class ConfigBridgeWriter {
  private readonly registry: SuiteSource;
  private readonly settings: BridgeSettings;
  private readonly secrets: SecretStore;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;

  constructor(options: ConfigBridgeWriterOptions) {
    this.registry = options.registry;
    this.settings = options.settings;
    this.secrets = options.secrets;
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? silentLogger;
  }

  get configPath(): string {
    return bridgePath(this.settings.runnerDir);
  }

  async generate(targetUrl?: string, remoteCredentials?: RemoteCredentials): Promise<ConfigBridge> {
    const isRemote = targetUrl !== undefined && targetUrl.length > 0;
    const baseUrl = isRemote ? trimTrailingSlash(targetUrl) : this.resolveBaseUrl();
    const remoteAuth = remoteCredentials && remoteCredentials.password.length > 0 ? remoteCredentials : undefined;

    const suites: Record<string, BridgeSuite> = {};
    for (const [suiteId, suite] of Object.entries(await this.registry.detect())) {
      const enabled = this.settings.suites[suiteId] ?? true;
      if (!enabled || !suite.detected) {
        continue;
      }
      suites[suiteId] = {
        ...suite.metadata,
        enabled: true,
        detected: true,
        label: suite.label,
        description: suite.description
      };
    }

    const authSuite = suites[AUTH_SUITE_ID];
    if (authSuite) {
      if (remoteAuth) {
        authSuite.testUser = remoteAuth.user ?? BOT_USERNAME;
        authSuite.testPassword = remoteAuth.password;
      } else {
        authSuite.testUser = BOT_USERNAME;
        authSuite.testPassword = this.secrets.localPassword() ?? '';
      }
    }

    return {
      baseUrl,
      remote: isRemote,
      remoteAuth: remoteAuth !== undefined,
      siteTitle: this.settings.siteTitle,
      timeout: this.resolveTimeout(),
      customUrls: [...this.settings.customUrls],
      suites
    };
  }

  /** Writes the bridge file, replacing any previous one, and returns its path. */
  async writeConfig(targetUrl?: string, remoteCredentials?: RemoteCredentials): Promise<string> {
    const config = await this.generate(targetUrl, remoteCredentials);
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 2), 'utf8');
    this.logger.debug(`Wrote bridge config for ${Object.keys(config.suites).length} suites to ${this.configPath}`);
    return this.configPath;
  }

  private resolveBaseUrl(): string {
    const configured = this.settings.baseUrl ?? this.env.SMOKE_BASE_URL;
    if (configured) {
      return trimTrailingSlash(configured);
    }
    return 'https://localhost';
  }

  private resolveTimeout(): number {
    const { timeout } = this.settings;
    if (!Number.isInteger(timeout) || timeout < 0) {
      this.logger.warn(`Ignoring invalid timeout ${timeout}; using ${DEFAULT_TIMEOUT_MS}ms`);
      return DEFAULT_TIMEOUT_MS;
    }
    return timeout;
  }
}

export async function readBridgeConfig(filePath: string): Promise<ConfigBridge> {
  const raw = await fs.readFile(filePath, 'utf8');
  return bridgeConfigSchema.parse(JSON.parse(raw));
}
