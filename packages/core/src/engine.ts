import { ConfigBridgeWriter } from './config-bridge.js';
import { loadSuiteDeclarations } from './declarations.js';
import { StaticFeatureDetector } from './features.js';
import { silentLogger, type Logger } from './logger.js';
import { ProcessOrchestrator } from './orchestrator.js';
import type { EnvironmentProbe, Remediator } from './environment.js';
import type { RunnerAdapter } from './runner-adapter.js';
import type { Settings } from './schema.js';
import { EnvSecretStore } from './secrets.js';
import { JsonFileStateStore } from './state-store.js';
import { SuiteRegistry } from './suite-registry.js';
import type { FeatureDetector, SecretStore, StateStore } from './types.js';

export interface Engine {
  settings: Settings;
  registry: SuiteRegistry;
  bridge: ConfigBridgeWriter;
  orchestrator: ProcessOrchestrator;
}

export interface EngineOverrides {
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  features?: FeatureDetector;
  secrets?: SecretStore;
  state?: StateStore;
  adapter?: RunnerAdapter;
  probe?: EnvironmentProbe;
  remediator?: Remediator;
}

/** Wires the default collaborators for a settings object. Callers can swap any of them. */
export async function createEngine(settings: Settings, overrides: EngineOverrides = {}): Promise<Engine> {
  const logger = overrides.logger ?? silentLogger;
  const env = overrides.env ?? process.env;

  const registry = new SuiteRegistry({
    runnerDir: settings.runnerDir,
    features: overrides.features ?? new StaticFeatureDetector(settings.capabilities, settings.metadata),
    declared: await loadSuiteDeclarations(settings.declarations, logger),
    logger
  });

  const bridge = new ConfigBridgeWriter({
    registry,
    settings,
    secrets: overrides.secrets ?? new EnvSecretStore(env),
    env,
    logger
  });

  const orchestrator = new ProcessOrchestrator({
    runnerDir: settings.runnerDir,
    bridge,
    registry,
    state: overrides.state ?? new JsonFileStateStore(settings.stateFile),
    adapter: overrides.adapter,
    probe: overrides.probe,
    remediator: overrides.remediator,
    logger
  });

  return { settings, registry, bridge, orchestrator };
}

/** Ids of suites that are both detected and enabled, in registry order. */
export async function runnableSuiteIds(engine: Engine): Promise<string[]> {
  const suites = await engine.registry.detect();
  return Object.values(suites)
    .filter((suite) => suite.detected && (engine.settings.suites[suite.id] ?? true))
    .map((suite) => suite.id);
}
