import type { ConfigBridge, RemoteCredentials, SecretStore } from './types.js';

const REDACTED = '***';

export class EnvSecretStore implements SecretStore {
  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly variable = 'SMOKE_BOT_PASSWORD'
  ) {}

  localPassword(): string | undefined {
    const value = this.env[this.variable];
    return value && value.length > 0 ? value : undefined;
  }
}

export function remoteCredentialsFromEnv(env: NodeJS.ProcessEnv = process.env): RemoteCredentials | undefined {
  const user = env.SMOKE_REMOTE_USER ?? '';
  const password = env.SMOKE_REMOTE_PASS ?? '';
  if (user.length === 0 || password.length === 0) {
    return undefined;
  }
  return { user, password };
}

export function redactBridgeCredentials(config: ConfigBridge): ConfigBridge {
  const suites = Object.fromEntries(
    Object.entries(config.suites).map(([suiteId, suite]) => [
      suiteId,
      suite.testPassword === undefined ? suite : { ...suite, testPassword: REDACTED }
    ])
  );
  return { ...config, suites };
}
