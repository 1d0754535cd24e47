export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function parseLogLevel(value: string | undefined): LogLevel {
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
    return value;
  }
  return 'info';
}

export function createConsoleLogger(level: LogLevel = parseLogLevel(process.env.SMOKE_LOG_LEVEL)): Logger {
  const threshold = LEVEL_ORDER[level];
  const emit = (entryLevel: LogLevel, message: string): void => {
    if (LEVEL_ORDER[entryLevel] < threshold) {
      return;
    }
    // stdout is reserved for command output.
    console.error(`${entryLevel.toUpperCase().padEnd(5, ' ')} ${message}`);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message)
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
