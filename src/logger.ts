// src/logger.ts
import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

const isDevelopment = process.env.NODE_ENV === 'development';
const isVitest = process.env.VITEST === 'true' || process.env.NODE_ENV === 'test';

/**
 * Resolve the effective log level.
 * An explicit LOG_LEVEL always wins; tests run silent unless asked otherwise.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.LOG_LEVEL) {
    return env.LOG_LEVEL;
  }
  if (env.VITEST === 'true' || env.NODE_ENV === 'test') {
    return 'silent';
  }
  return env.NODE_ENV === 'development' ? 'debug' : 'info';
}

const effectiveLogLevel = resolveLogLevel();

const baseOptions: LoggerOptions = {
  level: effectiveLogLevel,
  base: { service: 'task-graph-engine' },
  // Graph and node metadata is caller supplied and may carry credentials
  redact: {
    paths: [
      'apiKey',
      '*.apiKey',
      'metadata.token',
      'metadata.password',
      '*.metadata.token',
      '*.metadata.password'
    ],
    censor: '[REDACTED]',
  },
};

// stderr keeps stdout free for CLI output that may be piped
const destination = pino.destination({ dest: 2, sync: isVitest });

const configuredLogger: Logger = isDevelopment
  ? pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino(baseOptions, destination);

let shutdownInProgress = false;

/**
 * Flush pending log lines before the process exits.
 */
export function shutdownLogger(): void {
  if (shutdownInProgress) {
    return;
  }
  shutdownInProgress = true;

  if (isDevelopment) {
    return;
  }

  try {
    destination.flushSync();
  } catch (flushError) {
    // sonic-boom refuses to flush before its fd is ready
    console.warn('Warning: Could not flush logger during shutdown:', flushError instanceof Error ? flushError.message : String(flushError));
  }
}

export default configuredLogger;
