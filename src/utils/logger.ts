import pino from 'pino';
import { build as pretty } from 'pino-pretty';

let runId: string | undefined;
let baseLogger: pino.Logger | undefined;
let configuredLevel: string | undefined;

export function getRunId(): string {
  if (!runId) {
    runId = generateRunId();
  }
  return runId;
}

export function generateRunId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

function buildBaseLogger(): pino.Logger {
  const level = configuredLevel ?? (process.env.LOG_LEVEL || 'warn');

  // A CLI shares the terminal with its prompts, so logs go to stderr.
  if (process.env.NODE_ENV === 'development' || process.stderr.isTTY) {
    return pino(
      { level },
      pretty({
        destination: 2,
        sync: true,
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname,runId',
      })
    );
  }

  return pino({ level }, pino.destination({ dest: 2, sync: true }));
}

/** Loggers created after this call use the given level. */
export function configureLogger(options: { level: string }): void {
  configuredLevel = options.level;
  baseLogger = undefined;
}

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  if (!baseLogger) {
    baseLogger = buildBaseLogger();
  }

  return baseLogger.child({
    runId: getRunId(),
    ...context,
  });
}
