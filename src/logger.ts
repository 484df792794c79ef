import pino, { type Logger } from 'pino';

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  // Keep test output clean unless a level is asked for
  return process.env.VITEST ? 'silent' : 'info';
}

const level = resolveLevel();
const logFile = process.env.LOG_FILE ?? './export-runner.log';

const fileDestination =
  logFile && level !== 'silent'
    ? pino.destination({ dest: logFile, mkdir: true, sync: false })
    : undefined;

function buildStreams(): pino.StreamEntry[] {
  const streams: pino.StreamEntry[] = [{ level: 'trace', stream: process.stdout }];
  if (fileDestination) {
    streams.push({ level: 'trace', stream: fileDestination });
  }
  return streams;
}

export const logger: Logger = pino(
  {
    name: 'order-export-runner',
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.multistream(buildStreams())
);

/**
 * Creates a child logger carrying context identifiers (run_id, owner, step, ...)
 */
export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}

let logFileClosed: Promise<void> | undefined;

/**
 * Writes out buffered lines and closes the log file. Called once, right
 * before the process exits.
 */
export function closeLogFile(): Promise<void> {
  const destination = fileDestination;
  if (!destination) return Promise.resolve();

  if (!logFileClosed) {
    logFileClosed = new Promise<void>((resolve) => {
      destination.once('close', () => resolve());
      destination.once('error', (err: Error) => {
        process.stderr.write(`Log file could not be closed: ${err.message}\n`);
        resolve();
      });
      destination.end();
    });
  }
  return logFileClosed;
}
