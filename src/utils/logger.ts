/**
 * Logging Utilities
 *
 * Structured pino loggers with file-based output. Each component writes to its
 * own file in the ./logs directory so a long research run can be traced stage
 * by stage without flooding the terminal.
 *
 * Dependencies:
 * - pino: low-overhead JSON logger with async file destinations
 */
import pino from 'pino';
import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';

export type Logger = pino.Logger;

const LOG_DIR = join(process.cwd(), 'logs');

function ensureLogDir(): void {
  if (!existsSync(LOG_DIR)) {
    mkdirSync(LOG_DIR, { recursive: true });
  }
}

export function createLogger(name: string): Logger {
  const level = process.env['LOG_LEVEL'] ?? 'debug';

  if (level === 'silent') {
    return pino({ name, level });
  }

  ensureLogDir();
  const logFile = join(LOG_DIR, `${name}.log`);

  return pino(
    {
      name,
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({
      dest: logFile,
      sync: false,
    })
  );
}

// Separate loggers for different parts of the app
export const gatewayLogger = createLogger('gateway');
export const toolLogger = createLogger('tools');
export const researchLogger = createLogger('research');
export const cliLogger = createLogger('cli');

/**
 * Shortens long tool output or model text for log lines.
 */
export function preview(text: string, limit = 500): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

// Helper to log uncaught errors
export function setupErrorHandlers(logger: Logger): void {
  process.on('uncaughtException', (error) => {
    logger.fatal({ error: error.message, stack: error.stack }, 'Uncaught exception');
    // Give time for log to flush
    setTimeout(() => process.exit(1), 100);
  });

  process.on('unhandledRejection', (reason) => {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    logger.error({ error: error.message, stack: error.stack }, 'Unhandled rejection');
  });
}
