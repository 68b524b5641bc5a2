import winston from 'winston';
import path from 'path';

/**
 * Logger Configuration
 *
 * Structured logging for the claim analysis pipeline
 */

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...metadata }) => {
    let msg = `${timestamp} [${level}] ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  })
);

function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ];

  if (process.env.LOG_TO_FILE !== 'false') {
    transports.push(
      // All logs
      new winston.transports.File({
        filename: path.join(process.cwd(), 'logs', 'combined.log'),
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      // Errors only
      new winston.transports.File({
        filename: path.join(process.cwd(), 'logs', 'error.log'),
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  }

  return transports;
}

/**
 * Create a logger instance
 * @param component Component name (e.g., 'ClaimSegmenter', 'RuleMerger')
 */
export function createLogger(component: string): winston.Logger {
  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    silent: process.env.LOG_SILENT === 'true',
    format: logFormat,
    defaultMeta: { component },
    transports: buildTransports(),
  });
}

/**
 * Default logger instance
 */
export const logger = createLogger('App');

/**
 * Log levels:
 * - error: a run could not complete (bad configuration, unreadable input)
 * - warn: a recovered failure (dropped slice, failed call, unparsable response)
 * - info: progress of a run
 * - debug: per-claim and per-rule detail
 */

/**
 * Logger bound to one pipeline run (usually the patent number)
 */
export class RunLogger {
  private logger: winston.Logger;
  private runId: string;

  constructor(runId: string, component: string = 'Pipeline') {
    this.runId = runId;
    this.logger = createLogger(`${component}:${runId}`);
  }

  info(message: string, metadata?: object) {
    this.logger.info(message, { runId: this.runId, ...metadata });
  }

  error(message: string, error?: unknown, metadata?: object) {
    this.logger.error(message, {
      runId: this.runId,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      ...metadata,
    });
  }

  warn(message: string, metadata?: object) {
    this.logger.warn(message, { runId: this.runId, ...metadata });
  }

  debug(message: string, metadata?: object) {
    this.logger.debug(message, { runId: this.runId, ...metadata });
  }

  started(metadata?: object) {
    this.info('Run started', metadata);
  }

  completed(metadata?: object) {
    this.info('Run completed', metadata);
  }

  failed(error: unknown, metadata?: object) {
    this.error('Run failed', error, metadata);
  }
}
