import winston from 'winston';
import path from 'path';

/**
 * Logger Configuration
 *
 * Structured logging for segmentation, routing and expertise runs.
 *
 * Environment:
 * - LOG_LEVEL: error | warn | info | debug (default info)
 * - LOG_TO_FILE: 'false' disables the logs/ file transports
 * - LOG_SILENT: 'true' mutes every transport (used by the test runner)
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

function fileTransports() {
  if (process.env.LOG_TO_FILE === 'false') {
    return [];
  }

  return [
    // File output - all logs
    new winston.transports.File({
      filename: path.join(process.cwd(), 'logs', 'combined.log'),
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    // File output - errors only
    new winston.transports.File({
      filename: path.join(process.cwd(), 'logs', 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
  ];
}

/**
 * Create a logger instance
 * @param component Component name (e.g., 'DocumentSegmenter', 'BackendRouter')
 */
export function createLogger(component: string): winston.Logger {
  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    silent: process.env.LOG_SILENT === 'true',
    format: logFormat,
    defaultMeta: { component },
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
      }),
      ...fileTransports(),
    ],
  });
}

const runBaseLoggers: Map<string, winston.Logger> = new Map();

function runBaseLogger(component: string): winston.Logger {
  let base = runBaseLoggers.get(component);
  if (!base) {
    base = createLogger(component);
    runBaseLoggers.set(component, base);
  }
  return base;
}

/**
 * Per-run logger
 *
 * Tags every entry with the run id so that concurrent pipeline and
 * expertise runs can be told apart in the combined log. Runs of one
 * component share a single set of transports.
 */
export class RunLogger {
  private logger: winston.Logger;
  readonly runId: string;

  constructor(component: string, runId: string) {
    this.runId = runId;
    this.logger = runBaseLogger(component).child({ runId });
  }

  info(message: string, metadata?: object) {
    this.logger.info(message, { ...metadata });
  }

  error(message: string, error?: Error | unknown, metadata?: object) {
    this.logger.error(message, {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      ...metadata,
    });
  }

  warn(message: string, metadata?: object) {
    this.logger.warn(message, { ...metadata });
  }

  debug(message: string, metadata?: object) {
    this.logger.debug(message, { ...metadata });
  }

  started(metadata?: object) {
    this.info('Run started', metadata);
  }

  completed(metadata?: object) {
    this.info('Run completed', metadata);
  }

  failed(error: Error | unknown, metadata?: object) {
    this.error('Run failed', error, metadata);
  }
}
