import winston from 'winston';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';
import { errorCode, formatError } from '../errors/BackupError';

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';
const CLOSE_TIMEOUT_MS = 5000;

type FileTransport = InstanceType<typeof winston.transports.File>;

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credential', 'key'];

/**
 * Sanitize metadata to remove sensitive information
 */
export function sanitizeMeta(meta: LogMeta): LogMeta {
  const sanitized: LogMeta = { ...meta };

  for (const [key, value] of Object.entries(sanitized)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

    if (isSensitive) {
      sanitized[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      sanitized[key] = sanitizeMeta(value);
    }
  }

  return sanitized;
}

function isPlainObject(value: unknown): value is LogMeta {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

interface LogLineInfo {
  level: string;
  message: unknown;
  [key: string]: unknown;
}

/**
 * Render one log record as `YYYY-MM-DD HH:mm:ss - LEVEL - message {meta}`
 */
export function formatLogLine(info: LogLineInfo): string {
  const { timestamp, level, message, ...meta } = info;
  const line = `${String(timestamp)} - ${level.toUpperCase()} - ${String(message)}`;

  if (Object.keys(meta).length === 0) {
    return line;
  }

  return `${line} ${JSON.stringify(sanitizeMeta(meta))}`;
}

/**
 * Run logger: every line goes to the console and is appended to the log file.
 * Losing the log file never interrupts a backup run.
 */
export class Logger implements ILogger {
  private winston: winston.Logger;
  private fileTransport: FileTransport | undefined;

  constructor(logLevel: LogLevel = LogLevel.INFO, logFile?: string) {
    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp({ format: TIMESTAMP_FORMAT }),
        winston.format.printf(info => formatLogLine(info))
      ),
      transports: [new winston.transports.Console()],
    });

    this.winston.on('error', (error: Error) => this.dropFileTransport(error));

    if (logFile) {
      this.attachFileTransport(logFile);
    }
  }

  /**
   * Whether lines are currently being appended to the log file
   */
  hasFileTransport(): boolean {
    return this.fileTransport !== undefined;
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const code = error ? errorCode(error) : undefined;
    const errorMeta = {
      ...meta,
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          ...(code ? { code } : {}),
        },
      }),
    };
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta);
  }

  logRunStart(meta?: LogMeta): void {
    this.info('--- Backup run started ---', {
      operation: 'run_start',
      ...meta,
    });
  }

  logStepStart(step: string, meta?: LogMeta): void {
    this.info(`Step started: ${step}`, {
      operation: 'step_start',
      step,
      ...meta,
    });
  }

  logStepComplete(step: string, meta?: LogMeta): void {
    this.info(`Step completed: ${step}`, {
      operation: 'step_complete',
      step,
      ...meta,
    });
  }

  logStepFailed(step: string, error: Error, meta?: LogMeta): void {
    this.error(`Step failed: ${step}`, error, {
      operation: 'step_failed',
      step,
      ...meta,
    });
  }

  logRetentionCleanup(deletedCount: number, retentionDays: number): void {
    this.info('Retention cleanup completed', {
      operation: 'retention_cleanup',
      deletedCount,
      retentionDays,
    });
  }

  logConfigurationStart(config: LogMeta): void {
    this.info('Application starting with configuration', {
      operation: 'startup',
      config: sanitizeMeta(config),
    });
  }

  logScheduledExecution(cronExpression: string): void {
    this.info('Scheduled backup execution triggered', {
      operation: 'scheduled_execution',
      cronExpression,
    });
  }

  logRunComplete(success: boolean, duration: number): void {
    if (success) {
      this.info('Backup run completed successfully', { operation: 'run_complete', duration });
    } else {
      this.error('Backup run failed', undefined, { operation: 'run_complete', duration });
    }
  }

  /**
   * Flush pending lines to the log file and release it
   */
  close(): Promise<void> {
    return new Promise(resolve => {
      const guard = setTimeout(() => resolve(), CLOSE_TIMEOUT_MS);
      guard.unref();
      const done = (): void => {
        clearTimeout(guard);
        resolve();
      };

      if (this.fileTransport) {
        this.fileTransport.on('finish', done);
      } else {
        this.winston.on('finish', done);
      }
      this.winston.end();
    });
  }

  private attachFileTransport(logFile: string): void {
    try {
      this.fileTransport = new winston.transports.File({
        filename: logFile,
        options: { flags: 'a' },
      });
    } catch (error) {
      this.warn(`Log file ${logFile} cannot be opened, logging to console only`, {
        error: formatError(error),
      });
      return;
    }

    this.winston.add(this.fileTransport);
  }

  private dropFileTransport(error: Error): void {
    const transport = this.fileTransport;
    if (!transport) {
      return;
    }

    this.fileTransport = undefined;
    this.winston.remove(transport);
    this.warn('Log file cannot be written, logging to console only', {
      error: formatError(error),
    });
  }
}
