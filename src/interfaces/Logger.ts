export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;

  // Specialized logging methods for backup runs
  logRunStart(meta?: LogMeta): void;
  logStepStart(step: string, meta?: LogMeta): void;
  logStepComplete(step: string, meta?: LogMeta): void;
  logStepFailed(step: string, error: Error, meta?: LogMeta): void;
  logRetentionCleanup(deletedCount: number, retentionDays: number): void;
  logConfigurationStart(config: LogMeta): void;
  logScheduledExecution(cronExpression: string): void;
  logRunComplete(success: boolean, duration: number): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
