import * as cron from 'node-cron';
import { CronScheduler as ICronScheduler, CronSchedulerConfig } from '../interfaces/CronScheduler';
import { BackupManager, BackupRunResult } from '../interfaces/BackupManager';
import { Logger } from '../interfaces/Logger';
import { formatError, toError } from '../errors/BackupError';

const DEFAULT_EXECUTION_TIMEOUT_MS = 60 * 60 * 1000;

/**
 * Custom error classes for cron scheduling operations
 */
export class CronSchedulerError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CronSchedulerError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class CronValidationError extends CronSchedulerError {
  constructor(
    message: string,
    public readonly expression: string
  ) {
    super(message, 'validation');
    this.name = 'CronValidationError';
  }
}

export class CronExecutionError extends CronSchedulerError {
  constructor(message: string, cause?: Error) {
    super(message, 'execution', cause);
    this.name = 'CronExecutionError';
  }
}

/**
 * CronScheduler implementation using node-cron library.
 * A trigger that fires while the previous run is still going is skipped, so
 * two runs never share the backup directory.
 */
export class CronScheduler implements ICronScheduler {
  private task: cron.ScheduledTask | null = null;
  private config: CronSchedulerConfig;
  private backupManager: BackupManager;
  private isBackupRunning = false;
  private logger: Logger;

  constructor(config: CronSchedulerConfig, backupManager: BackupManager, logger: Logger) {
    this.config = config;
    this.backupManager = backupManager;
    this.logger = logger;
  }

  start(): void {
    if (this.task) {
      this.logger.warn('CronScheduler is already running');
      return;
    }

    if (!this.validateCronExpression(this.config.cronExpression)) {
      throw new CronValidationError(
        `Invalid cron expression: ${this.config.cronExpression}`,
        this.config.cronExpression
      );
    }

    try {
      this.logger.info(
        `Starting cron scheduler with expression: ${this.config.cronExpression} (timezone: ${this.timezone()})`
      );

      this.task = cron.schedule(
        this.config.cronExpression,
        async () => {
          try {
            await this.executeScheduledBackup();
          } catch (error) {
            const cronError = new CronExecutionError(
              `Unexpected error in scheduled backup execution: ${formatError(error)}`,
              toError(error)
            );
            this.logger.error(cronError.message, cronError);
          }
        },
        {
          scheduled: false, // Don't start immediately
          timezone: this.timezone(),
        }
      );

      this.task.start();
      this.logger.info('CronScheduler started successfully');

      if (this.config.runOnInit) {
        this.logger.info('Running initial backup due to runOnInit configuration');
        setImmediate(() => {
          this.executeScheduledBackup().catch(error => {
            this.logger.error('Initial backup execution failed', toError(error));
          });
        });
      }
    } catch (error) {
      const startError = new CronSchedulerError(
        `Failed to start cron scheduler: ${formatError(error)}`,
        'start',
        toError(error)
      );
      this.logger.error(startError.message, startError);
      throw startError;
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.warn('CronScheduler is not running');
      return;
    }

    this.logger.info('Stopping cron scheduler...');
    this.task.stop();
    this.task = null;
    this.logger.info('CronScheduler stopped successfully');
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  isBackupInProgress(): boolean {
    return this.isBackupRunning;
  }

  /**
   * Validate a cron expression using node-cron's built-in validation
   */
  validateCronExpression(expression: string): boolean {
    try {
      return cron.validate(expression);
    } catch (error) {
      this.logger.error('Cron expression validation error', toError(error));
      return false;
    }
  }

  /**
   * Execute a scheduled backup with overlap prevention.
   * The guard is held until the backup itself settles, even after the
   * timeout has reported it as overdue.
   */
  private async executeScheduledBackup(): Promise<void> {
    if (this.isBackupRunning) {
      this.logger.warn('Backup is already running, skipping this scheduled execution');
      return;
    }

    this.isBackupRunning = true;
    const startTime = Date.now();
    this.logger.logScheduledExecution(this.config.cronExpression);

    const backup = this.backupManager.executeBackup().finally(() => {
      this.isBackupRunning = false;
    });

    let timeout: NodeJS.Timeout | undefined;
    try {
      const timeoutMs = this.config.executionTimeoutMs ?? DEFAULT_EXECUTION_TIMEOUT_MS;
      const result = await Promise.race<BackupRunResult>([
        backup,
        new Promise<never>((_, reject) => {
          timeout = setTimeout(() => {
            reject(new CronExecutionError(`Backup execution timed out after ${timeoutMs}ms`));
          }, timeoutMs);
        }),
      ]);

      const duration = Date.now() - startTime;
      if (result.success) {
        this.logger.info(`Scheduled backup completed successfully in ${duration}ms`, {
          archiveName: result.archiveName,
          archiveSize: result.archiveSize,
          remotePath: result.remotePath,
        });
      } else {
        this.logger.error(`Scheduled backup failed after ${duration}ms`, undefined, {
          failure: result.error,
          errorKind: result.errorKind,
        });
      }
    } catch (error) {
      if (error instanceof CronExecutionError) {
        this.watchOverdueBackup(backup, startTime);
      }
      this.logger.error(
        `Scheduled backup execution failed after ${Date.now() - startTime}ms`,
        toError(error),
        {
          cronExpression: this.config.cronExpression,
          timezone: this.timezone(),
        }
      );
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
    }
  }

  /**
   * Log the outcome of a run that outlived its timeout
   */
  private watchOverdueBackup(backup: Promise<BackupRunResult>, startTime: number): void {
    backup.then(
      result => {
        this.logger.warn(`Overdue scheduled backup finished after ${Date.now() - startTime}ms`, {
          success: result.success,
          archiveName: result.archiveName,
        });
      },
      error => {
        this.logger.error(
          `Overdue scheduled backup failed after ${Date.now() - startTime}ms`,
          toError(error)
        );
      }
    );
  }

  private timezone(): string {
    return this.config.timezone || 'UTC';
  }
}
