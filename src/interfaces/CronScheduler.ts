/**
 * Interface for cron-based backup scheduling
 */
export interface CronScheduler {
  /** Start the cron scheduler with the configured interval */
  start(): void;

  /** Stop the cron scheduler */
  stop(): void;

  /** Check if the scheduler is currently running */
  isRunning(): boolean;

  /** Check if a backup triggered by the scheduler is in progress */
  isBackupInProgress(): boolean;

  /** Validate a cron expression */
  validateCronExpression(expression: string): boolean;
}

/**
 * Configuration for the cron scheduler
 */
export interface CronSchedulerConfig {
  /** Cron expression for backup schedule */
  cronExpression: string;

  /** Timezone for cron execution (defaults to UTC) */
  timezone?: string;

  /** Whether to run immediately on start */
  runOnInit?: boolean;

  /** Upper bound for one run in milliseconds (defaults to one hour) */
  executionTimeoutMs?: number;
}
