#!/usr/bin/env node
import { ConfigurationManager, ConfigurationError } from './config/ConfigurationManager';
import { Logger } from './clients/Logger';
import { BackupManager } from './clients/BackupManager';
import { CronScheduler } from './clients/CronScheduler';
import { FtpClient } from './clients/FtpClient';
import { LocalArchiver } from './clients/LocalArchiver';
import { LocalRetentionManager } from './clients/LocalRetentionManager';
import { MySQLDumper } from './clients/MySQLDumper';
import { PostgreSQLDumper } from './clients/PostgreSQLDumper';
import { RemoteRetentionManager } from './clients/RemoteRetentionManager';
import { RemoteUploader } from './clients/RemoteUploader';
import { BackupConfig } from './interfaces/BackupConfig';
import { DatabaseDumper } from './interfaces/DatabaseDumper';
import { LogLevel } from './interfaces/Logger';
import { RemoteFileClientFactory } from './interfaces/RemoteFileClient';
import { toError } from './errors/BackupError';

export const EXIT_SUCCESS = 0;
export const EXIT_CONFIGURATION_ERROR = 1;
export const EXIT_BACKUP_FAILED = 2;
export const EXIT_VALIDATION_FAILED = 3;

type Env = Record<string, string | undefined>;

/**
 * Main application class that initializes and coordinates all components
 */
class SiteBackupApplication {
  private logger: Logger;
  private config: BackupConfig | null = null;
  private backupManager: BackupManager | null = null;
  private cronScheduler: CronScheduler | null = null;
  private isShuttingDown = false;
  private env: Env;

  constructor(env: Env = process.env) {
    this.env = env;
    // Console only until the configuration names the log file
    this.logger = new Logger(LogLevel.INFO);
  }

  /**
   * Load configuration and wire the components.
   * Throws ConfigurationError when the environment is incomplete or invalid.
   */
  initialize(): void {
    const config = ConfigurationManager.loadConfiguration(this.env);
    this.config = config;

    this.logger = new Logger(config.logLevel, config.logFile);
    this.logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));

    const createRemoteClient: RemoteFileClientFactory = () => new FtpClient(config.remote);
    const dumper = this.createDumper(config);

    this.backupManager = new BackupManager(
      {
        localRetention: new LocalRetentionManager(config, this.logger),
        archiver: new LocalArchiver(config, dumper, this.logger),
        dumper,
        uploader: new RemoteUploader(createRemoteClient, config.remote, this.logger),
        remoteRetention: new RemoteRetentionManager(createRemoteClient, config, this.logger),
        createRemoteClient,
      },
      config,
      this.logger
    );
  }

  /**
   * Whether the configuration asks for daemon mode
   */
  isScheduled(): boolean {
    return this.config?.schedule !== undefined;
  }

  /**
   * Execute a single backup run and map its outcome to an exit code
   */
  async runOnce(runDate: Date = new Date()): Promise<number> {
    const backupManager = this.requireBackupManager();

    const result = await backupManager.executeBackup(runDate);
    if (!result.success) {
      return EXIT_BACKUP_FAILED;
    }

    if (result.warnings.length > 0) {
      this.logger.warn(`Backup completed with ${result.warnings.length} cleanup warnings`, {
        warnings: result.warnings,
      });
    }
    return EXIT_SUCCESS;
  }

  /**
   * Validate the environment, then start scheduled backups
   */
  async start(): Promise<number> {
    const backupManager = this.requireBackupManager();
    const schedule = this.config?.schedule;
    if (!schedule) {
      throw new Error('No backup schedule configured');
    }

    this.logger.info('Validating configuration and testing connections...');
    const isValid = await backupManager.validateConfiguration();
    if (!isValid) {
      this.logger.error('Configuration validation failed, not starting the scheduler');
      return EXIT_VALIDATION_FAILED;
    }

    this.cronScheduler = new CronScheduler(
      {
        cronExpression: schedule,
        timezone: Intl.DateTimeFormat().resolvedOptions().timeZone,
        runOnInit: false,
      },
      backupManager,
      this.logger
    );

    try {
      this.cronScheduler.start();
    } catch (error) {
      this.logger.error('Failed to start backup scheduler', toError(error));
      return EXIT_VALIDATION_FAILED;
    }

    this.logger.info(
      'Service is now running and will execute backups according to the configured schedule'
    );
    return EXIT_SUCCESS;
  }

  /**
   * Stop the scheduler and flush the log file
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    this.logger.info('Initiating graceful shutdown...');

    if (this.cronScheduler && this.cronScheduler.isRunning()) {
      this.cronScheduler.stop();
      if (this.cronScheduler.isBackupInProgress()) {
        this.logger.warn('A backup run is still in progress and will be interrupted');
      }
    }

    this.logger.info('Site backup service shutdown completed');
    await this.logger.close();
  }

  /**
   * Setup signal handlers for graceful shutdown
   */
  setupSignalHandlers(): void {
    const signals = ['SIGTERM', 'SIGINT'] as const;

    signals.forEach(signal => {
      process.once(signal, () => {
        this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
        this.shutdown()
          .catch(error => {
            this.logger.error('Error during shutdown', toError(error));
          })
          .finally(() => process.exit(EXIT_SUCCESS));
      });
    });
  }

  getLogger(): Logger {
    return this.logger;
  }

  private createDumper(config: BackupConfig): DatabaseDumper {
    if (config.database.engine === 'postgres') {
      return new PostgreSQLDumper(config.database, this.logger);
    }
    return new MySQLDumper(config.database, this.logger);
  }

  private requireBackupManager(): BackupManager {
    if (!this.backupManager) {
      throw new Error('Application not initialized. Call initialize() first.');
    }
    return this.backupManager;
  }
}

/**
 * Main application entry point; resolves with the process exit code
 */
async function main(env: Env = process.env): Promise<number> {
  const app = new SiteBackupApplication(env);

  try {
    app.initialize();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      app.getLogger().error('Configuration error', error, { field: error.field });
      return EXIT_CONFIGURATION_ERROR;
    }
    throw error;
  }

  if (!app.isScheduled()) {
    const exitCode = await app.runOnce();
    await app.getLogger().close();
    return exitCode;
  }

  app.setupSignalHandlers();
  const exitCode = await app.start();
  if (exitCode !== EXIT_SUCCESS) {
    await app.getLogger().close();
  }
  return exitCode;
}

// Export for testing
export { SiteBackupApplication, main };

if (require.main === module) {
  main()
    .then(exitCode => {
      process.exitCode = exitCode;
    })
    .catch(error => {
      console.error('Fatal error starting application:', error);
      process.exitCode = EXIT_BACKUP_FAILED;
    });
}
