import { isAbsolute, join, relative, resolve, sep } from 'path';
import { BackupConfig, DatabaseEngine } from '../interfaces/BackupConfig';
import { LogLevel } from '../interfaces/Logger';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const REQUIRED_VARS = [
  'SITE_PATH',
  'BACKUP_DIRECTORY',
  'DB_HOST',
  'DB_USER',
  'DB_PASSWORD',
  'DB_NAME',
  'FTP_HOST',
  'FTP_USER',
  'FTP_PASSWORD',
  'FTP_REMOTE_DIR',
] as const;

const DEFAULT_DB_PORTS: Record<DatabaseEngine, number> = {
  mysql: 3306,
  postgres: 5432,
};

const DEFAULT_RETENTION_DAYS = 3;
const DEFAULT_COMPRESSION_LEVEL = 9;
const DEFAULT_FTP_PORT = 21;
const DEFAULT_FTP_TIMEOUT_MS = 30000;
const DEFAULT_ARCHIVE_PREFIX = 'backup';
const LOG_FILE_NAME = 'backup_log.txt';

type Env = Record<string, string | undefined>;

export class ConfigurationManager {
  /**
   * Build the backup configuration from environment variables
   */
  static loadConfiguration(env: Env = process.env): BackupConfig {
    const missingVars = REQUIRED_VARS.filter(name => !env[name]?.trim());
    if (missingVars.length > 0) {
      throw new ConfigurationError(
        `Missing required environment variables: ${missingVars.join(', ')}`,
        missingVars[0]
      );
    }

    const engine = ConfigurationManager.parseEngine(env['DB_ENGINE']);
    const sitePath = ConfigurationManager.required(env, 'SITE_PATH');
    const backupDirectory = ConfigurationManager.required(env, 'BACKUP_DIRECTORY');
    if (ConfigurationManager.isWithin(sitePath, backupDirectory)) {
      throw new ConfigurationError(
        `BACKUP_DIRECTORY must be outside SITE_PATH (${sitePath}), or each archive would copy the earlier ones`,
        'BACKUP_DIRECTORY'
      );
    }

    const archivePrefix = env['BACKUP_PREFIX']?.trim() || DEFAULT_ARCHIVE_PREFIX;
    if (!/^[A-Za-z0-9_-]+$/.test(archivePrefix)) {
      throw new ConfigurationError(
        'BACKUP_PREFIX may only contain letters, digits, "_" and "-"',
        'BACKUP_PREFIX'
      );
    }

    const schedule = env['BACKUP_SCHEDULE']?.trim();
    if (schedule && !ConfigurationManager.isValidCronExpression(schedule)) {
      throw new ConfigurationError('BACKUP_SCHEDULE must be a valid cron expression', 'BACKUP_SCHEDULE');
    }

    const config: BackupConfig = {
      sitePath,
      backupDirectory,
      logFile: env['BACKUP_LOG_FILE']?.trim() || join(backupDirectory, LOG_FILE_NAME),
      archivePrefix,
      compressionLevel: ConfigurationManager.parseInteger(
        env,
        'BACKUP_COMPRESSION_LEVEL',
        DEFAULT_COMPRESSION_LEVEL,
        0,
        9
      ),
      database: {
        engine,
        host: ConfigurationManager.required(env, 'DB_HOST'),
        port: ConfigurationManager.parseInteger(env, 'DB_PORT', DEFAULT_DB_PORTS[engine], 1, 65535),
        user: ConfigurationManager.required(env, 'DB_USER'),
        password: ConfigurationManager.required(env, 'DB_PASSWORD'),
        name: ConfigurationManager.required(env, 'DB_NAME'),
      },
      remote: {
        host: ConfigurationManager.required(env, 'FTP_HOST'),
        port: ConfigurationManager.parseInteger(env, 'FTP_PORT', DEFAULT_FTP_PORT, 1, 65535),
        user: ConfigurationManager.required(env, 'FTP_USER'),
        password: ConfigurationManager.required(env, 'FTP_PASSWORD'),
        remoteDirectory: ConfigurationManager.required(env, 'FTP_REMOTE_DIR'),
        secure: ConfigurationManager.parseBoolean(env, 'FTP_SECURE', false),
        timeoutMs: ConfigurationManager.parseInteger(env, 'FTP_TIMEOUT_MS', DEFAULT_FTP_TIMEOUT_MS, 1),
      },
      retentionDays: ConfigurationManager.parseInteger(
        env,
        'BACKUP_RETENTION_DAYS',
        DEFAULT_RETENTION_DAYS,
        0
      ),
      logLevel: ConfigurationManager.parseLogLevel(env['LOG_LEVEL']),
    };

    // Add optional properties only if they exist
    if (schedule) {
      config.schedule = schedule;
    }

    return config;
  }

  /**
   * Copy of the configuration that is safe to log
   */
  static sanitizeForLogging(config: BackupConfig): Record<string, unknown> {
    return {
      ...config,
      database: { ...config.database, password: '[REDACTED]' },
      remote: { ...config.remote, password: '[REDACTED]' },
    };
  }

  /** True when `candidate` is `parent` itself or lies below it */
  private static isWithin(parent: string, candidate: string): boolean {
    const path = relative(resolve(parent), resolve(candidate));
    return path === '' || (path !== '..' && !path.startsWith(`..${sep}`) && !isAbsolute(path));
  }

  private static required(env: Env, name: (typeof REQUIRED_VARS)[number]): string {
    const value = env[name]?.trim();
    if (!value) {
      throw new ConfigurationError(`Missing required environment variable: ${name}`, name);
    }
    return value;
  }

  private static parseInteger(
    env: Env,
    name: string,
    defaultValue: number,
    min: number,
    max: number = Number.MAX_SAFE_INTEGER
  ): number {
    const raw = env[name]?.trim();
    if (!raw) {
      return defaultValue;
    }

    if (!/^\d+$/.test(raw)) {
      throw new ConfigurationError(`${name} must be an integer between ${min} and ${max}`, name);
    }

    const parsed = parseInt(raw, 10);
    if (parsed < min || parsed > max) {
      throw new ConfigurationError(`${name} must be an integer between ${min} and ${max}`, name);
    }

    return parsed;
  }

  private static parseBoolean(env: Env, name: string, defaultValue: boolean): boolean {
    const raw = env[name]?.trim().toLowerCase();
    if (!raw) {
      return defaultValue;
    }

    if (['true', '1', 'yes'].includes(raw)) {
      return true;
    }
    if (['false', '0', 'no'].includes(raw)) {
      return false;
    }

    throw new ConfigurationError(`${name} must be true or false`, name);
  }

  private static parseEngine(raw: string | undefined): DatabaseEngine {
    const value = raw?.trim().toLowerCase() || 'mysql';
    if (value === 'mysql' || value === 'postgres') {
      return value;
    }
    throw new ConfigurationError('DB_ENGINE must be "mysql" or "postgres"', 'DB_ENGINE');
  }

  private static parseLogLevel(raw: string | undefined): LogLevel {
    const value = raw?.trim().toLowerCase() || LogLevel.INFO;
    const level = Object.values(LogLevel).find(candidate => candidate === value);
    if (!level) {
      throw new ConfigurationError(
        `LOG_LEVEL must be one of: ${Object.values(LogLevel).join(', ')}`,
        'LOG_LEVEL'
      );
    }
    return level;
  }

  private static isValidCronExpression(cronExpression: string): boolean {
    // Basic cron validation - 5 or 6 fields
    const cronParts = cronExpression.trim().split(/\s+/);
    if (cronParts.length !== 5 && cronParts.length !== 6) {
      return false;
    }

    // Validate each part has valid characters
    const validChars = /^[\d*/,\-?LW#]+$/;
    return cronParts.every(part => validChars.test(part));
  }
}
