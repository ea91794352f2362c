import { promises as fs } from 'fs';
import { dirname } from 'path';
import { DatabaseConfig } from '../interfaces/BackupConfig';
import { DatabaseDumper, DumpInfo } from '../interfaces/DatabaseDumper';
import { Logger } from '../interfaces/Logger';
import { DumpFailedError, errorCode, formatError, toError } from '../errors/BackupError';
import { CommandTimeoutError, runCommand } from '../utils/runCommand';

const DUMP_TIMEOUT_MS = 30 * 60 * 1000;
const PING_TIMEOUT_MS = 30 * 1000;

/**
 * Dumps a MySQL/MariaDB database with mysqldump
 */
export class MySQLDumper implements DatabaseDumper {
  readonly engine = 'mysql' as const;
  private config: DatabaseConfig;
  private logger: Logger;

  constructor(config: DatabaseConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * Check the server answers with the configured credentials (mysqladmin ping)
   */
  async testConnection(): Promise<boolean> {
    try {
      const result = await runCommand(
        'mysqladmin',
        [...this.connectionArgs(), 'ping'],
        { env: this.credentialsEnv(), timeoutMs: PING_TIMEOUT_MS }
      );

      if (result.exitCode !== 0) {
        this.logger.error('MySQL connection test failed', undefined, {
          exitCode: result.exitCode,
          stderr: result.stderr.trim(),
        });
        return false;
      }

      return true;
    } catch (error) {
      this.logger.error('MySQL connection test failed', toError(error));
      return false;
    }
  }

  /**
   * Write a plain SQL dump of the configured database to outputPath
   */
  async createDump(outputPath: string): Promise<DumpInfo> {
    const timestamp = new Date();

    try {
      this.logger.info(`Creating MySQL dump for database: ${this.config.name}`);

      await fs.mkdir(dirname(outputPath), { recursive: true });
      await this.executeMysqldump(outputPath);

      let stats;
      try {
        stats = await fs.stat(outputPath);
      } catch (error) {
        throw new DumpFailedError(
          `Dump file was not created at ${outputPath}: ${formatError(error)}`,
          undefined,
          toError(error)
        );
      }

      if (stats.size === 0) {
        throw new DumpFailedError(`Dump file is empty: ${outputPath}`);
      }

      this.logger.info(`MySQL dump created successfully: ${stats.size} bytes`);

      return {
        filePath: outputPath,
        fileSize: stats.size,
        databaseName: this.config.name,
        timestamp,
      };
    } catch (error) {
      await this.removePartialDump(outputPath);

      if (error instanceof DumpFailedError) {
        throw error;
      }

      throw new DumpFailedError(
        `Failed to create dump: ${formatError(error)}`,
        undefined,
        toError(error)
      );
    }
  }

  private async executeMysqldump(outputPath: string): Promise<void> {
    const args = [
      ...this.connectionArgs(),
      '--single-transaction',
      '--routines',
      '--triggers',
      `--result-file=${outputPath}`,
      this.config.name,
    ];

    let result;
    try {
      result = await runCommand('mysqldump', args, {
        env: this.credentialsEnv(),
        timeoutMs: DUMP_TIMEOUT_MS,
      });
    } catch (error) {
      if (error instanceof CommandTimeoutError) {
        throw new DumpFailedError(
          'mysqldump timeout after 30 minutes. This may indicate a very large database or connection issues.',
          undefined,
          error
        );
      }
      throw new DumpFailedError(this.analyzeSpawnError(error), undefined, toError(error));
    }

    if (result.exitCode !== 0) {
      throw new DumpFailedError(
        this.analyzeDumpError(result.exitCode, result.stderr, result.stdout),
        result.exitCode
      );
    }

    const warnings = result.stderr.trim();
    if (warnings) {
      this.logger.warn('mysqldump warning', { output: warnings });
    }
  }

  private connectionArgs(): string[] {
    return ['-h', this.config.host, '-P', String(this.config.port), '-u', this.config.user];
  }

  // Keeps the password out of the process list
  private credentialsEnv(): Record<string, string> {
    return { MYSQL_PWD: this.config.password };
  }

  /**
   * Analyze mysqldump error output and provide helpful error messages
   */
  private analyzeDumpError(exitCode: number, stderr: string, stdout: string): string {
    const lowerStderr = stderr.toLowerCase();

    if (lowerStderr.includes('access denied')) {
      return `mysqldump authentication failed (exit code ${exitCode}). Please check database credentials.`;
    }

    if (lowerStderr.includes('unknown database')) {
      return `mysqldump failed: database "${this.config.name}" does not exist (exit code ${exitCode}).`;
    }

    if (
      lowerStderr.includes("can't connect") ||
      lowerStderr.includes('connection refused') ||
      lowerStderr.includes('unknown mysql server host')
    ) {
      return `mysqldump failed: unable to connect to database server (exit code ${exitCode}). Please check connection settings.`;
    }

    if (lowerStderr.includes('no space left on device') || lowerStderr.includes('errcode: 28')) {
      return `mysqldump failed: insufficient disk space (exit code ${exitCode}).`;
    }

    const errorContext =
      stderr.trim() || stdout.trim() || 'No additional error information available';
    return `mysqldump failed with exit code ${exitCode}. Error details: ${errorContext}`;
  }

  private analyzeSpawnError(error: unknown): string {
    const code = errorCode(error);

    if (code === 'ENOENT') {
      return 'mysqldump command not found. Please ensure MySQL client tools are installed.';
    }

    if (code === 'EACCES') {
      return 'Permission denied executing mysqldump. Please check file permissions.';
    }

    return `Failed to execute mysqldump: ${formatError(error)}`;
  }

  private async removePartialDump(outputPath: string): Promise<void> {
    try {
      await fs.unlink(outputPath);
      this.logger.debug(`Cleaned up partial dump file: ${outputPath}`);
    } catch (cleanupError) {
      if (errorCode(cleanupError) !== 'ENOENT') {
        this.logger.warn(`Failed to cleanup partial dump file ${outputPath}`, {
          error: formatError(cleanupError),
        });
      }
    }
  }
}
