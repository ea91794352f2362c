import { Client } from 'pg';
import { promises as fs } from 'fs';
import { dirname } from 'path';
import { DatabaseConfig } from '../interfaces/BackupConfig';
import { DatabaseDumper, DumpInfo } from '../interfaces/DatabaseDumper';
import { Logger } from '../interfaces/Logger';
import { DumpFailedError, errorCode, formatError, toError } from '../errors/BackupError';
import { CommandTimeoutError, runCommand } from '../utils/runCommand';

const DUMP_TIMEOUT_MS = 30 * 60 * 1000;

/**
 * Dumps a PostgreSQL database with pg_dump as plain SQL
 */
export class PostgreSQLDumper implements DatabaseDumper {
  readonly engine = 'postgres' as const;
  private config: DatabaseConfig;
  private logger: Logger;

  constructor(config: DatabaseConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * Test connection to the PostgreSQL database
   */
  async testConnection(): Promise<boolean> {
    const client = new Client({
      host: this.config.host,
      port: this.config.port,
      user: this.config.user,
      password: this.config.password,
      database: this.config.name,
    });

    try {
      await client.connect();
      await client.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.error('PostgreSQL connection test failed', toError(error));
      return false;
    } finally {
      await client.end().catch(cleanupError => {
        this.logger.warn('Failed to close database connection during cleanup', {
          error: formatError(cleanupError),
        });
      });
    }
  }

  async createDump(outputPath: string): Promise<DumpInfo> {
    const timestamp = new Date();

    try {
      this.logger.info(`Creating PostgreSQL dump for database: ${this.config.name}`);

      await fs.mkdir(dirname(outputPath), { recursive: true });
      await this.executePgDump(outputPath);

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

      this.logger.info(`PostgreSQL dump created successfully: ${stats.size} bytes`);

      return {
        filePath: outputPath,
        fileSize: stats.size,
        databaseName: this.config.name,
        timestamp,
      };
    } catch (error) {
      try {
        await fs.unlink(outputPath);
      } catch (cleanupError) {
        if (errorCode(cleanupError) !== 'ENOENT') {
          this.logger.warn(`Failed to cleanup partial dump file ${outputPath}`, {
            error: formatError(cleanupError),
          });
        }
      }

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

  private async executePgDump(outputPath: string): Promise<void> {
    const args = [
      '--host',
      this.config.host,
      '--port',
      String(this.config.port),
      '--username',
      this.config.user,
      '--no-password',
      '--clean',
      '--no-owner',
      '--no-acl',
      '--format=plain',
      '--file',
      outputPath,
      this.config.name,
    ];

    let result;
    try {
      result = await runCommand('pg_dump', args, {
        env: { PGPASSWORD: this.config.password },
        timeoutMs: DUMP_TIMEOUT_MS,
      });
    } catch (error) {
      if (error instanceof CommandTimeoutError) {
        throw new DumpFailedError(
          'pg_dump timeout after 30 minutes. This may indicate a very large database or connection issues.',
          undefined,
          error
        );
      }

      const code = errorCode(error);
      const message =
        code === 'ENOENT'
          ? 'pg_dump command not found. Please ensure PostgreSQL client tools are installed.'
          : `Failed to execute pg_dump: ${formatError(error)}`;
      throw new DumpFailedError(message, undefined, toError(error));
    }

    if (result.exitCode !== 0) {
      throw new DumpFailedError(
        this.analyzePgDumpError(result.exitCode, result.stderr, result.stdout),
        result.exitCode
      );
    }
  }

  /**
   * Analyze pg_dump error and provide helpful error messages
   */
  private analyzePgDumpError(exitCode: number, stderr: string, stdout: string): string {
    const lowerStderr = stderr.toLowerCase();

    if (lowerStderr.includes('password authentication failed')) {
      return `pg_dump authentication failed (exit code ${exitCode}). Please check database credentials.`;
    }

    if (lowerStderr.includes('database') && lowerStderr.includes('does not exist')) {
      return `pg_dump failed: database "${this.config.name}" does not exist (exit code ${exitCode}).`;
    }

    if (lowerStderr.includes('permission denied')) {
      return `pg_dump failed: insufficient permissions to access database (exit code ${exitCode}).`;
    }

    if (
      lowerStderr.includes('connection') &&
      (lowerStderr.includes('refused') || lowerStderr.includes('timeout'))
    ) {
      return `pg_dump failed: unable to connect to database server (exit code ${exitCode}). Please check connection settings.`;
    }

    if (lowerStderr.includes('no space left on device')) {
      return `pg_dump failed: insufficient disk space (exit code ${exitCode}).`;
    }

    const errorContext =
      stderr.trim() || stdout.trim() || 'No additional error information available';
    return `pg_dump failed with exit code ${exitCode}. Error details: ${errorContext}`;
  }
}
