const mockWinstonLogger = {
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debug: jest.fn(),
  on: jest.fn(),
  add: jest.fn(),
  remove: jest.fn(),
  end: jest.fn(),
};

const mockFileTransport = {
  on: jest.fn(),
};

// Mock winston to capture log calls
jest.mock('winston', () => ({
  createLogger: jest.fn(() => mockWinstonLogger),
  format: {
    combine: jest.fn(),
    timestamp: jest.fn(),
    printf: jest.fn(),
  },
  transports: {
    Console: jest.fn(),
    File: jest.fn(() => mockFileTransport),
  },
}));

import winston from 'winston';
import { Logger, formatLogLine, sanitizeMeta } from '../src/clients/Logger';
import { LogLevel } from '../src/interfaces/Logger';

function registeredHandler(
  emitter: { on: jest.Mock },
  event: string
): (...args: unknown[]) => void {
  // Latest registration wins: every Logger built in a test shares the mock
  const call = [...emitter.on.mock.calls].reverse().find(([name]) => name === event);
  if (!call) {
    throw new Error(`No ${event} handler registered`);
  }
  return call[1];
}

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    jest.clearAllMocks();
    logger = new Logger(LogLevel.DEBUG);
  });

  describe('construction', () => {
    it('should create a console-only logger at the given level', () => {
      expect(winston.createLogger).toHaveBeenCalledWith(
        expect.objectContaining({ level: LogLevel.DEBUG })
      );
      expect(winston.transports.File).not.toHaveBeenCalled();
      expect(logger.hasFileTransport()).toBe(false);
    });

    it('should append to the log file when one is given', () => {
      const fileLogger = new Logger(LogLevel.INFO, '/var/backups/site/backup_log.txt');

      expect(winston.transports.File).toHaveBeenCalledWith({
        filename: '/var/backups/site/backup_log.txt',
        options: { flags: 'a' },
      });
      expect(mockWinstonLogger.add).toHaveBeenCalledWith(mockFileTransport);
      expect(fileLogger.hasFileTransport()).toBe(true);
    });

    it('should fall back to the console when the log file cannot be opened', () => {
      jest.mocked(winston.transports.File).mockImplementationOnce(() => {
        throw new Error('bad path');
      });

      const fileLogger = new Logger(LogLevel.INFO, '/missing/backup_log.txt');

      expect(fileLogger.hasFileTransport()).toBe(false);
      expect(mockWinstonLogger.add).not.toHaveBeenCalled();
      expect(mockWinstonLogger.warn).toHaveBeenCalledWith(
        'Log file /missing/backup_log.txt cannot be opened, logging to console only',
        { error: 'Error: bad path' }
      );
    });

    it('should drop the file transport when it fails to write', () => {
      const fileLogger = new Logger(LogLevel.INFO, '/var/backups/site/backup_log.txt');
      const onError = registeredHandler(mockWinstonLogger, 'error');

      onError(new Error('disk full'));
      onError(new Error('disk full'));

      expect(mockWinstonLogger.remove).toHaveBeenCalledTimes(1);
      expect(mockWinstonLogger.remove).toHaveBeenCalledWith(mockFileTransport);
      expect(fileLogger.hasFileTransport()).toBe(false);
      expect(mockWinstonLogger.warn).toHaveBeenCalledWith(
        'Log file cannot be written, logging to console only',
        { error: 'Error: disk full' }
      );
    });
  });

  describe('Basic logging methods', () => {
    it('should log info messages', () => {
      logger.info('Test info message', { key: 'value' });

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Test info message', { key: 'value' });
    });

    it('should log debug messages', () => {
      logger.debug('Test debug message');

      expect(mockWinstonLogger.debug).toHaveBeenCalledWith('Test debug message', undefined);
    });

    it('should log error messages with error object and code', () => {
      const error = Object.assign(new Error('Test error'), { code: 'ENOENT' });

      logger.error('Test error message', error, { key: 'value' });

      expect(mockWinstonLogger.error).toHaveBeenCalledWith('Test error message', {
        key: 'value',
        error: {
          name: 'Error',
          message: 'Test error',
          code: 'ENOENT',
        },
      });
    });

    it('should log error messages without error object', () => {
      logger.error('Test error message', undefined, { key: 'value' });

      expect(mockWinstonLogger.error).toHaveBeenCalledWith('Test error message', { key: 'value' });
    });
  });

  describe('Specialized logging methods', () => {
    it('should log run start', () => {
      logger.logRunStart({ runId: 'run-1' });

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('--- Backup run started ---', {
        operation: 'run_start',
        runId: 'run-1',
      });
    });

    it('should log step start and completion', () => {
      logger.logStepStart('archive');
      logger.logStepComplete('upload', { remotePath: '/backups/backup-2024-01-02.zip' });

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Step started: archive', {
        operation: 'step_start',
        step: 'archive',
      });
      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Step completed: upload', {
        operation: 'step_complete',
        step: 'upload',
        remotePath: '/backups/backup-2024-01-02.zip',
      });
    });

    it('should log step failure as an error', () => {
      logger.logStepFailed('upload', new Error('connection reset'));

      expect(mockWinstonLogger.error).toHaveBeenCalledWith('Step failed: upload', {
        operation: 'step_failed',
        step: 'upload',
        error: { name: 'Error', message: 'connection reset' },
      });
    });

    it('should log retention cleanup', () => {
      logger.logRetentionCleanup(2, 3);

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Retention cleanup completed', {
        operation: 'retention_cleanup',
        deletedCount: 2,
        retentionDays: 3,
      });
    });

    it('should log configuration with sensitive values removed', () => {
      logger.logConfigurationStart({
        sitePath: '/var/www/shop',
        remote: { host: 'ftp.example.test', password: 'test-secret' },
      });

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Application starting with configuration', {
        operation: 'startup',
        config: {
          sitePath: '/var/www/shop',
          remote: { host: 'ftp.example.test', password: '[REDACTED]' },
        },
      });
    });

    it('should log scheduled execution', () => {
      logger.logScheduledExecution('0 2 * * *');

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Scheduled backup execution triggered', {
        operation: 'scheduled_execution',
        cronExpression: '0 2 * * *',
      });
    });

    it('should log run completion by outcome', () => {
      logger.logRunComplete(true, 1500);
      logger.logRunComplete(false, 20);

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Backup run completed successfully', {
        operation: 'run_complete',
        duration: 1500,
      });
      expect(mockWinstonLogger.error).toHaveBeenCalledWith('Backup run failed', {
        operation: 'run_complete',
        duration: 20,
      });
    });
  });

  describe('close', () => {
    it('should resolve once the file transport has flushed', async () => {
      const fileLogger = new Logger(LogLevel.INFO, '/var/backups/site/backup_log.txt');

      const closing = fileLogger.close();
      expect(mockWinstonLogger.end).toHaveBeenCalled();
      registeredHandler(mockFileTransport, 'finish')();

      await expect(closing).resolves.toBeUndefined();
    });

    it('should resolve once the console logger has finished', async () => {
      const closing = logger.close();
      registeredHandler(mockWinstonLogger, 'finish')();

      await expect(closing).resolves.toBeUndefined();
    });
  });
});

describe('formatLogLine', () => {
  it('should render timestamp, upper-case level and message', () => {
    expect(
      formatLogLine({
        level: 'info',
        message: 'Backup zipped successfully',
        timestamp: '2024-01-02 03:04:05',
      })
    ).toBe('2024-01-02 03:04:05 - INFO - Backup zipped successfully');
  });

  it('should append sanitized metadata as JSON', () => {
    expect(
      formatLogLine({
        level: 'warn',
        message: 'Upload slow',
        timestamp: '2024-01-02 03:04:05',
        fileSize: 10,
        ftpPassword: 'test-secret',
      })
    ).toBe('2024-01-02 03:04:05 - WARN - Upload slow {"fileSize":10,"ftpPassword":"[REDACTED]"}');
  });
});

describe('sanitizeMeta', () => {
  it('should redact sensitive keys at any depth', () => {
    const when = new Date(2024, 0, 2);

    expect(
      sanitizeMeta({
        apiKey: 'test-secret',
        config: { database: { host: 'db.local', password: 'test-secret' } },
        files: ['a', 'b'],
        when,
      })
    ).toEqual({
      apiKey: '[REDACTED]',
      config: { database: { host: 'db.local', password: '[REDACTED]' } },
      files: ['a', 'b'],
      when,
    });
  });
});
