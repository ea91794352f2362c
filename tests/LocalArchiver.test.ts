import JSZip from 'jszip';
import { existsSync, mkdtempSync, promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { LocalArchiver } from '../src/clients/LocalArchiver';
import { BackupConfig } from '../src/interfaces/BackupConfig';
import { DatabaseDumper } from '../src/interfaces/DatabaseDumper';
import {
  ArchiveWriteFailedError,
  DumpFailedError,
  SourceUnavailableError,
} from '../src/errors/BackupError';
import { createMockLogger } from './helpers/mockLogger';
import { createTestConfig } from './helpers/testConfig';
import { DUMP_SQL, createFakeDumper } from './helpers/fakeDumper';

async function zipFileNames(archivePath: string): Promise<string[]> {
  const zip = await JSZip.loadAsync(await fs.readFile(archivePath));
  return Object.values(zip.files)
    .filter(entry => !entry.dir)
    .map(entry => entry.name)
    .sort();
}

describe('LocalArchiver', () => {
  const runDate = new Date(2024, 0, 2, 2, 0, 0);

  let root: string;
  let config: BackupConfig;
  let dumper: jest.Mocked<DatabaseDumper>;
  let logger: ReturnType<typeof createMockLogger>;
  let archiver: LocalArchiver;

  beforeEach(async () => {
    root = mkdtempSync(join(tmpdir(), 'local-archiver-'));
    config = createTestConfig(root);
    await fs.mkdir(join(config.sitePath, 'css'), { recursive: true });
    await fs.writeFile(join(config.sitePath, 'index.html'), '<h1>Shop</h1>');
    await fs.writeFile(join(config.sitePath, 'css', 'style.css'), 'body { margin: 0; }');

    dumper = createFakeDumper();
    logger = createMockLogger();
    archiver = new LocalArchiver(config, dumper, logger);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('createArchive', () => {
    it('should write one dated zip holding the site tree and the dump', async () => {
      const info = await archiver.createArchive(runDate);

      const expectedPath = join(config.backupDirectory, 'backup-2024-01-02.zip');
      expect(info.fileName).toBe('backup-2024-01-02.zip');
      expect(info.filePath).toBe(expectedPath);
      expect(info.fileSize).toBe((await fs.stat(expectedPath)).size);

      expect(await zipFileNames(expectedPath)).toEqual([
        'database_backup.sql',
        'site_data/css/style.css',
        'site_data/index.html',
      ]);

      const zip = await JSZip.loadAsync(await fs.readFile(expectedPath));
      expect(await zip.file('database_backup.sql')?.async('string')).toBe(DUMP_SQL);
      expect(await zip.file('site_data/index.html')?.async('string')).toBe('<h1>Shop</h1>');
    });

    it('should leave nothing but the archive in the backup directory', async () => {
      await archiver.createArchive(runDate);

      expect(await fs.readdir(config.backupDirectory)).toEqual(['backup-2024-01-02.zip']);
    });

    it('should hand the dumper a path inside the staging directory', async () => {
      await archiver.createArchive(runDate);

      const dumpPath = dumper.createDump.mock.calls[0][0];
      expect(dumpPath.startsWith(join(config.backupDirectory, '.staging-'))).toBe(true);
      expect(dumpPath.endsWith(join('database', 'database_backup.sql'))).toBe(true);
    });

    it('should fail with SourceUnavailable before dumping when the site is missing', async () => {
      await fs.rm(config.sitePath, { recursive: true });

      const pending = archiver.createArchive(runDate);

      await expect(pending).rejects.toBeInstanceOf(SourceUnavailableError);
      await expect(pending).rejects.toMatchObject({ sourcePath: config.sitePath });
      expect(dumper.createDump).not.toHaveBeenCalled();
      expect(existsSync(join(config.backupDirectory, 'backup-2024-01-02.zip'))).toBe(false);
    });

    it('should reject a site path that is a file', async () => {
      const filePath = join(root, 'not-a-dir');
      await fs.writeFile(filePath, 'x');
      archiver = new LocalArchiver(createTestConfig(root, { sitePath: filePath }), dumper, logger);

      await expect(archiver.createArchive(runDate)).rejects.toThrow(
        `Site path ${filePath} is not a directory`
      );
    });

    it('should propagate a dump failure and clean up the staging directory', async () => {
      const failure = new DumpFailedError('mysqldump failed with exit code 2', 2);
      dumper.createDump.mockRejectedValue(failure);

      await expect(archiver.createArchive(runDate)).rejects.toBe(failure);
      expect(await fs.readdir(config.backupDirectory)).toEqual([]);
    });

    it('should wrap unexpected dumper errors as DumpFailed', async () => {
      dumper.createDump.mockRejectedValue(new Error('boom'));

      const pending = archiver.createArchive(runDate);

      await expect(pending).rejects.toBeInstanceOf(DumpFailedError);
      await expect(pending).rejects.toThrow('Database dump failed: Error: boom');
    });

    it('should fail with ArchiveWriteFailed when the backup directory cannot be created', async () => {
      const blocker = join(root, 'blocker');
      await fs.writeFile(blocker, 'x');
      archiver = new LocalArchiver(
        createTestConfig(root, { backupDirectory: join(blocker, 'backups') }),
        dumper,
        logger
      );

      await expect(archiver.createArchive(runDate)).rejects.toBeInstanceOf(ArchiveWriteFailedError);
      expect(dumper.createDump).not.toHaveBeenCalled();
    });
  });

  describe('verifySource', () => {
    it('should resolve for a readable directory', async () => {
      await expect(archiver.verifySource()).resolves.toBeUndefined();
    });
  });
});
