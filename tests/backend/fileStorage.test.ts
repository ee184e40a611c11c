import * as fs from 'fs/promises';
import * as path from 'path';

import { FileStorage } from '../../src/backend/utils/fileStorage';

describe('FileStorage', () => {
  let fileStorage: FileStorage;
  const testDataDir = './test-data-file-storage';

  beforeEach(async () => {
    fileStorage = new FileStorage(testDataDir);
    await fileStorage.ensureDataDir();
  });

  afterEach(async () => {
    jest.useRealTimers();
    await fs.rm(testDataDir, { recursive: true, force: true });
  });

  describe('ensureDataDir', () => {
    it('should create data directories', async () => {
      for (const directory of ['library', 'state', 'charts', 'catalog']) {
        await expect(
          fs.access(path.join(testDataDir, directory))
        ).resolves.toBeUndefined();
      }
    });
  });

  describe('writeJSON and readJSON', () => {
    it('should write and read JSON data', async () => {
      const testData = { test: 'value', number: 42 };

      await fileStorage.writeJSON('library/test.json', testData);
      const result = await fileStorage.readJSON('library/test.json');

      expect(result).toEqual(testData);
    });

    it('should return null for non-existent files', async () => {
      const result = await fileStorage.readJSON('non-existent.json');
      expect(result).toBeNull();
    });

    it('should leave no temporary file behind', async () => {
      await fileStorage.writeJSON('library/ledger.json', { plays: [] });

      const files = await fs.readdir(path.join(testDataDir, 'library'));
      expect(files).toEqual(['ledger.json']);
    });

    it('should replace existing content', async () => {
      await fileStorage.writeJSON('state/value.json', { version: 1 });
      await fileStorage.writeJSON('state/value.json', { version: 2 });

      expect(await fileStorage.readJSON('state/value.json')).toEqual({
        version: 2,
      });
    });

    it('should reject invalid JSON content', async () => {
      await fs.writeFile(
        path.join(testDataDir, 'invalid.json'),
        'invalid json content',
        'utf-8'
      );

      await expect(fileStorage.readJSON('invalid.json')).rejects.toThrow();
    });

    it('should create nested directories', async () => {
      await fileStorage.writeJSON('deep/nested/file.json', { data: 'test' });

      expect(await fileStorage.readJSON('deep/nested/file.json')).toEqual({
        data: 'test',
      });
    });
  });

  describe('writeJSONWithBackup', () => {
    it('should not create a backup for a new file', async () => {
      await fileStorage.writeJSONWithBackup('state/engine-state.json', {
        n: 1,
      });

      const files = await fs.readdir(path.join(testDataDir, 'state'));
      expect(files).toEqual(['engine-state.json']);
    });

    it('should keep only the three newest backups', async () => {
      // Arrange: backup names carry the current time
      jest.useFakeTimers({
        doNotFake: [
          'setTimeout',
          'clearTimeout',
          'setImmediate',
          'clearImmediate',
          'nextTick',
          'queueMicrotask',
        ],
      });
      const start = Date.UTC(2024, 5, 1, 12, 0, 0);

      // Act
      for (let i = 0; i < 5; i++) {
        jest.setSystemTime(start + i * 1000);
        await fileStorage.writeJSONWithBackup('state/engine-state.json', {
          n: i,
        });
      }

      // Assert
      const files = (await fs.readdir(path.join(testDataDir, 'state'))).sort();
      expect(files).toEqual([
        'engine-state-backup-2024-06-01T12-00-02-000Z.json.bak',
        'engine-state-backup-2024-06-01T12-00-03-000Z.json.bak',
        'engine-state-backup-2024-06-01T12-00-04-000Z.json.bak',
        'engine-state.json',
      ]);
      expect(await fileStorage.readJSON('state/engine-state.json')).toEqual({
        n: 4,
      });
    });
  });

  describe('Security Validation', () => {
    it('should reject path traversal with ../', async () => {
      await expect(
        fileStorage.writeJSON('../malicious.json', { data: 'hack' })
      ).rejects.toThrow('Invalid path component: ..');
    });

    it('should reject absolute paths', async () => {
      await expect(
        fileStorage.writeJSON('/etc/malicious.json', { data: 'hack' })
      ).rejects.toThrow('Path traversal attempt detected');
    });

    it('should reject backslash path separators', async () => {
      await expect(
        fileStorage.writeJSON('..\\malicious.json', { data: 'hack' })
      ).rejects.toThrow('Invalid path component: ..\\malicious.json');
    });

    it('should reject unsupported file extensions', async () => {
      await expect(
        fileStorage.writeJSON('malicious.exe', { data: 'test' })
      ).rejects.toThrow('Invalid filename format: malicious.exe');
    });

    it('should reject directory names with special characters', async () => {
      await expect(
        fileStorage.writeJSON('dir@name/file.json', { data: 'test' })
      ).rejects.toThrow('Invalid path format: dir@name');
    });
  });
});
