import * as fs from 'fs/promises';
import * as path from 'path';

import { createLogger } from './logger';

export const DATA_SUBDIRECTORIES = [
  'library',
  'state',
  'charts',
  'catalog',
] as const;

export class FileStorage {
  private dataDir: string;
  private logger = createLogger('FileStorage');
  // Strict allowlist pattern for file/directory names
  private readonly SAFE_PATH_PATTERN = /^[a-zA-Z0-9_-]+$/;
  private readonly SAFE_FILENAME_PATTERN = /^[a-zA-Z0-9_-]+\.(json|bak)$/;
  // Maximum number of backup files to keep per original file
  private readonly MAX_BACKUPS = 3;

  constructor(dataDir: string = './data') {
    this.dataDir = path.resolve(dataDir);
  }

  /**
   * Validates that a path component (directory or filename) is safe
   */
  private validatePathComponent(component: string): void {
    if (!component) {
      throw new Error('Path component cannot be empty');
    }

    if (
      component.includes('..') ||
      component.includes('/') ||
      component.includes('\\')
    ) {
      throw new Error(`Invalid path component: ${component}`);
    }

    if (component.includes('.')) {
      if (!this.SAFE_FILENAME_PATTERN.test(component)) {
        throw new Error(`Invalid filename format: ${component}`);
      }
    } else if (!this.SAFE_PATH_PATTERN.test(component)) {
      throw new Error(`Invalid path format: ${component}`);
    }
  }

  /**
   * Validates and resolves a file path, ensuring it stays within dataDir
   */
  private validateAndResolvePath(filePath: string): string {
    const pathParts = filePath.split('/').filter(part => part.length > 0);
    pathParts.forEach(part => this.validatePathComponent(part));

    const fullPath = path.resolve(this.dataDir, filePath);

    if (
      !fullPath.startsWith(this.dataDir + path.sep) &&
      fullPath !== this.dataDir
    ) {
      throw new Error('Path traversal attempt detected');
    }

    return fullPath;
  }

  async ensureDataDir(): Promise<void> {
    try {
      await fs.mkdir(this.dataDir, { recursive: true });
      for (const subdirectory of DATA_SUBDIRECTORIES) {
        await fs.mkdir(path.join(this.dataDir, subdirectory), {
          recursive: true,
        });
      }
    } catch (error) {
      this.logger.error('Error creating data directories', error);
      throw error;
    }
  }

  async readJSON<T>(filePath: string): Promise<T | null> {
    try {
      const fullPath = this.validateAndResolvePath(filePath);
      const data = await fs.readFile(fullPath, 'utf-8');
      return JSON.parse(data) as T;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  /**
   * Writes JSON through a temporary sibling file and a rename, so a crash
   * mid-write leaves either the old or the new content on disk.
   */
  async writeJSON<T>(filePath: string, data: T): Promise<void> {
    try {
      const fullPath = this.validateAndResolvePath(filePath);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      const tempPath = `${fullPath}.${process.pid}.tmp`;
      await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
      await fs.rename(tempPath, fullPath);
    } catch (error) {
      this.logger.error(`Error writing JSON file ${filePath}`, error);
      throw error;
    }
  }

  /**
   * Creates a backup of a file before modification.
   * Keeps up to MAX_BACKUPS rotated backups with timestamps.
   */
  async createBackup(filePath: string): Promise<string | null> {
    try {
      const fullPath = this.validateAndResolvePath(filePath);

      try {
        await fs.access(fullPath);
      } catch {
        // No file to backup
        return null;
      }

      const dir = path.dirname(fullPath);
      const ext = path.extname(fullPath);
      const baseName = path.basename(fullPath, ext);
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      const backupPath = path.join(
        dir,
        `${baseName}-backup-${timestamp}${ext}.bak`
      );

      await fs.copyFile(fullPath, backupPath);
      await this.cleanupOldBackups(dir, baseName, ext);

      return backupPath;
    } catch (error) {
      // The write that follows still goes ahead without a backup
      this.logger.warn(`Could not back up ${filePath}`, error);
      return null;
    }
  }

  /**
   * Removes old backup files, keeping only the most recent ones.
   */
  private async cleanupOldBackups(
    dir: string,
    baseName: string,
    ext: string
  ): Promise<void> {
    const files = await fs.readdir(dir);
    const backupPattern = new RegExp(
      `^${baseName}-backup-.*${ext.replace('.', '\\.')}\\.bak$`
    );

    const backups = files
      .filter(f => backupPattern.test(f))
      .sort((a, b) => b.localeCompare(a)); // Newest first (timestamp in name)

    for (const stale of backups.slice(this.MAX_BACKUPS)) {
      await fs.unlink(path.join(dir, stale));
    }
  }

  /**
   * Writes JSON with automatic backup of existing file.
   * Use this for small critical files like the engine state.
   */
  async writeJSONWithBackup<T>(filePath: string, data: T): Promise<void> {
    await this.createBackup(filePath);
    await this.writeJSON(filePath, data);
  }
}
