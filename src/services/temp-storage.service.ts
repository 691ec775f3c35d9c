import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { BaseService } from './base.service';
import { GENERATION_CONFIG } from '@/config/generation.config';
import { getErrorMessage } from '@/lib/errors';

/**
 * Short-lived files handed to the chat platform for upload.
 * Cleanup is best effort: failures are logged and never reach the caller.
 */
export class TempStorageService extends BaseService {
  constructor(private readonly baseDir: string) {
    super();
  }

  /**
   * Reserve an empty file in the base directory and return its path
   */
  async createTempFile(suffix: string = GENERATION_CONFIG.tempFileSuffix): Promise<string> {
    await fs.mkdir(this.baseDir, { recursive: true });
    const filePath = path.join(this.baseDir, `${Date.now()}-${uuidv4()}${suffix}`);
    await fs.writeFile(filePath, '', { flag: 'wx' });
    return filePath;
  }

  async writeTempFile(contents: Buffer, suffix: string = GENERATION_CONFIG.tempFileSuffix): Promise<string> {
    const filePath = await this.createTempFile(suffix);
    try {
      await fs.writeFile(filePath, contents);
    } catch (error) {
      await this.cleanup(filePath);
      throw error;
    }
    this.logger.debug('Temp file written', { filePath, bytes: contents.length });
    return filePath;
  }

  /**
   * Returns false when the file could not be deleted
   */
  async cleanup(filePath: string): Promise<boolean> {
    try {
      await fs.rm(filePath, { force: true });
      return true;
    } catch (error) {
      this.logger.warn('Failed to delete temp file', { filePath, error: getErrorMessage(error) });
      return false;
    }
  }

  /**
   * Remove every file left in the base directory (e.g. after a crash)
   */
  async cleanupAll(): Promise<number> {
    let removed = 0;
    try {
      const entries = await fs.readdir(this.baseDir, { withFileTypes: true });
      for (const entry of entries) {
        if (entry.isFile()) {
          if (await this.cleanup(path.join(this.baseDir, entry.name))) {
            removed += 1;
          }
        }
      }
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code !== 'ENOENT') {
        this.logger.warn('Failed to sweep temp directory', {
          baseDir: this.baseDir,
          error: getErrorMessage(error),
        });
      }
    }
    return removed;
  }

  /**
   * Writes the bytes to a temp file, runs `fn` with its path and deletes the
   * file afterwards, whether `fn` succeeded or threw.
   */
  async withTempFile<T>(
    contents: Buffer,
    fn: (filePath: string) => Promise<T>,
    suffix: string = GENERATION_CONFIG.tempFileSuffix
  ): Promise<T> {
    const filePath = await this.createTempFile(suffix);
    try {
      await fs.writeFile(filePath, contents);
      return await fn(filePath);
    } finally {
      await this.cleanup(filePath);
    }
  }
}
