import fs from 'fs-extra';
import path from 'path';
import { logger } from '../../utils/logging.js';
import { getErrorMessage, isNotFoundError, toError } from '../../utils/errorHandling.js';
import { ErrorCode, FileSystemError } from '../../errors/index.js';

/**
 * File operations the lifecycle rules and bookkeeping jobs depend on
 */
export interface IMediaFileStore {
  fileExists(filePath: string): Promise<boolean>;
  listFilesMatching(stemPath: string): Promise<string[]>;
  deleteFile(filePath: string): Promise<void>;
  ensureDirectory(dirPath: string): Promise<void>;
}

/**
 * Strip the final extension from a path
 *
 * @example
 * fileStem('/media/show/episode.en.mkv') // => '/media/show/episode.en'
 */
export function fileStem(filePath: string): string {
  const ext = path.extname(filePath);
  return ext ? filePath.slice(0, -ext.length) : filePath;
}

export class MediaFileStore implements IMediaFileStore {
  async fileExists(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile();
    } catch (error) {
      if (isNotFoundError(error)) {
        return false;
      }
      throw new FileSystemError(
        `Failed to stat file: ${getErrorMessage(error)}`,
        ErrorCode.FS_READ_FAILED,
        filePath,
        false,
        { service: 'MediaFileStore', operation: 'fileExists' },
        toError(error)
      );
    }
  }

  /**
   * Files beside the stem named `<stem>.<anything>`
   */
  async listFilesMatching(stemPath: string): Promise<string[]> {
    const directory = path.dirname(stemPath);
    const prefix = `${path.basename(stemPath)}.`;

    let entries: string[];
    try {
      entries = await fs.readdir(directory);
    } catch (error) {
      if (isNotFoundError(error)) {
        return [];
      }
      throw new FileSystemError(
        `Failed to list directory: ${getErrorMessage(error)}`,
        ErrorCode.FS_READ_FAILED,
        directory,
        false,
        { service: 'MediaFileStore', operation: 'listFilesMatching' },
        toError(error)
      );
    }

    const matches: string[] = [];
    for (const entry of entries.filter(name => name.startsWith(prefix)).sort()) {
      const candidate = path.join(directory, entry);
      if (await this.fileExists(candidate)) {
        matches.push(candidate);
      }
    }
    return matches;
  }

  /**
   * Remove a file; a file that is already gone is not an error
   */
  async deleteFile(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
      logger.info('Deleted file', {
        service: 'MediaFileStore',
        operation: 'deleteFile',
        path: filePath,
      });
    } catch (error) {
      if (isNotFoundError(error)) {
        return;
      }
      throw new FileSystemError(
        `Failed to delete file: ${getErrorMessage(error)}`,
        ErrorCode.FS_WRITE_FAILED,
        filePath,
        false,
        { service: 'MediaFileStore', operation: 'deleteFile' },
        toError(error)
      );
    }
  }

  async ensureDirectory(dirPath: string): Promise<void> {
    try {
      await fs.ensureDir(dirPath);
    } catch (error) {
      throw new FileSystemError(
        `Failed to create directory: ${getErrorMessage(error)}`,
        ErrorCode.FS_WRITE_FAILED,
        dirPath,
        true,
        { service: 'MediaFileStore', operation: 'ensureDirectory' },
        toError(error)
      );
    }
  }
}
