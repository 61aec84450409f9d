/**
 * File system operations from the script host, used to move backup files between
 * the administrative shares of database hosts.
 */
import { mkdir, copyFile, stat, unlink, readdir, rmdir } from 'fs/promises';
import { FileTransfer } from './types.js';

export const localFileTransfer: FileTransfer = {
  async ensureDirectory(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  },

  async copyFile(source: string, destination: string): Promise<{ fileSize: number }> {
    await copyFile(source, destination);
    const stats = await stat(destination);
    return { fileSize: stats.size };
  },

  async removeFile(path: string): Promise<void> {
    await unlink(path);
  },

  async removeDirectoryIfEmpty(path: string): Promise<boolean> {
    const entries = await readdir(path);
    if (entries.length > 0) {
      return false;
    }
    await rmdir(path);
    return true;
  },
};
