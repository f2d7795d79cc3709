/**
 * Local filesystem storage backend.
 *
 * Files live under a home path; extended attributes are kept in a hidden
 * JSON sidecar next to each file so that any filesystem can be used.
 */

import fs from 'fs/promises';
import { createReadStream } from 'fs';
import path from 'path';
import type { Readable } from 'stream';
import { z } from 'zod';
import { storageLogger as log } from '../logger.js';
import { StorageError } from './errors.js';
import type { FileStat, StorageBackend, WriteOptions, XattrUpdate } from './types.js';

export interface LocalStorageOptions {
  homepath: string;
  chunksize: number;
}

const USERID_REGEX = /^\d+:\d+$/;

const xattrSchema = z.record(z.string());

export class LocalStorage implements StorageBackend {
  readonly type = 'local' as const;
  private readonly homepath: string;
  private readonly chunksize: number;
  // Serializes read-modify-write cycles on each sidecar
  private readonly sidecarQueues = new Map<string, Promise<void>>();

  constructor(options: LocalStorageOptions) {
    this.homepath = path.resolve(options.homepath);
    this.chunksize = options.chunksize;
  }

  async init(): Promise<void> {
    let isDirectory: boolean;
    try {
      isDirectory = (await fs.stat(this.homepath)).isDirectory();
    } catch (error) {
      throw StorageError.fromNodeError(error, this.homepath);
    }
    if (!isDirectory) {
      throw new StorageError('Storage home path is not a directory', 'EINVAL', this.homepath);
    }
    log.info('Local storage initialized', { homepath: this.homepath });
  }

  /**
   * Map a storage path into the home path, refusing anything that escapes it
   */
  resolvePath(filepath: string): string {
    const fullPath = path.join(this.homepath, filepath);
    const relative = path.relative(this.homepath, fullPath);
    if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      throw new StorageError('Path outside of the storage home', 'EACCES', filepath);
    }
    return fullPath;
  }

  private checkUserid(userid: string): void {
    if (!USERID_REGEX.test(userid)) {
      throw new StorageError('Only Unix-based userid is supported', 'EINVAL');
    }
  }

  private sidecarPath(fullPath: string): string {
    return path.join(path.dirname(fullPath), `.${path.basename(fullPath)}.xattr.json`);
  }

  async stat(filepath: string, userid: string): Promise<FileStat> {
    this.checkUserid(userid);
    const fullPath = this.resolvePath(filepath);
    const start = Date.now();
    let stats;
    try {
      stats = await fs.stat(fullPath);
    } catch (error) {
      throw StorageError.fromNodeError(error, filepath);
    }
    log.debug('Invoked stat', { filepath, elapsedTimeMs: Date.now() - start });
    if (stats.isDirectory()) {
      throw StorageError.isDirectory(filepath);
    }
    return {
      inode: String(stats.ino),
      filepath,
      ownerid: `${stats.uid}:${stats.gid}`,
      size: stats.size,
      mtime: Math.floor(stats.mtimeMs / 1000),
    };
  }

  private async readXattrs(fullPath: string, filepath: string): Promise<Record<string, string>> {
    let content: string;
    try {
      content = await fs.readFile(this.sidecarPath(fullPath), 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw StorageError.fromNodeError(error, filepath);
    }
    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch {
      json = null;
    }
    const parsed = xattrSchema.safeParse(json);
    if (!parsed.success) {
      log.warn('Ignoring corrupted xattr sidecar', { filepath });
      return {};
    }
    return parsed.data;
  }

  private async writeXattrs(fullPath: string, xattrs: Record<string, string>): Promise<void> {
    const sidecar = this.sidecarPath(fullPath);
    if (Object.keys(xattrs).length === 0) {
      await fs.rm(sidecar, { force: true });
      return;
    }
    await fs.writeFile(sidecar, JSON.stringify(xattrs));
  }

  private async withSidecar<T>(fullPath: string, task: () => Promise<T>): Promise<T> {
    const key = this.sidecarPath(fullPath);
    const previous = this.sidecarQueues.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.sidecarQueues.set(key, settled);
    try {
      return await run;
    } finally {
      if (this.sidecarQueues.get(key) === settled) {
        this.sidecarQueues.delete(key);
      }
    }
  }

  async getxattr(filepath: string, userid: string, key: string): Promise<string | undefined> {
    // Fails with ENOENT when the file itself is gone
    await this.stat(filepath, userid);
    const fullPath = this.resolvePath(filepath);
    const xattrs = await this.withSidecar(fullPath, () => this.readXattrs(fullPath, filepath));
    return xattrs[key];
  }

  async setxattr(filepath: string, userid: string, key: string, value: string | number): Promise<void> {
    await this.stat(filepath, userid);
    const fullPath = this.resolvePath(filepath);
    await this.withSidecar(fullPath, async () => {
      const xattrs = await this.readXattrs(fullPath, filepath);
      xattrs[key] = String(value);
      await this.writeXattrs(fullPath, xattrs);
    });
  }

  async rmxattr(filepath: string, userid: string, key: string): Promise<void> {
    await this.stat(filepath, userid);
    const fullPath = this.resolvePath(filepath);
    await this.withSidecar(fullPath, async () => {
      const xattrs = await this.readXattrs(fullPath, filepath);
      if (!(key in xattrs)) {
        return;
      }
      delete xattrs[key];
      await this.writeXattrs(fullPath, xattrs);
    });
  }

  async updatexattr<T>(
    filepath: string,
    userid: string,
    key: string,
    update: (current: string | undefined) => XattrUpdate<T>
  ): Promise<T> {
    await this.stat(filepath, userid);
    const fullPath = this.resolvePath(filepath);
    return this.withSidecar(fullPath, async () => {
      const xattrs = await this.readXattrs(fullPath, filepath);
      const current = xattrs[key];
      const { value, result } = update(current);
      if (value !== current) {
        if (value === undefined) {
          delete xattrs[key];
        } else {
          xattrs[key] = value;
        }
        await this.writeXattrs(fullPath, xattrs);
      }
      return result;
    });
  }

  async readFile(filepath: string, userid: string): Promise<Readable> {
    const { size } = await this.stat(filepath, userid);
    const fullPath = this.resolvePath(filepath);
    log.debug('File open for read', { filepath, size });
    return createReadStream(fullPath, { highWaterMark: Math.max(1, Math.min(this.chunksize, size)) });
  }

  async writeFile(filepath: string, userid: string, content: Buffer, options: WriteOptions = {}): Promise<void> {
    this.checkUserid(userid);
    const fullPath = this.resolvePath(filepath);
    const islock = options.islock === true;
    const start = Date.now();
    try {
      // Plain writes truncate in place so that the inode, hence the file id, is kept
      await fs.writeFile(fullPath, content, { flag: islock ? 'wx' : 'w' });
    } catch (error) {
      const storageError = StorageError.fromNodeError(error, filepath);
      if (storageError.code === 'EEXIST') {
        log.info('File exists on write but islock flag requested', { filepath });
      } else {
        log.warn('Error writing the file', { filepath, error: storageError.message });
      }
      throw storageError;
    }
    log.info('File written successfully', {
      filepath,
      size: content.length,
      elapsedTimeMs: Date.now() - start,
      islock,
    });
  }

  async renameFile(origfilepath: string, newfilepath: string, userid: string): Promise<void> {
    this.checkUserid(userid);
    const origPath = this.resolvePath(origfilepath);
    const newPath = this.resolvePath(newfilepath);
    try {
      await fs.rename(origPath, newPath);
    } catch (error) {
      throw StorageError.fromNodeError(error, origfilepath);
    }
    // Extended attributes follow the file
    try {
      await fs.rename(this.sidecarPath(origPath), this.sidecarPath(newPath));
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw StorageError.fromNodeError(error, origfilepath);
      }
    }
    log.info('File renamed', { origfilepath, newfilepath });
  }

  async removeFile(filepath: string, userid: string): Promise<void> {
    this.checkUserid(userid);
    const fullPath = this.resolvePath(filepath);
    try {
      await fs.unlink(fullPath);
    } catch (error) {
      throw StorageError.fromNodeError(error, filepath);
    }
    await fs.rm(this.sidecarPath(fullPath), { force: true });
    log.info('File removed', { filepath });
  }
}
