import type { Readable } from 'stream';
import type { StorageType } from '../../config/schema.js';

export interface FileStat {
  // Stable file identifier, used as the WOPI file id
  inode: string;
  filepath: string;
  // uid:gid of the owner
  ownerid: string;
  size: number;
  // Seconds since the epoch
  mtime: number;
}

/**
 * Outcome of an attribute update: the new value (undefined removes the
 * attribute) and what the caller gets back.
 */
export interface XattrUpdate<T> {
  value: string | undefined;
  result: T;
}

export interface WriteOptions {
  // Create the file exclusively, failing with EEXIST if it is already there
  islock?: boolean;
}

/**
 * A storage backend. Paths are relative to the backend's home path and
 * every operation runs on behalf of a `uid:gid` user id.
 */
export interface StorageBackend {
  readonly type: StorageType;

  init(): Promise<void>;

  stat(filepath: string, userid: string): Promise<FileStat>;

  getxattr(filepath: string, userid: string, key: string): Promise<string | undefined>;
  setxattr(filepath: string, userid: string, key: string, value: string | number): Promise<void>;
  rmxattr(filepath: string, userid: string, key: string): Promise<void>;
  // Read, decide and write an attribute with no other update in between
  updatexattr<T>(
    filepath: string,
    userid: string,
    key: string,
    update: (current: string | undefined) => XattrUpdate<T>
  ): Promise<T>;

  readFile(filepath: string, userid: string): Promise<Readable>;
  writeFile(filepath: string, userid: string, content: Buffer, options?: WriteOptions): Promise<void>;
  renameFile(origfilepath: string, newfilepath: string, userid: string): Promise<void>;
  removeFile(filepath: string, userid: string): Promise<void>;
}
