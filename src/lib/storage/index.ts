import type { Readable } from 'stream';
import type { ServerConfig } from '../../config/index.js';
import { LocalStorage } from './localStorage.js';
import type { StorageBackend } from './types.js';

export * from './types.js';
export * from './errors.js';
export { LocalStorage } from './localStorage.js';

/**
 * Instantiate the backend selected by general.storagetype
 */
export function createStorage(config: ServerConfig): StorageBackend {
  switch (config.general.storagetype) {
    case 'local':
      return new LocalStorage({
        homepath: config.local.storagehomepath,
        chunksize: config.io.chunksize,
      });
  }
}

export async function readStream(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}
