import type { ConfigStore } from './config/index.js';
import type { HostResolver } from './lib/clientAuth.js';
import type { Secrets } from './lib/secrets.js';
import type { StorageBackend } from './lib/storage/index.js';

/**
 * Everything the HTTP layer needs, built once at startup
 */
export interface ServerContext {
  store: ConfigStore;
  storage: StorageBackend;
  secrets: Secrets;
  version: string;
  // Resolves allowedclients host names, DNS unless overridden
  resolveHost?: HostResolver;
}
