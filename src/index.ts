import fs from 'fs';
import http from 'http';
import https from 'https';
import { getServerVersion } from './lib/env.js';
import {
  ConfigError,
  ConfigStore,
  getWopiUrl,
  loadConfig,
  resolveConfigPaths,
  type ServerConfig,
} from './config/index.js';
import { configureLogger, logger, toPinoLevel } from './lib/logger.js';
import { loadSecrets } from './lib/secrets.js';
import { createStorage } from './lib/storage/index.js';
import { createApp } from './app.js';

// Force shutdown after this delay
const SHUTDOWN_TIMEOUT_MS = 30 * 1000;

function createServer(config: ServerConfig, app: http.RequestListener): http.Server {
  const { usehttps, wopicert, wopikey } = config.security;
  if (usehttps && wopicert && wopikey) {
    return https.createServer({ cert: fs.readFileSync(wopicert), key: fs.readFileSync(wopikey) }, app);
  }
  return http.createServer(app);
}

const start = async () => {
  const paths = resolveConfigPaths();

  let config: ServerConfig;
  try {
    config = loadConfig(paths);
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.fatal('Failed to load configuration', { ...paths }, err);
    process.exit(1);
  }

  configureLogger({ level: toPinoLevel(config.general.loglevel), file: config.general.logfile });

  try {
    const secrets = await loadSecrets(config.security);
    const storage = createStorage(config);
    await storage.init();

    const store = new ConfigStore(paths, config);
    const app = createApp({ store, storage, secrets, version: getServerVersion() });
    const server = createServer(config, app);

    server.listen(config.general.port, () => {
      logger.info('WOPI server started', {
        port: config.general.port,
        https: config.security.usehttps,
        wopiurl: getWopiUrl(config),
        storagetype: storage.type,
        version: getServerVersion(),
      });
    });

    const gracefulShutdown = (signal: string) => {
      logger.info('Received shutdown signal, starting graceful shutdown...', { signal });

      server.close(() => {
        logger.info('Graceful shutdown completed');
        process.exit(0);
      });

      setTimeout(() => {
        logger.warn('Forced shutdown after timeout');
        process.exit(1);
      }, SHUTDOWN_TIMEOUT_MS).unref();
    };

    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    if (error instanceof ConfigError) {
      logger.fatal('Invalid configuration', { issues: error.issues }, err);
    } else {
      logger.fatal('Failed to start server', {}, err);
    }
    process.exit(1);
  }
};

void start();
