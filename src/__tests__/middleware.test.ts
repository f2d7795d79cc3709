import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import express from 'express';
import fs from 'fs/promises';
import request from 'supertest';
import { ConfigStore, loadConfig, resolveConfigPaths, serializeConfig, type ConfigPaths } from '../config/index.js';
import { getLogLevel, setLogLevel } from '../lib/logger.js';
import { StorageError } from '../lib/storage/index.js';
import { configRefreshMiddleware } from '../middleware/configRefresh.js';
import { AppError, errorHandler } from '../middleware/error.js';
import { requestContextMiddleware } from '../middleware/requestLogger.js';
import { baseRawConfig, makeTempDir } from './helpers.js';

const buildErrorApp = (env: string) => {
    const app = express();
    app.set('env', env);
    app.use(requestContextMiddleware);
    app.get('/boom', () => {
        throw new Error('disk on fire');
    });
    app.get('/denied', () => {
        throw new StorageError('Path outside of the storage home', 'EACCES', '../etc');
    });
    app.get('/conflict', () => {
        throw AppError.conflict('Already there');
    });
    app.use(errorHandler);
    return app;
};

describe('Error handler', () => {
    it('should hide internal errors outside development', async () => {
        const res = await request(buildErrorApp('production')).get('/boom').set('X-Request-ID', 'test-request');

        expect(res.status).toBe(500);
        expect(res.headers['x-request-id']).toBe('test-request');
        expect(res.body).toEqual({ error: 'Internal error', code: 'INTERNAL_ERROR', requestId: 'test-request' });
    });

    it('should expose the message and stack in development', async () => {
        const res = await request(buildErrorApp('development')).get('/boom');

        expect(res.status).toBe(500);
        expect(res.body.error).toBe('disk on fire');
        expect(res.body.stack.startsWith('Error: disk on fire')).toBe(true);
    });

    it('should map storage errors to HTTP statuses', async () => {
        const res = await request(buildErrorApp('production')).get('/denied');

        expect(res.status).toBe(403);
        expect(res.body).toMatchObject({ error: 'Path outside of the storage home', code: 'AUTHORIZATION_ERROR' });
    });

    it('should keep the code of application errors', async () => {
        const res = await request(buildErrorApp('production')).get('/conflict');

        expect(res.status).toBe(409);
        expect(res.body).toMatchObject({ error: 'Already there', code: 'CONFLICT' });
    });
});

describe('Configuration refresh', () => {
    let dir: string;
    let paths: ConfigPaths;
    let previousLevel: string;

    const buildRefreshApp = (store: ConfigStore) => {
        const app = express();
        app.set('env', 'production');
        app.use(configRefreshMiddleware(store));
        app.get('/', (req, res) => {
            res.json({ env: req.app.get('env'), tokenvalidity: store.config.general.tokenvalidity });
        });
        return app;
    };

    beforeEach(async () => {
        previousLevel = getLogLevel();
        dir = await makeTempDir('refresh');
        paths = resolveConfigPaths({ WOPI_CONFIG_DIR: dir });
        await fs.writeFile(paths.defaultsPath, serializeConfig(baseRawConfig(dir)));
    });

    afterEach(async () => {
        setLogLevel(previousLevel);
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('should apply the new log level and token validity', async () => {
        // Last read long ago, the first request refreshes
        const store = new ConfigStore(paths, loadConfig(paths), 0);
        await fs.writeFile(paths.overridePath, '[general]\nloglevel = Debug\ntokenvalidity = 600\n');

        const res = await request(buildRefreshApp(store)).get('/');

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ env: 'development', tokenvalidity: 600 });
        expect(getLogLevel()).toBe('debug');
    });

    it('should not re-read a fresh configuration', async () => {
        const store = new ConfigStore(paths, loadConfig(paths));
        await fs.writeFile(paths.overridePath, '[general]\ntokenvalidity = 600\n');

        const res = await request(buildRefreshApp(store)).get('/');

        expect(res.body).toEqual({ env: 'production', tokenvalidity: 86400 });
    });

    it('should keep serving when the configuration became invalid', async () => {
        const store = new ConfigStore(paths, loadConfig(paths), 0);
        await fs.writeFile(paths.overridePath, '[general]\nport = none\n');

        const res = await request(buildRefreshApp(store)).get('/');

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ env: 'production', tokenvalidity: 86400 });
    });
});
