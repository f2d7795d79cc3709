import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Express } from 'express';
import { createApp } from '../app.js';
import { ConfigStore, validateConfig, type RawConfig } from '../config/index.js';
import type { ServerContext } from '../context.js';
import type { HostResolver } from '../lib/clientAuth.js';
import { LocalStorage } from '../lib/storage/index.js';
import { generateAccessToken } from '../lib/wopi/token.js';

export const WOPI_SECRET = 'test-secret';
export const IOP_SECRET = 'test-iop-secret';
export const RUID = '1000';
export const RGID = '1000';
export const USERID = `${RUID}:${RGID}`;
export const WOPI_URL = 'https://wopi.test';
export const IOP_HOST = 'iop.test';

export const makeTempDir = (prefix: string): Promise<string> =>
    fs.mkdtemp(path.join(os.tmpdir(), `wopi-${prefix}-`));

export const baseRawConfig = (homepath: string): RawConfig => ({
    general: {
        storagetype: 'local',
        port: '8080',
        nonofficetypes: '.txt .md',
        loglevel: 'Info',
        allowedclients: IOP_HOST,
        downloadurl: 'https://files.test/download',
        wopiurl: WOPI_URL,
    },
    security: {
        usehttps: 'no',
        wopisecretfile: '/unused/wopisecret',
        iopsecretfile: '/unused/iopsecret',
    },
    local: {
        storagehomepath: homepath,
    },
    io: {
        chunksize: '4',
        maxfilesize: '1024',
    },
});

export interface TestServer {
    app: Express;
    ctx: ServerContext;
    home: string;
    storage: LocalStorage;
    /** Access token for a file of the test user, with the file's current mtime */
    token: (filename: string, canedit?: boolean) => Promise<string>;
    cleanup: () => Promise<void>;
}

// The IOP host resolves to the loopback addresses supertest connects from
export const loopbackResolver: HostResolver = async (host) =>
    host === IOP_HOST ? ['127.0.0.1', '::1'] : [];

export async function createTestServer(resolveHost: HostResolver = loopbackResolver): Promise<TestServer> {
    const home = await makeTempDir('home');
    const config = validateConfig(baseRawConfig(home));
    const store = new ConfigStore({ defaultsPath: '/unused/defaults.conf', overridePath: '/unused/override.conf' }, config);
    const storage = new LocalStorage({ homepath: home, chunksize: config.io.chunksize });
    await storage.init();

    const ctx: ServerContext = {
        store,
        storage,
        secrets: { wopisecret: WOPI_SECRET, iopsecret: IOP_SECRET },
        version: 'test',
        resolveHost,
    };

    return {
        app: createApp(ctx),
        ctx,
        home,
        storage,
        token: async (filename, canedit = true) => {
            const { mtime } = await storage.stat(filename, USERID);
            return generateAccessToken({ ruid: RUID, rgid: RGID, filename, canedit, mtime }, WOPI_SECRET, 3600).token;
        },
        cleanup: () => fs.rm(home, { recursive: true, force: true }),
    };
}
