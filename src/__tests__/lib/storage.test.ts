import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import fs from 'fs/promises';
import {
    LocalStorage,
    StorageError,
    createStorage,
    isStorageError,
    readStream,
} from '../../lib/storage/index.js';
import { validateConfig } from '../../config/index.js';
import { baseRawConfig, makeTempDir } from '../helpers.js';

const USERID = '1000:1000';

const captureStorageError = async (promise: Promise<unknown>): Promise<StorageError> => {
    try {
        await promise;
    } catch (error) {
        if (error instanceof StorageError) {
            return error;
        }
        throw error;
    }
    throw new Error('Expected a StorageError');
};

describe('Local Storage', () => {
    let home: string;
    let storage: LocalStorage;

    beforeEach(async () => {
        home = await makeTempDir('storage');
        storage = new LocalStorage({ homepath: home, chunksize: 4 });
        await storage.init();
        await fs.mkdir(path.join(home, 'docs'));
        await fs.writeFile(path.join(home, 'docs', 'report.docx'), 'hello world');
    });

    afterEach(async () => {
        await fs.rm(home, { recursive: true, force: true });
    });

    describe('init', () => {
        it('should fail when the home path does not exist', async () => {
            const missing = new LocalStorage({ homepath: path.join(home, 'missing'), chunksize: 4 });

            expect((await captureStorageError(missing.init())).code).toBe('ENOENT');
        });

        it('should fail when the home path is a file', async () => {
            const notDir = new LocalStorage({ homepath: path.join(home, 'docs', 'report.docx'), chunksize: 4 });

            const error = await captureStorageError(notDir.init());

            expect(error.code).toBe('EINVAL');
            expect(error.message).toBe('Storage home path is not a directory');
        });
    });

    describe('createStorage', () => {
        it('should build the local backend from the configuration', () => {
            expect(createStorage(validateConfig(baseRawConfig(home))).type).toBe('local');
        });
    });

    describe('stat', () => {
        it('should describe a file', async () => {
            const stats = await fs.stat(path.join(home, 'docs', 'report.docx'));

            expect(await storage.stat('/docs/report.docx', USERID)).toEqual({
                inode: String(stats.ino),
                filepath: '/docs/report.docx',
                ownerid: `${stats.uid}:${stats.gid}`,
                size: 11,
                mtime: Math.floor(stats.mtimeMs / 1000),
            });
        });

        it('should report a missing file as ENOENT', async () => {
            const error = await captureStorageError(storage.stat('/docs/missing.docx', USERID));

            expect(error.code).toBe('ENOENT');
            expect(isStorageError(error, 'ENOENT')).toBe(true);
        });

        it('should refuse directories', async () => {
            expect((await captureStorageError(storage.stat('/docs', USERID))).code).toBe('EISDIR');
        });

        it('should refuse paths escaping the home path', async () => {
            const error = await captureStorageError(storage.stat('../../etc/passwd', USERID));

            expect(error.code).toBe('EACCES');
        });

        it('should accept names starting with two dots', async () => {
            await fs.writeFile(path.join(home, '..notes.docx'), 'draft');

            expect((await storage.stat('/..notes.docx', USERID)).size).toBe(5);
        });

        it('should refuse user ids that are not uid:gid', async () => {
            const error = await captureStorageError(storage.stat('/docs/report.docx', 'alice'));

            expect(error.code).toBe('EINVAL');
            expect(error.message).toBe('Only Unix-based userid is supported');
        });
    });

    describe('extended attributes', () => {
        it('should store, read and remove attributes', async () => {
            await storage.setxattr('/docs/report.docx', USERID, 'oc.wopi.lastwritetime', 1700000000);
            await storage.setxattr('/docs/report.docx', USERID, 'user.note', 'draft');

            expect(await storage.getxattr('/docs/report.docx', USERID, 'oc.wopi.lastwritetime')).toBe('1700000000');

            await storage.rmxattr('/docs/report.docx', USERID, 'oc.wopi.lastwritetime');

            expect(await storage.getxattr('/docs/report.docx', USERID, 'oc.wopi.lastwritetime')).toBeUndefined();
            expect(await storage.getxattr('/docs/report.docx', USERID, 'user.note')).toBe('draft');
        });

        it('should read a missing attribute as undefined', async () => {
            expect(await storage.getxattr('/docs/report.docx', USERID, 'user.none')).toBeUndefined();
        });

        it('should drop the sidecar once the last attribute is gone', async () => {
            await storage.setxattr('/docs/report.docx', USERID, 'user.note', 'draft');
            await storage.rmxattr('/docs/report.docx', USERID, 'user.note');

            expect(await fs.readdir(path.join(home, 'docs'))).toEqual(['report.docx']);
        });

        it('should ignore a corrupted sidecar', async () => {
            await fs.writeFile(path.join(home, 'docs', '.report.docx.xattr.json'), '{not json');

            expect(await storage.getxattr('/docs/report.docx', USERID, 'user.note')).toBeUndefined();
        });

        it('should keep concurrent updates', async () => {
            await Promise.all(
                ['a', 'b', 'c', 'd'].map((key) => storage.setxattr('/docs/report.docx', USERID, `user.${key}`, key))
            );

            for (const key of ['a', 'b', 'c', 'd']) {
                expect(await storage.getxattr('/docs/report.docx', USERID, `user.${key}`)).toBe(key);
            }
        });

        it('should update an attribute from its current value', async () => {
            const counter = (current: string | undefined) => {
                const value = String(Number(current ?? '0') + 1);
                return { value, result: value };
            };

            const results = await Promise.all(
                [1, 2, 3].map(() => storage.updatexattr('/docs/report.docx', USERID, 'user.count', counter))
            );

            expect(results.sort()).toEqual(['1', '2', '3']);
            expect(await storage.getxattr('/docs/report.docx', USERID, 'user.count')).toBe('3');
        });

        it('should remove an attribute updated to undefined', async () => {
            await storage.setxattr('/docs/report.docx', USERID, 'user.note', 'draft');

            const previous = await storage.updatexattr('/docs/report.docx', USERID, 'user.note', (current) => ({
                value: undefined,
                result: current,
            }));

            expect(previous).toBe('draft');
            expect(await fs.readdir(path.join(home, 'docs'))).toEqual(['report.docx']);
        });

        it('should fail on a missing file', async () => {
            const error = await captureStorageError(storage.setxattr('/docs/missing.docx', USERID, 'user.note', 'x'));

            expect(error.code).toBe('ENOENT');
        });
    });

    describe('readFile', () => {
        it('should stream the content in chunks', async () => {
            const stream = await storage.readFile('/docs/report.docx', USERID);
            const chunks = await new Promise<string[]>((resolve, reject) => {
                const received: string[] = [];
                stream.on('data', (chunk: Buffer) => received.push(chunk.toString()));
                stream.on('end', () => resolve(received));
                stream.on('error', reject);
            });

            expect(chunks).toEqual(['hell', 'o wo', 'rld']);
        });

        it('should read an empty file', async () => {
            await fs.writeFile(path.join(home, 'empty.txt'), '');

            expect((await readStream(await storage.readFile('/empty.txt', USERID))).length).toBe(0);
        });
    });

    describe('writeFile', () => {
        it('should replace the content in place', async () => {
            const before = await storage.stat('/docs/report.docx', USERID);

            await storage.writeFile('/docs/report.docx', USERID, Buffer.from('new'));

            const after = await storage.stat('/docs/report.docx', USERID);
            expect(after.inode).toBe(before.inode);
            expect(after.size).toBe(3);
            expect(await fs.readFile(path.join(home, 'docs', 'report.docx'), 'utf-8')).toBe('new');
        });

        it('should refuse to overwrite with islock', async () => {
            const error = await captureStorageError(
                storage.writeFile('/docs/report.docx', USERID, Buffer.from('lock'), { islock: true })
            );

            expect(error.code).toBe('EEXIST');
            expect(await fs.readFile(path.join(home, 'docs', 'report.docx'), 'utf-8')).toBe('hello world');
        });

        it('should create a new file with islock', async () => {
            await storage.writeFile('/docs/.~lock.report.docx#', USERID, Buffer.from('lock'), { islock: true });

            expect(await fs.readFile(path.join(home, 'docs', '.~lock.report.docx#'), 'utf-8')).toBe('lock');
        });
    });

    describe('renameFile', () => {
        it('should move the file with its attributes', async () => {
            await storage.setxattr('/docs/report.docx', USERID, 'user.note', 'draft');

            await storage.renameFile('/docs/report.docx', '/docs/final.docx', USERID);

            expect(await storage.getxattr('/docs/final.docx', USERID, 'user.note')).toBe('draft');
            expect((await captureStorageError(storage.stat('/docs/report.docx', USERID))).code).toBe('ENOENT');
        });

        it('should work without attributes', async () => {
            await storage.renameFile('/docs/report.docx', '/final.docx', USERID);

            expect((await storage.stat('/final.docx', USERID)).size).toBe(11);
        });
    });

    describe('removeFile', () => {
        it('should remove the file and its attributes', async () => {
            await storage.setxattr('/docs/report.docx', USERID, 'user.note', 'draft');

            await storage.removeFile('/docs/report.docx', USERID);

            expect(await fs.readdir(path.join(home, 'docs'))).toEqual([]);
        });

        it('should report a missing file as ENOENT', async () => {
            expect((await captureStorageError(storage.removeFile('/docs/missing.docx', USERID))).code).toBe('ENOENT');
        });
    });
});
