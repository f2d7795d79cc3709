import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { LocalStorage } from '../lib/storage/index.js';
import {
    conflictFileName,
    createOfficeLock,
    getForeignOfficeLock,
    hasConflict,
    isOfficeFile,
    officeLockContent,
    officeLockName,
    removeOfficeLock,
    type WopiFileRef,
} from '../lib/wopi/index.js';
import { makeTempDir } from './helpers.js';

describe('Office lock files', () => {
    describe('isOfficeFile', () => {
        it('should treat unlisted extensions as Office documents', () => {
            expect(isOfficeFile('/docs/report.DOCX', ['.txt', '.md'])).toBe(true);
            expect(isOfficeFile('/docs/notes.txt', ['.txt', '.md'])).toBe(false);
            expect(isOfficeFile('/docs/README.MD', ['.txt', '.md'])).toBe(false);
        });

        it('should not treat files without extension as Office documents', () => {
            expect(isOfficeFile('/docs/Makefile', [])).toBe(false);
        });
    });

    describe('officeLockName', () => {
        it('should name the lock file next to the document', () => {
            expect(officeLockName('/docs/report.docx')).toBe('/docs/.~lock.report.docx#');
        });
    });

    describe('officeLockContent', () => {
        it('should follow the LibreOffice format', () => {
            expect(officeLockContent('https://wopi.test', new Date(2024, 0, 15, 9, 5))).toBe(
                ',Collaborative Online Editor,https://wopi.test,15.01.2024 09:05,WOPIServer;'
            );
        });
    });

    describe('on storage', () => {
        let home: string;
        let file: WopiFileRef;

        beforeEach(async () => {
            home = await makeTempDir('office');
            await fs.writeFile(path.join(home, 'report.docx'), 'content');
            file = {
                storage: new LocalStorage({ homepath: home, chunksize: 1024 }),
                filename: '/report.docx',
                userid: '1000:1000',
            };
        });

        afterEach(async () => {
            await fs.rm(home, { recursive: true, force: true });
        });

        it('should find no foreign lock without a lock file', async () => {
            expect(await getForeignOfficeLock(file)).toBeNull();
        });

        it('should not report its own lock file as foreign', async () => {
            await createOfficeLock(file, 'https://wopi.test');
            // Repeated LOCKs find the file already there
            await createOfficeLock(file, 'https://wopi.test');

            const content = await fs.readFile(path.join(home, '.~lock.report.docx#'), 'utf-8');
            expect(content.startsWith(',Collaborative Online Editor,https://wopi.test,')).toBe(true);
            expect(await getForeignOfficeLock(file)).toBeNull();
        });

        it('should report a lock file written by a desktop application', async () => {
            await fs.writeFile(
                path.join(home, '.~lock.report.docx#'),
                ',Jane Doe,laptop,15.01.2024 09:05,file:///home/jane/.config/libreoffice/4;\n'
            );

            expect(await getForeignOfficeLock(file)).toBe(
                ',Jane Doe,laptop,15.01.2024 09:05,file:///home/jane/.config/libreoffice/4;'
            );
        });

        it('should remove the lock file, and tolerate its absence', async () => {
            await createOfficeLock(file, 'https://wopi.test');

            await removeOfficeLock(file);
            await removeOfficeLock(file);

            expect(await fs.readdir(home)).toEqual(['report.docx']);
        });

        it('should not remove a lock file written by a desktop application', async () => {
            await fs.writeFile(path.join(home, '.~lock.report.docx#'), ',Jane Doe,laptop,15.01.2024 09:05,file:///home/jane;');

            await removeOfficeLock(file);

            expect(await fs.readFile(path.join(home, '.~lock.report.docx#'), 'utf-8')).toBe(
                ',Jane Doe,laptop,15.01.2024 09:05,file:///home/jane;'
            );
        });
    });
});

describe('Conflict detection', () => {
    describe('conflictFileName', () => {
        const when = new Date(2024, 0, 15, 9, 30, 5);

        it('should insert the timestamp before the extension', () => {
            expect(conflictFileName('/docs/report.docx', when)).toBe('/docs/report_conflict-20240115-093005.docx');
        });

        it('should append the timestamp to names without extension', () => {
            expect(conflictFileName('/docs/README', when)).toBe('/docs/README_conflict-20240115-093005');
        });
    });

    describe('hasConflict', () => {
        it('should report a conflict when the save time is unknown', () => {
            expect(hasConflict(undefined, 1700000000)).toBe(true);
        });

        it('should report a conflict when the file is gone', () => {
            expect(hasConflict(1700000000, undefined)).toBe(true);
        });

        it('should report a conflict when the file changed after the last save', () => {
            expect(hasConflict(1700000000, 1700000001)).toBe(true);
        });

        it('should accept a file not modified since the last save', () => {
            expect(hasConflict(1700000000, 1700000000)).toBe(false);
            expect(hasConflict(1700000000, 1699999999)).toBe(false);
        });
    });
});
