/**
 * WOPI Host Endpoints
 *
 * Implements the WOPI protocol for Office file editing via external WOPI clients.
 * https://docs.microsoft.com/en-us/microsoft-365/cloud-storage-partner-program/rest/
 */

import express, { Router, Request, Response, NextFunction } from 'express';
import path from 'path';
import { pipeline } from 'node:stream/promises';
import { getWopiUrl } from '../config/index.js';
import type { ServerContext } from '../context.js';
import { wopiLogger as logger } from '../lib/logger.js';
import { isStorageError } from '../lib/storage/index.js';
import {
    AccessTokenError,
    type AccessTokenPayload,
    extractTokenFromRequest,
    generateAccessToken,
    tokenUserId,
    verifyAccessToken,
} from '../lib/wopi/token.js';
import {
    acquireLock,
    clearSaveTime,
    getLock,
    getSaveTime,
    markSaveTime,
    refreshLock,
    releaseLock,
    unlockAndRelock,
    validateLock,
    type LockResult,
    type WopiFileRef,
} from '../lib/wopi/lockManager.js';
import { createOfficeLock, getForeignOfficeLock, isOfficeFile, removeOfficeLock } from '../lib/wopi/officeLock.js';
import { conflictFileName, hasConflict } from '../lib/wopi/conflict.js';
import { AppError } from '../middleware/error.js';

export const WOPI_OPERATIONS = [
    'LOCK',
    'REFRESH_LOCK',
    'UNLOCK',
    'GET_LOCK',
    'UNLOCK_AND_RELOCK',
    'PUT_RELATIVE',
    'DELETE',
    'DELETE_FILE',
    'RENAME_FILE',
] as const;

export type WopiOperation = (typeof WOPI_OPERATIONS)[number];

const isWopiOperation = (value: string): value is WopiOperation =>
    WOPI_OPERATIONS.some((operation) => operation === value);

// Tries before giving up on finding a free name for PutRelative
const MAX_RELATIVE_NAME_ATTEMPTS = 100;

interface WopiRequest {
    token: AccessTokenPayload;
    file: WopiFileRef;
}

type OperationHandler = (req: Request, res: Response, wopi: WopiRequest) => Promise<void>;

/**
 * Required header of a POST request
 * @throws AppError 400 if missing
 */
function requireHeader(req: Request, name: string): string {
    const value = req.get(name);
    if (!value) {
        throw AppError.badRequest(`Missing header ${name} in POST request`);
    }
    return value;
}

function requestBody(req: Request): Buffer {
    return Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
}

/**
 * Turn token and storage failures into their WOPI status codes
 */
function toHttpError(error: unknown, req: Request): unknown {
    if (error instanceof AccessTokenError) {
        logger.warn('Access token validation failed', { path: req.path, reason: error.message });
        return AppError.unauthorized('Invalid access token');
    }
    if (isStorageError(error, 'ENOENT')) {
        return AppError.notFound('File');
    }
    return error;
}

function requireWriteAccess(token: AccessTokenPayload): void {
    if (!token.canedit) {
        throw AppError.forbidden('Access token does not grant write access');
    }
}

function sendLockFailure(res: Response, result: LockResult, fallbackReason: string): void {
    res.setHeader('X-WOPI-Lock', result.existingLockId || '');
    res.setHeader('X-WOPI-LockFailureReason', result.reason || fallbackReason);
    res.status(409).json({ error: result.reason || fallbackReason });
}

export function createWopiRouter(ctx: ServerContext): Router {
    const router = Router();
    const { storage } = ctx;

    const rawBody = express.raw({ type: () => true, limit: ctx.store.config.io.maxfilesize });

    /**
     * Decode the access token of the request and bind it to its file
     */
    const authenticate = (req: Request, requireWrite: boolean): WopiRequest => {
        const accessToken = extractTokenFromRequest(req);
        if (!accessToken) {
            throw new AccessTokenError('Missing access token');
        }
        const token = verifyAccessToken(accessToken, ctx.secrets.wopisecret);
        if (requireWrite) {
            requireWriteAccess(token);
        }
        return {
            token,
            file: { storage, filename: token.filename, userid: tokenUserId(token) },
        };
    };

    const lockTimeout = (): number => ctx.store.config.general.locktimeout;

    const officeFile = (filename: string): boolean =>
        isOfficeFile(filename, ctx.store.config.general.nonofficetypes);

    const setItemVersion = async (res: Response, file: WopiFileRef): Promise<void> => {
        const stat = await storage.stat(file.filename, file.userid);
        res.setHeader('X-WOPI-ItemVersion', String(stat.mtime));
    };

    // =============================================================================
    // Lock operations
    // =============================================================================

    const handleUnlockAndRelock: OperationHandler = async (req, res, { file }) => {
        const lockId = requireHeader(req, 'X-WOPI-Lock');
        const oldLockId = requireHeader(req, 'X-WOPI-OldLock');

        const result = await unlockAndRelock(file, oldLockId, lockId, lockTimeout());
        if (!result.success) {
            sendLockFailure(res, result, 'Lock mismatch');
            return;
        }

        logger.info('Lock replaced', { filename: file.filename, oldLockId, lockId });
        await setItemVersion(res, file);
        res.status(200).end();
    };

    const handleLock: OperationHandler = async (req, res, wopi) => {
        const { file } = wopi;
        const lockId = requireHeader(req, 'X-WOPI-Lock');

        if (req.get('X-WOPI-OldLock')) {
            await handleUnlockAndRelock(req, res, wopi);
            return;
        }

        const office = officeFile(file.filename);
        if (office) {
            const foreignLock = await getForeignOfficeLock(file);
            if (foreignLock !== null) {
                logger.warn('File already locked by another application', {
                    filename: file.filename,
                    lockFile: foreignLock,
                });
                sendLockFailure(res, { success: false, reason: 'File locked by another application' }, 'Lock conflict');
                return;
            }
        }

        const result = await acquireLock(file, lockId, lockTimeout());
        if (!result.success) {
            sendLockFailure(res, result, 'Lock conflict');
            return;
        }

        if (!result.refreshed) {
            try {
                await markSaveTime(file);
            } catch (error) {
                // Saving will report a conflict instead of overwriting
                logger.warn('Unable to record the save time', {
                    filename: file.filename,
                    error: error instanceof Error ? error.message : 'Unknown',
                });
            }
        }
        if (office) {
            await createOfficeLock(file, getWopiUrl(ctx.store.config));
        }

        logger.info('File locked', { filename: file.filename, lockId, refreshed: result.refreshed === true });
        await setItemVersion(res, file);
        res.status(200).end();
    };

    const handleRefreshLock: OperationHandler = async (req, res, { file }) => {
        const lockId = requireHeader(req, 'X-WOPI-Lock');

        const result = await refreshLock(file, lockId, lockTimeout());
        if (!result.success) {
            sendLockFailure(res, result, 'Lock not found');
            return;
        }

        await setItemVersion(res, file);
        res.status(200).end();
    };

    const handleUnlock: OperationHandler = async (req, res, { file }) => {
        const lockId = requireHeader(req, 'X-WOPI-Lock');

        const result = await releaseLock(file, lockId);
        if (!result.success) {
            sendLockFailure(res, result, 'Lock mismatch');
            return;
        }

        if (result.alreadyUnlocked) {
            logger.debug('Nothing to unlock', { filename: file.filename, lockId });
            await setItemVersion(res, file);
            res.status(200).end();
            return;
        }

        await clearSaveTime(file);
        if (officeFile(file.filename)) {
            await removeOfficeLock(file);
        }

        logger.info('File unlocked', { filename: file.filename, lockId });
        await setItemVersion(res, file);
        res.status(200).end();
    };

    const handleGetLock: OperationHandler = async (_req, res, { file }) => {
        const lock = await getLock(file);
        res.setHeader('X-WOPI-Lock', lock ? lock.lockId : '');
        res.status(200).end();
    };

    // =============================================================================
    // File operations
    // =============================================================================

    /**
     * Write content under a new name next to the original file,
     * false when the target is taken and may not be overwritten
     */
    const writeRelative = async (
        file: WopiFileRef,
        target: string,
        content: Buffer,
        overwrite: boolean
    ): Promise<boolean> => {
        try {
            await storage.writeFile(target, file.userid, content, { islock: !overwrite });
            return true;
        } catch (error) {
            if (isStorageError(error, 'EEXIST')) {
                return false;
            }
            throw error;
        }
    };

    const handlePutRelative: OperationHandler = async (req, res, { token, file }) => {
        const suggestedTarget = req.get('X-WOPI-SuggestedTarget');
        const relativeTarget = req.get('X-WOPI-RelativeTarget');
        const overwriteRelative = req.get('X-WOPI-OverwriteRelativeTarget')?.toLowerCase() === 'true';

        if (!suggestedTarget && !relativeTarget) {
            throw AppError.badRequest('Missing header X-WOPI-SuggestedTarget in POST request');
        }

        const dir = path.posix.dirname(file.filename);
        const originalExt = path.posix.extname(file.filename);
        const originalBase = path.posix.basename(file.filename, originalExt);
        const content = requestBody(req);
        let newFileName: string;

        if (relativeTarget) {
            // Exact name, the client decides what happens when it is taken
            newFileName = path.posix.join(dir, path.posix.basename(relativeTarget));
            const target: WopiFileRef = { ...file, filename: newFileName };

            if (overwriteRelative) {
                const lock = await getLock(target).catch((error: unknown) => {
                    if (isStorageError(error, 'ENOENT')) {
                        return null;
                    }
                    throw error;
                });
                if (lock) {
                    res.setHeader('X-WOPI-Lock', lock.lockId);
                    res.status(409).json({ error: 'Target file is locked' });
                    return;
                }
            }

            if (!(await writeRelative(file, newFileName, content, overwriteRelative))) {
                const ext = path.posix.extname(newFileName);
                const base = path.posix.basename(newFileName, ext);
                res.setHeader('X-WOPI-ValidRelativeTarget', `${base}_${Date.now()}${ext}`);
                res.status(409).json({ error: 'File already exists' });
                return;
            }
        } else {
            // Suggested target can be extension only (starts with .) or full name
            const suggested = suggestedTarget || '';
            const wanted = suggested.startsWith('.')
                ? `${originalBase}${suggested}`
                : path.posix.basename(suggested);
            const ext = path.posix.extname(wanted);
            const base = path.posix.basename(wanted, ext);

            let written: string | null = null;
            for (let attempt = 1; attempt <= MAX_RELATIVE_NAME_ATTEMPTS && !written; attempt++) {
                const candidate = path.posix.join(dir, attempt === 1 ? wanted : `${base} (${attempt})${ext}`);
                if (await writeRelative(file, candidate, content, false)) {
                    written = candidate;
                }
            }
            if (!written) {
                res.status(409).json({ error: 'No free file name found' });
                return;
            }
            newFileName = written;
        }

        const stat = await storage.stat(newFileName, file.userid);
        const { token: newToken } = generateAccessToken(
            { ruid: token.ruid, rgid: token.rgid, filename: newFileName, canedit: token.canedit, mtime: stat.mtime },
            ctx.secrets.wopisecret,
            ctx.store.config.general.tokenvalidity
        );

        logger.info('File written under a new name', { filename: file.filename, newFileName, size: content.length });

        const url = new URL(`${getWopiUrl(ctx.store.config)}/wopi/files/${stat.inode}`);
        url.searchParams.set('access_token', newToken);
        res.json({
            Name: path.posix.basename(newFileName),
            Url: url.toString(),
        });
    };

    const handleDelete: OperationHandler = async (_req, res, { file }) => {
        const lock = await getLock(file);
        if (lock) {
            res.setHeader('X-WOPI-Lock', lock.lockId);
            res.status(409).json({ error: 'File is locked' });
            return;
        }

        await storage.removeFile(file.filename, file.userid);
        logger.info('File deleted', { filename: file.filename });
        res.status(200).end();
    };

    const handleRenameFile: OperationHandler = async (req, res, { file }) => {
        const requestedName = requireHeader(req, 'X-WOPI-RequestedName');

        const validation = await validateLock(file, req.get('X-WOPI-Lock'));
        if (!validation.valid) {
            res.setHeader('X-WOPI-Lock', validation.existingLockId || '');
            res.status(409).json({ error: 'Lock mismatch' });
            return;
        }

        if (requestedName.includes('/') || requestedName === '.' || requestedName === '..') {
            res.setHeader('X-WOPI-InvalidFileNameError', 'Invalid file name');
            res.status(400).json({ error: 'Invalid file name' });
            return;
        }

        // The requested name comes without extension
        const ext = path.posix.extname(file.filename);
        const newFileName = path.posix.join(path.posix.dirname(file.filename), `${requestedName}${ext}`);

        const targetExists = await storage.stat(newFileName, file.userid).then(
            () => true,
            (error: unknown) => {
                if (isStorageError(error, 'ENOENT')) {
                    return false;
                }
                throw error;
            }
        );
        if (targetExists) {
            res.setHeader('X-WOPI-InvalidFileNameError', 'File already exists');
            res.status(400).json({ error: 'File already exists' });
            return;
        }

        const locked = (await getLock(file)) !== null;
        await storage.renameFile(file.filename, newFileName, file.userid);

        // The desktop lock file follows the document
        if (officeFile(file.filename) && locked) {
            await removeOfficeLock(file);
            await createOfficeLock({ ...file, filename: newFileName }, getWopiUrl(ctx.store.config));
        }

        logger.info('File renamed', { filename: file.filename, newFileName });
        res.json({ Name: requestedName });
    };

    const operations: Record<WopiOperation, { handler: OperationHandler; write: boolean }> = {
        LOCK: { handler: handleLock, write: true },
        REFRESH_LOCK: { handler: handleRefreshLock, write: true },
        UNLOCK: { handler: handleUnlock, write: true },
        GET_LOCK: { handler: handleGetLock, write: false },
        UNLOCK_AND_RELOCK: { handler: handleUnlockAndRelock, write: true },
        PUT_RELATIVE: { handler: handlePutRelative, write: true },
        DELETE: { handler: handleDelete, write: true },
        DELETE_FILE: { handler: handleDelete, write: true },
        RENAME_FILE: { handler: handleRenameFile, write: true },
    };

    // =============================================================================
    // WOPI Endpoints
    // =============================================================================

    /**
     * CheckFileInfo
     * GET /wopi/files/{fileid}
     *
     * Returns information about the file and permissions for the user.
     */
    router.get('/files/:fileid', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { token, file } = authenticate(req, false);
            const stat = await storage.stat(file.filename, file.userid);
            const canedit = token.canedit;

            const checkFileInfo: Record<string, unknown> = {
                BaseFileName: path.posix.basename(file.filename),
                OwnerId: stat.ownerid,
                UserId: file.userid,
                Size: stat.size,
                Version: String(stat.mtime),

                // Permissions
                SupportsUpdate: canedit,
                UserCanWrite: canedit,
                UserCanNotWriteRelative: !canedit,

                // Capabilities
                SupportsLocks: canedit,
                SupportsGetLock: canedit,
                SupportsExtendedLockLength: true,
                SupportsRename: canedit,
                UserCanRename: canedit,
                SupportsDeleteFile: canedit,
            };

            const { downloadurl } = ctx.store.config.general;
            if (downloadurl) {
                const query = new URLSearchParams({
                    dir: path.posix.dirname(file.filename),
                    files: path.posix.basename(file.filename),
                });
                checkFileInfo.DownloadUrl = `${downloadurl}?${query.toString()}`;
            }

            logger.debug('CheckFileInfo', { filename: file.filename, fileid: req.params.fileid, canedit });
            res.json(checkFileInfo);
        } catch (error) {
            next(toHttpError(error, req));
        }
    });

    /**
     * GetFile
     * GET /wopi/files/{fileid}/contents
     *
     * Returns the binary contents of the file.
     */
    router.get('/files/:fileid/contents', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { token, file } = authenticate(req, false);
            const stream = await storage.readFile(file.filename, file.userid);

            res.setHeader('X-WOPI-ItemVersion', String(token.mtime));
            res.setHeader('Content-Type', 'application/octet-stream');
            logger.info('GetFile', { filename: file.filename, fileid: req.params.fileid });

            await pipeline(stream, res);
        } catch (error) {
            next(toHttpError(error, req));
        }
    });

    /**
     * PutFile
     * POST /wopi/files/{fileid}/contents
     *
     * Updates the binary contents of the file. If the file changed behind the
     * editor's back, the content is saved as a conflict copy instead.
     */
    router.post('/files/:fileid/contents', rawBody, async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { file } = authenticate(req, true);
            const content = requestBody(req);

            type LockValidation = Awaited<ReturnType<typeof validateLock>>;
            const validation = await validateLock(file, req.get('X-WOPI-Lock')).catch((error: unknown): LockValidation => {
                // A deleted file cannot be locked, leave it to the conflict check
                if (isStorageError(error, 'ENOENT')) {
                    return { valid: true };
                }
                throw error;
            });
            if (!validation.valid) {
                res.setHeader('X-WOPI-Lock', validation.existingLockId || '');
                res.setHeader('X-WOPI-LockFailureReason', 'Lock mismatch');
                res.status(409).json({ error: 'Lock mismatch' });
                return;
            }

            const savetime = await getSaveTime(file);
            const mtime = await storage.stat(file.filename, file.userid).then(
                (stat) => stat.mtime,
                (error: unknown) => {
                    if (isStorageError(error, 'ENOENT')) {
                        return undefined;
                    }
                    throw error;
                }
            );

            if (hasConflict(savetime, mtime)) {
                const conflictName = conflictFileName(file.filename);
                await storage.writeFile(conflictName, file.userid, content);
                logger.info('Conflicting copy created', { filename: file.filename, conflictName, savetime, mtime });
                res.setHeader('X-WOPI-ServerError', 'Conflicting copy created');
                res.status(500).json({ error: 'Conflicting copy created' });
                return;
            }

            await storage.writeFile(file.filename, file.userid, content);
            await markSaveTime(file);

            logger.info('File successfully written', { filename: file.filename, size: content.length });
            await setItemVersion(res, file);
            res.status(200).end();
        } catch (error) {
            next(toHttpError(error, req));
        }
    });

    /**
     * POST /wopi/files/{fileid}
     * X-WOPI-Override: LOCK | REFRESH_LOCK | UNLOCK | GET_LOCK | UNLOCK_AND_RELOCK
     *                  PUT_RELATIVE | DELETE | DELETE_FILE | RENAME_FILE
     */
    router.post('/files/:fileid', rawBody, async (req: Request, res: Response, next: NextFunction) => {
        try {
            const wopi = authenticate(req, false);

            const override = requireHeader(req, 'X-WOPI-Override').toUpperCase();
            if (!isWopiOperation(override)) {
                throw AppError.badRequest(`Unknown operation ${override} found in header`);
            }

            const operation = operations[override];
            if (operation.write) {
                requireWriteAccess(wopi.token);
            }

            logger.debug('WOPI operation', {
                operation: override,
                user: wopi.file.userid,
                filename: wopi.file.filename,
                fileid: req.params.fileid,
            });
            await operation.handler(req, res, wopi);
        } catch (error) {
            next(toHttpError(error, req));
        }
    });

    return router;
}
