/**
 * WOPI Lock Manager
 *
 * Manages file locks for WOPI edit operations. Locks live on the storage
 * itself, as an extended attribute of the locked file, so they survive
 * restarts and are shared by every server using the same storage.
 */

import { z } from 'zod';
import { wopiLogger as logger } from '../logger.js';
import { isStorageError, type StorageBackend } from '../storage/index.js';
import { removeOfficeLock } from './officeLock.js';

// xattr keys used for locking and conflict resolution on the storage
export const WOPI_LOCK_KEY = 'oc.wopi.lock';
export const LAST_SAVE_TIME_KEY = 'oc.wopi.lastwritetime';

/**
 * A file as seen by the user a token was issued for
 */
export interface WopiFileRef {
    storage: StorageBackend;
    filename: string;
    userid: string;
}

export interface LockInfo {
    lockId: string;
    userid: string;
    expiresAt: Date;
    createdAt: Date;
}

export interface LockResult {
    success: boolean;
    lockId?: string;
    existingLockId?: string;
    reason?: string;
    // Set when LOCK was repeated with the lock id already held
    refreshed?: boolean;
    // Set when UNLOCK found nothing to release
    alreadyUnlocked?: boolean;
}

const lockRecordSchema = z.object({
    lockId: z.string(),
    userid: z.string(),
    expiresAt: z.string().datetime(),
    createdAt: z.string().datetime(),
});

function parseLockRecord(value: string | undefined, filename: string): LockInfo | null {
    if (value === undefined) {
        return null;
    }

    let json: unknown;
    try {
        json = JSON.parse(value);
    } catch {
        json = null;
    }
    const parsed = lockRecordSchema.safeParse(json);
    if (!parsed.success) {
        // Invalid data, treat as unlocked so that it gets overwritten
        logger.warn('Ignoring invalid lock record', { filename });
        return null;
    }

    return {
        lockId: parsed.data.lockId,
        userid: parsed.data.userid,
        expiresAt: new Date(parsed.data.expiresAt),
        createdAt: new Date(parsed.data.createdAt),
    };
}

function serializeLockRecord(lock: LockInfo): string {
    return JSON.stringify({
        lockId: lock.lockId,
        userid: lock.userid,
        expiresAt: lock.expiresAt.toISOString(),
        createdAt: lock.createdAt.toISOString(),
    });
}

const expiryFromNow = (ttlSeconds: number): Date => new Date(Date.now() + ttlSeconds * 1000);

const isExpired = (lock: LockInfo): boolean => lock.expiresAt.getTime() < Date.now();

interface LockDecision<T> {
    result: T;
    // New lock record, null to remove it, omitted to leave it as is
    next?: LockInfo | null;
}

/**
 * Read the current lock, decide and store the outcome as one step, so that
 * concurrent requests on the same file see each other's locks.
 * An expired lock is seen as no lock and removed with this server's lock file.
 */
async function updateLock<T>(file: WopiFileRef, decide: (current: LockInfo | null) => LockDecision<T>): Promise<T> {
    const { result, expiredLock } = await file.storage.updatexattr(
        file.filename,
        file.userid,
        WOPI_LOCK_KEY,
        (value) => {
            const stored = parseLockRecord(value, file.filename);
            const expired = stored !== null && isExpired(stored);
            const decision = decide(expired ? null : stored);

            let next: string | undefined;
            if (decision.next === undefined) {
                next = expired ? undefined : value;
            } else {
                next = decision.next === null ? undefined : serializeLockRecord(decision.next);
            }
            return {
                value: next,
                result: { result: decision.result, expiredLock: expired && next === undefined ? stored : null },
            };
        }
    );

    if (expiredLock) {
        logger.debug('Expired lock removed', { filename: file.filename, lockId: expiredLock.lockId });
        await removeOfficeLock(file);
    }
    return result;
}

/**
 * Acquire a lock on a file
 */
export async function acquireLock(file: WopiFileRef, lockId: string, ttlSeconds: number): Promise<LockResult> {
    return updateLock(file, (existingLock): LockDecision<LockResult> => {
        if (existingLock) {
            // Same lock ID - this is a refresh, extend the expiry
            if (existingLock.lockId === lockId) {
                return {
                    result: { success: true, lockId, refreshed: true },
                    next: { ...existingLock, expiresAt: expiryFromNow(ttlSeconds) },
                };
            }

            // Active lock by someone else
            return { result: { success: false, existingLockId: existingLock.lockId, reason: 'Lock conflict' } };
        }

        return {
            result: { success: true, lockId },
            next: { lockId, userid: file.userid, expiresAt: expiryFromNow(ttlSeconds), createdAt: new Date() },
        };
    });
}

/**
 * Refresh an existing lock (extend TTL)
 */
export async function refreshLock(file: WopiFileRef, lockId: string, ttlSeconds: number): Promise<LockResult> {
    return updateLock(file, (existingLock): LockDecision<LockResult> => {
        if (!existingLock) {
            return { result: { success: false, reason: 'Lock not found' } };
        }

        if (existingLock.lockId !== lockId) {
            return { result: { success: false, existingLockId: existingLock.lockId, reason: 'Lock ID mismatch' } };
        }

        return {
            result: { success: true, lockId },
            next: { ...existingLock, expiresAt: expiryFromNow(ttlSeconds) },
        };
    });
}

/**
 * Release a lock
 */
export async function releaseLock(file: WopiFileRef, lockId: string): Promise<LockResult> {
    return updateLock(file, (existingLock): LockDecision<LockResult> => {
        if (!existingLock) {
            return { result: { success: true, alreadyUnlocked: true } };
        }

        if (existingLock.lockId !== lockId) {
            return { result: { success: false, existingLockId: existingLock.lockId, reason: 'Lock ID mismatch' } };
        }

        return { result: { success: true }, next: null };
    });
}

/**
 * Get current lock info for a file, null when unlocked
 */
export async function getLock(file: WopiFileRef): Promise<LockInfo | null> {
    return updateLock(file, (lock) => ({ result: lock }));
}

/**
 * Validate if the provided lock ID matches the current lock
 */
export async function validateLock(file: WopiFileRef, lockId: string | undefined): Promise<{ valid: boolean; existingLockId?: string }> {
    const currentLock = await getLock(file);

    if (!currentLock) {
        // No lock - valid for operations that don't require a lock
        return { valid: true };
    }

    if (currentLock.lockId === lockId) {
        return { valid: true };
    }

    return { valid: false, existingLockId: currentLock.lockId };
}

/**
 * Atomic unlock and relock operation
 */
export async function unlockAndRelock(
    file: WopiFileRef,
    oldLockId: string,
    newLockId: string,
    ttlSeconds: number
): Promise<LockResult> {
    return updateLock(file, (currentLock): LockDecision<LockResult> => {
        if (!currentLock || currentLock.lockId !== oldLockId) {
            return {
                result: { success: false, existingLockId: currentLock?.lockId ?? '', reason: 'Old lock ID mismatch' },
            };
        }

        return {
            result: { success: true, lockId: newLockId },
            next: {
                lockId: newLockId,
                userid: file.userid,
                expiresAt: expiryFromNow(ttlSeconds),
                createdAt: new Date(),
            },
        };
    });
}

/**
 * Remember when the editor last wrote the file, for conflict detection on save
 */
export async function markSaveTime(file: WopiFileRef, when: Date = new Date()): Promise<void> {
    await file.storage.setxattr(file.filename, file.userid, LAST_SAVE_TIME_KEY, Math.floor(when.getTime() / 1000));
}

export async function clearSaveTime(file: WopiFileRef): Promise<void> {
    await file.storage.rmxattr(file.filename, file.userid, LAST_SAVE_TIME_KEY);
}

/**
 * Last save time in seconds, undefined when unknown or when the file is gone
 */
export async function getSaveTime(file: WopiFileRef): Promise<number | undefined> {
    let value: string | undefined;
    try {
        value = await file.storage.getxattr(file.filename, file.userid, LAST_SAVE_TIME_KEY);
    } catch (error) {
        if (isStorageError(error, 'ENOENT')) {
            return undefined;
        }
        throw error;
    }
    if (value === undefined) {
        return undefined;
    }
    const savetime = parseInt(value, 10);
    return Number.isNaN(savetime) ? undefined : savetime;
}
