/**
 * Open endpoints, reserved to the IOP.
 *
 * Returns the WOPISrc to hand over to the WOPI client together with an
 * access token for the given user and file.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { getWopiUrl } from '../config/index.js';
import type { ServerContext } from '../context.js';
import { wopiLogger as logger } from '../lib/logger.js';
import { isStorageError } from '../lib/storage/index.js';
import { generateAccessToken } from '../lib/wopi/token.js';
import { AppError } from '../middleware/error.js';
import { requireIopClient } from '../middleware/iopAuth.js';

const openQuerySchema = z.object({
    ruid: z.string().regex(/^\d+$/, 'must be a numeric uid'),
    rgid: z.string().regex(/^\d+$/, 'must be a numeric gid'),
    filename: z.string().min(1),
    canedit: z
        .string()
        .optional()
        .transform((value) => value?.toLowerCase() === 'yes'),
});

export function createOpenRouter(ctx: ServerContext): Router {
    const router = Router();

    const open = async (req: Request, res: Response, next: NextFunction) => {
        try {
            const parsed = openQuerySchema.safeParse(req.query);
            if (!parsed.success) {
                const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
                next(AppError.badRequest('Invalid open request', { issues }));
                return;
            }
            const { ruid, rgid, filename, canedit } = parsed.data;
            const config = ctx.store.config;

            const stat = await ctx.storage.stat(filename, `${ruid}:${rgid}`);
            const { token, exp } = generateAccessToken(
                { ruid, rgid, filename, canedit, mtime: stat.mtime },
                ctx.secrets.wopisecret,
                config.general.tokenvalidity
            );

            logger.info('Access token issued', {
                user: `${ruid}:${rgid}`,
                filename,
                canedit,
                inode: stat.inode,
                expiresAt: new Date(exp * 1000).toISOString(),
            });

            // The token is URL-safe already, only the WOPISrc gets encoded
            const wopiSrc = `${getWopiUrl(config)}/wopi/files/${stat.inode}`;
            res.type('text/plain').send(`${encodeURIComponent(wopiSrc)}&access_token=${token}`);
        } catch (error) {
            if (isStorageError(error, 'ENOENT')) {
                next(AppError.notFound('File'));
                return;
            }
            next(error);
        }
    };

    router.get('/cboxopen', requireIopClient(ctx), open);
    router.get('/iop/open', requireIopClient(ctx), open);

    return router;
}
