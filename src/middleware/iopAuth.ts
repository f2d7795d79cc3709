import type { RequestHandler } from 'express';
import type { ServerContext } from '../context.js';
import { getClientIP, hasIopSecret, isAllowedClient } from '../lib/clientAuth.js';
import { createChildLogger } from '../lib/logger.js';

const logger = createChildLogger('auth');

/**
 * Only the IOP may open files: either it presents the IOP secret,
 * or it calls from one of the allowed client hosts.
 */
export const requireIopClient = (ctx: ServerContext): RequestHandler => async (req, res, next) => {
    try {
        if (hasIopSecret(req.get('Authorization'), ctx.secrets.iopsecret)) {
            next();
            return;
        }

        const client = getClientIP(req);
        if (await isAllowedClient(client, ctx.store.config.general.allowedclients, ctx.resolveHost)) {
            next();
            return;
        }

        logger.info('Unauthorized access attempt', { client, path: req.path });
        res.status(401).json({ error: 'Client IP not authorized' });
    } catch (error) {
        next(error);
    }
};
