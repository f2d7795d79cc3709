import { Request, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { createChildLogger, type Logger } from '../lib/logger.js';
import { getClientIP } from '../lib/clientAuth.js';

const logger = createChildLogger('http');

// Extend Express Request type to include logger and requestId
declare global {
    namespace Express {
        interface Request {
            id: string;
            log: Logger;
        }
    }
}

// Middleware to add request context and logging
export const requestContextMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
    const incomingId = req.get('X-Request-ID');
    req.id = incomingId || uuidv4();
    res.setHeader('X-Request-ID', req.id);

    req.log = logger;

    const startTime = Date.now();

    res.on('finish', () => {
        const duration = Date.now() - startTime;
        const context = {
            requestId: req.id,
            method: req.method,
            url: req.path, // Query strings carry access tokens
            override: req.get('X-WOPI-Override'),
            statusCode: res.statusCode,
            duration: `${duration}ms`,
            ip: getClientIP(req),
        };

        if (res.statusCode >= 500) {
            logger.error('Request failed', context);
        } else if (res.statusCode >= 400) {
            logger.warn('Request completed with error', context);
        } else {
            logger.info('Request completed', context);
        }
    });

    next();
};
