import type { RequestHandler } from 'express';
import { ConfigError, type ConfigStore } from '../config/index.js';
import { configLogger as logger, setLogLevel, toPinoLevel } from '../lib/logger.js';

/**
 * Picks up changes to the runtime settings before serving each request,
 * at most once per refresh interval.
 */
export const configRefreshMiddleware = (store: ConfigStore): RequestHandler => (req, res, next) => {
    try {
        const settings = store.refreshIfStale();
        if (settings) {
            setLogLevel(toPinoLevel(settings.loglevel));
            req.app.set('env', settings.loglevel === 'Debug' ? 'development' : 'production');
            logger.debug('Runtime configuration refreshed', { ...settings });
        }
    } catch (error) {
        if (!(error instanceof ConfigError)) {
            next(error);
            return;
        }
        // Keep serving with the last good configuration
        logger.warn('Failed to refresh configuration', { issues: error.issues }, error);
    }
    next();
};
