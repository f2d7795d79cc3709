import express, { Request, Response } from 'express';
import helmet from 'helmet';
import type { ServerContext } from './context.js';
import { logger } from './lib/logger.js';
import { getClientIP } from './lib/clientAuth.js';
import { configRefreshMiddleware } from './middleware/configRefresh.js';
import { errorHandler } from './middleware/error.js';
import { requestContextMiddleware } from './middleware/requestLogger.js';
import { createOpenRouter } from './routes/open.js';
import { createWopiRouter } from './routes/wopi.js';

const indexPage = (version: string): string => `
    <div align="center" style="color:#000080; padding-top:50px; font-family:Verdana; size:11">
    This is a <a href="https://wopi.readthedocs.io">WOPI</a> server for online Office editors.
    To use this service, log in to your file sharing service
    and click on the Open button next to your Office documents.</div>
    <br><br><br><br><br><br><br><br><br><br><hr>
    <i>WOPI bridge ${version}, running on Node.js ${process.version}</i>.
    `;

export function createApp(ctx: ServerContext): express.Express {
  const app = express();

  // Debug log level turns on development mode, stack traces included in error responses
  app.set('env', ctx.store.config.general.loglevel === 'Debug' ? 'development' : 'production');
  app.disable('x-powered-by');

  app.use(helmet({
    // WOPI clients frame the editor, not this host
    crossOriginResourcePolicy: { policy: 'cross-origin' },
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    noSniff: true,
    dnsPrefetchControl: { allow: false },
    permittedCrossDomainPolicies: { permittedPolicies: 'none' },
  }));

  app.use(requestContextMiddleware);
  app.use(configRefreshMiddleware(ctx.store));

  app.get('/', (req: Request, res: Response) => {
    logger.info('Accessed index page', { client: getClientIP(req) });
    res.type('html').send(indexPage(ctx.version));
  });

  app.use('/wopi', createOpenRouter(ctx));
  app.use('/wopi', createWopiRouter(ctx));

  app.use(errorHandler);

  return app;
}
