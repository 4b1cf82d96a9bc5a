import cors from 'cors';
import express, { type Express, type Router } from 'express';
import type { Server } from 'http';

import type { Chain } from '../../chain.js';
import logger from '../../logger.js';
import settings from '../../settings.js';
import accounts from './accounts.js';
import events from './events.js';
import pool from './pool.js';
import stakes from './stakes.js';
import token from './token.js';
import transactions from './transactions.js';

const endpoints: Record<string, (chain: Chain) => Router> = {
    '/token': token,
    '/accounts': accounts,
    '/pool': pool,
    '/stakes': stakes,
    '/events': events,
    '/transactions': transactions,
};

export function createApp(chain: Chain): Express {
    const app = express();
    app.use(cors());
    app.use(express.json());

    logger.trace('Setting up HTTP endpoints...');
    for (const [route, factory] of Object.entries(endpoints)) {
        app.use(route, factory(chain));
        logger.trace('Initialized API endpoint ' + route);
    }
    return app;
}

/**
 * HTTP server module
 */
export function init(chain: Chain, port: number = settings.apiPort): Promise<Server> {
    const app = createApp(chain);
    return new Promise((resolve, reject) => {
        const server = app.listen(port, () => {
            const addr = server.address();
            if (addr && typeof addr !== 'string') {
                logger.info(`HTTP server listening on ${addr.address}:${addr.port}`);
            } else {
                logger.info(`HTTP server listening on port ${port}`);
            }
            resolve(server);
        });

        server.on('error', (error: NodeJS.ErrnoException) => {
            if (error.code === 'EADDRINUSE') {
                logger.error(`HTTP port ${port} is already in use. Please use a different port by setting the API_PORT environment variable.`);
            } else if (error.code === 'EACCES') {
                logger.error(`Permission denied to use port ${port}. Try using a port number > 1024 or running with elevated privileges.`);
            } else {
                logger.error(`HTTP server error: ${error.message}`);
            }
            reject(error);
        });
    });
}

export default {
    createApp,
    init,
};
