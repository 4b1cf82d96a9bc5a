import express, { type Request, type Response, type Router } from 'express';

import type { Chain } from '../../chain.js';
import { toEventDocument } from '../../utils/event-logger.js';
import { getPagination } from './utils.js';

export default function eventsRouter(chain: Chain): Router {
    const router: Router = express.Router();

    /**
     * @api {get} /events Committed events, newest first
     * @apiParam {String} [name] Only events with this name (e.g. Transfer)
     * @apiUse PaginationParams
     */
    router.get('/', (req: Request, res: Response) => {
        const { limit, skip, page } = getPagination(req);
        const name = typeof req.query.name === 'string' ? req.query.name : undefined;
        const all = chain.store.events.filter(e => !name || e.name === name);
        const data = all
            .slice()
            .reverse()
            .slice(skip, skip + limit)
            .map(toEventDocument);
        res.json({ data, total: all.length, limit, skip, page });
    });

    return router;
}
