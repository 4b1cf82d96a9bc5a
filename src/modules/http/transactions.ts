import express, { type Request, type Response, type Router } from 'express';

import type { Chain } from '../../chain.js';
import logger from '../../logger.js';
import transaction from '../../transaction.js';

export default function transactionsRouter(chain: Chain): Router {
    const router: Router = express.Router();

    /**
     * @api {post} /transactions Submit a signed transaction
     * @apiBody {Number} type TransactionType
     * @apiBody {String} sender Base58 public key of the signer
     * @apiBody {Object} data Type specific payload
     * @apiBody {Number} ts Unix seconds, at most an hour away from the ledger clock
     * @apiBody {String} hash SHA-256 of {type, data, sender, ts}
     * @apiBody {String} signature Base58 signature over hash
     */
    router.post('/', async (req: Request, res: Response) => {
        const tx: unknown = req.body;
        if (!transaction.isTransaction(tx)) {
            res.status(400).json({ valid: false, error: 'Malformed transaction' });
            return;
        }
        if (!transaction.isSignedBySender(tx)) {
            res.status(401).json({ valid: false, error: 'Invalid signature' });
            return;
        }
        try {
            const result = await transaction.execute(tx, chain);
            res.status(result.valid ? 200 : 400).json({ ...result, hash: tx.hash });
        } catch (error) {
            logger.error(`[http:transactions] ${error instanceof Error ? error.message : String(error)}`);
            res.status(500).json({ valid: false, error: 'internal error' });
        }
    });

    return router;
}
