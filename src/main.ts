import { createChain } from './chain.js';
import logger from './logger.js';
import http from './modules/http/index.js';
import { disconnectKafkaProducer } from './modules/kafka.js';
import mongo, { stateToDocuments } from './mongo.js';
import settings from './settings.js';
import type { LedgerState } from './state.js';
import { attachEventLogger } from './utils/event-logger.js';

async function main(): Promise<void> {
    logger.info('Starting stakeledger node...');

    let state: LedgerState | undefined;
    if (settings.persistState) {
        await mongo.init();
        state = (await mongo.loadState()) ?? undefined;
    }

    if (!state && !settings.adminAccount) {
        logger.warn('ADMIN_ACCOUNT is not set: the fresh ledger has no administrator');
    }

    const chain = createChain({ state, deployer: settings.adminAccount || undefined });
    attachEventLogger(chain.store);

    if (settings.persistState) {
        // writes are chained so they land in commit order
        let saving: Promise<void> = Promise.resolve();
        chain.store.onCommit((_events, committed) => {
            // snapshot now: a later failing scope may mutate this object before it rolls back
            const docs = stateToDocuments(committed);
            saving = saving
                .then(() => mongo.saveDocuments(docs))
                .catch(err => {
                    logger.error(`[main] Failed to persist state: ${err instanceof Error ? err.message : String(err)}`);
                });
        });
        // persist the initial role setup of a fresh ledger
        await mongo.saveState(chain.store.state);
    }

    const server = await http.init(chain);

    const shutdown = async (signal: string) => {
        logger.info(`${signal} received, shutting down`);
        server.close();
        await disconnectKafkaProducer();
        await mongo.close();
        process.exit(0);
    };
    for (const signal of ['SIGINT', 'SIGTERM']) {
        process.on(signal, () => {
            shutdown(signal).catch(err => {
                logger.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
                process.exit(1);
            });
        });
    }
}

main().catch(err => {
    logger.fatal(`Node failed to start: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    process.exit(1);
});
