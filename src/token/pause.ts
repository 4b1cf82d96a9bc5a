import StateCache from '../cache.js';
import type { Clock } from '../clock.js';
import { LedgerError } from '../errors.js';
import logger from '../logger.js';
import AccessControl from './access-control.js';
import type { Gate, Operation, OperationKind } from './gates.js';

const BLOCKED_WHILE_PAUSED: ReadonlySet<OperationKind> = new Set(['mint', 'burn', 'transfer', 'transferFrom']);

export class PauseBreaker implements Gate {
    readonly name = 'pause';

    constructor(
        private readonly store: StateCache,
        private readonly clock: Clock,
        private readonly access: AccessControl
    ) {}

    paused(): boolean {
        return this.store.state.paused;
    }

    pause(caller: string): void {
        this.store.atomic(() => {
            this.access.requireRole(caller, 'pauser');
            if (this.store.state.paused) throw new LedgerError('AlreadyPaused', 'Pausable: paused');
            this.store.state.paused = true;
            logger.warn(`[pause] Token paused by ${caller}`);
            this.store.emit('Paused', { account: caller }, this.clock.now());
        });
    }

    unpause(caller: string): void {
        this.store.atomic(() => {
            this.access.requireRole(caller, 'pauser');
            if (!this.store.state.paused) throw new LedgerError('NotPaused', 'Pausable: not paused');
            this.store.state.paused = false;
            logger.info(`[pause] Token unpaused by ${caller}`);
            this.store.emit('Unpaused', { account: caller }, this.clock.now());
        });
    }

    check(op: Operation): void {
        if (this.store.state.paused && BLOCKED_WHILE_PAUSED.has(op.kind)) {
            throw new LedgerError('ContractPaused', 'Pausable: paused', { operation: op.kind });
        }
    }
}

export default PauseBreaker;
