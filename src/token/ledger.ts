import StateCache from '../cache.js';
import type { Clock } from '../clock.js';
import config from '../config.js';
import { LedgerError } from '../errors.js';
import logger from '../logger.js';
import { type AccountState, emptyAccount, ensureEntry, getEntry } from '../state.js';
import { formatTokenAmount } from '../utils/bigint.js';

export interface BalanceMovement {
    from: string;
    to: string;
    amount: bigint;
}

export type TransferHook = (movement: BalanceMovement) => void;

/**
 * Balances and supply counters. No authorization here: callers run the gate pipeline first.
 *
 * Burned tokens shrink the effective cap for good, so
 *   totalMinted - totalBurned <= hardCap - totalBurned
 * holds after every operation.
 */
export class Ledger {
    private hooks: TransferHook[] = [];

    constructor(
        private readonly store: StateCache,
        private readonly clock: Clock,
        private readonly nullAccount: string = config.nullAccount
    ) {}

    addTransferHook(hook: TransferHook): () => void {
        this.hooks.push(hook);
        return () => {
            this.hooks = this.hooks.filter(h => h !== hook);
        };
    }

    balanceOf(account: string): bigint {
        return getEntry(this.store.state.accounts, account)?.balance ?? 0n;
    }

    hardCap(): bigint {
        return this.store.state.supply.hardCap;
    }

    effectiveCap(): bigint {
        const { hardCap, totalBurned } = this.store.state.supply;
        return hardCap - totalBurned;
    }

    totalMinted(): bigint {
        return this.store.state.supply.totalMinted;
    }

    burned(): bigint {
        return this.store.state.supply.totalBurned;
    }

    totalSupply(): bigint {
        const { totalMinted, totalBurned } = this.store.state.supply;
        return totalMinted - totalBurned;
    }

    mint(to: string, amount: bigint): void {
        this.requireAmount(amount);
        if (to === this.nullAccount) {
            throw new LedgerError('InvalidReceiver', 'Cannot mint to the null account', { to });
        }
        const supply = this.store.state.supply;
        if (this.totalSupply() + amount > this.effectiveCap()) {
            throw new LedgerError('CapExceeded', `Cap exceeded: ${formatTokenAmount(this.effectiveCap())} available`, {
                cap: this.effectiveCap(),
                supply: this.totalSupply(),
                amount,
            });
        }
        const receiver = this.account(to);
        supply.totalMinted += amount;
        receiver.balance += amount;
        this.moved(this.nullAccount, to, amount);
    }

    burn(from: string, amount: bigint): void {
        this.requireAmount(amount);
        this.debit(from, amount);
        this.store.state.supply.totalBurned += amount;
        this.moved(from, this.nullAccount, amount);
    }

    move(from: string, to: string, amount: bigint): void {
        this.requireAmount(amount);
        if (to === this.nullAccount) {
            throw new LedgerError('InvalidReceiver', 'Cannot transfer to the null account', { to });
        }
        this.debit(from, amount);
        this.account(to).balance += amount;
        this.moved(from, to, amount);
    }

    private debit(from: string, amount: bigint): void {
        const balance = this.balanceOf(from);
        if (balance < amount) {
            throw new LedgerError('InsufficientBalance', `Not enough Balance. ${from} holds ${formatTokenAmount(balance)}`, {
                account: from,
                balance,
                amount,
            });
        }
        this.account(from).balance = balance - amount;
    }

    private requireAmount(amount: bigint): void {
        if (amount < 0n) {
            throw new LedgerError('InvalidAmount', `Amount must not be negative: ${amount}`, { amount });
        }
    }

    private account(address: string): AccountState {
        return ensureEntry(this.store.state.accounts, address, emptyAccount);
    }

    private moved(from: string, to: string, amount: bigint): void {
        logger.trace(`[ledger] ${from} -> ${to}: ${amount}`);
        this.store.emit('Transfer', { from, to, value: amount }, this.clock.now());
        for (const hook of this.hooks) {
            hook({ from, to, amount });
        }
    }
}

export default Ledger;
