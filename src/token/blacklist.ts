import StateCache from '../cache.js';
import type { Clock } from '../clock.js';
import config from '../config.js';
import { LedgerError } from '../errors.js';
import logger from '../logger.js';
import { emptyAccount, ensureEntry, getEntry } from '../state.js';
import AccessControl from './access-control.js';
import { type Gate, type Operation, sourceOf } from './gates.js';

export const BLACKLIST_MESSAGES = {
    cannotBlacklist: 'This address can not be blacklisted.',
    alreadyBlacklisted: 'This address is already blacklisted.',
    notBlacklisted: 'This address is not blacklisted.',
    caller: 'Your address has been blacklisted and is currently not allowed to interact with this token.',
    source: 'This address has been blacklisted and is currently not allowed to transfer this token.',
    destination: 'This address has been blacklisted and is currently not allowed to receive this token.',
    spender: 'The allowance for this spender can only be reset to 0.',
} as const;

export class BlacklistFilter implements Gate {
    readonly name = 'blacklist';

    constructor(
        private readonly store: StateCache,
        private readonly clock: Clock,
        private readonly access: AccessControl,
        private readonly nullAccount: string = config.nullAccount
    ) {}

    isBlacklisted(account: string): boolean {
        return getEntry(this.store.state.accounts, account)?.blacklisted ?? false;
    }

    isProtected(account: string): boolean {
        return this.store.state.protectedAccounts.includes(account);
    }

    /**
     * Register a custodial account (token or staking pool) that may never be flagged.
     * Must run inside an atomic scope.
     */
    protect(account: string): void {
        if (!this.isProtected(account)) this.store.state.protectedAccounts.push(account);
    }

    blacklist(caller: string, account: string): void {
        this.store.atomic(() => {
            this.access.requireRole(caller, 'blacklister');
            if (
                account === this.nullAccount ||
                account === caller ||
                this.isProtected(account) ||
                this.access.hasRole('admin', account)
            ) {
                throw new LedgerError('CannotBlacklist', BLACKLIST_MESSAGES.cannotBlacklist, { account });
            }
            if (this.isBlacklisted(account)) {
                throw new LedgerError('AlreadyBlacklisted', BLACKLIST_MESSAGES.alreadyBlacklisted, { account });
            }
            ensureEntry(this.store.state.accounts, account, emptyAccount).blacklisted = true;
            logger.warn(`[blacklist] ${account} blacklisted by ${caller}`);
            this.store.emit('Blacklisted', { account, value: true, actor: caller }, this.clock.now());
        });
    }

    unblacklist(caller: string, account: string): void {
        this.store.atomic(() => {
            this.access.requireRole(caller, 'blacklister');
            const entry = getEntry(this.store.state.accounts, account);
            if (!entry || !entry.blacklisted) {
                throw new LedgerError('NotBlacklisted', BLACKLIST_MESSAGES.notBlacklisted, { account });
            }
            entry.blacklisted = false;
            logger.info(`[blacklist] ${account} removed from blacklist by ${caller}`);
            this.store.emit('Blacklisted', { account, value: false, actor: caller }, this.clock.now());
        });
    }

    check(op: Operation): void {
        const source = sourceOf(op);
        // approve: the caller is the owner, but still gets the "interact" message
        if (this.isBlacklisted(op.caller) && (op.caller !== source || op.kind === 'approve')) {
            this.reject(op.caller, BLACKLIST_MESSAGES.caller);
        }
        if (source !== undefined && this.isBlacklisted(source)) {
            this.reject(source, BLACKLIST_MESSAGES.source);
        }
        switch (op.kind) {
            case 'mint':
            case 'transfer':
            case 'transferFrom':
                if (this.isBlacklisted(op.to)) this.reject(op.to, BLACKLIST_MESSAGES.destination);
                break;
            case 'approve':
            case 'permit':
                if (op.value !== 0n && this.isBlacklisted(op.spender)) {
                    this.reject(op.spender, BLACKLIST_MESSAGES.spender);
                }
                break;
            case 'burn':
                break;
        }
    }

    private reject(account: string, message: string): never {
        throw new LedgerError('Blacklisted', message, { account });
    }
}

export default BlacklistFilter;
