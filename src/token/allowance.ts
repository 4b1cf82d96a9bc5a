import StateCache from '../cache.js';
import type { Clock } from '../clock.js';
import config from '../config.js';
import { hashMessage, recoverSigner } from '../crypto.js';
import { LedgerError } from '../errors.js';
import logger from '../logger.js';
import { type AccountState, emptyAccount, ensureEntry, getEntry, setEntry } from '../state.js';
import { MAX_UINT256 } from '../utils/bigint.js';

export interface PermitDomain {
    name: string;
    chainId: string;
    verifyingContract: string;
}

export interface PermitMessage {
    domain: PermitDomain;
    owner: string;
    spender: string;
    value: bigint;
    nonce: bigint;
    deadline: number;
}

export function defaultPermitDomain(): PermitDomain {
    return {
        name: config.tokenName,
        chainId: config.chainId,
        verifyingContract: config.tokenAccount,
    };
}

/**
 * Digest an owner signs to authorise a permit
 */
export function permitHash(message: PermitMessage): string {
    return hashMessage({
        domain: message.domain,
        owner: message.owner,
        spender: message.spender,
        value: message.value,
        nonce: message.nonce,
        deadline: message.deadline,
    });
}

export class AllowanceGuard {
    constructor(
        private readonly store: StateCache,
        private readonly clock: Clock,
        private readonly domain: PermitDomain = defaultPermitDomain(),
        private readonly nullAccount: string = config.nullAccount
    ) {}

    allowance(owner: string, spender: string): bigint {
        const account = getEntry(this.store.state.accounts, owner);
        return (account && getEntry(account.allowances, spender)) ?? 0n;
    }

    nonces(owner: string): bigint {
        return getEntry(this.store.state.accounts, owner)?.nonce ?? 0n;
    }

    get permitDomain(): PermitDomain {
        return { ...this.domain };
    }

    /**
     * Direct allowance change. A non-zero allowance must go back to zero before it can
     * take another non-zero value.
     */
    approve(owner: string, spender: string, value: bigint): void {
        if (owner === spender) {
            throw new LedgerError('SelfAllowanceError', 'There is no reason to grant yourself an allowance', { owner });
        }
        if (spender === this.nullAccount) {
            throw new LedgerError('ZeroAddressAllowanceError', 'There is no reason to grant the Zero address an allowance', {
                owner,
            });
        }
        if (value < 0n || value > MAX_UINT256) {
            throw new LedgerError('InvalidAmount', `Invalid allowance value ${value}`, { value });
        }
        const current = this.allowance(owner, spender);
        if (current !== 0n && value !== 0n) {
            throw new LedgerError('MustResetToZeroFirst', 'Reset the allowance to 0 before updating it.', {
                owner,
                spender,
                current,
            });
        }
        this.write(owner, spender, value);
        const now = this.clock.now();
        this.store.emit('Approval', { owner, spender, value }, now);
        if (value === MAX_UINT256) {
            logger.warn(`[allowance] ${owner} granted ${spender} an unlimited allowance`);
            this.store.emit('UnlimitedAllowanceWarning', { owner, spender }, now);
        }
    }

    /**
     * Signature-based approve. The owner's nonce is consumed before the approve rules run.
     */
    permit(owner: string, spender: string, value: bigint, deadline: number, signature: string): void {
        if (this.clock.now() > deadline) {
            throw new LedgerError('ExpiredDeadline', 'Permit: expired deadline', { deadline });
        }
        const nonce = this.nonces(owner);
        const digest = permitHash({ domain: this.domain, owner, spender, value, nonce, deadline });
        const signer = recoverSigner(digest, signature);
        if (signer !== owner) {
            throw new LedgerError('InvalidSigner', 'Permit: invalid signature', { owner, signer: signer ?? '' });
        }
        this.account(owner).nonce = nonce + 1n;
        this.approve(owner, spender, value);
    }

    /**
     * Consume allowance for a delegated spend. The unlimited sentinel is never decremented
     * and no Approval event is emitted.
     */
    spendAllowance(owner: string, spender: string, amount: bigint): void {
        const current = this.allowance(owner, spender);
        if (current === MAX_UINT256) return;
        if (amount > current) {
            throw new LedgerError('InsufficientAllowance', `Not enough allowance. ${spender} may spend ${current} of ${owner}`, {
                owner,
                spender,
                current,
                amount,
            });
        }
        this.write(owner, spender, current - amount);
    }

    private write(owner: string, spender: string, value: bigint): void {
        const { allowances } = this.account(owner);
        if (value === 0n) {
            if (Object.hasOwn(allowances, spender)) delete allowances[spender];
        } else {
            setEntry(allowances, spender, value);
        }
    }

    private account(owner: string): AccountState {
        return ensureEntry(this.store.state.accounts, owner, emptyAccount);
    }
}

export default AllowanceGuard;
