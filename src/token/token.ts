import StateCache from '../cache.js';
import type { Clock } from '../clock.js';
import config from '../config.js';
import logger from '../logger.js';
import { ROLES, type Role } from '../state.js';
import AccessControl from './access-control.js';
import AllowanceGuard, { type PermitDomain, defaultPermitDomain } from './allowance.js';
import BlacklistFilter from './blacklist.js';
import { GatePipeline, type Operation } from './gates.js';
import Ledger, { type TransferHook } from './ledger.js';
import PauseBreaker from './pause.js';

export interface TokenOptions {
    // Receives every role when the state has no admin yet
    deployer?: string;
    burnRequiresRole?: boolean;
    domain?: PermitDomain;
    nullAccount?: string;
}

/**
 * Capped, role-gated, pausable token with blacklisting and signature approvals.
 * Every mutating call runs in one atomic scope of the state cache.
 */
export class Token {
    readonly name: string = config.tokenName;
    readonly symbol: string = config.tokenSymbol;
    readonly decimals: number = config.decimals;

    readonly access: AccessControl;
    readonly pauser: PauseBreaker;
    readonly blacklistFilter: BlacklistFilter;
    readonly allowances: AllowanceGuard;
    readonly ledger: Ledger;
    private readonly gates: GatePipeline;

    constructor(
        private readonly store: StateCache,
        clock: Clock,
        options: TokenOptions = {}
    ) {
        const nullAccount = options.nullAccount ?? config.nullAccount;
        this.access = new AccessControl(store, clock, {
            burnRequiresRole: options.burnRequiresRole ?? config.burnRequiresRole,
        });
        this.pauser = new PauseBreaker(store, clock, this.access);
        this.blacklistFilter = new BlacklistFilter(store, clock, this.access, nullAccount);
        this.allowances = new AllowanceGuard(store, clock, options.domain ?? defaultPermitDomain(), nullAccount);
        this.ledger = new Ledger(store, clock, nullAccount);
        this.gates = new GatePipeline([this.access, this.pauser, this.blacklistFilter]);

        const deployer = options.deployer;
        if (deployer && store.state.roles.admin.length === 0) {
            store.atomic(() => {
                for (const role of ROLES) this.access.setupRole(role, deployer, deployer);
            });
            logger.info(`[token] ${this.symbol} created, all roles granted to ${deployer}`);
        }
    }

    // reads

    totalSupply(): bigint {
        return this.ledger.totalSupply();
    }

    totalMinted(): bigint {
        return this.ledger.totalMinted();
    }

    burned(): bigint {
        return this.ledger.burned();
    }

    cap(): bigint {
        return this.ledger.effectiveCap();
    }

    hardCap(): bigint {
        return this.ledger.hardCap();
    }

    balanceOf(account: string): bigint {
        return this.ledger.balanceOf(account);
    }

    allowance(owner: string, spender: string): bigint {
        return this.allowances.allowance(owner, spender);
    }

    nonces(owner: string): bigint {
        return this.allowances.nonces(owner);
    }

    paused(): boolean {
        return this.pauser.paused();
    }

    isBlacklisted(account: string): boolean {
        return this.blacklistFilter.isBlacklisted(account);
    }

    hasRole(role: Role, account: string): boolean {
        return this.access.hasRole(role, account);
    }

    getRoleAdmin(role: Role): Role {
        return this.access.getRoleAdmin(role);
    }

    getRoleMembers(role: Role): string[] {
        return this.access.getRoleMembers(role);
    }

    get gateOrder(): string[] {
        return this.gates.names;
    }

    get domain(): PermitDomain {
        return this.allowances.permitDomain;
    }

    addTransferHook(hook: TransferHook): () => void {
        return this.ledger.addTransferHook(hook);
    }

    /**
     * Mark a custodial account (e.g. a staking pool) as never blacklistable
     */
    registerCustodian(account: string): void {
        this.store.atomic(() => this.blacklistFilter.protect(account));
    }

    // balance and allowance changes

    mint(caller: string, to: string, amount: bigint): void {
        this.run({ kind: 'mint', caller, to, amount }, () => this.ledger.mint(to, amount));
    }

    burn(caller: string, amount: bigint): void {
        this.burnFrom(caller, caller, amount);
    }

    burnFrom(caller: string, from: string, amount: bigint): void {
        this.run({ kind: 'burn', caller, from, amount }, () => {
            if (caller !== from) this.allowances.spendAllowance(from, caller, amount);
            this.ledger.burn(from, amount);
        });
    }

    transfer(caller: string, to: string, amount: bigint): void {
        this.run({ kind: 'transfer', caller, to, amount }, () => this.ledger.move(caller, to, amount));
    }

    transferFrom(caller: string, from: string, to: string, amount: bigint): void {
        this.run({ kind: 'transferFrom', caller, from, to, amount }, () => {
            if (caller !== from) this.allowances.spendAllowance(from, caller, amount);
            this.ledger.move(from, to, amount);
        });
    }

    approve(caller: string, spender: string, value: bigint): void {
        this.run({ kind: 'approve', caller, spender, value }, () => this.allowances.approve(caller, spender, value));
    }

    permit(caller: string, owner: string, spender: string, value: bigint, deadline: number, signature: string): void {
        this.run({ kind: 'permit', caller, owner, spender, value }, () =>
            this.allowances.permit(owner, spender, value, deadline, signature)
        );
    }

    // administration

    grantRole(caller: string, role: Role, account: string): void {
        this.access.grantRole(caller, role, account);
    }

    revokeRole(caller: string, role: Role, account: string): void {
        this.access.revokeRole(caller, role, account);
    }

    renounceRole(caller: string, role: Role, account: string): void {
        this.access.renounceRole(caller, role, account);
    }

    pause(caller: string): void {
        this.pauser.pause(caller);
    }

    unpause(caller: string): void {
        this.pauser.unpause(caller);
    }

    blacklist(caller: string, account: string): void {
        this.blacklistFilter.blacklist(caller, account);
    }

    unblacklist(caller: string, account: string): void {
        this.blacklistFilter.unblacklist(caller, account);
    }

    private run(op: Operation, apply: () => void): void {
        this.store.atomic(() => {
            this.gates.check(op);
            apply();
        });
    }
}

export default Token;
