import StateCache from '../cache.js';
import type { Clock } from '../clock.js';
import { LedgerError } from '../errors.js';
import logger from '../logger.js';
import { ROLES, type Role } from '../state.js';
import type { Gate, Operation } from './gates.js';

export interface AccessControlOptions {
    burnRequiresRole?: boolean;
}

/**
 * Role registry. Every role is administered by `admin`.
 */
export class AccessControl implements Gate {
    readonly name = 'access-control';
    private readonly burnRequiresRole: boolean;

    constructor(
        private readonly store: StateCache,
        private readonly clock: Clock,
        options: AccessControlOptions = {}
    ) {
        this.burnRequiresRole = options.burnRequiresRole ?? false;
    }

    static isRole(value: string): value is Role {
        return (ROLES as readonly string[]).includes(value);
    }

    hasRole(role: Role, account: string): boolean {
        return this.store.state.roles[role].includes(account);
    }

    getRoleAdmin(_role: Role): Role {
        return 'admin';
    }

    getRoleMembers(role: Role): string[] {
        return [...this.store.state.roles[role]];
    }

    requireRole(account: string, role: Role): void {
        if (!this.hasRole(role, account)) {
            throw new LedgerError('PermissionDenied', `Permissions: account ${account} is missing role ${role}`, {
                account,
                role,
            });
        }
    }

    grantRole(caller: string, role: Role, account: string): void {
        this.store.atomic(() => {
            this.requireRole(caller, this.getRoleAdmin(role));
            this.setupRole(role, account, caller);
        });
    }

    revokeRole(caller: string, role: Role, account: string): void {
        this.store.atomic(() => {
            this.requireRole(caller, this.getRoleAdmin(role));
            this.removeRole(role, account, caller);
        });
    }

    renounceRole(caller: string, role: Role, account: string): void {
        this.store.atomic(() => {
            if (account !== caller) {
                throw new LedgerError('PermissionDenied', 'Can only renounce for self', { account: caller, role });
            }
            this.removeRole(role, account, caller);
        });
    }

    /**
     * Grant without an admin check; used when a ledger is first created.
     * Must run inside an atomic scope.
     */
    setupRole(role: Role, account: string, sender: string): void {
        const members = this.store.state.roles[role];
        if (members.includes(account)) return;
        members.push(account);
        logger.debug(`[access-control] ${account} granted ${role} by ${sender}`);
        this.store.emit('RoleGranted', { role, account, sender }, this.clock.now());
    }

    private removeRole(role: Role, account: string, sender: string): void {
        const members = this.store.state.roles[role];
        const idx = members.indexOf(account);
        if (idx === -1) return;
        members.splice(idx, 1);
        logger.debug(`[access-control] ${account} lost ${role}, revoked by ${sender}`);
        this.store.emit('RoleRevoked', { role, account, sender }, this.clock.now());
    }

    check(op: Operation): void {
        if (op.kind === 'mint') {
            this.requireRole(op.caller, 'minter');
        } else if (op.kind === 'burn' && this.burnRequiresRole) {
            this.requireRole(op.caller, 'burner');
        }
    }
}

export default AccessControl;
