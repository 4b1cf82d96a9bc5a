import assert from 'assert';
import { describe, it } from 'node:test';

import config from '../src/config.js';
import { BLACKLIST_MESSAGES } from '../src/token/blacklist.js';
import { ADMIN, ALICE, BOB, CAROL, eventsAfter, expectLedgerError, setup } from './helpers.js';

describe('blacklist filter', () => {
    it('refuses accounts that can never be flagged', () => {
        const { token } = setup();
        token.grantRole(ADMIN, 'admin', BOB);
        for (const account of [config.nullAccount, ADMIN, config.tokenAccount, config.staking.poolAccount, BOB]) {
            expectLedgerError(() => token.blacklist(ADMIN, account), 'CannotBlacklist', 'This address can not be blacklisted.');
        }
    });

    it('flags and unflags an account', () => {
        const chain = setup();
        const { token } = chain;
        const before = chain.store.events.length;

        token.blacklist(ADMIN, ALICE);
        assert.strictEqual(token.isBlacklisted(ALICE), true);
        expectLedgerError(() => token.blacklist(ADMIN, ALICE), 'AlreadyBlacklisted', 'This address is already blacklisted.');

        token.unblacklist(ADMIN, ALICE);
        assert.strictEqual(token.isBlacklisted(ALICE), false);
        expectLedgerError(() => token.unblacklist(ADMIN, ALICE), 'NotBlacklisted', 'This address is not blacklisted.');

        assert.deepStrictEqual(eventsAfter(chain, before), [
            ['Blacklisted', { account: ALICE, value: true, actor: ADMIN }],
            ['Blacklisted', { account: ALICE, value: false, actor: ADMIN }],
        ]);
    });

    it('requires the blacklister role', () => {
        const { token } = setup();
        expectLedgerError(() => token.blacklist(BOB, ALICE), 'PermissionDenied', 'Permissions: account bob is missing role blacklister');
    });

    it('stops a flagged account from sending, receiving and approving', () => {
        const { token } = setup();
        token.mint(ADMIN, ALICE, 100n);
        token.mint(ADMIN, BOB, 100n);
        token.approve(BOB, ALICE, 10n);
        token.approve(BOB, CAROL, 10n);
        token.blacklist(ADMIN, ALICE);

        expectLedgerError(() => token.transfer(ALICE, BOB, 1n), 'Blacklisted', BLACKLIST_MESSAGES.source);
        expectLedgerError(() => token.burn(ALICE, 1n), 'Blacklisted', BLACKLIST_MESSAGES.source);
        expectLedgerError(() => token.transfer(BOB, ALICE, 1n), 'Blacklisted', BLACKLIST_MESSAGES.destination);
        expectLedgerError(() => token.mint(ADMIN, ALICE, 1n), 'Blacklisted', BLACKLIST_MESSAGES.destination);
        expectLedgerError(() => token.transferFrom(CAROL, BOB, ALICE, 1n), 'Blacklisted', BLACKLIST_MESSAGES.destination);
        expectLedgerError(() => token.transferFrom(ALICE, BOB, CAROL, 1n), 'Blacklisted', BLACKLIST_MESSAGES.caller);
        expectLedgerError(() => token.approve(ALICE, BOB, 10n), 'Blacklisted', BLACKLIST_MESSAGES.caller);

        assert.strictEqual(token.balanceOf(ALICE), 100n);
        assert.strictEqual(token.balanceOf(BOB), 100n);
    });

    it('lets an allowance for a flagged spender only be reset to zero', () => {
        const { token } = setup();
        token.approve(BOB, ALICE, 10n);
        token.blacklist(ADMIN, ALICE);

        expectLedgerError(() => token.approve(CAROL, ALICE, 5n), 'Blacklisted', BLACKLIST_MESSAGES.spender);
        token.approve(BOB, ALICE, 0n);
        assert.strictEqual(token.allowance(BOB, ALICE), 0n);
    });

    it('lifting the flag restores transfers', () => {
        const { token } = setup();
        token.mint(ADMIN, ALICE, 100n);
        token.blacklist(ADMIN, ALICE);
        token.unblacklist(ADMIN, ALICE);
        token.transfer(ALICE, BOB, 40n);
        assert.strictEqual(token.balanceOf(BOB), 40n);
    });

    it('flags an account named after an Object.prototype member', () => {
        const { token } = setup();
        token.blacklist(ADMIN, 'constructor');

        assert.strictEqual(token.isBlacklisted('constructor'), true);
        assert.strictEqual(token.isBlacklisted('toString'), false);
        assert.strictEqual(Object.hasOwn(Object, 'blacklisted'), false);
        assert.strictEqual(setup().token.isBlacklisted('constructor'), false);
        expectLedgerError(() => token.mint(ADMIN, 'constructor', 1n), 'Blacklisted', BLACKLIST_MESSAGES.destination);
        expectLedgerError(() => token.unblacklist(ADMIN, 'valueOf'), 'NotBlacklisted', BLACKLIST_MESSAGES.notBlacklisted);

        token.unblacklist(ADMIN, 'constructor');
        token.mint(ADMIN, 'constructor', 1n);
        assert.strictEqual(token.balanceOf('constructor'), 1n);
    });
});
