import { LedgerError } from '../errors.js';

/**
 * One flag per guarded entry point. A flag is held for the duration of the call and
 * released on every exit path.
 */
export class ReentrancyGuard {
    private readonly entered = new Set<string>();

    isEntered(entry: string): boolean {
        return this.entered.has(entry);
    }

    run<T>(entry: string, fn: () => T): T {
        if (this.entered.has(entry)) {
            throw new LedgerError('Reentrancy', `ReentrancyGuard: reentrant call to ${entry}`, { entry });
        }
        this.entered.add(entry);
        try {
            return fn();
        } finally {
            this.entered.delete(entry);
        }
    }
}

export default ReentrancyGuard;
