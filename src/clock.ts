/**
 * Source of block time, in whole seconds.
 */
export interface Clock {
    now(): number;
}

export const systemClock: Clock = {
    now: () => Math.floor(Date.now() / 1000),
};

/**
 * Clock moved by hand, used for replays and tests.
 */
export class ManualClock implements Clock {
    constructor(private current: number = 1_700_000_000) {}

    now(): number {
        return this.current;
    }

    set(timestamp: number): void {
        this.current = timestamp;
    }

    advance(seconds: number): void {
        this.current += seconds;
    }
}
