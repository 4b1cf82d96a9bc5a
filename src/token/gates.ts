/**
 * Every balance- or allowance-changing entry point is described as an Operation and
 * run through the gates in a fixed order before any state is touched:
 *
 *   1. access control (role checks)
 *   2. pause breaker
 *   3. blacklist filter
 *
 * The allowance guard and the ledger run afterwards. A gate rejects by throwing.
 */

export type Operation =
    | { kind: 'mint'; caller: string; to: string; amount: bigint }
    | { kind: 'burn'; caller: string; from: string; amount: bigint }
    | { kind: 'transfer'; caller: string; to: string; amount: bigint }
    | { kind: 'transferFrom'; caller: string; from: string; to: string; amount: bigint }
    | { kind: 'approve'; caller: string; spender: string; value: bigint }
    | { kind: 'permit'; caller: string; owner: string; spender: string; value: bigint };

export type OperationKind = Operation['kind'];

export interface Gate {
    readonly name: string;
    check(op: Operation): void;
}

/**
 * Account whose tokens (or allowance) the operation acts on, if any
 */
export function sourceOf(op: Operation): string | undefined {
    switch (op.kind) {
        case 'burn':
        case 'transferFrom':
            return op.from;
        case 'transfer':
        case 'approve':
            return op.caller;
        case 'permit':
            return op.owner;
        case 'mint':
            return undefined;
    }
}

export class GatePipeline {
    constructor(private readonly gates: readonly Gate[]) {}

    get names(): string[] {
        return this.gates.map(g => g.name);
    }

    check(op: Operation): void {
        for (const gate of this.gates) {
            gate.check(op);
        }
    }
}
