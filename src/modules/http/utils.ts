import type { Request } from 'express';

import { formatTokenAmount } from '../../utils/bigint.js';

const MAX_LIMIT = 100;

function queryInt(value: unknown): number {
    return typeof value === 'string' ? parseInt(value, 10) : NaN;
}

/**
 * Pagination parameters from `?limit=&offset=` (limit defaults to 10, at most 100)
 */
export const getPagination = (req: Request) => {
    const limit = Math.min(Math.max(queryInt(req.query.limit) || 10, 1), MAX_LIMIT);
    const offset = Math.max(queryInt(req.query.offset) || 0, 0);
    return {
        limit,
        skip: offset,
        page: Math.floor(offset / limit) + 1,
    };
};

/**
 * Token amount for responses: decimal-formatted plus the raw integer string
 */
export function formatTokenAmountForResponse(amount: bigint): { amount: string; rawAmount: string } {
    return {
        amount: formatTokenAmount(amount),
        rawAmount: amount.toString(),
    };
}
