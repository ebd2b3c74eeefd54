/**
 * Scheme Error Taxonomy
 *
 * precondition: wrong state, window not open/closed, invalid input, reentrant call
 * arithmetic: insufficient balance, allowance or custody
 * external: the settlement asset refused or failed a transfer
 * business: an order did not fill; not a fault, the caller may retry later
 */

export type SchemeErrorCategory = 'precondition' | 'arithmetic' | 'external' | 'business';

export class SchemeError extends Error {
    readonly code: string;
    readonly category: SchemeErrorCategory;

    constructor(category: SchemeErrorCategory, code: string, message: string, options?: { cause?: unknown }) {
        super(`[SCHEME] ${code}: ${message}`, options);
        this.name = new.target.name;
        this.code = code;
        this.category = category;
    }
}

export class PreconditionError extends SchemeError {
    constructor(code: string, message: string) {
        super('precondition', code, message);
    }
}

export class ArithmeticError extends SchemeError {
    constructor(code: string, message: string) {
        super('arithmetic', code, message);
    }
}

export class ExternalTransferError extends SchemeError {
    constructor(message: string, cause?: unknown) {
        super('external', 'EXTERNAL_TRANSFER_FAILED', message, { cause });
    }
}

export class OrderNotFilledError extends SchemeError {
    readonly side: 'buy' | 'sell';

    constructor(side: 'buy' | 'sell') {
        super('business', side === 'buy' ? 'BUY_NOT_FILLED' : 'SELL_NOT_FILLED', `${side} order has not filled yet`);
        this.side = side;
    }
}

/**
 * Raised when undoing the external side of a failed operation did not fully
 * succeed. `cause` is the original failure; `failures` lists what could not
 * be reversed.
 */
export class RollbackIncompleteError extends SchemeError {
    readonly failures: string[];

    constructor(cause: unknown, failures: string[]) {
        super('external', 'ROLLBACK_INCOMPLETE', `could not reverse ${failures.length} settlement movement(s)`, { cause });
        this.failures = failures;
    }
}

export function isBusinessRejection(err: unknown): err is OrderNotFilledError {
    return err instanceof OrderNotFilledError;
}
