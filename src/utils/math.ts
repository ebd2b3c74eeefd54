import BigNumber from 'bignumber.js';

/**
 * Settlement amounts are arbitrary-precision non-negative integers.
 */
export type Amount = BigNumber;

export const ZERO: Amount = new BigNumber(0);

export const toBigNumber = (value: BigNumber.Value): BigNumber => {
    return new BigNumber(value);
};

export const isWholeAmount = (value: BigNumber): boolean => {
    return value.isFinite() && value.isInteger() && !value.isNegative();
};

/**
 * Parse an amount, returning null when it is not a finite non-negative integer.
 */
export const parseAmount = (value: BigNumber.Value): Amount | null => {
    const parsed = toBigNumber(value);
    return isWholeAmount(parsed) ? parsed : null;
};

/**
 * floor(pool * part / whole). Returns zero for a zero denominator.
 */
export const proRataShare = (pool: Amount, part: Amount, whole: Amount): Amount => {
    if (whole.isZero()) return ZERO;
    return pool.multipliedBy(part).dividedToIntegerBy(whole);
};

export const sumAmounts = (values: Iterable<Amount>): Amount => {
    let total = ZERO;
    for (const value of values) {
        total = total.plus(value);
    }
    return total;
};
