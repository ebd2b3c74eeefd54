// Configuration Constants for Pooled Asset Schemes

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const SCHEME_CONFIG = {
    // Timing windows, measured from offerClosingTime
    MAX_ORDER_WINDOW_MS: 90 * MS_PER_DAY,
    MAX_MATURITY_WINDOW_MS: 180 * MS_PER_DAY,

    // Allowance sentinel (2^256 - 1), never decremented
    UNLIMITED_ALLOWANCE: '115792089237316195423570985008687907853269984665640564039457584007913129639935',

    // Assert conservation invariants after every committed operation
    ASSERT_INVARIANTS: process.env.DEV_MODE === 'true' || process.env.NODE_ENV !== 'production',

    // Log prefixes
    LOG_PREFIX: '[SCHEME]',
    LEDGER_LOG_PREFIX: '[LEDGER]',
    REFUND_LOG_PREFIX: '[REFUND]',
    STORE_LOG_PREFIX: '[STORE]',
} as const;

export { MS_PER_DAY };
