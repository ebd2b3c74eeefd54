/**
 * Scheme Lifecycle FSM
 *
 * Offering → Ordering → AssetHolding → AssetSelling → AssetSold → Closed
 *
 * Early exits: Offering → Closed and Ordering → Closed, once the position
 * can no longer be bought.
 *
 * Forward-only. No state is ever revisited; Closed is terminal.
 */

export enum SchemeState {
    Offering = 'Offering',         // Accepting deposits and withdrawals
    Ordering = 'Ordering',         // Buy order outstanding
    AssetHolding = 'AssetHolding', // Position held, shares transferable
    AssetSelling = 'AssetSelling', // Sell order outstanding
    AssetSold = 'AssetSold',       // Proceeds in custody, awaiting redemption
    Closed = 'Closed'              // Terminal
}

const TRANSITIONS: Record<SchemeState, readonly SchemeState[]> = {
    [SchemeState.Offering]: [SchemeState.Ordering, SchemeState.Closed],
    [SchemeState.Ordering]: [SchemeState.AssetHolding, SchemeState.Closed],
    [SchemeState.AssetHolding]: [SchemeState.AssetSelling],
    [SchemeState.AssetSelling]: [SchemeState.AssetSold],
    [SchemeState.AssetSold]: [SchemeState.Closed],
    [SchemeState.Closed]: [],
};

export function canTransition(from: SchemeState, to: SchemeState): boolean {
    return TRANSITIONS[from].includes(to);
}

export function nextStates(from: SchemeState): readonly SchemeState[] {
    return TRANSITIONS[from];
}

export function isTerminal(state: SchemeState): boolean {
    return TRANSITIONS[state].length === 0;
}

export function isSchemeState(value: string): value is SchemeState {
    return (Object.values(SchemeState) as string[]).includes(value);
}

/**
 * Lifecycle deadlines, epoch milliseconds
 */
export interface SchemeSchedule {
    offerClosingTime: number;
    orderExpiration: number;
    maturity: number;
}

/**
 * Whether redeem() may run now.
 *
 * - AssetSold: always
 * - Ordering: once the buy order has expired (orderExpiration < now)
 * - Offering: once the offer has closed (offerClosingTime < now)
 */
export function isRedeemable(state: SchemeState, schedule: SchemeSchedule, now: number): boolean {
    switch (state) {
        case SchemeState.AssetSold:
            return true;
        case SchemeState.Ordering:
            return schedule.orderExpiration < now;
        case SchemeState.Offering:
            return schedule.offerClosingTime < now;
        default:
            return false;
    }
}
