/**
 * Refund Engine - closing distributions
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * TWO ALGORITHMS, CHOSEN BY HOW FAR THE LIFECYCLE GOT
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * PRE-PURCHASE (Offering / Ordering, position never acquired):
 *   every holder gets their balance back 1:1.
 *   Requires custody >= totalSupply.
 *
 * POST-SALE (AssetSold):
 *   refund_i = floor(soldPrice * balance_i / totalSupplyAtEntry)
 *   After the pass the whole remaining custody balance (rounding remainder
 *   plus any dust) goes to the largest holder, so custody ends at zero.
 *   Requires custody >= soldPrice.
 *   soldPrice == 0, no holders or totalSupply == 0 → nothing to pay.
 *
 * Planning is pure; execution burns each holder's balance before paying them.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { SCHEME_CONFIG } from '../config/constants';
import { Amount, ZERO, proRataShare, sumAmounts } from '../utils/math';
import logger from '../utils/logger';
import { ArithmeticError } from './errors';
import { Ledger } from './ledger';
import { SettlementJournal } from './settlementJournal';
import { SchemeState } from './schemeLifecycle';

export type RedemptionMode = 'pre-purchase' | 'post-sale';

export type PayoutKind = 'refund' | 'prorata' | 'remainder';

export interface Payout {
    participant: string;
    kind: PayoutKind;
    amount: Amount;
    /** Ledger balance burned alongside this payout (zero for the remainder) */
    burned: Amount;
}

export interface RedemptionPlan {
    mode: RedemptionMode;
    payouts: Payout[];
    totalPaid: Amount;
    remainderRecipient: string | null;
    remainder: Amount;
}

export interface RedemptionInput {
    entryState: SchemeState;
    holders: Array<{ identity: string; balance: Amount }>;
    totalSupply: Amount;
    soldPrice: Amount;
    custodyBalance: Amount;
}

const { REFUND_LOG_PREFIX } = SCHEME_CONFIG;

export function redemptionMode(entryState: SchemeState): RedemptionMode {
    return entryState === SchemeState.AssetSold ? 'post-sale' : 'pre-purchase';
}

export function planRedemption(input: RedemptionInput): RedemptionPlan {
    return redemptionMode(input.entryState) === 'post-sale'
        ? planPostSaleRefund(input)
        : planPrePurchaseRefund(input);
}

/**
 * Return every contribution 1:1.
 */
export function planPrePurchaseRefund(input: RedemptionInput): RedemptionPlan {
    const { holders, totalSupply, custodyBalance } = input;

    if (totalSupply.isZero() || holders.length === 0) {
        return emptyPlan('pre-purchase');
    }

    if (custodyBalance.isLessThan(totalSupply)) {
        throw new ArithmeticError(
            'CUSTODY_SHORTFALL',
            `custody holds ${custodyBalance.toFixed()} but contributions total ${totalSupply.toFixed()}`
        );
    }

    const payouts: Payout[] = holders.map(({ identity, balance }) => ({
        participant: identity,
        kind: 'refund',
        amount: balance,
        burned: balance,
    }));

    return {
        mode: 'pre-purchase',
        payouts,
        totalPaid: sumAmounts(payouts.map(p => p.amount)),
        remainderRecipient: null,
        remainder: ZERO,
    };
}

/**
 * Split sale proceeds pro-rata; the remainder goes to the largest holder.
 */
export function planPostSaleRefund(input: RedemptionInput): RedemptionPlan {
    const { holders, totalSupply, soldPrice, custodyBalance } = input;

    if (soldPrice.isZero() || holders.length === 0 || totalSupply.isZero()) {
        return emptyPlan('post-sale');
    }

    if (custodyBalance.isLessThan(soldPrice)) {
        throw new ArithmeticError(
            'CUSTODY_SHORTFALL',
            `custody holds ${custodyBalance.toFixed()} but sale proceeds are ${soldPrice.toFixed()}`
        );
    }

    const payouts: Payout[] = [];
    let largest: { identity: string; balance: Amount } | null = null;

    for (const holder of holders) {
        payouts.push({
            participant: holder.identity,
            kind: 'prorata',
            amount: proRataShare(soldPrice, holder.balance, totalSupply),
            burned: holder.balance,
        });

        if (!largest || holder.balance.isGreaterThan(largest.balance)) {
            largest = holder;
        }
    }

    const distributed = sumAmounts(payouts.map(p => p.amount));
    const remainder = custodyBalance.minus(distributed);
    const remainderRecipient = largest ? largest.identity : null;

    if (remainderRecipient && remainder.isGreaterThan(0)) {
        payouts.push({ participant: remainderRecipient, kind: 'remainder', amount: remainder, burned: ZERO });
    }

    return {
        mode: 'post-sale',
        payouts,
        totalPaid: custodyBalance,
        remainderRecipient,
        remainder,
    };
}

/**
 * Apply a plan: burn, then pay, holder by holder.
 */
export function executeRedemption(plan: RedemptionPlan, ledger: Ledger, journal: SettlementJournal): void {
    for (const payout of plan.payouts) {
        if (payout.burned.isGreaterThan(0)) {
            ledger.burn(payout.participant, payout.burned);
        }
        if (payout.amount.isGreaterThan(0)) {
            journal.pay(payout.participant, payout.amount);
        }

        logger.debug(
            `${REFUND_LOG_PREFIX} ${payout.kind.toUpperCase()} to=${payout.participant} ` +
            `paid=${payout.amount.toFixed()} burned=${payout.burned.toFixed()}`
        );
    }

    logger.info(
        `${REFUND_LOG_PREFIX} ${plan.mode} payouts=${plan.payouts.length} totalPaid=${plan.totalPaid.toFixed()}` +
        (plan.remainderRecipient ? ` remainder=${plan.remainder.toFixed()} to=${plan.remainderRecipient}` : '')
    );
}

function emptyPlan(mode: RedemptionMode): RedemptionPlan {
    return { mode, payouts: [], totalPaid: ZERO, remainderRecipient: null, remainder: ZERO };
}
