/**
 * Scheme Conservation Invariants
 *
 *   1. totalSupply === sum(balances)                      (always)
 *   2. totalSupply <= custody balance                     (Offering, Ordering)
 *   3. soldPrice  <= custody balance                      (AssetSold)
 *
 * While the position is held (AssetHolding, AssetSelling) custody has paid
 * for it, so only invariant 1 applies.
 *
 * VIOLATIONS:
 *   - DEV_MODE / non-production: throw Error immediately
 *   - PROD: log [SCHEME-ERROR] with full breakdown
 */

import { SCHEME_CONFIG } from '../config/constants';
import { Amount } from '../utils/math';
import logger from '../utils/logger';
import { Ledger } from './ledger';
import { SchemeState } from './schemeLifecycle';

export interface SchemeAccountingView {
    id: string;
    state: SchemeState;
    soldPrice: Amount;
    ledger: Ledger;
    custodyBalance: Amount;
}

export interface SchemeInvariantResult {
    valid: boolean;
    errors: string[];
}

export function checkSchemeInvariants(view: SchemeAccountingView): SchemeInvariantResult {
    const ledgerCheck = view.ledger.checkInvariants();
    const errors = [...ledgerCheck.errors];
    const supply = view.ledger.totalSupply;

    if (view.state === SchemeState.Offering || view.state === SchemeState.Ordering) {
        if (supply.isGreaterThan(view.custodyBalance)) {
            errors.push(`totalSupply (${supply.toFixed()}) exceeds custody (${view.custodyBalance.toFixed()})`);
        }
    }

    if (view.state === SchemeState.AssetSold && view.soldPrice.isGreaterThan(view.custodyBalance)) {
        errors.push(`soldPrice (${view.soldPrice.toFixed()}) exceeds custody (${view.custodyBalance.toFixed()})`);
    }

    return { valid: errors.length === 0, errors };
}

export function assertSchemeInvariants(view: SchemeAccountingView): void {
    const check = checkSchemeInvariants(view);
    if (check.valid) return;

    const errorMsg =
        `[SCHEME-ERROR] Invariant violation detected! scheme=${view.id} state=${view.state}\n` +
        `  Errors:\n${check.errors.map(e => `    - ${e}`).join('\n')}\n` +
        `  totalSupply=${view.ledger.totalSupply.toFixed()} custody=${view.custodyBalance.toFixed()} ` +
        `soldPrice=${view.soldPrice.toFixed()}`;

    if (SCHEME_CONFIG.ASSERT_INVARIANTS) {
        throw new Error(errorMsg);
    }
    logger.error(errorMsg);
}
