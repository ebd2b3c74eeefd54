/**
 * Ledger - Contribution and Share Accounting
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ONE LEDGER INSTANCE PER SCHEME, TWO ROLES
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * While the scheme is Offering/Ordering the ledger records contributions
 * (mint on deposit, burn on withdrawal or refund). Once the position is
 * acquired the same balances are the share ledger and transfer/approve
 * become legal. The ledger itself knows nothing about lifecycle; the scheme
 * layers its guards on top.
 *
 * INVARIANTS (HARD RULES):
 *   1. totalSupply === sum(balances)
 *   2. No balance is negative
 *   3. participants holds each identity at most once, in first-credit order
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import { SCHEME_CONFIG } from '../config/constants';
import { Amount, ZERO, sumAmounts } from '../utils/math';
import logger from '../utils/logger';
import { ArithmeticError, PreconditionError } from './errors';

export const UNLIMITED_ALLOWANCE: Amount = new BigNumber(SCHEME_CONFIG.UNLIMITED_ALLOWANCE);

/**
 * Serializable ledger image (amounts as decimal strings)
 */
export interface LedgerSnapshot {
    balances: Array<[string, string]>;
    allowances: Array<[string, string, string]>;
    participants: string[];
}

/**
 * Hooks for transfer and approval notifications
 */
export interface LedgerObserver {
    onTransfer?(from: string, to: string, amount: Amount): void;
    onApproval?(owner: string, spender: string, amount: Amount): void;
}

export interface LedgerInvariantResult {
    valid: boolean;
    errors: string[];
    sumBalances: Amount;
}

export class Ledger {
    private balances = new Map<string, Amount>();
    private allowances = new Map<string, Map<string, Amount>>();
    private participantSet = new Set<string>();
    private supply: Amount = ZERO;

    constructor(private readonly observer: LedgerObserver = {}) {}

    // ═══════════════════════════════════════════════════════════════════════════
    // READS
    // ═══════════════════════════════════════════════════════════════════════════

    get totalSupply(): Amount {
        return this.supply;
    }

    balanceOf(identity: string): Amount {
        return this.balances.get(identity) ?? ZERO;
    }

    allowance(owner: string, spender: string): Amount {
        return this.allowances.get(owner)?.get(spender) ?? ZERO;
    }

    /**
     * Everyone who has ever been credited, in first-credit order
     */
    participants(): string[] {
        return Array.from(this.participantSet);
    }

    /**
     * Participants currently holding a nonzero balance
     */
    holders(): Array<{ identity: string; balance: Amount }> {
        const result: Array<{ identity: string; balance: Amount }> = [];
        for (const identity of this.participantSet) {
            const balance = this.balanceOf(identity);
            if (!balance.isZero()) {
                result.push({ identity, balance });
            }
        }
        return result;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // MUTATIONS
    // ═══════════════════════════════════════════════════════════════════════════

    mint(identity: string, amount: Amount): void {
        requireIdentity(identity, 'mint');

        this.balances.set(identity, this.balanceOf(identity).plus(amount));
        this.supply = this.supply.plus(amount);
        this.participantSet.add(identity);

        logger.debug(`${SCHEME_CONFIG.LEDGER_LOG_PREFIX} MINT to=${identity} amount=${amount.toFixed()} supply=${this.supply.toFixed()}`);
    }

    burn(identity: string, amount: Amount): void {
        const balance = this.balanceOf(identity);
        if (balance.isLessThan(amount)) {
            throw new ArithmeticError(
                'INSUFFICIENT_BALANCE',
                `cannot burn ${amount.toFixed()} from ${identity} holding ${balance.toFixed()}`
            );
        }

        this.balances.set(identity, balance.minus(amount));
        this.supply = this.supply.minus(amount);

        logger.debug(`${SCHEME_CONFIG.LEDGER_LOG_PREFIX} BURN from=${identity} amount=${amount.toFixed()} supply=${this.supply.toFixed()}`);
    }

    transfer(from: string, to: string, amount: Amount): boolean {
        this.move(from, to, amount);
        return true;
    }

    /**
     * Spend `amount` of `from`'s balance on behalf of `spender`.
     * An unlimited allowance is left untouched.
     */
    transferFrom(spender: string, from: string, to: string, amount: Amount): boolean {
        const allowed = this.allowance(from, spender);
        if (allowed.isLessThan(amount)) {
            throw new ArithmeticError(
                'INSUFFICIENT_ALLOWANCE',
                `${spender} may spend ${allowed.toFixed()} of ${from}, requested ${amount.toFixed()}`
            );
        }

        this.move(from, to, amount);

        if (!allowed.isEqualTo(UNLIMITED_ALLOWANCE)) {
            this.setAllowance(from, spender, allowed.minus(amount));
        }
        return true;
    }

    approve(owner: string, spender: string, amount: Amount): boolean {
        requireIdentity(owner, 'approve');
        requireIdentity(spender, 'approve');

        this.setAllowance(owner, spender, amount);
        this.observer.onApproval?.(owner, spender, amount);
        return true;
    }

    private move(from: string, to: string, amount: Amount): void {
        requireIdentity(to, 'transfer');
        if (from === to) {
            throw new PreconditionError('SELF_TRANSFER', `transfer from ${from} to itself is not allowed`);
        }

        const balance = this.balanceOf(from);
        if (balance.isLessThan(amount)) {
            throw new ArithmeticError(
                'INSUFFICIENT_BALANCE',
                `cannot transfer ${amount.toFixed()} from ${from} holding ${balance.toFixed()}`
            );
        }

        this.balances.set(from, balance.minus(amount));
        this.balances.set(to, this.balanceOf(to).plus(amount));
        this.participantSet.add(to);

        this.observer.onTransfer?.(from, to, amount);
    }

    private setAllowance(owner: string, spender: string, amount: Amount): void {
        let bySpender = this.allowances.get(owner);
        if (!bySpender) {
            bySpender = new Map<string, Amount>();
            this.allowances.set(owner, bySpender);
        }
        bySpender.set(spender, amount);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // SNAPSHOT & RESTORE
    // ═══════════════════════════════════════════════════════════════════════════

    snapshot(): LedgerSnapshot {
        const allowances: Array<[string, string, string]> = [];
        for (const [owner, bySpender] of this.allowances) {
            for (const [spender, amount] of bySpender) {
                allowances.push([owner, spender, amount.toFixed()]);
            }
        }

        return {
            balances: Array.from(this.balances, ([identity, amount]): [string, string] => [identity, amount.toFixed()]),
            allowances,
            participants: this.participants(),
        };
    }

    restore(snapshot: LedgerSnapshot): void {
        this.balances = new Map(snapshot.balances.map(([identity, amount]): [string, Amount] => [identity, new BigNumber(amount)]));
        this.allowances = new Map();
        for (const [owner, spender, amount] of snapshot.allowances) {
            this.setAllowance(owner, spender, new BigNumber(amount));
        }
        this.participantSet = new Set(snapshot.participants);
        this.supply = sumAmounts(this.balances.values());
    }

    checkInvariants(): LedgerInvariantResult {
        const errors: string[] = [];
        const sumBalances = sumAmounts(this.balances.values());

        if (!sumBalances.isEqualTo(this.supply)) {
            errors.push(`totalSupply (${this.supply.toFixed()}) !== sum(balances) (${sumBalances.toFixed()})`);
        }

        for (const [identity, balance] of this.balances) {
            if (balance.isNegative()) {
                errors.push(`balance of ${identity} is negative (${balance.toFixed()})`);
            }
            if (!balance.isZero() && !this.participantSet.has(identity)) {
                errors.push(`holder ${identity} missing from participant set`);
            }
        }

        return { valid: errors.length === 0, errors, sumBalances };
    }
}

function requireIdentity(identity: string, operation: string): void {
    if (!identity) {
        throw new PreconditionError('NULL_IDENTITY', `${operation} requires a non-null identity`);
    }
}
