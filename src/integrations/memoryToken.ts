/**
 * In-Memory Settlement Token
 *
 * A complete fungible token held in process memory: balances, allowances,
 * minting for test funding, checkpoints and failure injection. `connect()`
 * returns the SettlementAsset handle a scheme uses for its custody account.
 */

import BigNumber from 'bignumber.js';
import { Amount, ZERO, parseAmount } from '../utils/math';
import { SettlementAsset, SettlementCheckpoint } from './settlementAsset';

export type TransferFailureRule = (movement: { from: string; to: string; amount: Amount }) => boolean;

interface TokenImage {
    balances: Map<string, Amount>;
    allowances: Map<string, Amount>;
}

const allowanceKey = (owner: string, spender: string): string => `${owner}->${spender}`;

export class MemoryToken {
    private balances = new Map<string, Amount>();
    private allowances = new Map<string, Amount>();
    private failureRules: TransferFailureRule[] = [];

    constructor(readonly symbol: string = 'USDC') {}

    balanceOf(identity: string): Amount {
        return this.balances.get(identity) ?? ZERO;
    }

    allowance(owner: string, spender: string): Amount {
        return this.allowances.get(allowanceKey(owner, spender)) ?? ZERO;
    }

    totalSupply(): Amount {
        let total = ZERO;
        for (const balance of this.balances.values()) total = total.plus(balance);
        return total;
    }

    mint(to: string, value: BigNumber.Value): void {
        const amount = parseAmount(value);
        if (!amount) throw new Error(`[${this.symbol}] invalid mint amount ${String(value)}`);
        this.balances.set(to, this.balanceOf(to).plus(amount));
    }

    approve(owner: string, spender: string, value: BigNumber.Value): boolean {
        const amount = parseAmount(value);
        if (!amount) return false;
        this.allowances.set(allowanceKey(owner, spender), amount);
        return true;
    }

    /**
     * Move funds owned by `from`. Returns false on insufficient balance or an
     * injected failure.
     */
    transfer(from: string, to: string, amount: Amount): boolean {
        if (!to || amount.isNegative()) return false;
        if (this.failureRules.some(rule => rule({ from, to, amount }))) return false;

        const balance = this.balanceOf(from);
        if (balance.isLessThan(amount)) return false;

        this.balances.set(from, balance.minus(amount));
        this.balances.set(to, this.balanceOf(to).plus(amount));
        return true;
    }

    transferFrom(spender: string, from: string, to: string, amount: Amount): boolean {
        const allowed = this.allowance(from, spender);
        if (allowed.isLessThan(amount)) return false;
        if (!this.transfer(from, to, amount)) return false;
        this.allowances.set(allowanceKey(from, spender), allowed.minus(amount));
        return true;
    }

    /**
     * Make every matching movement fail until the returned function is called.
     */
    failWhen(rule: TransferFailureRule): () => void {
        this.failureRules.push(rule);
        return () => {
            this.failureRules = this.failureRules.filter(r => r !== rule);
        };
    }

    checkpoint(): SettlementCheckpoint {
        const image: TokenImage = {
            balances: new Map(this.balances),
            allowances: new Map(this.allowances),
        };
        return {
            rollback: () => {
                this.balances = new Map(image.balances);
                this.allowances = new Map(image.allowances);
            },
        };
    }

    /**
     * Handle bound to `operator`, the account that sends with `transfer` and
     * spends allowances with `transferFrom`.
     */
    connect(operator: string, options: { checkpoints?: boolean } = {}): SettlementAsset {
        const handle: SettlementAsset = {
            transferFrom: (src, dst, amount) => this.transferFrom(operator, src, dst, amount),
            transfer: (dst, amount) => this.transfer(operator, dst, amount),
            balanceOf: (identity) => this.balanceOf(identity),
        };
        if (options.checkpoints !== false) {
            handle.checkpoint = () => this.checkpoint();
        }
        return handle;
    }
}
