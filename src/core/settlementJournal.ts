/**
 * Settlement Journal - unit of work over the settlement asset
 *
 * Every external movement an operation makes goes through one journal. If
 * the operation fails, `rollback()` returns the asset to where it was: via
 * the asset's own checkpoint when it offers one, otherwise by replaying
 * compensating transfers in reverse order.
 */

import { Amount } from '../utils/math';
import logger from '../utils/logger';
import { SettlementAsset, SettlementCheckpoint } from '../integrations/settlementAsset';
import { ExternalTransferError } from './errors';

export interface SettlementMovement {
    kind: 'pull' | 'pay';
    counterparty: string;
    amount: Amount;
}

export class SettlementJournal {
    private readonly movements: SettlementMovement[] = [];
    private readonly checkpoint: SettlementCheckpoint | null;

    constructor(private readonly asset: SettlementAsset, private readonly custody: string) {
        this.checkpoint = asset.checkpoint ? asset.checkpoint() : null;
    }

    /**
     * Pull `amount` from `src` into custody.
     */
    pull(src: string, amount: Amount): void {
        this.invoke(`pull ${amount.toFixed()} from ${src}`, () => this.asset.transferFrom(src, this.custody, amount));
        this.movements.push({ kind: 'pull', counterparty: src, amount });
    }

    /**
     * Pay `amount` from custody to `dst`.
     */
    pay(dst: string, amount: Amount): void {
        this.invoke(`pay ${amount.toFixed()} to ${dst}`, () => this.asset.transfer(dst, amount));
        this.movements.push({ kind: 'pay', counterparty: dst, amount });
    }

    /**
     * Undo every recorded movement. Returns descriptions of movements that
     * could not be reversed (always empty on the checkpoint path).
     */
    rollback(): string[] {
        if (this.checkpoint) {
            this.checkpoint.rollback();
            return [];
        }

        const failures: string[] = [];
        for (const movement of [...this.movements].reverse()) {
            const reversed = this.reverse(movement);
            if (!reversed) {
                const description = `${movement.kind} ${movement.amount.toFixed()} ${movement.kind === 'pay' ? 'to' : 'from'} ${movement.counterparty}`;
                failures.push(description);
                logger.error(`[SCHEME] ROLLBACK failed to reverse ${description}`);
            }
        }
        return failures;
    }

    private reverse(movement: SettlementMovement): boolean {
        try {
            return movement.kind === 'pay'
                ? this.asset.transferFrom(movement.counterparty, this.custody, movement.amount)
                : this.asset.transfer(movement.counterparty, movement.amount);
        } catch (err: unknown) {
            logger.error(`[SCHEME] ROLLBACK transfer threw: ${err instanceof Error ? err.message : String(err)}`);
            return false;
        }
    }

    private invoke(description: string, call: () => boolean): void {
        let ok: boolean;
        try {
            ok = call();
        } catch (err: unknown) {
            throw new ExternalTransferError(`settlement asset threw on ${description}`, err);
        }
        if (!ok) {
            throw new ExternalTransferError(`settlement asset refused to ${description}`);
        }
    }
}
