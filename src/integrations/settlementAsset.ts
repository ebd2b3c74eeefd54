/**
 * Settlement Asset Port
 *
 * The fungible asset participants deposit and are repaid in. The scheme only
 * sees it through a handle bound to its own custody account: `transfer`
 * pays out of custody, `transferFrom` pulls from `src` using the allowance
 * `src` granted the custody account.
 *
 * Calls are synchronous. A `false` return or a throw is an external failure
 * and aborts the containing operation.
 */

import { Amount } from '../utils/math';

export interface SettlementCheckpoint {
    rollback(): void;
}

export interface SettlementAsset {
    transferFrom(src: string, dst: string, amount: Amount): boolean;
    transfer(dst: string, amount: Amount): boolean;
    balanceOf(identity: string): Amount;

    /**
     * Optional. Capture the asset's state so a failed operation can be undone
     * exactly. Without it the scheme reverses movements with compensating
     * transfers.
     */
    checkpoint?(): SettlementCheckpoint;
}
