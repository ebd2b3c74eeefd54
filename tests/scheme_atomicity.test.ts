/**
 * Atomicity & Reentrancy Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * A failed operation leaves no trace: ledger, lifecycle fields, settlement
 * balances and notifications all match the pre-call state.
 *
 * Test Cases:
 *   1. Deposit whose pull is refused → nothing minted
 *   2. Withdrawal whose payout is refused → contribution restored
 *   3. Redemption failing mid-pass (checkpoint path) → every payout undone
 *   4. Same failure without checkpoints → compensating transfers
 *   5. Compensation impossible → RollbackIncompleteError
 *   6. Failed redemption from Ordering → buy order still open
 *   7. Invariant violated after the body ran → rolled back like any failure
 *   8. Collaborator calling back into the scheme → rejected
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import { ExternalTransferError, RollbackIncompleteError } from '../src/core/errors';
import { checkSchemeInvariants } from '../src/core/invariants';
import { Ledger } from '../src/core/ledger';
import { SchemeNotification } from '../src/core/notifications';
import { Scheme } from '../src/core/scheme';
import { SchemeState } from '../src/core/schemeLifecycle';
import { ManualOrderGateway } from '../src/execution/manualOrderGateway';
import { NoFillOrderGateway } from '../src/execution/orderGateway';
import { MemoryToken } from '../src/integrations/memoryToken';
import { Amount, ZERO } from '../src/utils/math';
import {
    ASSET_REF,
    CUSTODY,
    Harness,
    MARKET,
    MATURITY,
    OFFER_CLOSING,
    ORDER_EXPIRATION,
    T0,
    acquire,
    createHarness,
    sell,
} from './fixtures';

const CONTRIBUTIONS = { alice: 100, bob: 200, carol: 700 };

/**
 * Gateway that calls back into the scheme when the buy order is placed
 */
class CallbackGateway extends NoFillOrderGateway {
    scheme: Scheme | null = null;

    placeBuy(budget: Amount, underlyingAssetRef: string): void {
        super.placeBuy(budget, underlyingAssetRef);
        this.scheme?.deposit('mallory', 1);
    }
}

/**
 * Gateway that can report the sell as filled before the proceeds reach custody
 */
class EarlySellReportGateway extends ManualOrderGateway {
    reportSellEarly = false;

    checkSellFilled(): boolean {
        return this.reportSellEarly || super.checkSellFilled();
    }

    sellFillPrice(): Amount {
        return this.reportSellEarly ? new BigNumber(999) : super.sellFillPrice();
    }
}

describe('Scheme atomicity', () => {
    describe('Offering', () => {
        let h: Harness;

        beforeEach(() => {
            h = createHarness();
        });

        it('mints nothing when the settlement pull is refused', () => {
            h.token.mint('alice', 100);

            expect(() => h.scheme.deposit('alice', 100)).toThrow(ExternalTransferError);
            expect(h.scheme.totalDeposits().toFixed()).toBe('0');
            expect(h.scheme.participants()).toEqual([]);
            expect(h.token.balanceOf('alice').toFixed()).toBe('100');
        });

        it('restores the contribution when the payout is refused', () => {
            h.contribute('alice', 100);
            const release = h.token.failWhen(m => m.to === 'alice');

            expect(() => h.scheme.withdraw('alice', 40)).toThrow(/EXTERNAL_TRANSFER_FAILED/);
            expect(h.scheme.depositOf('alice').toFixed()).toBe('100');
            expect(h.token.balanceOf(CUSTODY).toFixed()).toBe('100');

            release();
            h.scheme.withdraw('alice', 40);
            expect(h.token.balanceOf('alice').toFixed()).toBe('40');
        });
    });

    describe('Redemption failing mid-pass', () => {
        it('undoes every payout through the asset checkpoint', () => {
            const h = createHarness();
            acquire(h, CONTRIBUTIONS, 1000);
            sell(h, 999);

            const seen: SchemeNotification[] = [];
            h.scheme.subscribe(n => seen.push(n));
            const release = h.token.failWhen(m => m.to === 'bob');

            expect(() => h.scheme.redeem()).toThrow(ExternalTransferError);

            expect(h.scheme.state).toBe(SchemeState.AssetSold);
            expect(h.token.balanceOf('alice').toFixed()).toBe('0');
            expect(h.token.balanceOf(CUSTODY).toFixed()).toBe('999');
            expect(h.scheme.previewRedemption().payouts.map(p => p.burned.toFixed())).toEqual(['100', '200', '700', '0']);
            expect(seen).toEqual([]);

            release();
            h.scheme.redeem();
            expect(h.token.balanceOf('bob').toFixed()).toBe('199');
            expect(seen.map(n => n.type)).toEqual(['transition']);
        });

        it('reverses payouts with compensating pulls when the asset has no checkpoints', () => {
            const h = createHarness({ checkpoints: false });
            for (const [who, amount] of Object.entries(CONTRIBUTIONS)) h.contribute(who, amount);
            h.clock.now = OFFER_CLOSING + 1;

            // alice and bob allow custody to claw back a reversed refund
            h.token.approve('alice', CUSTODY, 100);
            h.token.approve('bob', CUSTODY, 200);
            const release = h.token.failWhen(m => m.to === 'carol');

            expect(() => h.scheme.redeem()).toThrow(ExternalTransferError);

            expect(h.token.balanceOf('alice').toFixed()).toBe('0');
            expect(h.token.balanceOf('bob').toFixed()).toBe('0');
            expect(h.token.balanceOf(CUSTODY).toFixed()).toBe('1000');
            expect(h.scheme.state).toBe(SchemeState.Offering);

            release();
            h.scheme.redeem();
            expect(h.token.balanceOf('carol').toFixed()).toBe('700');
        });

        it('reports movements it could not reverse', () => {
            const h = createHarness({ checkpoints: false });
            for (const [who, amount] of Object.entries(CONTRIBUTIONS)) h.contribute(who, amount);
            h.clock.now = OFFER_CLOSING + 1;

            h.token.approve('bob', CUSTODY, 200);
            h.token.failWhen(m => m.to === 'carol');

            let caught: unknown;
            try {
                h.scheme.redeem();
            } catch (err) {
                caught = err;
            }

            expect(caught).toBeInstanceOf(RollbackIncompleteError);
            if (caught instanceof RollbackIncompleteError) {
                expect(caught.failures).toEqual(['pay 100 to alice']);
                expect(caught.cause).toBeInstanceOf(ExternalTransferError);
            }
            expect(h.scheme.state).toBe(SchemeState.Offering);
            expect(h.scheme.depositOf('alice').toFixed()).toBe('100');
        });
    });

    describe('Ordering redemption failing', () => {
        it('leaves the buy order open when a refund is refused', () => {
            const h = createHarness();
            for (const [who, amount] of Object.entries(CONTRIBUTIONS)) h.contribute(who, amount);
            h.clock.now = OFFER_CLOSING;
            h.scheme.makeBuyOrder();
            h.clock.now = ORDER_EXPIRATION + 1;
            const release = h.token.failWhen(m => m.to === 'bob');

            expect(() => h.scheme.redeem()).toThrow(ExternalTransferError);
            expect(h.scheme.state).toBe(SchemeState.Ordering);
            expect(h.gateway.orderStatus('buy')).toBe('open');

            release();
            h.scheme.redeem();
            expect(h.gateway.orderStatus('buy')).toBe('cancelled');
        });
    });

    describe('Invariant violations', () => {
        it('rolls back an operation that leaves custody short of soldPrice', () => {
            const token = new MemoryToken();
            const gateway = new EarlySellReportGateway({ token, custody: CUSTODY, market: MARKET });
            const clock = { now: T0 };
            const scheme = Scheme.create(
                {
                    custody: CUSTODY,
                    underlyingAssetRef: ASSET_REF,
                    offerClosingTime: OFFER_CLOSING,
                    orderExpiration: ORDER_EXPIRATION,
                    maturity: MATURITY,
                },
                { asset: token.connect(CUSTODY), gateway, clock: () => clock.now }
            );

            token.mint('alice', 1000);
            token.approve('alice', CUSTODY, 1000);
            scheme.deposit('alice', 1000);
            clock.now = OFFER_CLOSING;
            scheme.makeBuyOrder();
            gateway.fillBuy(1000);
            scheme.publishToken();
            clock.now = MATURITY;
            scheme.sellAsset();

            const seen: SchemeNotification[] = [];
            scheme.subscribe(n => seen.push(n));

            gateway.reportSellEarly = true;
            expect(() => scheme.updateSellOrder()).toThrow(/Invariant violation/);
            expect(scheme.state).toBe(SchemeState.AssetSelling);
            expect(scheme.soldPrice.toFixed()).toBe('0');
            expect(seen).toEqual([]);

            gateway.reportSellEarly = false;
            gateway.fillSell(999);
            scheme.updateSellOrder();

            expect(scheme.state).toBe(SchemeState.AssetSold);
            expect(seen.map(n => (n.type === 'transition' ? `${n.from}->${n.to}` : n.type))).toEqual([
                'AssetSelling->AssetSold',
            ]);
        });

        it('reports contributions that custody does not cover', () => {
            const ledger = new Ledger();
            ledger.mint('alice', new BigNumber(100));

            const view = { id: 'scheme-1', soldPrice: ZERO, ledger, custodyBalance: new BigNumber(50) };

            expect(checkSchemeInvariants({ ...view, state: SchemeState.Offering })).toEqual({
                valid: false,
                errors: ['totalSupply (100) exceeds custody (50)'],
            });
            expect(checkSchemeInvariants({ ...view, state: SchemeState.AssetHolding }).valid).toBe(true);
        });

        it('reports sale proceeds that custody does not hold', () => {
            const result = checkSchemeInvariants({
                id: 'scheme-1',
                state: SchemeState.AssetSold,
                soldPrice: new BigNumber(999),
                ledger: new Ledger(),
                custodyBalance: new BigNumber(998),
            });

            expect(result.errors).toEqual(['soldPrice (999) exceeds custody (998)']);
        });
    });

    describe('Reentrancy', () => {
        it('rejects a collaborator calling back mid-operation and rolls back', () => {
            const gateway = new CallbackGateway();
            const h = createHarness({ gateway: () => gateway });
            gateway.scheme = h.scheme;
            h.contribute('alice', 100);
            h.fund('mallory', 1);
            h.clock.now = OFFER_CLOSING;

            expect(() => h.scheme.makeBuyOrder()).toThrow(/REENTRANT_CALL/);
            expect(h.scheme.state).toBe(SchemeState.Offering);
            expect(h.scheme.depositOf('mallory').toFixed()).toBe('0');
        });

        it('lets listeners act after the operation has committed', () => {
            const h = createHarness();
            h.fund('alice', 10);
            h.clock.now = ORDER_EXPIRATION + 1;

            const states: SchemeState[] = [];
            h.scheme.subscribe(() => states.push(h.scheme.state));
            h.scheme.redeem();

            expect(states).toEqual([SchemeState.Closed]);
            expect(h.token.balanceOf('alice').toFixed()).toBe('10');
        });
    });
});
