/**
 * Shared scheme fixtures
 *
 * A scheme wired to an in-memory settlement token, a manual order gateway
 * and a hand-driven clock.
 */

import BigNumber from 'bignumber.js';
import { MS_PER_DAY } from '../src/config/constants';
import { Scheme } from '../src/core/scheme';
import { ManualOrderGateway } from '../src/execution/manualOrderGateway';
import { OrderGateway } from '../src/execution/orderGateway';
import { MemoryToken } from '../src/integrations/memoryToken';

export { MS_PER_DAY };

export const T0 = Date.UTC(2026, 0, 1);
export const OFFER_CLOSING = T0 + 10 * MS_PER_DAY;
export const ORDER_EXPIRATION = OFFER_CLOSING + 30 * MS_PER_DAY;
export const MATURITY = OFFER_CLOSING + 120 * MS_PER_DAY;

export const CUSTODY = 'scheme-custody';
export const MARKET = 'market-desk';
export const ASSET_REF = 'parcel-0042';

export interface TestClock {
    now: number;
}

export interface Harness {
    scheme: Scheme;
    token: MemoryToken;
    gateway: ManualOrderGateway;
    clock: TestClock;
    /** Credit `who` with tokens and approve custody to pull them */
    fund(who: string, amount: BigNumber.Value): void;
    /** Fund and deposit in one step */
    contribute(who: string, amount: BigNumber.Value): void;
}

export interface HarnessOptions {
    checkpoints?: boolean;
    gateway?: (token: MemoryToken) => OrderGateway;
}

export function createHarness(options: HarnessOptions = {}): Harness {
    const token = new MemoryToken();
    const gateway = new ManualOrderGateway({ token, custody: CUSTODY, market: MARKET });
    const clock: TestClock = { now: T0 };

    const scheme = Scheme.create(
        {
            custody: CUSTODY,
            underlyingAssetRef: ASSET_REF,
            offerClosingTime: OFFER_CLOSING,
            orderExpiration: ORDER_EXPIRATION,
            maturity: MATURITY,
        },
        {
            asset: token.connect(CUSTODY, { checkpoints: options.checkpoints }),
            gateway: options.gateway ? options.gateway(token) : gateway,
            clock: () => clock.now,
        }
    );

    const fund = (who: string, amount: BigNumber.Value): void => {
        token.mint(who, amount);
        token.approve(who, CUSTODY, token.allowance(who, CUSTODY).plus(amount));
    };

    return {
        scheme,
        token,
        gateway,
        clock,
        fund,
        contribute: (who, amount) => {
            fund(who, amount);
            scheme.deposit(who, amount);
        },
    };
}

/**
 * Drive a harness to AssetHolding with the given contributions and purchase price.
 */
export function acquire(h: Harness, contributions: Record<string, number>, purchasePrice: number): void {
    for (const [who, amount] of Object.entries(contributions)) {
        h.contribute(who, amount);
    }
    h.clock.now = OFFER_CLOSING;
    h.scheme.makeBuyOrder();
    h.gateway.fillBuy(purchasePrice);
    h.scheme.publishToken();
}

/**
 * Continue from AssetHolding to AssetSold at the given price.
 */
export function sell(h: Harness, soldPrice: number): void {
    h.clock.now = MATURITY;
    h.scheme.sellAsset();
    h.gateway.fillSell(soldPrice);
    h.scheme.updateSellOrder();
}

export const amountOf = (value: BigNumber): string => value.toFixed();
