/**
 * Order Gateway - pluggable market access for the underlying position
 *
 * The scheme places one buy order once the offer closes and one sell order
 * at maturity, then polls for fills. A fill is a normal business outcome;
 * "not filled" is not an error.
 *
 * Real order matching is out of scope. NoFillOrderGateway is the default and
 * never fills.
 */

import { Amount, ZERO } from '../utils/math';
import logger from '../utils/logger';

export type OrderSide = 'buy' | 'sell';

export type OrderStatus = 'none' | 'open' | 'cancelled' | 'filled';

export type OrderOutcome =
    | { filled: false }
    | { filled: true; price: Amount };

export interface OrderGateway {
    placeBuy(budget: Amount, underlyingAssetRef: string): void;
    cancelBuy(): void;
    checkBuyFilled(): boolean;
    /** Settlement amount paid for the position; meaningful once filled */
    buyFillPrice(): Amount;

    placeSell(quantity: Amount, underlyingAssetRef: string): void;
    cancelSell(): void;
    checkSellFilled(): boolean;
    /** Settlement amount received for the position; meaningful once filled */
    sellFillPrice(): Amount;
}

/**
 * Tracks order status per side; subclasses decide when orders fill.
 */
export abstract class TrackedOrderGateway implements OrderGateway {
    protected status: Record<OrderSide, OrderStatus> = { buy: 'none', sell: 'none' };

    orderStatus(side: OrderSide): OrderStatus {
        return this.status[side];
    }

    placeBuy(budget: Amount, underlyingAssetRef: string): void {
        this.status.buy = 'open';
        logger.info(`[ORDER] BUY placed asset=${underlyingAssetRef} budget=${budget.toFixed()}`);
    }

    cancelBuy(): void {
        if (this.status.buy === 'open') {
            this.status.buy = 'cancelled';
            logger.info('[ORDER] BUY cancelled');
        }
    }

    placeSell(quantity: Amount, underlyingAssetRef: string): void {
        this.status.sell = 'open';
        logger.info(`[ORDER] SELL placed asset=${underlyingAssetRef} quantity=${quantity.toFixed()}`);
    }

    cancelSell(): void {
        if (this.status.sell === 'open') {
            this.status.sell = 'cancelled';
            logger.info('[ORDER] SELL cancelled');
        }
    }

    checkBuyFilled(): boolean {
        return this.status.buy === 'filled';
    }

    checkSellFilled(): boolean {
        return this.status.sell === 'filled';
    }

    abstract buyFillPrice(): Amount;
    abstract sellFillPrice(): Amount;
}

export class NoFillOrderGateway extends TrackedOrderGateway {
    buyFillPrice(): Amount {
        return ZERO;
    }

    sellFillPrice(): Amount {
        return ZERO;
    }
}
