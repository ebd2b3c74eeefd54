import BigNumber from 'bignumber.js';
import { MemoryToken } from '../integrations/memoryToken';
import { Amount, ZERO, parseAmount } from '../utils/math';
import logger from '../utils/logger';
import { TrackedOrderGateway } from './orderGateway';

export interface ManualOrderGatewayOptions {
    token: MemoryToken;
    /** Scheme custody account: pays for the buy, receives sale proceeds */
    custody: string;
    /** Counterparty account standing in for the market */
    market: string;
}

/**
 * Gateway for simulations and tests: orders fill only when `fillBuy` /
 * `fillSell` is called, and each fill settles against the in-memory token.
 */
export class ManualOrderGateway extends TrackedOrderGateway {
    private buyPrice: Amount = ZERO;
    private sellPrice: Amount = ZERO;

    constructor(private readonly options: ManualOrderGatewayOptions) {
        super();
    }

    fillBuy(value: BigNumber.Value): void {
        const price = this.requireOpen('buy', value);
        const { token, custody, market } = this.options;
        if (!token.transfer(custody, market, price)) {
            throw new Error(`[ORDER] custody ${custody} cannot pay ${price.toFixed()} for the buy fill`);
        }
        this.buyPrice = price;
        this.status.buy = 'filled';
        logger.info(`[ORDER] BUY filled price=${price.toFixed()}`);
    }

    fillSell(value: BigNumber.Value): void {
        const price = this.requireOpen('sell', value);
        const { token, custody, market } = this.options;
        if (!token.transfer(market, custody, price)) {
            throw new Error(`[ORDER] market ${market} cannot pay ${price.toFixed()} for the sell fill`);
        }
        this.sellPrice = price;
        this.status.sell = 'filled';
        logger.info(`[ORDER] SELL filled price=${price.toFixed()}`);
    }

    buyFillPrice(): Amount {
        return this.buyPrice;
    }

    sellFillPrice(): Amount {
        return this.sellPrice;
    }

    private requireOpen(side: 'buy' | 'sell', value: BigNumber.Value): Amount {
        if (this.status[side] !== 'open') {
            throw new Error(`[ORDER] no open ${side} order to fill (status=${this.status[side]})`);
        }
        const price = parseAmount(value);
        if (!price) {
            throw new Error(`[ORDER] invalid ${side} fill price ${String(value)}`);
        }
        return price;
    }
}
