/**
 * Scheme - pooled-capital vehicle for one illiquid position
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * EVERY MUTATION GOES THROUGH execute()
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 *   1. reject nested calls (a collaborator calling back mid-operation)
 *   2. evaluate the operation's guards against one clock sample
 *   3. snapshot ledger + scheme fields, open a settlement journal
 *   4. run the body
 *   5. check invariants
 *   6. on any error (invariant violations included): restore, roll the
 *      journal back, drop notifications; on success: publish notifications
 *
 * Either every ledger mutation and settlement movement of an operation is
 * applied or none is.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import { SCHEME_CONFIG } from '../config/constants';
import { OrderGateway, OrderOutcome, NoFillOrderGateway } from '../execution/orderGateway';
import { SettlementAsset } from '../integrations/settlementAsset';
import { generateSchemeId } from '../utils/id';
import { Amount, ZERO, parseAmount } from '../utils/math';
import logger from '../utils/logger';
import {
    ArithmeticError,
    OrderNotFilledError,
    PreconditionError,
    RollbackIncompleteError,
} from './errors';
import { GuardContext, GuardedOperation, checkOperation } from './guards';
import { assertSchemeInvariants } from './invariants';
import { Ledger, LedgerSnapshot } from './ledger';
import { NotificationBus, NotificationListener } from './notifications';
import { Payout, RedemptionMode, RedemptionPlan, executeRedemption, planRedemption } from './refundEngine';
import { SchemeSchedule, SchemeState, canTransition, isSchemeState } from './schemeLifecycle';
import { SettlementJournal } from './settlementJournal';

const { LOG_PREFIX } = SCHEME_CONFIG;

export interface SchemeParams extends SchemeSchedule {
    /** Scheme's own account on the settlement asset */
    custody: string;
    /** Opaque reference to the underlying position */
    underlyingAssetRef: string;
}

export interface SchemeDependencies {
    asset: SettlementAsset;
    gateway?: OrderGateway;
    clock?: () => number;
}

export interface SchemeSnapshot {
    id: string;
    state: SchemeState;
    custody: string;
    underlyingAssetRef: string;
    offerClosingTime: number;
    orderExpiration: number;
    maturity: number;
    purchasePrice: string;
    soldPrice: string;
    ledger: LedgerSnapshot;
}

export interface RedemptionReport {
    mode: RedemptionMode;
    payouts: Payout[];
    totalPaid: Amount;
    remainderRecipient: string | null;
    remainder: Amount;
}

interface SchemeFields {
    state: SchemeState;
    purchasePrice: Amount;
    soldPrice: Amount;
}

interface OperationContext {
    now: number;
    journal: SettlementJournal;
}

/**
 * Validate the construction-time schedule.
 */
export function validateSchedule(schedule: SchemeSchedule): string[] {
    const errors: string[] = [];
    const { offerClosingTime, orderExpiration, maturity } = schedule;

    const fields: Array<keyof SchemeSchedule> = ['offerClosingTime', 'orderExpiration', 'maturity'];
    for (const name of fields) {
        const value = schedule[name];
        if (!Number.isSafeInteger(value) || value < 0) {
            errors.push(`${name} must be a non-negative integer timestamp, got ${value}`);
        }
    }
    if (errors.length > 0) return errors;

    if (orderExpiration < offerClosingTime) {
        errors.push('orderExpiration must not precede offerClosingTime');
    }
    if (orderExpiration > offerClosingTime + SCHEME_CONFIG.MAX_ORDER_WINDOW_MS) {
        errors.push('orderExpiration must be within 90 days of offerClosingTime');
    }
    if (maturity < offerClosingTime) {
        errors.push('maturity must not precede offerClosingTime');
    }
    if (maturity > offerClosingTime + SCHEME_CONFIG.MAX_MATURITY_WINDOW_MS) {
        errors.push('maturity must be within 180 days of offerClosingTime');
    }
    return errors;
}

export class Scheme {
    readonly id: string;
    readonly custody: string;
    readonly underlyingAssetRef: string;
    readonly schedule: Readonly<SchemeSchedule>;

    private fields: SchemeFields = { state: SchemeState.Offering, purchasePrice: ZERO, soldPrice: ZERO };
    private readonly ledger: Ledger;
    private readonly bus: NotificationBus;
    private readonly asset: SettlementAsset;
    private readonly gateway: OrderGateway;
    private readonly clock: () => number;
    private busy = false;

    private constructor(id: string, params: SchemeParams, deps: SchemeDependencies) {
        this.id = id;
        this.custody = params.custody;
        this.underlyingAssetRef = params.underlyingAssetRef;
        this.schedule = Object.freeze({
            offerClosingTime: params.offerClosingTime,
            orderExpiration: params.orderExpiration,
            maturity: params.maturity,
        });
        this.asset = deps.asset;
        this.gateway = deps.gateway ?? new NoFillOrderGateway();
        this.clock = deps.clock ?? Date.now;
        this.bus = new NotificationBus(id, this.clock);
        this.ledger = new Ledger({
            onTransfer: (from, to, amount) => this.bus.raise({ type: 'transfer', from, to, amount }),
            onApproval: (owner, spender, amount) => this.bus.raise({ type: 'approval', owner, spender, amount }),
        });
    }

    /**
     * Deploy a new scheme in Offering. The schedule is validated here and
     * never again.
     */
    static create(params: SchemeParams, deps: SchemeDependencies): Scheme {
        if (!params.custody) {
            throw new PreconditionError('INVALID_PARAMS', 'custody identity is required');
        }
        if (!params.underlyingAssetRef) {
            throw new PreconditionError('INVALID_PARAMS', 'underlyingAssetRef is required');
        }
        const errors = validateSchedule(params);
        if (errors.length > 0) {
            throw new PreconditionError('INVALID_SCHEDULE', errors.join('; '));
        }

        const scheme = new Scheme(generateSchemeId(), params, deps);
        logger.info(
            `${LOG_PREFIX} CREATED id=${scheme.id} asset=${params.underlyingAssetRef} ` +
            `offerClosing=${params.offerClosingTime} orderExpiration=${params.orderExpiration} maturity=${params.maturity}`
        );
        return scheme;
    }

    /**
     * Rebuild a scheme from a persisted snapshot.
     */
    static fromSnapshot(snapshot: SchemeSnapshot, deps: SchemeDependencies): Scheme {
        if (!isSchemeState(snapshot.state)) {
            throw new PreconditionError('INVALID_SNAPSHOT', `unknown state ${String(snapshot.state)}`);
        }
        const purchasePrice = parseAmount(snapshot.purchasePrice);
        const soldPrice = parseAmount(snapshot.soldPrice);
        if (!purchasePrice || !soldPrice) {
            throw new PreconditionError('INVALID_SNAPSHOT', 'prices must be non-negative integers');
        }

        const scheme = new Scheme(snapshot.id, snapshot, deps);
        scheme.fields = { state: snapshot.state, purchasePrice, soldPrice };
        scheme.ledger.restore(snapshot.ledger);
        return scheme;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // READS
    // ═══════════════════════════════════════════════════════════════════════════

    get state(): SchemeState {
        return this.fields.state;
    }

    get offerClosingTime(): number {
        return this.schedule.offerClosingTime;
    }

    get orderExpiration(): number {
        return this.schedule.orderExpiration;
    }

    get maturity(): number {
        return this.schedule.maturity;
    }

    get purchasePrice(): Amount {
        return this.fields.purchasePrice;
    }

    get soldPrice(): Amount {
        return this.fields.soldPrice;
    }

    custodyBalance(): Amount {
        return this.asset.balanceOf(this.custody);
    }

    /** Contributions total; zero outside Offering */
    totalDeposits(): Amount {
        return this.state === SchemeState.Offering ? this.ledger.totalSupply : ZERO;
    }

    /** A participant's contribution; zero outside Offering */
    depositOf(identity: string): Amount {
        return this.state === SchemeState.Offering ? this.ledger.balanceOf(identity) : ZERO;
    }

    /** Share supply; zero outside AssetHolding */
    totalSupply(): Amount {
        return this.state === SchemeState.AssetHolding ? this.ledger.totalSupply : ZERO;
    }

    /** Share balance; zero outside AssetHolding */
    balanceOf(identity: string): Amount {
        return this.state === SchemeState.AssetHolding ? this.ledger.balanceOf(identity) : ZERO;
    }

    /** Share allowance; zero outside AssetHolding */
    allowance(owner: string, spender: string): Amount {
        return this.state === SchemeState.AssetHolding ? this.ledger.allowance(owner, spender) : ZERO;
    }

    participants(): string[] {
        return this.ledger.participants();
    }

    subscribe(listener: NotificationListener): () => void {
        return this.bus.subscribe(listener);
    }

    snapshot(): SchemeSnapshot {
        return {
            id: this.id,
            state: this.state,
            custody: this.custody,
            underlyingAssetRef: this.underlyingAssetRef,
            ...this.schedule,
            purchasePrice: this.purchasePrice.toFixed(),
            soldPrice: this.soldPrice.toFixed(),
            ledger: this.ledger.snapshot(),
        };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // OFFERING
    // ═══════════════════════════════════════════════════════════════════════════

    deposit(caller: string, value: BigNumber.Value): void {
        const amount = requireAmount(value, true);
        this.execute('deposit', 'deposit', ({ journal }) => {
            this.ledger.mint(caller, amount);
            journal.pull(caller, amount);
        });
        logger.info(`${LOG_PREFIX} DEPOSIT from=${caller} amount=${amount.toFixed()} total=${this.ledger.totalSupply.toFixed()}`);
    }

    withdraw(caller: string, value: BigNumber.Value): void {
        const amount = requireAmount(value, true);
        this.execute('withdraw', 'withdraw', ({ journal }) => {
            this.payBack(caller, amount, journal);
        });
    }

    /**
     * Withdraw the caller's whole contribution. Returns the amount returned.
     */
    withdrawAll(caller: string): Amount {
        return this.execute('withdrawAll', 'withdraw', ({ journal }) => {
            const balance = this.ledger.balanceOf(caller);
            if (balance.isZero()) {
                throw new PreconditionError('NOTHING_TO_WITHDRAW', `${caller} has no contribution`);
            }
            this.payBack(caller, balance, journal);
            return balance;
        });
    }

    private payBack(caller: string, amount: Amount, journal: SettlementJournal): void {
        const balance = this.ledger.balanceOf(caller);
        if (balance.isLessThan(amount)) {
            throw new ArithmeticError(
                'INSUFFICIENT_BALANCE',
                `${caller} contributed ${balance.toFixed()}, cannot withdraw ${amount.toFixed()}`
            );
        }
        this.ledger.burn(caller, amount);
        journal.pay(caller, amount);
        logger.info(`${LOG_PREFIX} WITHDRAW to=${caller} amount=${amount.toFixed()} total=${this.ledger.totalSupply.toFixed()}`);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // BUYING
    // ═══════════════════════════════════════════════════════════════════════════

    makeBuyOrder(): void {
        this.execute('makeBuyOrder', 'makeBuyOrder', () => {
            this.gateway.placeBuy(this.ledger.totalSupply, this.underlyingAssetRef);
            this.transition(SchemeState.Ordering);
        });
    }

    /**
     * Poll the buy order. Not filled leaves the scheme in Ordering.
     */
    tryPublishToken(): OrderOutcome {
        return this.execute('publishToken', 'publishToken', () => {
            if (!this.gateway.checkBuyFilled()) {
                logger.info(`${LOG_PREFIX} BUY not filled, scheme stays in ${this.state}`);
                return { filled: false };
            }
            const price = this.gateway.buyFillPrice();
            this.fields.purchasePrice = price;
            this.transition(SchemeState.AssetHolding);
            logger.info(`${LOG_PREFIX} PUBLISHED shares=${this.ledger.totalSupply.toFixed()} purchasePrice=${price.toFixed()}`);
            return { filled: true, price };
        });
    }

    /**
     * Poll the buy order; throws OrderNotFilledError when it has not filled.
     */
    publishToken(): Amount {
        const outcome = this.tryPublishToken();
        if (!outcome.filled) throw new OrderNotFilledError('buy');
        return outcome.price;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // SELLING
    // ═══════════════════════════════════════════════════════════════════════════

    sellAsset(): void {
        this.execute('sellAsset', 'sellAsset', () => {
            this.gateway.placeSell(this.ledger.totalSupply, this.underlyingAssetRef);
            this.transition(SchemeState.AssetSelling);
        });
    }

    tryUpdateSellOrder(): OrderOutcome {
        return this.execute('updateSellOrder', 'updateSellOrder', () => {
            if (!this.gateway.checkSellFilled()) {
                logger.info(`${LOG_PREFIX} SELL not filled, scheme stays in ${this.state}`);
                return { filled: false };
            }
            const price = this.gateway.sellFillPrice();
            this.fields.soldPrice = price;
            this.transition(SchemeState.AssetSold);
            logger.info(`${LOG_PREFIX} SOLD soldPrice=${price.toFixed()}`);
            return { filled: true, price };
        });
    }

    updateSellOrder(): Amount {
        const outcome = this.tryUpdateSellOrder();
        if (!outcome.filled) throw new OrderNotFilledError('sell');
        return outcome.price;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // SHARES (AssetHolding only)
    // ═══════════════════════════════════════════════════════════════════════════

    approve(owner: string, spender: string, value: BigNumber.Value): boolean {
        const amount = requireAmount(value, false);
        return this.execute('approve', 'shareTransfer', () => this.ledger.approve(owner, spender, amount));
    }

    transfer(from: string, to: string, value: BigNumber.Value): boolean {
        const amount = requireAmount(value, false);
        return this.execute('transfer', 'shareTransfer', () => this.ledger.transfer(from, to, amount));
    }

    transferFrom(spender: string, from: string, to: string, value: BigNumber.Value): boolean {
        const amount = requireAmount(value, false);
        return this.execute('transferFrom', 'shareTransfer', () => this.ledger.transferFrom(spender, from, to, amount));
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // REDEMPTION
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Compute what redeem() would pay right now, without changing anything.
     */
    previewRedemption(): RedemptionPlan {
        const failure = checkOperation('redeem', this.guardContext(this.clock()));
        if (!failure.ok) throw new PreconditionError(failure.code, failure.reason);
        return this.planRedemption();
    }

    /**
     * Distribute custody to participants and close the scheme.
     */
    redeem(): RedemptionReport {
        return this.execute('redeem', 'redeem', ({ journal }) => {
            const entryState = this.state;
            const plan = this.planRedemption();
            executeRedemption(plan, this.ledger, journal);

            // cancelled only once every payout has gone through
            if (entryState === SchemeState.Ordering) {
                this.gateway.cancelBuy();
            }
            this.transition(SchemeState.Closed);

            logger.info(
                `${LOG_PREFIX} REDEEM from=${entryState} mode=${plan.mode} paid=${plan.totalPaid.toFixed()} ` +
                `custodyAfter=${this.custodyBalance().toFixed()}`
            );

            return {
                mode: plan.mode,
                payouts: plan.payouts,
                totalPaid: plan.totalPaid,
                remainderRecipient: plan.remainderRecipient,
                remainder: plan.remainder,
            };
        });
    }

    private planRedemption(): RedemptionPlan {
        return planRedemption({
            entryState: this.state,
            holders: this.ledger.holders(),
            totalSupply: this.ledger.totalSupply,
            soldPrice: this.soldPrice,
            custodyBalance: this.custodyBalance(),
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // EXECUTION
    // ═══════════════════════════════════════════════════════════════════════════

    private guardContext(now: number): GuardContext {
        return { state: this.state, schedule: this.schedule, now };
    }

    private transition(to: SchemeState): void {
        const from = this.state;
        if (!canTransition(from, to)) {
            throw new PreconditionError('ILLEGAL_TRANSITION', `${from} → ${to} is not a lifecycle edge`);
        }
        this.fields.state = to;
        this.bus.raise({ type: 'transition', from, to });
        logger.info(`${LOG_PREFIX} TRANSITION id=${this.id} ${from} → ${to}`);
    }

    private execute<T>(operation: string, guard: GuardedOperation, body: (ctx: OperationContext) => T): T {
        if (this.busy) {
            throw new PreconditionError('REENTRANT_CALL', `${operation} called while another operation is running`);
        }

        const now = this.clock();
        const check = checkOperation(guard, this.guardContext(now));
        if (!check.ok) {
            logger.debug(`${LOG_PREFIX} REJECTED ${operation} code=${check.code} ${check.reason}`);
            throw new PreconditionError(check.code, `${operation}: ${check.reason}`);
        }

        this.busy = true;
        const savedFields: SchemeFields = { ...this.fields };
        const savedLedger = this.ledger.snapshot();
        const journal = new SettlementJournal(this.asset, this.custody);

        let result: T;
        try {
            result = body({ now, journal });
            assertSchemeInvariants({
                id: this.id,
                state: this.state,
                soldPrice: this.soldPrice,
                ledger: this.ledger,
                custodyBalance: this.custodyBalance(),
            });
        } catch (err: unknown) {
            this.fields = savedFields;
            this.ledger.restore(savedLedger);
            this.bus.discard();
            const failures = journal.rollback();
            this.busy = false;

            logger.warn(`${LOG_PREFIX} ROLLBACK ${operation}: ${err instanceof Error ? err.message : String(err)}`);
            if (failures.length > 0) {
                throw new RollbackIncompleteError(err, failures);
            }
            throw err;
        }
        this.busy = false;

        this.bus.flush();
        return result;
    }
}

function requireAmount(value: BigNumber.Value, positive: boolean): Amount {
    const amount = parseAmount(value);
    if (!amount) {
        throw new PreconditionError('INVALID_AMOUNT', `amount must be a non-negative integer, got ${String(value)}`);
    }
    if (positive && amount.isZero()) {
        throw new PreconditionError('INVALID_AMOUNT', 'amount must be greater than zero');
    }
    return amount;
}
