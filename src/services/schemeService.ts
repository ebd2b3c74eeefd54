/**
 * Scheme Service - runs scheme operations and persists their outcome
 *
 * The scheme itself is synchronous and in-memory. After each successful
 * operation the service saves the new snapshot and appends the
 * notifications it published. A failed operation persists nothing.
 * Calls are queued: overlapping callers are served in call order.
 */

import BigNumber from 'bignumber.js';
import { Scheme, SchemeDependencies, SchemeParams, RedemptionReport } from '../core/scheme';
import { SchemeNotification } from '../core/notifications';
import { OrderOutcome } from '../execution/orderGateway';
import { SchemeStore } from '../storage/schemeStore';
import { Amount } from '../utils/math';
import logger from '../utils/logger';

export class SchemeService {
    private published: SchemeNotification[] = [];
    private tail: Promise<void> = Promise.resolve();

    private constructor(readonly scheme: Scheme, private readonly store: SchemeStore) {
        scheme.subscribe((notification) => {
            this.published.push(notification);
        });
    }

    static async create(params: SchemeParams, deps: SchemeDependencies, store: SchemeStore): Promise<SchemeService> {
        const service = new SchemeService(Scheme.create(params, deps), store);
        await service.persist('create');
        return service;
    }

    /**
     * Resume a persisted scheme, or null when the store has no such id.
     */
    static async load(id: string, deps: SchemeDependencies, store: SchemeStore): Promise<SchemeService | null> {
        const snapshot = await store.load(id);
        if (!snapshot) {
            logger.warn(`[STORE] scheme ${id} not found`);
            return null;
        }
        return new SchemeService(Scheme.fromSnapshot(snapshot, deps), store);
    }

    deposit(caller: string, amount: BigNumber.Value): Promise<void> {
        return this.run('deposit', s => s.deposit(caller, amount));
    }

    withdraw(caller: string, amount: BigNumber.Value): Promise<void> {
        return this.run('withdraw', s => s.withdraw(caller, amount));
    }

    withdrawAll(caller: string): Promise<Amount> {
        return this.run('withdrawAll', s => s.withdrawAll(caller));
    }

    makeBuyOrder(): Promise<void> {
        return this.run('makeBuyOrder', s => s.makeBuyOrder());
    }

    publishToken(): Promise<OrderOutcome> {
        return this.run('publishToken', s => s.tryPublishToken());
    }

    sellAsset(): Promise<void> {
        return this.run('sellAsset', s => s.sellAsset());
    }

    updateSellOrder(): Promise<OrderOutcome> {
        return this.run('updateSellOrder', s => s.tryUpdateSellOrder());
    }

    approve(owner: string, spender: string, amount: BigNumber.Value): Promise<boolean> {
        return this.run('approve', s => s.approve(owner, spender, amount));
    }

    transfer(from: string, to: string, amount: BigNumber.Value): Promise<boolean> {
        return this.run('transfer', s => s.transfer(from, to, amount));
    }

    transferFrom(spender: string, from: string, to: string, amount: BigNumber.Value): Promise<boolean> {
        return this.run('transferFrom', s => s.transferFrom(spender, from, to, amount));
    }

    redeem(): Promise<RedemptionReport> {
        return this.run('redeem', s => s.redeem());
    }

    /**
     * Operations and their persists run strictly one after another, so a
     * slower save can never overwrite a newer snapshot.
     */
    private run<T>(operation: string, body: (scheme: Scheme) => T): Promise<T> {
        const next = this.tail.then(async () => {
            this.published = [];
            const result = body(this.scheme);
            await this.persist(operation);
            return result;
        });
        // failures reach the caller through `next`; the queue moves on
        this.tail = next.then(
            () => undefined,
            () => undefined
        );
        return next;
    }

    private async persist(operation: string): Promise<void> {
        const events = this.published;
        this.published = [];
        try {
            await this.store.save(this.scheme.snapshot());
            await this.store.appendEvents(events);
        } catch (err: unknown) {
            logger.error(
                `[STORE] persisting ${operation} for scheme ${this.scheme.id} failed: ` +
                `${err instanceof Error ? err.message : String(err)}`
            );
            throw err;
        }
    }
}
