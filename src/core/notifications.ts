/**
 * Scheme Notifications
 *
 * Advisory only: listeners observe committed changes and cannot veto them.
 * Events raised inside an operation are buffered and published after the
 * operation commits; a failed operation publishes nothing.
 */

import { generateEventId } from '../utils/id';
import { Amount } from '../utils/math';
import logger from '../utils/logger';
import type { SchemeState } from './schemeLifecycle';

interface NotificationBase {
    id: string;
    schemeId: string;
    at: number;
}

export interface TransitionNotification extends NotificationBase {
    type: 'transition';
    from: SchemeState;
    to: SchemeState;
}

export interface TransferNotification extends NotificationBase {
    type: 'transfer';
    from: string;
    to: string;
    amount: Amount;
}

export interface ApprovalNotification extends NotificationBase {
    type: 'approval';
    owner: string;
    spender: string;
    amount: Amount;
}

export type SchemeNotification = TransitionNotification | TransferNotification | ApprovalNotification;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type NotificationPayload = DistributiveOmit<SchemeNotification, 'id' | 'schemeId' | 'at'>;

export type NotificationListener = (notification: SchemeNotification) => void;

/**
 * Collects notifications for the operation in flight and fans them out to
 * subscribers on flush.
 */
export class NotificationBus {
    private listeners = new Set<NotificationListener>();
    private pending: SchemeNotification[] = [];

    constructor(private readonly schemeId: string, private readonly clock: () => number) {}

    subscribe(listener: NotificationListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    raise(payload: NotificationPayload): void {
        this.pending.push({
            ...payload,
            id: generateEventId(),
            schemeId: this.schemeId,
            at: this.clock(),
        });
    }

    discard(): void {
        this.pending = [];
    }

    /**
     * Publish buffered notifications. A throwing listener is logged and does
     * not stop delivery to the others.
     */
    flush(): SchemeNotification[] {
        const published = this.pending;
        this.pending = [];

        for (const notification of published) {
            for (const listener of this.listeners) {
                try {
                    listener(notification);
                } catch (err: unknown) {
                    const message = err instanceof Error ? err.message : String(err);
                    logger.warn(`[SCHEME] listener failed on ${notification.type} event=${notification.id}: ${message}`);
                }
            }
        }

        return published;
    }
}
