/**
 * Scheme Persistence
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Snapshots go to the `schemes` table (one row per scheme, upserted), every
 * published notification to `scheme_events` (append-only).
 *
 * RULES:
 * 1. Errors THROW - never swallowed
 * 2. Loaded rows are validated before a scheme is rebuilt from them
 *
 * GREP-FRIENDLY LOGS:
 * - [STORE] WRITE - Successful database write
 * - [STORE] ERROR - Database operation failed
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { SCHEME_CONFIG } from '../config/constants';
import { DEFAULT_CONFIG } from '../config/default';
import type { LedgerSnapshot } from '../core/ledger';
import type { SchemeNotification } from '../core/notifications';
import type { SchemeSnapshot } from '../core/scheme';
import { isSchemeState } from '../core/schemeLifecycle';
import logger from '../utils/logger';

const { STORE_LOG_PREFIX } = SCHEME_CONFIG;

/**
 * Notification as persisted: amounts as decimal strings
 */
export interface StoredEvent {
    id: string;
    scheme_id: string;
    type: SchemeNotification['type'];
    payload: Record<string, string>;
    at: string;
}

export interface SchemeStore {
    save(snapshot: SchemeSnapshot): Promise<void>;
    load(id: string): Promise<SchemeSnapshot | null>;
    appendEvents(events: readonly SchemeNotification[]): Promise<void>;
    listEvents(schemeId: string): Promise<StoredEvent[]>;
}

export function toStoredEvent(notification: SchemeNotification): StoredEvent {
    const base = { id: notification.id, scheme_id: notification.schemeId, at: new Date(notification.at).toISOString() };
    switch (notification.type) {
        case 'transition':
            return { ...base, type: 'transition', payload: { from: notification.from, to: notification.to } };
        case 'transfer':
            return {
                ...base,
                type: 'transfer',
                payload: { from: notification.from, to: notification.to, amount: notification.amount.toFixed() },
            };
        case 'approval':
            return {
                ...base,
                type: 'approval',
                payload: { owner: notification.owner, spender: notification.spender, amount: notification.amount.toFixed() },
            };
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════════

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
    Array.isArray(value) && value.every(v => typeof v === 'string');

const isTuple = (value: unknown, length: number): value is string[] =>
    isStringArray(value) && value.length === length;

function parseLedgerSnapshot(value: unknown): LedgerSnapshot | null {
    if (!isRecord(value)) return null;
    const { balances, allowances, participants } = value;
    if (!Array.isArray(balances) || !Array.isArray(allowances) || !isStringArray(participants)) return null;

    const parsedBalances: Array<[string, string]> = [];
    for (const entry of balances) {
        if (!isTuple(entry, 2)) return null;
        parsedBalances.push([entry[0], entry[1]]);
    }
    const parsedAllowances: Array<[string, string, string]> = [];
    for (const entry of allowances) {
        if (!isTuple(entry, 3)) return null;
        parsedAllowances.push([entry[0], entry[1], entry[2]]);
    }
    return { balances: parsedBalances, allowances: parsedAllowances, participants };
}

/**
 * Validate an untyped row payload as a SchemeSnapshot.
 */
export function parseSchemeSnapshot(value: unknown): SchemeSnapshot | null {
    if (!isRecord(value)) return null;
    const { id, state, custody, underlyingAssetRef, offerClosingTime, orderExpiration, maturity, purchasePrice, soldPrice } = value;

    if (typeof id !== 'string' || typeof custody !== 'string' || typeof underlyingAssetRef !== 'string') return null;
    if (typeof state !== 'string' || !isSchemeState(state)) return null;
    if (typeof offerClosingTime !== 'number' || typeof orderExpiration !== 'number' || typeof maturity !== 'number') return null;
    if (typeof purchasePrice !== 'string' || typeof soldPrice !== 'string') return null;

    const ledger = parseLedgerSnapshot(value.ledger);
    if (!ledger) return null;

    return { id, state, custody, underlyingAssetRef, offerClosingTime, orderExpiration, maturity, purchasePrice, soldPrice, ledger };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SUPABASE
// ═══════════════════════════════════════════════════════════════════════════════

export interface SupabaseSchemeStoreOptions {
    schemeTable?: string;
    eventTable?: string;
}

export class SupabaseSchemeStore implements SchemeStore {
    private readonly schemeTable: string;
    private readonly eventTable: string;

    constructor(private readonly client: SupabaseClient, options: SupabaseSchemeStoreOptions = {}) {
        this.schemeTable = options.schemeTable ?? DEFAULT_CONFIG.SCHEME_TABLE;
        this.eventTable = options.eventTable ?? DEFAULT_CONFIG.SCHEME_EVENT_TABLE;
    }

    async save(snapshot: SchemeSnapshot): Promise<void> {
        const { error } = await this.client.from(this.schemeTable).upsert({
            id: snapshot.id,
            state: snapshot.state,
            snapshot,
            updated_at: new Date().toISOString(),
        });

        if (error) {
            logger.error(`${STORE_LOG_PREFIX} ERROR save scheme=${snapshot.id}: ${error.message}`);
            throw new Error(`${STORE_LOG_PREFIX} save failed: ${error.message}`);
        }
        logger.debug(`${STORE_LOG_PREFIX} WRITE scheme=${snapshot.id} state=${snapshot.state}`);
    }

    async load(id: string): Promise<SchemeSnapshot | null> {
        const { data, error } = await this.client
            .from(this.schemeTable)
            .select('snapshot')
            .eq('id', id)
            .maybeSingle();

        if (error) {
            logger.error(`${STORE_LOG_PREFIX} ERROR load scheme=${id}: ${error.message}`);
            throw new Error(`${STORE_LOG_PREFIX} load failed: ${error.message}`);
        }
        if (!data) return null;

        const row: unknown = data;
        const snapshot = isRecord(row) ? parseSchemeSnapshot(row.snapshot) : null;
        if (!snapshot) {
            throw new Error(`${STORE_LOG_PREFIX} stored snapshot for scheme ${id} is malformed`);
        }
        return snapshot;
    }

    async appendEvents(events: readonly SchemeNotification[]): Promise<void> {
        if (events.length === 0) return;

        const rows = events.map(toStoredEvent);
        const { error } = await this.client.from(this.eventTable).insert(rows);
        if (error) {
            logger.error(`${STORE_LOG_PREFIX} ERROR append ${rows.length} event(s): ${error.message}`);
            throw new Error(`${STORE_LOG_PREFIX} appendEvents failed: ${error.message}`);
        }
        logger.debug(`${STORE_LOG_PREFIX} WRITE events=${rows.length} scheme=${rows[0].scheme_id}`);
    }

    async listEvents(schemeId: string): Promise<StoredEvent[]> {
        const { data, error } = await this.client
            .from(this.eventTable)
            .select('*')
            .eq('scheme_id', schemeId)
            .order('at', { ascending: true });

        if (error) {
            throw new Error(`${STORE_LOG_PREFIX} listEvents failed: ${error.message}`);
        }
        const rows: unknown[] = data ?? [];
        return rows.filter(isStoredEvent);
    }
}

function isStoredEvent(value: unknown): value is StoredEvent {
    if (!isRecord(value)) return false;
    const { id, scheme_id, type, payload, at } = value;
    return typeof id === 'string'
        && typeof scheme_id === 'string'
        && (type === 'transition' || type === 'transfer' || type === 'approval')
        && isRecord(payload)
        && Object.values(payload).every(v => typeof v === 'string')
        && typeof at === 'string';
}

// ═══════════════════════════════════════════════════════════════════════════════
// IN-MEMORY
// ═══════════════════════════════════════════════════════════════════════════════

export class MemorySchemeStore implements SchemeStore {
    private readonly snapshots = new Map<string, SchemeSnapshot>();
    private readonly events = new Map<string, StoredEvent[]>();

    async save(snapshot: SchemeSnapshot): Promise<void> {
        this.snapshots.set(snapshot.id, structuredClone(snapshot));
    }

    async load(id: string): Promise<SchemeSnapshot | null> {
        const snapshot = this.snapshots.get(id);
        return snapshot ? structuredClone(snapshot) : null;
    }

    async appendEvents(events: readonly SchemeNotification[]): Promise<void> {
        for (const event of events) {
            const stored = toStoredEvent(event);
            const list = this.events.get(stored.scheme_id) ?? [];
            list.push(stored);
            this.events.set(stored.scheme_id, list);
        }
    }

    async listEvents(schemeId: string): Promise<StoredEvent[]> {
        return [...(this.events.get(schemeId) ?? [])];
    }
}
