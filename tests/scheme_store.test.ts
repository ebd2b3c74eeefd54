/**
 * Scheme Persistence Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * SchemeService against the in-memory store: snapshots written after each
 * committed operation, events appended in order, schemes resumed by id.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { Scheme, SchemeDependencies, SchemeParams, SchemeSnapshot } from '../src/core/scheme';
import { SchemeState } from '../src/core/schemeLifecycle';
import { MemoryToken } from '../src/integrations/memoryToken';
import { SchemeService } from '../src/services/schemeService';
import { MemorySchemeStore, parseSchemeSnapshot } from '../src/storage/schemeStore';
import { ASSET_REF, CUSTODY, MATURITY, OFFER_CLOSING, ORDER_EXPIRATION, T0 } from './fixtures';

const params: SchemeParams = {
    custody: CUSTODY,
    underlyingAssetRef: ASSET_REF,
    offerClosingTime: OFFER_CLOSING,
    orderExpiration: ORDER_EXPIRATION,
    maturity: MATURITY,
};

/**
 * Store whose Nth save is held back, so later saves could overtake it
 */
class SlowSaveStore extends MemorySchemeStore {
    private saves = 0;

    constructor(private readonly slowSave: number, private readonly delayMs: number) {
        super();
    }

    async save(snapshot: SchemeSnapshot): Promise<void> {
        this.saves += 1;
        if (this.saves === this.slowSave) {
            await new Promise(resolve => setTimeout(resolve, this.delayMs));
        }
        await super.save(snapshot);
    }
}

describe('SchemeService with MemorySchemeStore', () => {
    let token: MemoryToken;
    let store: MemorySchemeStore;
    let clock: { now: number };
    let deps: SchemeDependencies;

    const fund = (who: string, amount: number) => {
        token.mint(who, amount);
        token.approve(who, CUSTODY, amount);
    };

    beforeEach(() => {
        token = new MemoryToken();
        store = new MemorySchemeStore();
        clock = { now: T0 };
        deps = { asset: token.connect(CUSTODY), clock: () => clock.now };
    });

    it('saves the initial snapshot on create', async () => {
        const service = await SchemeService.create(params, deps, store);
        const saved = await store.load(service.scheme.id);

        expect(saved?.state).toBe(SchemeState.Offering);
        expect(saved?.ledger.participants).toEqual([]);
        expect(await store.listEvents(service.scheme.id)).toEqual([]);
    });

    it('appends the transition event and resumes from the stored snapshot', async () => {
        const service = await SchemeService.create(params, deps, store);
        fund('alice', 100);
        fund('bob', 50);
        await service.deposit('alice', 100);
        await service.deposit('bob', 50);

        clock.now = OFFER_CLOSING;
        await service.makeBuyOrder();

        const events = await store.listEvents(service.scheme.id);
        expect(events.map(e => [e.type, e.payload])).toEqual([
            ['transition', { from: 'Offering', to: 'Ordering' }],
        ]);

        const resumed = await SchemeService.load(service.scheme.id, deps, store);
        expect(resumed?.scheme.state).toBe(SchemeState.Ordering);
        expect(resumed?.scheme.participants()).toEqual(['alice', 'bob']);

        expect(await resumed?.publishToken()).toEqual({ filled: false });

        clock.now = ORDER_EXPIRATION + 1;
        const report = await resumed?.redeem();
        expect(report?.mode).toBe('pre-purchase');
        expect(token.balanceOf('alice').toFixed()).toBe('100');
        expect(token.balanceOf('bob').toFixed()).toBe('50');

        const after = await store.listEvents(service.scheme.id);
        expect(after.map(e => e.payload.to)).toEqual(['Ordering', 'Closed']);
        expect((await store.load(service.scheme.id))?.state).toBe(SchemeState.Closed);
    });

    it('persists nothing for a rejected operation', async () => {
        const service = await SchemeService.create(params, deps, store);
        token.mint('alice', 100);

        await expect(service.deposit('alice', 100)).rejects.toThrow(/EXTERNAL_TRANSFER_FAILED/);

        const saved = await store.load(service.scheme.id);
        expect(saved?.ledger.balances).toEqual([]);
        expect(await store.listEvents(service.scheme.id)).toEqual([]);
    });

    it('persists overlapping calls in call order', async () => {
        // save #1 is create, save #2 is alice's deposit
        const slowStore = new SlowSaveStore(2, 20);
        const service = await SchemeService.create(params, deps, slowStore);
        fund('alice', 100);
        fund('bob', 100);

        await Promise.all([service.deposit('alice', 100), service.deposit('bob', 100)]);

        const saved = await slowStore.load(service.scheme.id);
        expect(saved?.ledger.balances).toEqual([
            ['alice', '100'],
            ['bob', '100'],
        ]);
    });

    it('keeps serving queued calls after one of them fails', async () => {
        const service = await SchemeService.create(params, deps, store);
        token.mint('carol', 100);
        fund('alice', 100);

        const results = await Promise.allSettled([service.deposit('carol', 100), service.deposit('alice', 100)]);

        expect(results.map(r => r.status)).toEqual(['rejected', 'fulfilled']);
        expect((await store.load(service.scheme.id))?.ledger.balances).toEqual([['alice', '100']]);
    });

    it('returns null for an unknown scheme id', async () => {
        expect(await SchemeService.load('missing-scheme', deps, store)).toBeNull();
    });
});

describe('parseSchemeSnapshot', () => {
    const createSnapshot = () => {
        const token = new MemoryToken();
        const scheme = Scheme.create(params, { asset: token.connect(CUSTODY), clock: () => T0 });
        token.mint('alice', 70);
        token.approve('alice', CUSTODY, 70);
        scheme.deposit('alice', 70);
        return { scheme, token, snapshot: scheme.snapshot() };
    };

    it('accepts a snapshot that went through JSON and rebuilds the scheme from it', () => {
        const { token, snapshot } = createSnapshot();
        const parsed = parseSchemeSnapshot(JSON.parse(JSON.stringify(snapshot)));

        expect(parsed).toEqual(snapshot);
        if (!parsed) return;

        const rebuilt = Scheme.fromSnapshot(parsed, { asset: token.connect(CUSTODY), clock: () => T0 });
        expect(rebuilt.id).toBe(snapshot.id);
        expect(rebuilt.depositOf('alice').toFixed()).toBe('70');
        expect(rebuilt.custodyBalance().toFixed()).toBe('70');
    });

    it('rejects an unknown state', () => {
        const { snapshot } = createSnapshot();
        expect(parseSchemeSnapshot({ ...snapshot, state: 'Liquidating' })).toBeNull();
    });

    it('rejects malformed ledger entries', () => {
        const { snapshot } = createSnapshot();
        const ledger = { ...snapshot.ledger, balances: [['alice']] };
        expect(parseSchemeSnapshot({ ...snapshot, ledger })).toBeNull();
    });

    it('rejects non-object input', () => {
        expect(parseSchemeSnapshot(null)).toBeNull();
        expect(parseSchemeSnapshot('scheme')).toBeNull();
    });
});
