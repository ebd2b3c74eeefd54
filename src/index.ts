/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * INDEX.TS - PUBLIC SURFACE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * NO runtime logic at import time. Consumers construct schemes through
 * Scheme.create / SchemeService.create and supply their own settlement asset
 * and order gateway.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

// Core
export { Scheme, validateSchedule } from './core/scheme';
export type { SchemeParams, SchemeDependencies, SchemeSnapshot, RedemptionReport } from './core/scheme';
export { SchemeState, canTransition, nextStates, isTerminal, isRedeemable } from './core/schemeLifecycle';
export type { SchemeSchedule } from './core/schemeLifecycle';
export { Ledger, UNLIMITED_ALLOWANCE } from './core/ledger';
export type { LedgerSnapshot, LedgerObserver } from './core/ledger';
export { checkOperation, firstFailure, OPERATION_GUARDS } from './core/guards';
export type { Guard, GuardContext, GuardResult, GuardedOperation } from './core/guards';
export { planRedemption, planPrePurchaseRefund, planPostSaleRefund } from './core/refundEngine';
export type { Payout, PayoutKind, RedemptionPlan, RedemptionMode } from './core/refundEngine';
export { checkSchemeInvariants } from './core/invariants';
export type { SchemeNotification, NotificationListener } from './core/notifications';
export {
    SchemeError,
    PreconditionError,
    ArithmeticError,
    ExternalTransferError,
    OrderNotFilledError,
    RollbackIncompleteError,
    isBusinessRejection,
} from './core/errors';

// Collaborators
export type { SettlementAsset, SettlementCheckpoint } from './integrations/settlementAsset';
export { MemoryToken } from './integrations/memoryToken';
export { NoFillOrderGateway, TrackedOrderGateway } from './execution/orderGateway';
export type { OrderGateway, OrderOutcome, OrderStatus } from './execution/orderGateway';
export { ManualOrderGateway } from './execution/manualOrderGateway';

// Persistence
export { SchemeService } from './services/schemeService';
export { SupabaseSchemeStore, MemorySchemeStore, parseSchemeSnapshot } from './storage/schemeStore';
export type { SchemeStore, StoredEvent } from './storage/schemeStore';
export { getSupabaseClient, isSupabaseAvailable } from './integrations/supabaseClient';

export type { Amount } from './utils/math';
