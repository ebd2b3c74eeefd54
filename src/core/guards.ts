/**
 * Operation Guards
 *
 * Pure precondition checks. Each returns a GuardResult instead of throwing so
 * they can be composed and tested without a scheme. The scheme turns the
 * first failure into a PreconditionError before touching any state.
 */

import { SchemeSchedule, SchemeState, isRedeemable } from './schemeLifecycle';

export type GuardResult =
    | { ok: true }
    | { ok: false; code: string; reason: string };

export interface GuardContext {
    state: SchemeState;
    schedule: SchemeSchedule;
    now: number;
}

export type Guard = (ctx: GuardContext) => GuardResult;

const PASS: GuardResult = { ok: true };

const fail = (code: string, reason: string): GuardResult => ({ ok: false, code, reason });

export function inState(...allowed: SchemeState[]): Guard {
    return (ctx) =>
        allowed.includes(ctx.state)
            ? PASS
            : fail('WRONG_STATE', `requires state ${allowed.join(' | ')}, scheme is ${ctx.state}`);
}

export function before(deadline: keyof SchemeSchedule): Guard {
    return (ctx) =>
        ctx.now < ctx.schedule[deadline]
            ? PASS
            : fail('WINDOW_CLOSED', `must run before ${deadline} (${ctx.schedule[deadline]}), now ${ctx.now}`);
}

export function notBefore(deadline: keyof SchemeSchedule): Guard {
    return (ctx) =>
        ctx.now >= ctx.schedule[deadline]
            ? PASS
            : fail('WINDOW_NOT_OPEN', `must run at or after ${deadline} (${ctx.schedule[deadline]}), now ${ctx.now}`);
}

export const redeemable: Guard = (ctx) =>
    isRedeemable(ctx.state, ctx.schedule, ctx.now)
        ? PASS
        : fail('NOT_REDEEMABLE', `scheme in ${ctx.state} cannot be redeemed at ${ctx.now}`);

/**
 * Run guards in order and return the first failure, or PASS.
 */
export function firstFailure(ctx: GuardContext, guards: readonly Guard[]): GuardResult {
    for (const guard of guards) {
        const result = guard(ctx);
        if (!result.ok) return result;
    }
    return PASS;
}

export type GuardedOperation =
    | 'deposit'
    | 'withdraw'
    | 'makeBuyOrder'
    | 'publishToken'
    | 'sellAsset'
    | 'updateSellOrder'
    | 'shareTransfer'
    | 'redeem';

export const OPERATION_GUARDS: Record<GuardedOperation, readonly Guard[]> = {
    deposit: [inState(SchemeState.Offering), before('offerClosingTime')],
    withdraw: [inState(SchemeState.Offering), before('offerClosingTime')],
    makeBuyOrder: [
        inState(SchemeState.Offering),
        notBefore('offerClosingTime'),
        before('orderExpiration'),
        before('maturity'),
    ],
    publishToken: [inState(SchemeState.Ordering), before('orderExpiration'), before('maturity')],
    sellAsset: [inState(SchemeState.AssetHolding), notBefore('maturity')],
    updateSellOrder: [inState(SchemeState.AssetSelling)],
    shareTransfer: [inState(SchemeState.AssetHolding), before('maturity')],
    redeem: [redeemable],
};

export function checkOperation(operation: GuardedOperation, ctx: GuardContext): GuardResult {
    return firstFailure(ctx, OPERATION_GUARDS[operation]);
}
