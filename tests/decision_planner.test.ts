/**
 * Decision Planner Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Flag precedence → action, sizing tables → size, guards → hold reasons.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { planDecision } from '../src/engine/decisionPlanner';
import type { Holdings, TrendFlags } from '../src/types';
import { createRiskScores, createTrendOutput } from './helpers/fixtures';

const EMPTY: Holdings = { quantity: '0', invested: '0', extracted: '0' };

function plan(
    flags: Partial<TrendFlags>,
    opts: { holdings?: Holdings; aggression?: number; exitPressure?: number; price?: number | null } = {}
) {
    return planDecision({
        position: { allocationCap: 1000, holdings: opts.holdings ?? EMPTY },
        trend: createTrendOutput({ flags }),
        scores: createRiskScores({ aggression: opts.aggression ?? 0.5, exitPressure: opts.exitPressure ?? 0.5 }),
        scoreSource: 'computed',
        price: opts.price === undefined ? 100 : opts.price,
    });
}

describe('planDecision', () => {
    describe('holds', () => {
        test('no flag raised', () => {
            expect(plan({}).decision).toEqual({ type: 'hold', reason: 'no_signal' });
        });

        test('no usable price', () => {
            expect(plan({ buySignal: true }, { price: null }).decision).toEqual({ type: 'hold', reason: 'no_price' });
            expect(plan({ buySignal: true }, { price: 0 }).decision).toEqual({ type: 'hold', reason: 'no_price' });
        });

        test('exit or trim with nothing held', () => {
            expect(plan({ exitPosition: true }).decision).toEqual({ type: 'hold', reason: 'no_holdings' });
            expect(plan({ trimFlag: true }).decision).toEqual({ type: 'hold', reason: 'no_holdings' });
        });

        test('entry with the allocation fully deployed', () => {
            const result = plan({ buyFlag: true }, { holdings: { quantity: '10', invested: '1000', extracted: '0' } });
            expect(result.decision).toEqual({ type: 'hold', reason: 'allocation_exhausted' });
            expect(result.justification.tier).toBe('normal');
        });

        test('trim that rounds to nothing', () => {
            const holdings = { quantity: '0.000000000000000001', invested: '500', extracted: '0' };
            expect(plan({ trimFlag: true }, { holdings }).decision).toEqual({ type: 'hold', reason: 'below_min_size' });
        });
    });

    describe('exits', () => {
        const held = { quantity: '3', invested: '300', extracted: '0' };

        test('exit sells the full quantity', () => {
            expect(plan({ exitPosition: true }, { holdings: held }).decision).toEqual({
                type: 'exit',
                trigger: 'exit_position',
                sizeFraction: 1,
                quantity: '3',
            });
        });

        test('exit outranks every entry flag', () => {
            const decision = plan({ emergencyExit: true, buySignal: true, reclaimedEma333: true }, { holdings: held }).decision;
            expect(decision.type === 'exit' ? decision.trigger : null).toBe('emergency_exit');
        });
    });

    describe('trims', () => {
        // Half deployed: trim multiplier is exactly 1
        const half = { quantity: '5', invested: '500', extracted: '0' };

        test('normal exit pressure trims 10% of holdings', () => {
            const result = plan({ trimFlag: true }, { holdings: half });
            expect(result.decision).toEqual({ type: 'trim', trigger: 'trim_flag', sizeFraction: 0.1, quantity: '0.5' });
            expect(result.justification.riskMultiplier).toBe(1);
        });

        test('high exit pressure trims half', () => {
            const result = plan({ trimFlag: true }, { holdings: half, exitPressure: 0.8 });
            expect(result.decision).toEqual({ type: 'trim', trigger: 'trim_flag', sizeFraction: 0.5, quantity: '2.5' });
            expect(result.justification.tier).toBe('aggressive');
        });

        test('trim outranks entries', () => {
            expect(plan({ trimFlag: true, buyFlag: true }, { holdings: half }).decision.type).toBe('trim');
        });
    });

    describe('entries', () => {
        test('aggressive S1 entry takes half the cap', () => {
            const result = plan({ buySignal: true }, { aggression: 0.8 });
            expect(result.decision).toEqual({ type: 'add', trigger: 'buy_signal', sizeFraction: 0.5, notional: 500 });
            expect(result.justification).toMatchObject({
                tier: 'aggressive',
                baseFraction: 0.5,
                riskMultiplier: 1,
                aggression: 0.8,
                scoreSource: 'computed',
                state: 'S1',
            });
        });

        test('patient later entry', () => {
            const { decision } = plan({ buyFlag: true }, { aggression: 0.2 });
            expect(decision.type).toBe('add');
            expect(decision.type === 'add' ? decision.notional : null).toBeCloseTo(50, 9);
        });

        test('entry is clipped to the remaining budget', () => {
            const holdings = { quantity: '9', invested: '900', extracted: '0' };
            expect(plan({ buySignal: true }, { holdings }).decision).toEqual({
                type: 'add',
                trigger: 'buy_signal',
                sizeFraction: 0.1,
                notional: 100,
            });
        });

        test('underwater holdings scale the first dip entry by 1.5', () => {
            const holdings = { quantity: '4', invested: '400', extracted: '0' };
            const result = plan({ firstDipBuyFlag: true }, { holdings, price: 50 });

            expect(result.justification.riskMultiplier).toBe(1.5);
            expect(result.decision.type === 'add' ? result.decision.notional : null).toBeCloseTo(300, 9);
        });

        test('first dip outranks a plain buy flag', () => {
            const { decision } = plan({ firstDipBuyFlag: true, buyFlag: true });
            expect(decision.type === 'add' ? decision.trigger : null).toBe('first_dip_buy_flag');
        });
    });
});
