/**
 * Execution History Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Slot mapping, repeat rules (consumed output, per-episode buys, cooldowns)
 * and history updates.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    historyUpdateFor,
    repeatHoldReason,
    slotFor,
    withExecution,
} from '../src/core/executionHistory';
import type {
    AddDecision,
    ExecutionHistory,
    ExecutionHistoryEntry,
    ExitDecision,
    TrimDecision,
} from '../src/types';
import { T0, createTrendOutput, minutesAfter } from './helpers/fixtures';

const S1_BUY: AddDecision = { type: 'add', trigger: 'buy_signal', sizeFraction: 0.3, notional: 300 };
const RETEST_BUY: AddDecision = { type: 'add', trigger: 'buy_flag', sizeFraction: 0.15, notional: 150 };
const TRIM: TrimDecision = { type: 'trim', trigger: 'trim_flag', sizeFraction: 0.1, quantity: '1' };
const EXIT: ExitDecision = { type: 'exit', trigger: 'exit_position', sizeFraction: 1, quantity: '10' };

function entry(partial: Partial<ExecutionHistoryEntry> = {}): ExecutionHistoryEntry {
    return {
        trigger: 'buy_signal',
        state: 'S1',
        signalAt: T0.toISOString(),
        executedAt: T0.toISOString(),
        price: 100,
        sizeFraction: 0.3,
        ...partial,
    };
}

function history(slots: ExecutionHistory['slots'], lastSignalAt: string = T0.toISOString()): ExecutionHistory {
    return { lastSignalAt, slots };
}

describe('execution history', () => {
    describe('slotFor', () => {
        test('buy slots follow trigger and state', () => {
            expect(slotFor(S1_BUY, 'S1')).toBe('s1Buy');
            expect(slotFor(RETEST_BUY, 'S2')).toBe('s2Buy');
            expect(slotFor(RETEST_BUY, 'S3')).toBe('s3Buy');
            expect(slotFor({ ...RETEST_BUY, trigger: 'first_dip_buy_flag' }, 'S3')).toBe('s3Buy');
            expect(slotFor({ ...RETEST_BUY, trigger: 'reclaimed_ema333' }, 'S3')).toBe('reclaimBuy');
        });

        test('trims and exits have their own slots', () => {
            expect(slotFor(TRIM, 'S3')).toBe('trim');
            expect(slotFor(EXIT, 'S0')).toBe('exit');
        });
    });

    describe('repeatHoldReason', () => {
        test('no history never holds', () => {
            expect(repeatHoldReason(S1_BUY, createTrendOutput(), undefined, '1h', T0)).toBeNull();
        });

        test('an output already acted on is consumed, exits included', () => {
            const trend = createTrendOutput({ evaluatedAt: T0.toISOString() });
            const past = history({ s1Buy: entry() });

            expect(repeatHoldReason(S1_BUY, trend, past, '1h', minutesAfter(T0, 60))).toBe('signal_consumed');
            expect(repeatHoldReason(EXIT, trend, past, '1h', minutesAfter(T0, 60))).toBe('signal_consumed');
        });

        test('S1 buy repeats inside the same episode are held', () => {
            const trend = createTrendOutput({
                evaluatedAt: minutesAfter(T0, 60).toISOString(),
                meta: { lastTransitionAt: minutesAfter(T0, -5).toISOString() },
            });

            expect(repeatHoldReason(S1_BUY, trend, history({ s1Buy: entry() }), '1h', minutesAfter(T0, 60)))
                .toBe('episode_entered');
        });

        test('with no recorded transition any earlier buy in the slot counts', () => {
            const trend = createTrendOutput({ evaluatedAt: minutesAfter(T0, 60).toISOString() });

            expect(trend.meta.lastTransitionAt).toBeNull();
            expect(repeatHoldReason(S1_BUY, trend, history({ s1Buy: entry() }), '1h', minutesAfter(T0, 60)))
                .toBe('episode_entered');
        });

        test('a new episode reopens the buy slot', () => {
            const trend = createTrendOutput({
                evaluatedAt: minutesAfter(T0, 120).toISOString(),
                meta: { lastTransitionAt: minutesAfter(T0, 90).toISOString() },
            });

            expect(repeatHoldReason(S1_BUY, trend, history({ s1Buy: entry() }), '1h', minutesAfter(T0, 120))).toBeNull();
        });

        test('an S3 buy does not block the S2 retest slot', () => {
            const trend = createTrendOutput({ state: 'S2', evaluatedAt: minutesAfter(T0, 60).toISOString() });
            const past = history({ s3Buy: entry({ trigger: 'buy_flag', state: 'S3' }) });

            expect(repeatHoldReason(RETEST_BUY, trend, past, '1h', minutesAfter(T0, 60))).toBeNull();
        });

        test('trims wait out the timeframe cooldown', () => {
            const past = history({ trim: entry({ trigger: 'trim_flag', state: 'S3' }) });
            const at = (minutes: number) => createTrendOutput({
                state: 'S3',
                evaluatedAt: minutesAfter(T0, minutes).toISOString(),
            });

            expect(repeatHoldReason(TRIM, at(4), past, '1h', minutesAfter(T0, 4))).toBe('repeat_cooldown');
            expect(repeatHoldReason(TRIM, at(359), past, '1h', minutesAfter(T0, 359))).toBe('repeat_cooldown');
            expect(repeatHoldReason(TRIM, at(360), past, '1h', minutesAfter(T0, 360))).toBeNull();
            expect(repeatHoldReason(TRIM, at(14), past, '1m', minutesAfter(T0, 14))).toBe('repeat_cooldown');
            expect(repeatHoldReason(TRIM, at(15), past, '1m', minutesAfter(T0, 15))).toBeNull();
        });

        test('an exit on a fresh output is never held', () => {
            const trend = createTrendOutput({ state: 'S0', evaluatedAt: minutesAfter(T0, 1).toISOString() });
            const past = history({ exit: entry({ trigger: 'exit_position', state: 'S0' }) });

            expect(repeatHoldReason(EXIT, trend, past, '1h', minutesAfter(T0, 1))).toBeNull();
        });
    });

    describe('history updates', () => {
        test('a fill is recorded under its slot and keeps the others', () => {
            const trend = createTrendOutput({ state: 'S3', evaluatedAt: minutesAfter(T0, 30).toISOString() });
            const update = historyUpdateFor(TRIM, trend, {
                side: 'sell',
                quantity: '1',
                notional: '120',
                price: 120,
                reference: 'fill-trim',
                executedAt: minutesAfter(T0, 31).toISOString(),
            });

            expect(update).toEqual({
                slot: 'trim',
                entry: {
                    trigger: 'trim_flag',
                    state: 'S3',
                    signalAt: minutesAfter(T0, 30).toISOString(),
                    executedAt: minutesAfter(T0, 31).toISOString(),
                    price: 120,
                    sizeFraction: 0.1,
                },
            });

            const next = withExecution(history({ s1Buy: entry() }), update);
            expect(next.lastSignalAt).toBe(minutesAfter(T0, 30).toISOString());
            expect(next.slots.s1Buy).toEqual(entry());
            expect(next.slots.trim).toEqual(update.entry);
        });
    });
});
