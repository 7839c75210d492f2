/**
 * Position Model Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Holdings arithmetic, status invariants, history gate, allocation split.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { planPositionsForApproval, splitAllocation } from '../src/core/allocation';
import {
    applyFill,
    deployedFraction,
    emptyHoldings,
    quantityFraction,
    realizedProfitFraction,
    remainingBudget,
    unrealizedReturn,
} from '../src/core/holdings';
import {
    assertPositionInvariants,
    initialStatus,
    shouldDemote,
    shouldPromote,
    statusAfterHoldingsChange,
} from '../src/core/positionModel';
import type { ExecutionFill } from '../src/types';
import { InvariantViolationError } from '../src/utils/errors';
import { T0, createPosition } from './helpers/fixtures';

function fill(partial: Partial<ExecutionFill>): ExecutionFill {
    return {
        side: 'buy',
        quantity: '0',
        notional: '0',
        price: 100,
        reference: 'fill-test',
        executedAt: T0.toISOString(),
        ...partial,
    };
}

describe('Holdings', () => {
    test('buy adds quantity and invested', () => {
        const after = applyFill(emptyHoldings(), fill({ side: 'buy', quantity: '3', notional: '300' }));
        expect(after).toEqual({ quantity: '3', invested: '300', extracted: '0' });
    });

    test('decimal arithmetic stays exact across fills', () => {
        let holdings = emptyHoldings();
        holdings = applyFill(holdings, fill({ quantity: '0.1', notional: '0.1' }));
        holdings = applyFill(holdings, fill({ quantity: '0.2', notional: '0.2' }));
        expect(holdings.quantity).toBe('0.3');
        expect(holdings.invested).toBe('0.3');
    });

    test('sell adds to extracted and never goes below zero', () => {
        const start = { quantity: '3', invested: '300', extracted: '0' };
        const after = applyFill(start, fill({ side: 'sell', quantity: '5', notional: '350' }));
        expect(after).toEqual({ quantity: '0', invested: '300', extracted: '350' });
    });

    test('dust remainder becomes exactly zero', () => {
        const start = { quantity: '1.0000000000000000001', invested: '100', extracted: '0' };
        const after = applyFill(start, fill({ side: 'sell', quantity: '1', notional: '110' }));
        expect(after.quantity).toBe('0');
    });

    test('derived fractions', () => {
        const holdings = { quantity: '2', invested: '600', extracted: '200' };
        expect(deployedFraction(holdings, 1000)).toBeCloseTo(0.4, 10);
        expect(remainingBudget(holdings, 1000)).toBe(600);
        expect(realizedProfitFraction(holdings, 1000)).toBe(0);
        // (2 · 150 + 200 − 600) / 600
        expect(unrealizedReturn(holdings, 150)).toBeCloseTo(-1 / 6, 10);
    });

    test('zero cap counts as fully deployed', () => {
        expect(deployedFraction(emptyHoldings(), 0)).toBe(1);
        expect(remainingBudget(emptyHoldings(), 0)).toBe(0);
    });

    test('quantityFraction takes a share and returns everything at 1', () => {
        const holdings = { quantity: '3', invested: '300', extracted: '0' };
        expect(quantityFraction(holdings, 0.25)).toBe('0.75');
        expect(quantityFraction(holdings, 1)).toBe('3');
        expect(quantityFraction(holdings, 0)).toBe('0');
    });
});

describe('Position invariants', () => {
    test('consistent positions pass', () => {
        expect(() => assertPositionInvariants(createPosition())).not.toThrow();
        expect(() => assertPositionInvariants(createPosition({
            status: 'active',
            holdings: { quantity: '1', invested: '100', extracted: '0' },
        }))).not.toThrow();
    });

    test.each([
        ['active with zero holdings', 'active', '0'],
        ['watchlist with holdings', 'watchlist', '2'],
        ['negative quantity', 'active', '-1'],
        ['non-numeric quantity', 'active', 'abc'],
    ] as const)('%s throws', (_label, status, quantity) => {
        const position = createPosition({ status, holdings: { quantity, invested: '0', extracted: '0' } });
        expect(() => assertPositionInvariants(position)).toThrow(InvariantViolationError);
    });

    test('paused and dormant positions are not held to the active rule', () => {
        expect(() => assertPositionInvariants(createPosition({ status: 'paused' }))).not.toThrow();
        expect(() => assertPositionInvariants(createPosition({
            status: 'paused',
            holdings: { quantity: '4', invested: '400', extracted: '0' },
        }))).not.toThrow();
    });
});

describe('Status transitions', () => {
    test('first fill activates, full exit returns to watchlist', () => {
        expect(statusAfterHoldingsChange('watchlist', { quantity: '1', invested: '100', extracted: '0' })).toBe('active');
        expect(statusAfterHoldingsChange('active', { quantity: '0', invested: '100', extracted: '90' })).toBe('watchlist');
        expect(statusAfterHoldingsChange('active', { quantity: '0.5', invested: '100', extracted: '50' })).toBe('active');
    });

    test('history gate is inclusive at the threshold', () => {
        expect(initialStatus(350, 350)).toBe('watchlist');
        expect(initialStatus(349, 350)).toBe('dormant');
        expect(shouldPromote({ status: 'dormant', barsCount: 350 }, 350)).toBe(true);
        expect(shouldPromote({ status: 'dormant', barsCount: 349 }, 350)).toBe(false);
        expect(shouldDemote({ status: 'watchlist', barsCount: 349 }, 350)).toBe(true);
        expect(shouldDemote({ status: 'active', barsCount: 10 }, 350)).toBe(false);
    });
});

describe('Allocation split', () => {
    test('default split across timeframes', () => {
        const caps = splitAllocation(1000);
        expect(caps['1m']).toBeCloseTo(50, 10);
        expect(caps['15m']).toBeCloseTo(125, 10);
        expect(caps['1h']).toBeCloseTo(700, 10);
        expect(caps['4h']).toBeCloseTo(125, 10);
    });

    test('splits must sum to 1', () => {
        expect(() => splitAllocation(1000, { '1m': 0.5, '15m': 0.5, '1h': 0.5, '4h': 0 })).toThrow('sum to');
    });

    test('negative total is rejected', () => {
        expect(() => splitAllocation(-1)).toThrow('invalid total allocation');
    });

    test('one plan per timeframe with a non-zero cap, status from history', () => {
        const plans = planPositionsForApproval(
            {
                instrument: 'TEST-ASSET',
                venue: 'test-venue',
                totalAllocation: 1000,
                barsCountByTimeframe: { '1h': 400, '4h': 120 },
                splits: { '1m': 0, '15m': 0, '1h': 0.8, '4h': 0.2 },
            },
            350
        );

        expect(plans.map(p => [p.timeframe, p.status, p.barsCount])).toEqual([
            ['1h', 'watchlist', 400],
            ['4h', 'dormant', 120],
        ]);
        expect(plans[0].allocationCap).toBeCloseTo(800, 10);
    });
});
