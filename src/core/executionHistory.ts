/**
 * Per-position execution history
 *
 * Stored in features.executionHistory and written in the same atomic update
 * as the fill it describes.
 *
 * REPEAT RULES:
 *   - An engine output is acted on at most once (signal_consumed)
 *   - S1 and S2 buys: once per state episode (episode_entered)
 *   - S3 dip buys, reclaim buys, trims: one per cooldown (repeat_cooldown)
 *   - Exits are only subject to the first rule
 *
 * An episode starts at the engine's last state transition. With no recorded
 * transition the episode is unbounded, so any earlier buy in that slot counts.
 */

import { REPEAT_COOLDOWN_MS } from '../config/constants';
import type {
    EntryTrigger,
    ExecutionFill,
    ExecutionHistory,
    ExecutionHistoryUpdate,
    ExecutionSlot,
    HoldReason,
    Timeframe,
    TradeDecision,
    TrendEngineOutput,
    TrendState,
} from '../types';

type RepeatPolicy = 'episode' | 'cooldown' | 'none';

const REPEAT_POLICY: Record<ExecutionSlot, RepeatPolicy> = {
    s1Buy: 'episode',
    s2Buy: 'episode',
    s3Buy: 'cooldown',
    reclaimBuy: 'cooldown',
    trim: 'cooldown',
    exit: 'none',
};

export function emptyExecutionHistory(): ExecutionHistory {
    return { lastSignalAt: null, slots: {} };
}

function buySlot(trigger: EntryTrigger, state: TrendState | null): ExecutionSlot {
    switch (trigger) {
        case 'buy_signal':
            return 's1Buy';
        case 'reclaimed_ema333':
            return 'reclaimBuy';
        case 'first_dip_buy_flag':
            return 's3Buy';
        case 'buy_flag':
            return state === 'S2' ? 's2Buy' : 's3Buy';
    }
}

export function slotFor(decision: TradeDecision, state: TrendState | null): ExecutionSlot {
    if (decision.type === 'add') {
        return buySlot(decision.trigger, state);
    }
    return decision.type;
}

/**
 * Hold reason when this decision repeats one already executed, else null.
 */
export function repeatHoldReason(
    decision: TradeDecision,
    trend: TrendEngineOutput,
    history: ExecutionHistory | undefined,
    timeframe: Timeframe,
    now: Date
): HoldReason | null {
    if (!history) {
        return null;
    }
    if (history.lastSignalAt === trend.evaluatedAt) {
        return 'signal_consumed';
    }

    const slot = slotFor(decision, trend.state);
    const last = history.slots[slot];
    if (!last) {
        return null;
    }

    switch (REPEAT_POLICY[slot]) {
        case 'episode': {
            const episodeStart = trend.meta.lastTransitionAt;
            if (episodeStart === null || Date.parse(last.executedAt) >= Date.parse(episodeStart)) {
                return 'episode_entered';
            }
            return null;
        }
        case 'cooldown':
            return now.getTime() - Date.parse(last.executedAt) < REPEAT_COOLDOWN_MS[timeframe]
                ? 'repeat_cooldown'
                : null;
        case 'none':
            return null;
    }
}

export function historyUpdateFor(
    decision: TradeDecision,
    trend: TrendEngineOutput,
    fill: ExecutionFill
): ExecutionHistoryUpdate {
    return {
        slot: slotFor(decision, trend.state),
        entry: {
            trigger: decision.trigger,
            state: trend.state,
            signalAt: trend.evaluatedAt,
            executedAt: fill.executedAt,
            price: fill.price,
            sizeFraction: decision.sizeFraction,
        },
    };
}

export function withExecution(
    history: ExecutionHistory | undefined,
    update: ExecutionHistoryUpdate
): ExecutionHistory {
    const base = history ?? emptyExecutionHistory();
    return {
        lastSignalAt: update.entry.signalAt,
        slots: { ...base.slots, [update.slot]: update.entry },
    };
}
