/**
 * Decision and audit record types
 *
 * Decisions are a tagged union: a hold never carries a size, an exit always
 * carries the full quantity.
 */

import type { PositionStatus, Timeframe } from './position';
import type { StructuralExitReason, TrendFlags, TrendScores, TrendState } from './trend';

export type EntryTrigger = 'buy_signal' | 'buy_flag' | 'first_dip_buy_flag' | 'reclaimed_ema333';
export type ExitTrigger = 'exit_position' | 'emergency_exit';
export type ActionTrigger = ExitTrigger | 'trim_flag' | EntryTrigger;

export type HoldReason =
    | 'no_signal'
    | 'no_holdings'
    | 'allocation_exhausted'
    | 'below_min_size'
    | 'insufficient_history'
    | 'stale_signal'
    | 'no_price'
    | 'signal_consumed'
    | 'episode_entered'
    | 'repeat_cooldown';

export interface HoldDecision {
    type: 'hold';
    reason: HoldReason;
}

export interface AddDecision {
    type: 'add';
    trigger: EntryTrigger;
    /** Fraction of allocation cap */
    sizeFraction: number;
    notional: number;
}

export interface TrimDecision {
    type: 'trim';
    trigger: 'trim_flag';
    /** Fraction of current holdings */
    sizeFraction: number;
    quantity: string;
}

export interface ExitDecision {
    type: 'exit';
    trigger: ExitTrigger;
    sizeFraction: 1;
    quantity: string;
}

export type Decision = HoldDecision | AddDecision | TrimDecision | ExitDecision;
export type TradeDecision = Exclude<Decision, HoldDecision>;

export type SizingTier = 'aggressive' | 'normal' | 'patient';

export interface DecisionJustification {
    state: TrendState | null;
    flags: TrendFlags | null;
    exitReason: StructuralExitReason | null;
    trendScores: TrendScores | null;
    aggression: number | null;
    exitPressure: number | null;
    scoreSource: 'cache' | 'computed' | null;
    tier: SizingTier | null;
    baseFraction: number | null;
    riskMultiplier: number | null;
}

export type ExecutionOutcome =
    | { status: 'success'; reference: string; price: number; quantity: string; notional: string }
    | { status: 'failed'; errorCode: string; message: string }
    | { status: 'skipped'; reason: 'duplicate'; lastExecutionAt: string | null }
    | { status: 'dry_run' };

interface AuditRecordBase {
    id: string;
    tickId: string;
    positionId: string;
    instrument: string;
    venue: string;
    timeframe: Timeframe;
    createdAt: string;
}

export interface DecisionAuditRecord extends AuditRecordBase {
    kind: 'decision';
    decision: TradeDecision;
    justification: DecisionJustification;
    execution: ExecutionOutcome;
}

export interface HoldAuditRecord extends AuditRecordBase {
    kind: 'hold';
    decision: HoldDecision;
    justification: DecisionJustification;
}

export type StatusTransitionCause =
    | 'first_entry'
    | 'full_exit'
    | 'history_sufficient'
    | 'history_insufficient';

export interface StatusTransitionAuditRecord extends AuditRecordBase {
    kind: 'status_transition';
    from: PositionStatus;
    to: PositionStatus;
    cause: StatusTransitionCause;
}

export type AuditRecord = DecisionAuditRecord | HoldAuditRecord | StatusTransitionAuditRecord;
