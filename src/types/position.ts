/**
 * Position & Data Model types
 *
 * A position is keyed by (instrument, venue, timeframe). Holdings are decimal
 * strings so that cumulative arithmetic stays exact across fills.
 */

import type { ActionTrigger } from './decision';
import type { TrendEngineOutput, IndicatorSnapshot, TrendState } from './trend';

export const TIMEFRAMES = ['1m', '15m', '1h', '4h'] as const;
export type Timeframe = (typeof TIMEFRAMES)[number];

export type PositionStatus = 'dormant' | 'watchlist' | 'active' | 'paused' | 'archived';

export interface PositionKey {
    instrument: string;
    venue: string;
    timeframe: Timeframe;
}

export interface Holdings {
    /** Cumulative quantity held */
    quantity: string;
    /** Cumulative native currency spent on buys */
    invested: string;
    /** Cumulative native currency received from sells */
    extracted: string;
}

export type PhaseLabel =
    | 'dip'
    | 'double_dip'
    | 'capitulation'
    | 'recover'
    | 'good'
    | 'euphoria'
    | 'unknown';

export interface RiskScoreComponents {
    macro: PhaseLabel;
    meso: PhaseLabel;
    cutPressure: number;
    deployedFraction: number;
    realizedProfitFraction: number;
}

export interface RiskScores {
    aggression: number;
    exitPressure: number;
    computedAt: string;
    components: RiskScoreComponents;
}

/**
 * One slot per kind of entry, plus trims and exits. S2 and S3 buys are split
 * by the state they were executed in.
 */
export type ExecutionSlot = 's1Buy' | 's2Buy' | 's3Buy' | 'reclaimBuy' | 'trim' | 'exit';

export interface ExecutionHistoryEntry {
    trigger: ActionTrigger;
    state: TrendState | null;
    /** evaluatedAt of the engine output that was acted on */
    signalAt: string;
    executedAt: string;
    price: number;
    sizeFraction: number;
}

export interface ExecutionHistory {
    /** evaluatedAt of the last engine output acted on */
    lastSignalAt: string | null;
    slots: Partial<Record<ExecutionSlot, ExecutionHistoryEntry>>;
}

export interface ExecutionHistoryUpdate {
    slot: ExecutionSlot;
    entry: ExecutionHistoryEntry;
}

export interface PositionFeatures {
    /** Bumped on every features write */
    version: number;
    indicators?: IndicatorSnapshot;
    trend?: TrendEngineOutput;
    riskScores?: RiskScores;
    /** Written only together with a recorded fill */
    executionHistory?: ExecutionHistory;
}

export interface Position extends PositionKey {
    id: string;
    status: PositionStatus;
    allocationCap: number;
    holdings: Holdings;
    barsCount: number;
    features: PositionFeatures;
    lastExecutionAt: string | null;
    createdAt: string;
    updatedAt: string;
}

export type FillSide = 'buy' | 'sell';

export interface ExecutionFill {
    side: FillSide;
    /** Quantity bought or sold */
    quantity: string;
    /** Native currency spent (buy) or received (sell) */
    notional: string;
    price: number;
    reference: string;
    executedAt: string;
}

export interface StatusChange {
    from: PositionStatus;
    to: PositionStatus;
}

export interface ExecutionRecordResult {
    position: Position;
    statusChange: StatusChange | null;
}

export interface ExecutionClaim {
    claimed: boolean;
    /** The stored timestamp that blocked the claim, when not claimed */
    lastExecutionAt: string | null;
}

export interface AllocationApproval {
    instrument: string;
    venue: string;
    totalAllocation: number;
    barsCountByTimeframe: Partial<Record<Timeframe, number>>;
    splits?: Record<Timeframe, number>;
}

export interface NewPosition extends PositionKey {
    status: PositionStatus;
    allocationCap: number;
    barsCount: number;
}
