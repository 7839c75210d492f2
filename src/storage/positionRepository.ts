/**
 * Position repository contract
 *
 * Every mutation is atomic with respect to one position row. Ownership of
 * fields is split by writer:
 *   status, holdings, lastExecutionAt,
 *   features.executionHistory          → orchestrator
 *   features.trend / features.indicators → trend engine job
 *   features.riskScores                → scoring service
 *   barsCount                          → external data layer
 */

import type {
    ExecutionClaim,
    ExecutionFill,
    ExecutionHistoryUpdate,
    ExecutionRecordResult,
    IndicatorSnapshot,
    NewPosition,
    Position,
    PositionStatus,
    RiskScores,
    Timeframe,
    TrendEngineOutput,
} from '../types';

export interface TrendFeaturesUpdate {
    trend: TrendEngineOutput;
    indicators?: IndicatorSnapshot;
}

export interface PositionRepository {
    /** watchlist + active positions for a timeframe */
    getEligiblePositions(timeframe: Timeframe): Promise<Position[]>;

    /** dormant positions for a timeframe */
    getBootstrapPositions(timeframe: Timeframe): Promise<Position[]>;

    getPosition(id: string): Promise<Position | null>;

    /**
     * Create positions, one per (instrument, venue, timeframe). A tuple that
     * already exists is returned unchanged.
     */
    createPositions(plans: NewPosition[]): Promise<Position[]>;

    /**
     * Compare-and-set on status. Returns null when the stored status is no
     * longer `from`.
     */
    updateStatus(id: string, from: PositionStatus, to: PositionStatus): Promise<Position | null>;

    updateBarsCount(id: string, barsCount: number): Promise<void>;

    refreshFeatures(id: string, update: TrendFeaturesUpdate): Promise<Position>;

    updateRiskScores(id: string, scores: RiskScores): Promise<Position>;

    /**
     * Atomically stamp lastExecutionAt = now unless the position was already
     * stamped within `windowMs`.
     */
    claimExecution(id: string, now: Date, windowMs: number): Promise<ExecutionClaim>;

    /**
     * Apply a fill to holdings and move status with it, in one atomic write.
     * A history update is stored into features.executionHistory in that same
     * write.
     */
    recordExecution(id: string, fill: ExecutionFill, history?: ExecutionHistoryUpdate): Promise<ExecutionRecordResult>;
}
