/**
 * In-process PositionRepository
 *
 * Used by tests and dry local runs. Rows are cloned on the way in and out so
 * callers never share references with stored state. Each method body runs
 * without an await between read and write, which makes it atomic per row.
 */

import { v4 as uuidv4 } from 'uuid';
import { withExecution } from '../core/executionHistory';
import { applyFill } from '../core/holdings';
import { isEligible, statusAfterHoldingsChange } from '../core/positionModel';
import type {
    ExecutionClaim,
    ExecutionFill,
    ExecutionHistoryUpdate,
    ExecutionRecordResult,
    NewPosition,
    Position,
    PositionStatus,
    RiskScores,
    Timeframe,
} from '../types';
import type { PositionRepository, TrendFeaturesUpdate } from './positionRepository';

function clone<T>(value: T): T {
    return structuredClone(value);
}

export class InMemoryPositionRepository implements PositionRepository {
    private readonly rows = new Map<string, Position>();

    constructor(private readonly clock: () => Date = () => new Date()) {}

    /** Insert or replace a row as-is. */
    seed(position: Position): void {
        this.rows.set(position.id, clone(position));
    }

    all(): Position[] {
        return Array.from(this.rows.values(), clone);
    }

    async getEligiblePositions(timeframe: Timeframe): Promise<Position[]> {
        return this.filter(p => p.timeframe === timeframe && isEligible(p.status));
    }

    async getBootstrapPositions(timeframe: Timeframe): Promise<Position[]> {
        return this.filter(p => p.timeframe === timeframe && p.status === 'dormant');
    }

    async getPosition(id: string): Promise<Position | null> {
        const row = this.rows.get(id);
        return row ? clone(row) : null;
    }

    async createPositions(plans: NewPosition[]): Promise<Position[]> {
        return plans.map(plan => {
            const existing = Array.from(this.rows.values()).find(p =>
                p.instrument === plan.instrument && p.venue === plan.venue && p.timeframe === plan.timeframe
            );
            if (existing) {
                return clone(existing);
            }

            const now = this.clock().toISOString();
            const position: Position = {
                id: uuidv4(),
                instrument: plan.instrument,
                venue: plan.venue,
                timeframe: plan.timeframe,
                status: plan.status,
                allocationCap: plan.allocationCap,
                holdings: { quantity: '0', invested: '0', extracted: '0' },
                barsCount: plan.barsCount,
                features: { version: 0 },
                lastExecutionAt: null,
                createdAt: now,
                updatedAt: now,
            };
            this.rows.set(position.id, position);
            return clone(position);
        });
    }

    async updateStatus(id: string, from: PositionStatus, to: PositionStatus): Promise<Position | null> {
        const row = this.require(id);
        if (row.status !== from) {
            return null;
        }
        row.status = to;
        this.touch(row);
        return clone(row);
    }

    async updateBarsCount(id: string, barsCount: number): Promise<void> {
        const row = this.require(id);
        row.barsCount = barsCount;
        this.touch(row);
    }

    async refreshFeatures(id: string, update: TrendFeaturesUpdate): Promise<Position> {
        const row = this.require(id);
        row.features = {
            ...row.features,
            version: row.features.version + 1,
            trend: clone(update.trend),
            indicators: update.indicators ? clone(update.indicators) : row.features.indicators,
        };
        this.touch(row);
        return clone(row);
    }

    async updateRiskScores(id: string, scores: RiskScores): Promise<Position> {
        const row = this.require(id);
        row.features = { ...row.features, version: row.features.version + 1, riskScores: clone(scores) };
        this.touch(row);
        return clone(row);
    }

    async claimExecution(id: string, now: Date, windowMs: number): Promise<ExecutionClaim> {
        const row = this.require(id);
        if (row.lastExecutionAt !== null && now.getTime() - Date.parse(row.lastExecutionAt) < windowMs) {
            return { claimed: false, lastExecutionAt: row.lastExecutionAt };
        }
        row.lastExecutionAt = now.toISOString();
        return { claimed: true, lastExecutionAt: null };
    }

    async recordExecution(
        id: string,
        fill: ExecutionFill,
        history?: ExecutionHistoryUpdate
    ): Promise<ExecutionRecordResult> {
        const row = this.require(id);
        const holdings = applyFill(row.holdings, fill);
        const nextStatus = statusAfterHoldingsChange(row.status, holdings);
        const statusChange = nextStatus !== row.status ? { from: row.status, to: nextStatus } : null;

        row.holdings = holdings;
        row.status = nextStatus;
        if (history) {
            row.features = {
                ...row.features,
                version: row.features.version + 1,
                executionHistory: withExecution(row.features.executionHistory, clone(history)),
            };
        }
        this.touch(row);
        return { position: clone(row), statusChange };
    }

    private filter(predicate: (p: Position) => boolean): Position[] {
        return Array.from(this.rows.values()).filter(predicate).map(clone);
    }

    private require(id: string): Position {
        const row = this.rows.get(id);
        if (!row) {
            throw new Error(`[REPO] position ${id} not found`);
        }
        return row;
    }

    private touch(row: Position): void {
        row.updatedAt = this.clock().toISOString();
    }
}
