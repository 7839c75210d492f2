/**
 * Supabase-backed PositionRepository
 *
 * Table `positions`, unique on (instrument, venue, timeframe). Read-modify-write
 * mutations use the integer `version` column as an optimistic lock and retry a
 * bounded number of times. The execution claim is a single conditional UPDATE.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { withExecution } from '../core/executionHistory';
import { applyFill } from '../core/holdings';
import { statusAfterHoldingsChange } from '../core/positionModel';
import { getSupabaseClient } from '../integrations/supabaseClient';
import { assertNoDbError, logDbWrite, safeUpdate } from '../services/db';
import type {
    ExecutionClaim,
    ExecutionFill,
    ExecutionHistoryUpdate,
    ExecutionRecordResult,
    NewPosition,
    Position,
    PositionStatus,
    RiskScores,
    StatusChange,
    Timeframe,
} from '../types';
import { ConcurrencyConflictError, errorMessage } from '../utils/errors';
import logger from '../utils/logger';
import { PositionRecord, isRecord, parsePositionRow } from './codec';
import type { PositionRepository, TrendFeaturesUpdate } from './positionRepository';

const TABLE = 'positions';
const MAX_CAS_ATTEMPTS = 3;

type RowPatch = Record<string, unknown>;

export class SupabasePositionRepository implements PositionRepository {
    constructor(private readonly client: SupabaseClient = getSupabaseClient()) {}

    async getEligiblePositions(timeframe: Timeframe): Promise<Position[]> {
        const { data, error } = await this.client
            .from(TABLE)
            .select('*')
            .eq('timeframe', timeframe)
            .in('status', ['watchlist', 'active']);
        assertNoDbError(TABLE, { op: 'GET_ELIGIBLE', details: { timeframe } }, error);
        return this.parseRows(data);
    }

    async getBootstrapPositions(timeframe: Timeframe): Promise<Position[]> {
        const { data, error } = await this.client
            .from(TABLE)
            .select('*')
            .eq('timeframe', timeframe)
            .eq('status', 'dormant');
        assertNoDbError(TABLE, { op: 'GET_BOOTSTRAP', details: { timeframe } }, error);
        return this.parseRows(data);
    }

    async getPosition(id: string): Promise<Position | null> {
        const record = await this.readRecord(id);
        return record ? record.position : null;
    }

    async createPositions(plans: NewPosition[]): Promise<Position[]> {
        if (plans.length === 0) return [];

        const now = new Date().toISOString();
        const rows = plans.map(plan => ({
            instrument: plan.instrument,
            venue: plan.venue,
            timeframe: plan.timeframe,
            status: plan.status,
            allocation_cap: plan.allocationCap,
            quantity: '0',
            invested: '0',
            extracted: '0',
            bars_count: plan.barsCount,
            features: { version: 0 },
            last_execution_at: null,
            version: 0,
            created_at: now,
            updated_at: now,
        }));

        const { error } = await this.client
            .from(TABLE)
            .upsert(rows, { onConflict: 'instrument,venue,timeframe', ignoreDuplicates: true });
        assertNoDbError(TABLE, { op: 'CREATE_POSITIONS' }, error);
        logDbWrite(TABLE, { op: 'CREATE_POSITIONS' }, rows.length);

        const created: Position[] = [];
        for (const plan of plans) {
            const { data, error: selectError } = await this.client
                .from(TABLE)
                .select('*')
                .eq('instrument', plan.instrument)
                .eq('venue', plan.venue)
                .eq('timeframe', plan.timeframe)
                .maybeSingle();
            assertNoDbError(TABLE, { op: 'READ_CREATED' }, selectError);
            if (data) {
                created.push(parsePositionRow(data).position);
            }
        }
        return created;
    }

    async updateStatus(id: string, from: PositionStatus, to: PositionStatus): Promise<Position | null> {
        const rows = await safeUpdate(
            this.client,
            TABLE,
            { status: to, updated_at: new Date().toISOString() },
            { id, status: from },
            { op: 'UPDATE_STATUS', id, details: { from, to } }
        );
        return rows.length > 0 ? parsePositionRow(rows[0]).position : null;
    }

    async updateBarsCount(id: string, barsCount: number): Promise<void> {
        await safeUpdate(
            this.client,
            TABLE,
            { bars_count: barsCount, updated_at: new Date().toISOString() },
            { id },
            { op: 'UPDATE_BARS_COUNT', id }
        );
    }

    async refreshFeatures(id: string, update: TrendFeaturesUpdate): Promise<Position> {
        const result = await this.compareAndSet(id, 'REFRESH_FEATURES', ({ position }) => ({
            features: {
                ...position.features,
                version: position.features.version + 1,
                trend: update.trend,
                indicators: update.indicators ?? position.features.indicators,
            },
        }));
        return result.position;
    }

    async updateRiskScores(id: string, scores: RiskScores): Promise<Position> {
        const result = await this.compareAndSet(id, 'UPDATE_RISK_SCORES', ({ position }) => ({
            features: {
                ...position.features,
                version: position.features.version + 1,
                riskScores: scores,
            },
        }));
        return result.position;
    }

    async claimExecution(id: string, now: Date, windowMs: number): Promise<ExecutionClaim> {
        const nowIso = now.toISOString();
        const cutoffIso = new Date(now.getTime() - windowMs).toISOString();

        const { data, error } = await this.client
            .from(TABLE)
            .update({ last_execution_at: nowIso })
            .eq('id', id)
            .or(`last_execution_at.is.null,last_execution_at.lte.${cutoffIso}`)
            .select('id');
        assertNoDbError(TABLE, { op: 'CLAIM_EXECUTION', id }, error);

        if (data && data.length > 0) {
            logDbWrite(TABLE, { op: 'CLAIM_EXECUTION', id });
            return { claimed: true, lastExecutionAt: null };
        }

        const record = await this.readRecord(id);
        return { claimed: false, lastExecutionAt: record?.position.lastExecutionAt ?? null };
    }

    async recordExecution(
        id: string,
        fill: ExecutionFill,
        history?: ExecutionHistoryUpdate
    ): Promise<ExecutionRecordResult> {
        let statusChange: StatusChange | null = null;

        const result = await this.compareAndSet(id, 'RECORD_EXECUTION', ({ position }) => {
            const holdings = applyFill(position.holdings, fill);
            const status = statusAfterHoldingsChange(position.status, holdings);
            statusChange = status !== position.status ? { from: position.status, to: status } : null;
            const patch: RowPatch = {
                quantity: holdings.quantity,
                invested: holdings.invested,
                extracted: holdings.extracted,
                status,
            };
            if (history) {
                patch.features = {
                    ...position.features,
                    version: position.features.version + 1,
                    executionHistory: withExecution(position.features.executionHistory, history),
                };
            }
            return patch;
        });

        return { position: result.position, statusChange };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // INTERNALS
    // ═══════════════════════════════════════════════════════════════════════════

    private parseRows(data: unknown): Position[] {
        if (!Array.isArray(data)) return [];
        const positions: Position[] = [];
        for (const row of data) {
            try {
                positions.push(parsePositionRow(row).position);
            } catch (err: unknown) {
                const id = isRecord(row) && typeof row.id === 'string' ? row.id : 'unknown';
                logger.error(`[REPO] skipping unparseable position row id=${id}: ${errorMessage(err)}`);
            }
        }
        return positions;
    }

    private async readRecord(id: string): Promise<PositionRecord | null> {
        const { data, error } = await this.client.from(TABLE).select('*').eq('id', id).maybeSingle();
        assertNoDbError(TABLE, { op: 'GET_POSITION', id }, error);
        return data ? parsePositionRow(data) : null;
    }

    /**
     * Read the row, build a patch, write it only if `version` is unchanged.
     */
    private async compareAndSet(
        id: string,
        op: string,
        buildPatch: (record: PositionRecord) => RowPatch
    ): Promise<PositionRecord> {
        for (let attempt = 1; attempt <= MAX_CAS_ATTEMPTS; attempt++) {
            const record = await this.readRecord(id);
            if (!record) {
                throw new Error(`[REPO] position ${id} not found`);
            }

            const patch = buildPatch(record);
            const { data, error } = await this.client
                .from(TABLE)
                .update({ ...patch, version: record.version + 1, updated_at: new Date().toISOString() })
                .eq('id', id)
                .eq('version', record.version)
                .select('*');
            assertNoDbError(TABLE, { op, id, details: { attempt } }, error);

            if (data && data.length > 0) {
                logDbWrite(TABLE, { op, id });
                return parsePositionRow(data[0]);
            }
            logger.warn(`[REPO] version conflict op=${op} position=${id.slice(0, 8)} attempt=${attempt}`);
        }
        throw new ConcurrencyConflictError(id, MAX_CAS_ATTEMPTS);
    }
}
