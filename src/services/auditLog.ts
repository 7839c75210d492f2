/**
 * Audit Log - append-only decision records
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * RULES:
 * 1. One record per evaluated position per tick, plus status transitions
 * 2. Records are frozen on append and never mutated
 * 3. append() never blocks or throws into the trade path
 * 4. Sink failures are logged as [AUDIT-ERROR], never dropped silently
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { getSupabaseClient } from '../integrations/supabaseClient';
import type { AuditRecord, Timeframe } from '../types';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';
import { safeInsert } from './db';

export interface AuditSink {
    write(record: AuditRecord): Promise<void>;
}

export interface AuditQuery {
    positionId?: string;
    timeframe?: Timeframe;
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

export class AuditLog {
    private readonly pending = new Set<Promise<void>>();
    private failures = 0;

    constructor(private readonly sink: AuditSink) {}

    append(record: AuditRecord): void {
        const frozen = deepFreeze(structuredClone(record));

        const write = Promise.resolve().then(() => this.sink.write(frozen)).then(
            () => {
                logger.debug(`[AUDIT] kind=${frozen.kind} position=${frozen.positionId.slice(0, 8)} tick=${frozen.tickId.slice(0, 8)}`);
            },
            (err: unknown) => {
                this.failures++;
                logger.error(
                    `[AUDIT-ERROR] kind=${frozen.kind} position=${frozen.positionId} ` +
                    `tick=${frozen.tickId} error=${errorMessage(err)}`
                );
            }
        );

        this.pending.add(write);
        void write.finally(() => this.pending.delete(write));
    }

    /**
     * Wait for every write appended so far.
     */
    async flush(): Promise<void> {
        while (this.pending.size > 0) {
            await Promise.all(Array.from(this.pending));
        }
    }

    get failedWrites(): number {
        return this.failures;
    }
}

/**
 * Table position_decisions. The record is stored whole in `payload`; the
 * columns beside it exist for querying by position and timeframe.
 */
export class SupabaseAuditSink implements AuditSink {
    constructor(private readonly client: SupabaseClient = getSupabaseClient()) {}

    async write(record: AuditRecord): Promise<void> {
        await safeInsert(
            this.client,
            'position_decisions',
            {
                id: record.id,
                tick_id: record.tickId,
                position_id: record.positionId,
                instrument: record.instrument,
                venue: record.venue,
                timeframe: record.timeframe,
                kind: record.kind,
                decision_type: record.kind === 'status_transition' ? null : record.decision.type,
                execution_status: record.kind === 'decision' ? record.execution.status : null,
                payload: record,
                created_at: record.createdAt,
            },
            { op: 'APPEND_AUDIT', id: record.id }
        );
    }
}

export class MemoryAuditSink implements AuditSink {
    private readonly records: AuditRecord[] = [];

    async write(record: AuditRecord): Promise<void> {
        this.records.push(record);
    }

    query(filter: AuditQuery = {}): AuditRecord[] {
        return this.records.filter(r =>
            (filter.positionId === undefined || r.positionId === filter.positionId) &&
            (filter.timeframe === undefined || r.timeframe === filter.timeframe)
        );
    }
}
