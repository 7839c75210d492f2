/**
 * Database Helper Module - Safe Database Operations with Strict Error Handling
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ALL SUPABASE WRITES GO THROUGH THIS MODULE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * RULES:
 * 1. NEVER swallow errors - always throw on failure
 * 2. Always log [DB-WRITE] on success
 * 3. Always log [DB-ERROR] on failure with full context
 *
 * GREP-FRIENDLY LOGS:
 * - [DB-WRITE] - Successful database write
 * - [DB-ERROR] - Database operation failed
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { PersistenceError } from '../utils/errors';
import logger from '../utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface DbOperationContext {
    /** Operation name (e.g., 'CLAIM_EXECUTION', 'RECORD_EXECUTION') */
    op: string;
    /** Optional ID for the record being operated on */
    id?: string;
    /** Optional additional context for logging */
    details?: Record<string, unknown>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

function logDbError(
    table: string,
    context: DbOperationContext,
    error: Pick<PostgrestError, 'message'> & Partial<PostgrestError>
): void {
    const errorLog = {
        table,
        op: context.op,
        id: context.id,
        errorMessage: error.message,
        errorCode: error.code,
        errorDetails: error.details,
        errorHint: error.hint,
        timestamp: new Date().toISOString(),
        ...context.details,
    };

    logger.error(`[DB-ERROR] ${JSON.stringify(errorLog)}`);
}

export function logDbWrite(
    table: string,
    context: DbOperationContext,
    rowCount: number = 1
): void {
    logger.debug(`[DB-WRITE] ${JSON.stringify({ table, op: context.op, id: context.id, rowCount })}`);
}

/**
 * Log and throw when a Supabase call returned an error.
 */
export function assertNoDbError(
    table: string,
    context: DbOperationContext,
    error: PostgrestError | null
): void {
    if (error) {
        logDbError(table, context, error);
        throw new PersistenceError(table, context.op, error.message);
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SAFE INSERT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Insert one record. Logs [DB-WRITE] on success, logs [DB-ERROR] and
 * THROWS on failure.
 */
export async function safeInsert(
    client: SupabaseClient,
    table: string,
    payload: Record<string, unknown>,
    context: DbOperationContext
): Promise<void> {
    try {
        const { error } = await client.from(table).insert(payload);
        assertNoDbError(table, context, error);
        logDbWrite(table, context);
    } catch (err: unknown) {
        if (err instanceof PersistenceError) {
            throw err;
        }
        const message = err instanceof Error ? err.message : String(err);
        logDbError(table, context, { message, code: 'UNEXPECTED_ERROR' });
        throw new PersistenceError(table, context.op, message);
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SAFE UPDATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Update rows matching every `filters` column with .eq(). Returns the
 * updated rows as untyped values for the caller to parse.
 */
export async function safeUpdate(
    client: SupabaseClient,
    table: string,
    payload: Record<string, unknown>,
    filters: Record<string, string | number | boolean>,
    context: DbOperationContext
): Promise<unknown[]> {
    try {
        let query = client.from(table).update(payload);
        for (const [column, value] of Object.entries(filters)) {
            query = query.eq(column, value);
        }

        const { data, error } = await query.select('*');
        assertNoDbError(table, context, error);

        const rows: unknown[] = data ?? [];
        logDbWrite(table, context, rows.length);
        return rows;
    } catch (err: unknown) {
        if (err instanceof PersistenceError) {
            throw err;
        }
        const message = err instanceof Error ? err.message : String(err);
        logDbError(table, context, { message, code: 'UNEXPECTED_ERROR' });
        throw new PersistenceError(table, context.op, message);
    }
}
