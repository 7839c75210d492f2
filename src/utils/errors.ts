/**
 * Typed failures raised inside a tick. Each carries the context that gets
 * logged next to it.
 */

export class InvariantViolationError extends Error {
    constructor(
        public readonly positionId: string,
        public readonly reason: string,
        public readonly context: Record<string, unknown> = {}
    ) {
        super(`[INVARIANT] position=${positionId} ${reason}`);
        this.name = 'InvariantViolationError';
    }
}

export class PersistenceError extends Error {
    constructor(
        public readonly table: string,
        public readonly op: string,
        message: string
    ) {
        super(`[DB-ERROR] ${op} failed on ${table}: ${message}`);
        this.name = 'PersistenceError';
    }
}

export class ConcurrencyConflictError extends Error {
    constructor(
        public readonly positionId: string,
        public readonly attempts: number
    ) {
        super(`[DB-CONFLICT] position=${positionId} still conflicting after ${attempts} attempts`);
        this.name = 'ConcurrencyConflictError';
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
