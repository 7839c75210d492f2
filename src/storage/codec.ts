/**
 * Row and JSON payload parsing
 *
 * Supabase returns untyped rows. Everything read back is checked here before
 * it reaches engine code; a row that fails the checks is rejected, never
 * coerced.
 */

import type {
    ActionTrigger,
    ExecutionHistory,
    ExecutionHistoryEntry,
    ExecutionSlot,
    IndicatorSnapshot,
    PhaseLabel,
    Position,
    PositionFeatures,
    PositionStatus,
    PriceBar,
    RiskScores,
    SupportResistanceLevel,
    Timeframe,
    TrendEngineOutput,
    TrendFlags,
    TrendMeta,
    TrendScores,
    TrendState,
} from '../types';

export class RowParseError extends Error {
    constructor(public readonly entity: string, public readonly field: string) {
        super(`[ROW-PARSE] ${entity}.${field} missing or invalid`);
        this.name = 'RowParseError';
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PRIMITIVES
// ═══════════════════════════════════════════════════════════════════════════════

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value);
}

function readString(row: Record<string, unknown>, key: string, entity: string): string {
    const value = row[key];
    if (typeof value !== 'string') throw new RowParseError(entity, key);
    return value;
}

function readNullableString(row: Record<string, unknown>, key: string, entity: string): string | null {
    const value = row[key];
    if (value === null || value === undefined) return null;
    if (typeof value !== 'string') throw new RowParseError(entity, key);
    return value;
}

/** Postgres numeric comes back as a string or a number depending on size. */
function readNumber(row: Record<string, unknown>, key: string, entity: string): number {
    const value = row[key];
    const parsed = typeof value === 'string' ? Number(value) : value;
    if (!isFiniteNumber(parsed)) throw new RowParseError(entity, key);
    return parsed;
}

function readDecimal(row: Record<string, unknown>, key: string, entity: string): string {
    const value = row[key];
    if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return value;
    if (isFiniteNumber(value)) return String(value);
    throw new RowParseError(entity, key);
}

const STATUSES: readonly PositionStatus[] = ['dormant', 'watchlist', 'active', 'paused', 'archived'];
const TIMEFRAME_VALUES: readonly Timeframe[] = ['1m', '15m', '1h', '4h'];
const STATES: readonly TrendState[] = ['S0', 'S1', 'S2', 'S3'];
const PHASES: readonly PhaseLabel[] = ['dip', 'double_dip', 'capitulation', 'recover', 'good', 'euphoria', 'unknown'];

export function isPositionStatus(value: unknown): value is PositionStatus {
    return STATUSES.some(s => s === value);
}

export function isTimeframe(value: unknown): value is Timeframe {
    return TIMEFRAME_VALUES.some(t => t === value);
}

export function isPhaseLabel(value: unknown): value is PhaseLabel {
    return PHASES.some(p => p === value);
}

function isTrendState(value: unknown): value is TrendState {
    return STATES.some(s => s === value);
}

function hasNumbers(value: unknown, keys: readonly string[]): value is Record<string, number> {
    return isRecord(value) && keys.every(k => isFiniteNumber(value[k]));
}

function hasBooleans(value: unknown, keys: readonly string[]): value is Record<string, boolean> {
    return isRecord(value) && keys.every(k => typeof value[k] === 'boolean');
}

// ═══════════════════════════════════════════════════════════════════════════════
// MARKET DATA
// ═══════════════════════════════════════════════════════════════════════════════

const EMA_KEYS = ['ema20', 'ema30', 'ema60', 'ema144', 'ema250', 'ema333'] as const;
const SLOPE_KEYS = ['ema20', 'ema60', 'ema144', 'ema250', 'ema333', 'dEma144'] as const;
const SNAPSHOT_NUMBER_KEYS = ['atr', 'atrMean20', 'rsiSlope10', 'adx', 'adxSlope10', 'volumeZ', 'dsepFast5', 'dsepMid5'] as const;

function parseSrLevels(value: unknown): SupportResistanceLevel[] | undefined {
    if (!Array.isArray(value)) return undefined;
    return value
        .filter((level): level is Record<string, number> => hasNumbers(level, ['price', 'strength']))
        .map(level => ({ price: level.price, strength: level.strength }));
}

export function parseIndicatorSnapshot(value: unknown): IndicatorSnapshot | null {
    if (!isRecord(value)) return null;
    const { timestamp, ema, slopes, srLevels } = value;
    const numbers: unknown = value;
    if (typeof timestamp !== 'string') return null;
    if (!hasNumbers(ema, EMA_KEYS) || !hasNumbers(slopes, SLOPE_KEYS)) return null;
    if (!hasNumbers(numbers, SNAPSHOT_NUMBER_KEYS)) return null;

    return {
        timestamp,
        ema: {
            ema20: ema.ema20, ema30: ema.ema30, ema60: ema.ema60,
            ema144: ema.ema144, ema250: ema.ema250, ema333: ema.ema333,
        },
        slopes: {
            ema20: slopes.ema20, ema60: slopes.ema60, ema144: slopes.ema144,
            ema250: slopes.ema250, ema333: slopes.ema333, dEma144: slopes.dEma144,
        },
        atr: numbers.atr,
        atrMean20: numbers.atrMean20,
        rsiSlope10: numbers.rsiSlope10,
        adx: numbers.adx,
        adxSlope10: numbers.adxSlope10,
        volumeZ: numbers.volumeZ,
        dsepFast5: numbers.dsepFast5,
        dsepMid5: numbers.dsepMid5,
        srLevels: parseSrLevels(srLevels),
    };
}

export function parsePriceBarRow(row: unknown): PriceBar {
    if (!isRecord(row)) throw new RowParseError('price_bars', 'row');
    return {
        timestamp: readString(row, 'timestamp', 'price_bars'),
        open: readNumber(row, 'open', 'price_bars'),
        high: readNumber(row, 'high', 'price_bars'),
        low: readNumber(row, 'low', 'price_bars'),
        close: readNumber(row, 'close', 'price_bars'),
        volume: readNumber(row, 'volume', 'price_bars'),
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// FEATURES
// ═══════════════════════════════════════════════════════════════════════════════

const FLAG_KEYS: ReadonlyArray<keyof TrendFlags> = [
    'buySignal', 'buyFlag', 'firstDipBuyFlag', 'trimFlag', 'emergencyExit', 'exitPosition', 'reclaimedEma333',
];
const SCORE_KEYS: ReadonlyArray<keyof TrendScores> = ['ts', 'srBoost', 'tsWithBoost', 'ox', 'dx', 'edx'];
const META_BOOL_KEYS: ReadonlyArray<keyof TrendMeta> = [
    'determined', 'provisional', 's1BuyConsumed', 'emergencyExitActive', 'firstDipConsumed',
];

function parseTrendOutput(value: unknown): TrendEngineOutput | undefined {
    if (!isRecord(value)) return undefined;
    const { flags, scores, meta, diagnostics } = value;
    if (!isTrendState(value.state) || !isTimeframe(value.timeframe)) return undefined;
    if (!hasBooleans(flags, FLAG_KEYS) || !hasNumbers(scores, SCORE_KEYS)) return undefined;
    if (!isRecord(meta) || !hasBooleans(meta, META_BOOL_KEYS)) return undefined;
    const liveConfirmations: unknown = isRecord(value.meta) ? value.meta.liveConfirmations : undefined;
    const s3EnteredAt: unknown = isRecord(value.meta) ? value.meta.s3EnteredAt : undefined;
    const lastTransitionAt: unknown = isRecord(value.meta) ? value.meta.lastTransitionAt : undefined;
    if (!isFiniteNumber(liveConfirmations)) return undefined;
    if (typeof value.evaluatedAt !== 'string' || typeof value.barTimestamp !== 'string' || !isFiniteNumber(value.price)) return undefined;

    const nullableString = (v: unknown): string | null => (typeof v === 'string' ? v : null);
    const exitReason = value.exitReason === 'fast_band_at_bottom' || value.exitReason === 'all_emas_below_ema333'
        ? value.exitReason
        : null;

    const parsedDiagnostics: Record<string, number | boolean | string> = {};
    if (isRecord(diagnostics)) {
        for (const [k, v] of Object.entries(diagnostics)) {
            if (typeof v === 'number' || typeof v === 'boolean' || typeof v === 'string') parsedDiagnostics[k] = v;
        }
    }

    return {
        timeframe: value.timeframe,
        state: value.state,
        previousState: isTrendState(value.previousState) ? value.previousState : null,
        mode: value.mode === 'bootstrap' ? 'bootstrap' : 'live',
        tradable: value.tradable === true,
        flags: {
            buySignal: flags.buySignal, buyFlag: flags.buyFlag, firstDipBuyFlag: flags.firstDipBuyFlag,
            trimFlag: flags.trimFlag, emergencyExit: flags.emergencyExit, exitPosition: flags.exitPosition,
            reclaimedEma333: flags.reclaimedEma333,
        },
        exitReason,
        scores: {
            ts: scores.ts, srBoost: scores.srBoost, tsWithBoost: scores.tsWithBoost,
            ox: scores.ox, dx: scores.dx, edx: scores.edx,
        },
        diagnostics: parsedDiagnostics,
        meta: {
            determined: meta.determined === true,
            provisional: meta.provisional === true,
            liveConfirmations,
            s1BuyConsumed: meta.s1BuyConsumed === true,
            emergencyExitActive: meta.emergencyExitActive === true,
            firstDipConsumed: meta.firstDipConsumed === true,
            s3EnteredAt: nullableString(s3EnteredAt),
            lastTransitionAt: nullableString(lastTransitionAt),
        },
        price: value.price,
        barTimestamp: value.barTimestamp,
        evaluatedAt: value.evaluatedAt,
    };
}

function parseRiskScores(value: unknown): RiskScores | undefined {
    if (!isRecord(value)) return undefined;
    const { aggression, exitPressure, computedAt, components } = value;
    if (!isFiniteNumber(aggression) || !isFiniteNumber(exitPressure) || typeof computedAt !== 'string') return undefined;
    if (!isRecord(components)) return undefined;
    const { macro, meso, cutPressure, deployedFraction, realizedProfitFraction } = components;
    if (!isPhaseLabel(macro) || !isPhaseLabel(meso)) return undefined;
    if (!isFiniteNumber(cutPressure) || !isFiniteNumber(deployedFraction) || !isFiniteNumber(realizedProfitFraction)) return undefined;

    return {
        aggression,
        exitPressure,
        computedAt,
        components: { macro, meso, cutPressure, deployedFraction, realizedProfitFraction },
    };
}

const EXECUTION_SLOTS: readonly ExecutionSlot[] = ['s1Buy', 's2Buy', 's3Buy', 'reclaimBuy', 'trim', 'exit'];
const ACTION_TRIGGERS: readonly ActionTrigger[] = [
    'exit_position', 'emergency_exit', 'trim_flag', 'buy_signal', 'buy_flag', 'first_dip_buy_flag', 'reclaimed_ema333',
];

function isActionTrigger(value: unknown): value is ActionTrigger {
    return ACTION_TRIGGERS.some(t => t === value);
}

function parseHistoryEntry(value: unknown): ExecutionHistoryEntry | undefined {
    if (!isRecord(value)) return undefined;
    const { trigger, state, signalAt, executedAt, price, sizeFraction } = value;
    if (!isActionTrigger(trigger) || typeof signalAt !== 'string' || typeof executedAt !== 'string') return undefined;
    if (!isFiniteNumber(price) || !isFiniteNumber(sizeFraction)) return undefined;
    return { trigger, state: isTrendState(state) ? state : null, signalAt, executedAt, price, sizeFraction };
}

function parseExecutionHistory(value: unknown): ExecutionHistory | undefined {
    if (!isRecord(value)) return undefined;
    const slots: ExecutionHistory['slots'] = {};
    if (isRecord(value.slots)) {
        for (const slot of EXECUTION_SLOTS) {
            const entry = parseHistoryEntry(value.slots[slot]);
            if (entry) slots[slot] = entry;
        }
    }
    return { lastSignalAt: typeof value.lastSignalAt === 'string' ? value.lastSignalAt : null, slots };
}

/**
 * Unparseable sub-entries are dropped: the engine and scoring step rebuild
 * them on their next run. Execution history keeps every slot that parses.
 */
export function parseFeatures(value: unknown): PositionFeatures {
    if (!isRecord(value)) return { version: 0 };
    return {
        version: isFiniteNumber(value.version) ? value.version : 0,
        indicators: parseIndicatorSnapshot(value.indicators) ?? undefined,
        trend: parseTrendOutput(value.trend),
        riskScores: parseRiskScores(value.riskScores),
        executionHistory: parseExecutionHistory(value.executionHistory),
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// POSITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export interface PositionRecord {
    position: Position;
    version: number;
}

export function parsePositionRow(row: unknown): PositionRecord {
    const entity = 'positions';
    if (!isRecord(row)) throw new RowParseError(entity, 'row');

    const status = row.status;
    const timeframe = row.timeframe;
    if (!isPositionStatus(status)) throw new RowParseError(entity, 'status');
    if (!isTimeframe(timeframe)) throw new RowParseError(entity, 'timeframe');

    return {
        version: readNumber(row, 'version', entity),
        position: {
            id: readString(row, 'id', entity),
            instrument: readString(row, 'instrument', entity),
            venue: readString(row, 'venue', entity),
            timeframe,
            status,
            allocationCap: readNumber(row, 'allocation_cap', entity),
            holdings: {
                quantity: readDecimal(row, 'quantity', entity),
                invested: readDecimal(row, 'invested', entity),
                extracted: readDecimal(row, 'extracted', entity),
            },
            barsCount: readNumber(row, 'bars_count', entity),
            features: parseFeatures(row.features),
            lastExecutionAt: readNullableString(row, 'last_execution_at', entity),
            createdAt: readString(row, 'created_at', entity),
            updatedAt: readString(row, 'updated_at', entity),
        },
    };
}
