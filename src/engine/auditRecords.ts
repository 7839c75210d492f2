import type {
    DecisionAuditRecord,
    DecisionJustification,
    ExecutionOutcome,
    HoldAuditRecord,
    HoldDecision,
    Position,
    PositionStatus,
    StatusTransitionAuditRecord,
    StatusTransitionCause,
    TradeDecision,
} from '../types';
import { generateAuditId } from '../utils/id';

function base(tickId: string, position: Position, now: Date) {
    return {
        id: generateAuditId(),
        tickId,
        positionId: position.id,
        instrument: position.instrument,
        venue: position.venue,
        timeframe: position.timeframe,
        createdAt: now.toISOString(),
    };
}

export function holdRecord(
    tickId: string,
    position: Position,
    decision: HoldDecision,
    justification: DecisionJustification,
    now: Date
): HoldAuditRecord {
    return { ...base(tickId, position, now), kind: 'hold', decision, justification };
}

export function decisionRecord(
    tickId: string,
    position: Position,
    decision: TradeDecision,
    justification: DecisionJustification,
    execution: ExecutionOutcome,
    now: Date
): DecisionAuditRecord {
    return { ...base(tickId, position, now), kind: 'decision', decision, justification, execution };
}

export function transitionRecord(
    tickId: string,
    position: Position,
    from: PositionStatus,
    to: PositionStatus,
    cause: StatusTransitionCause,
    now: Date
): StatusTransitionAuditRecord {
    return { ...base(tickId, position, now), kind: 'status_transition', from, to, cause };
}

/**
 * Justification for holds decided before the engine output was read.
 */
export function emptyJustification(): DecisionJustification {
    return {
        state: null,
        flags: null,
        exitReason: null,
        trendScores: null,
        aggression: null,
        exitPressure: null,
        scoreSource: null,
        tier: null,
        baseFraction: null,
        riskMultiplier: null,
    };
}
