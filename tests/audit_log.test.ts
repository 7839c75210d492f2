/**
 * Audit Log Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Append-only, frozen records; sink failures counted and never thrown.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { emptyJustification, holdRecord, transitionRecord } from '../src/engine/auditRecords';
import { AuditLog, AuditSink, MemoryAuditSink } from '../src/services/auditLog';
import type { AuditRecord } from '../src/types';
import { T0, createPosition } from './helpers/fixtures';

const OTHER_ID = 'a1b2c3d4-0000-4000-8000-000000000002';

function hold(positionId: string = createPosition().id): AuditRecord {
    return holdRecord(
        'tick-test',
        createPosition({ id: positionId }),
        { type: 'hold', reason: 'no_signal' },
        emptyJustification(),
        T0
    );
}

class FailingSink implements AuditSink {
    async write(): Promise<void> {
        throw new Error('sink unavailable');
    }
}

class ThrowingSink implements AuditSink {
    write(): Promise<void> {
        throw new Error('sink threw before returning');
    }
}

describe('AuditLog', () => {
    test('appended records reach the sink frozen', async () => {
        const sink = new MemoryAuditSink();
        const log = new AuditLog(sink);

        log.append(hold());
        await log.flush();

        const [record] = sink.query();
        expect(Object.isFrozen(record)).toBe(true);
        expect(record.kind === 'hold' && Object.isFrozen(record.decision)).toBe(true);
        expect(record.createdAt).toBe(T0.toISOString());
    });

    test('the stored record is detached from the caller object', async () => {
        const sink = new MemoryAuditSink();
        const log = new AuditLog(sink);
        const original = hold();

        log.append(original);
        await log.flush();
        original.instrument = 'CHANGED';

        expect(sink.query()[0].instrument).toBe('TEST-ASSET');
    });

    test('a failing sink is counted, never thrown', async () => {
        const log = new AuditLog(new FailingSink());

        expect(() => log.append(hold())).not.toThrow();
        log.append(hold());
        await log.flush();

        expect(log.failedWrites).toBe(2);
    });

    test('a sink that throws synchronously is counted, never thrown', async () => {
        const log = new AuditLog(new ThrowingSink());

        expect(() => log.append(hold())).not.toThrow();
        await log.flush();

        expect(log.failedWrites).toBe(1);
    });

    test('query filters by position and timeframe', async () => {
        const sink = new MemoryAuditSink();
        const log = new AuditLog(sink);

        log.append(hold());
        log.append(hold(OTHER_ID));
        log.append(transitionRecord('tick-test', createPosition(), 'dormant', 'watchlist', 'history_sufficient', T0));
        await log.flush();

        expect(sink.query({ positionId: createPosition().id }).map(r => r.kind)).toEqual(['hold', 'status_transition']);
        expect(sink.query({ positionId: OTHER_ID })).toHaveLength(1);
        expect(sink.query({ timeframe: '4h' })).toHaveLength(0);
    });

    test('every record gets its own id', async () => {
        const sink = new MemoryAuditSink();
        const log = new AuditLog(sink);

        log.append(hold());
        log.append(hold());
        await log.flush();

        const [a, b] = sink.query();
        expect(a.id).not.toBe(b.id);
    });
});
