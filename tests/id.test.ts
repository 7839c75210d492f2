/**
 * ID Generation Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Tick, audit and client order ids are fresh on every call and never reused.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { generateAuditId, generateClientOrderId, generateTickId } from '../src/utils/id';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

describe('ID Generation', () => {
    describe('generateTickId', () => {
        test('returns a v4 uuid', () => {
            expect(generateTickId()).toMatch(UUID_V4);
        });

        test('always returns unique values', () => {
            expect(generateTickId()).not.toBe(generateTickId());
        });
    });

    describe('generateAuditId', () => {
        test('generates unique values across many calls', () => {
            const ids = new Set<string>();
            const count = 1000;

            for (let i = 0; i < count; i++) {
                ids.add(generateAuditId());
            }

            expect(ids.size).toBe(count);
        });
    });

    describe('generateClientOrderId', () => {
        const positionId = 'a1b2c3d4-0000-4000-8000-000000000001';

        test('prefixes the position id head to a uuid', () => {
            const id = generateClientOrderId(positionId);
            expect(id.startsWith('a1b2c3d4-')).toBe(true);
            expect(id.slice(9)).toMatch(UUID_V4);
        });

        test('two orders for the same position never share an id', () => {
            expect(generateClientOrderId(positionId)).not.toBe(generateClientOrderId(positionId));
        });
    });
});
