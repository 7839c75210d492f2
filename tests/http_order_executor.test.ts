/**
 * HTTP Order Executor Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Response parsing and the HTTP boundary, against an in-process order service.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import express from 'express';
import type { Server } from 'http';
import { HttpOrderExecutor, parseOrderResponse } from '../src/execution/httpOrderExecutor';
import type { OrderCommand } from '../src/execution/orderExecutor';
import { closeServer, listenOnFreePort } from './helpers/listen';

const BUY: OrderCommand = {
    clientOrderId: 'a1b2c3d4-test-order',
    positionId: 'a1b2c3d4-0000-4000-8000-000000000001',
    instrument: 'TEST-ASSET',
    venue: 'test-venue',
    timeframe: '1h',
    referencePrice: 100,
    side: 'buy',
    notional: '300',
};

describe('parseOrderResponse', () => {
    test('well-formed fill', () => {
        expect(parseOrderResponse({ reference: 'ref-1', price: 100, filledQuantity: '3', notional: '300' })).toEqual({
            ok: true,
            reference: 'ref-1',
            price: 100,
            filledQuantity: '3',
            notional: '300',
        });
    });

    test('explicit rejection keeps code and message', () => {
        expect(parseOrderResponse({ ok: false, errorCode: 'INSUFFICIENT_FUNDS', message: 'not enough' })).toEqual({
            ok: false,
            errorCode: 'INSUFFICIENT_FUNDS',
            message: 'not enough',
        });
    });

    test('rejection without details gets defaults', () => {
        expect(parseOrderResponse({ ok: false })).toEqual({ ok: false, errorCode: 'REJECTED', message: 'order rejected' });
    });

    test.each([
        ['non-object', 'filled'],
        ['missing reference', { price: 100, filledQuantity: '3', notional: '300' }],
        ['zero price', { reference: 'r', price: 0, filledQuantity: '3', notional: '300' }],
        ['numeric quantity', { reference: 'r', price: 100, filledQuantity: 3, notional: '300' }],
        ['empty notional', { reference: 'r', price: 100, filledQuantity: '3', notional: ' ' }],
    ])('%s is a bad response', (_label, body) => {
        const result = parseOrderResponse(body);
        expect(result.ok).toBe(false);
        expect(result.ok ? null : result.errorCode).toBe('BAD_RESPONSE');
    });
});

describe('HttpOrderExecutor', () => {
    let server: Server;
    let executor: HttpOrderExecutor;
    const received: unknown[] = [];

    beforeAll(async () => {
        const app = express();
        app.use(express.json());
        app.post('/orders', (req, res) => {
            received.push(req.body);
            const body: unknown = req.body;
            const clientOrderId = typeof body === 'object' && body !== null && 'clientOrderId' in body
                ? body.clientOrderId
                : null;

            if (clientOrderId === 'reject') {
                res.json({ ok: false, errorCode: 'MARKET_CLOSED', message: 'venue closed' });
                return;
            }
            if (clientOrderId === 'crash') {
                res.status(500).json({ message: 'internal failure' });
                return;
            }
            res.json({ reference: 'svc-1', price: 100, filledQuantity: '3', notional: '300' });
        });

        const listening = await listenOnFreePort(app);
        server = listening.server;
        executor = new HttpOrderExecutor({ baseUrl: listening.baseUrl, timeoutMs: 2000 });
    });

    afterAll(async () => {
        await closeServer(server);
    });

    test('posts the command and returns the fill', async () => {
        const result = await executor.execute(BUY);

        expect(result).toEqual({ ok: true, reference: 'svc-1', price: 100, filledQuantity: '3', notional: '300' });
        expect(received[received.length - 1]).toEqual(BUY);
    });

    test('2xx rejection becomes a failure result', async () => {
        const result = await executor.execute({ ...BUY, clientOrderId: 'reject' });
        expect(result).toEqual({ ok: false, errorCode: 'MARKET_CLOSED', message: 'venue closed' });
    });

    test('non-2xx status maps to an HTTP error code', async () => {
        const result = await executor.execute({ ...BUY, clientOrderId: 'crash' });
        expect(result).toEqual({ ok: false, errorCode: 'HTTP_500', message: 'internal failure' });
    });
});
