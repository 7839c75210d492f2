/**
 * HTTP client for the order-execution service.
 *
 * POST {baseUrl}/orders with the command as JSON. A 2xx body is either a fill
 * or an explicit rejection; anything else becomes a failure result. No retry:
 * a repeated POST could double-fill.
 */

import axios, { AxiosInstance } from 'axios';
import { getOrderServiceConfig } from '../config/constants';
import { isRecord } from '../storage/codec';
import logger from '../utils/logger';
import type { OrderCommand, OrderExecutor, OrderResult } from './orderExecutor';

function isDecimalString(value: unknown): value is string {
    return typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value));
}

export function parseOrderResponse(body: unknown): OrderResult {
    if (!isRecord(body)) {
        return { ok: false, errorCode: 'BAD_RESPONSE', message: 'response body is not an object' };
    }

    if (body.ok === false) {
        return {
            ok: false,
            errorCode: typeof body.errorCode === 'string' ? body.errorCode : 'REJECTED',
            message: typeof body.message === 'string' ? body.message : 'order rejected',
        };
    }

    const { reference, price, filledQuantity, notional } = body;
    if (
        typeof reference !== 'string' ||
        typeof price !== 'number' || !Number.isFinite(price) || price <= 0 ||
        !isDecimalString(filledQuantity) ||
        !isDecimalString(notional)
    ) {
        return { ok: false, errorCode: 'BAD_RESPONSE', message: 'response is missing fill fields' };
    }

    return { ok: true, reference, price, filledQuantity, notional };
}

export class HttpOrderExecutor implements OrderExecutor {
    private readonly http: AxiosInstance;

    constructor(config: { baseUrl: string; timeoutMs: number } = getOrderServiceConfig()) {
        this.http = axios.create({
            baseURL: config.baseUrl,
            timeout: config.timeoutMs,
            headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        });
    }

    async execute(command: OrderCommand): Promise<OrderResult> {
        try {
            const response = await this.http.post<unknown>('/orders', command);
            return parseOrderResponse(response.data);
        } catch (err: unknown) {
            if (axios.isAxiosError(err)) {
                if (err.response) {
                    const body: unknown = err.response.data;
                    const message = isRecord(body) && typeof body.message === 'string' ? body.message : err.message;
                    logger.warn(`[ORDER-HTTP] status=${err.response.status} client=${command.clientOrderId} ${message}`);
                    return { ok: false, errorCode: `HTTP_${err.response.status}`, message };
                }
                logger.warn(`[ORDER-HTTP] network error client=${command.clientOrderId} code=${err.code ?? 'unknown'}`);
                return { ok: false, errorCode: err.code ?? 'NETWORK_ERROR', message: err.message };
            }
            throw err;
        }
    }
}
