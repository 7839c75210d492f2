/**
 * ID Generation Utilities
 *
 * Every call returns a fresh v4 UUID. Ids are never derived from position
 * keys, so two ticks on the same position always produce distinct records.
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Id for one orchestrator or engine pass over a timeframe.
 */
export function generateTickId(): string {
    return uuidv4();
}

/**
 * Id for an audit record.
 */
export function generateAuditId(): string {
    return uuidv4();
}

/**
 * Client order id sent with every order command. The order service uses it to
 * reject replays of the same command.
 */
export function generateClientOrderId(positionId: string): string {
    return `${positionId.slice(0, 8)}-${uuidv4()}`;
}
