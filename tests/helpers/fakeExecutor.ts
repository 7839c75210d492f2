import BigNumber from 'bignumber.js';
import type { OrderCommand, OrderExecutor, OrderResult } from '../../src/execution/orderExecutor';

/**
 * Fills every order at `price`. Buys fill notional/price, sells fill the
 * requested quantity. `respond` replaces the fill logic when set.
 */
export class FakeOrderExecutor implements OrderExecutor {
    readonly calls: OrderCommand[] = [];
    respond: ((command: OrderCommand) => Promise<OrderResult>) | null = null;

    constructor(public price: number = 100) {}

    async execute(command: OrderCommand): Promise<OrderResult> {
        this.calls.push(command);
        if (this.respond) {
            return this.respond(command);
        }

        const reference = `fill-${this.calls.length}`;
        if (command.side === 'buy') {
            return {
                ok: true,
                reference,
                price: this.price,
                filledQuantity: new BigNumber(command.notional).dividedBy(this.price).toFixed(),
                notional: command.notional,
            };
        }
        return {
            ok: true,
            reference,
            price: this.price,
            filledQuantity: command.quantity,
            notional: new BigNumber(command.quantity).times(this.price).toFixed(),
        };
    }
}
