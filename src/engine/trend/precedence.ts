/**
 * Flag precedence
 *
 * exit_position > emergency_exit > trim_flag > entry flags > reclaimed_ema333
 *
 * Exactly one action (or none) comes out of any flag combination.
 */

import type { ActionTrigger, TrendFlagName, TrendFlags } from '../../types';

export const FLAG_PRECEDENCE: ReadonlyArray<[TrendFlagName, ActionTrigger]> = [
    ['exitPosition', 'exit_position'],
    ['emergencyExit', 'emergency_exit'],
    ['trimFlag', 'trim_flag'],
    ['buySignal', 'buy_signal'],
    ['firstDipBuyFlag', 'first_dip_buy_flag'],
    ['buyFlag', 'buy_flag'],
    ['reclaimedEma333', 'reclaimed_ema333'],
];

export function selectAction(flags: TrendFlags): ActionTrigger | null {
    for (const [flag, trigger] of FLAG_PRECEDENCE) {
        if (flags[flag]) {
            return trigger;
        }
    }
    return null;
}
