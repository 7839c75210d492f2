/**
 * Portfolio-phase provider
 *
 * Latest row of the portfolio_phase table, written by an external job on its
 * own cadence. Consumed read-only by scoring.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { getSupabaseClient } from '../integrations/supabaseClient';
import type { PhaseContext } from '../risk/scoring/types';
import { isPhaseLabel, isRecord } from '../storage/codec';
import { clamp } from '../utils/math';
import { assertNoDbError } from './db';

export interface PhaseProvider {
    /** null when no phase has been published yet */
    getPhase(): Promise<PhaseContext | null>;
}

export class SupabasePhaseProvider implements PhaseProvider {
    constructor(private readonly client: SupabaseClient = getSupabaseClient()) {}

    async getPhase(): Promise<PhaseContext | null> {
        const { data, error } = await this.client
            .from('portfolio_phase')
            .select('macro, meso, cut_pressure, updated_at')
            .order('updated_at', { ascending: false })
            .limit(1)
            .maybeSingle();
        assertNoDbError('portfolio_phase', { op: 'GET_PHASE' }, error);

        const row: unknown = data;
        if (!isRecord(row)) return null;

        const cutPressure = Number(row.cut_pressure ?? 0);
        return {
            macro: isPhaseLabel(row.macro) ? row.macro : 'unknown',
            meso: isPhaseLabel(row.meso) ? row.meso : 'unknown',
            cutPressure: Number.isFinite(cutPressure) ? clamp(cutPressure) : 0,
            updatedAt: typeof row.updated_at === 'string' ? row.updated_at : null,
        };
    }
}

export class StaticPhaseProvider implements PhaseProvider {
    constructor(private phase: PhaseContext | null = null) {}

    setPhase(phase: PhaseContext | null): void {
        this.phase = phase;
    }

    async getPhase(): Promise<PhaseContext | null> {
        return this.phase;
    }
}
