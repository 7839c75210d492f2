/**
 * Supabase Client - Centralized database client
 *
 * Uses SUPABASE_SERVICE_ROLE_KEY for full database access. The client is
 * created on first use so that importing a repository module never requires
 * credentials.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import logger from '../utils/logger';

// Validate URL format
const isValidUrl = (url: string): boolean => {
    try {
        new URL(url);
        return true;
    } catch {
        return false;
    }
};

let client: SupabaseClient | null = null;

/**
 * Check if Supabase is configured for operations
 */
export function isSupabaseAvailable(): boolean {
    const url = process.env.SUPABASE_URL;
    return !!(url && isValidUrl(url) && process.env.SUPABASE_SERVICE_ROLE_KEY);
}

/**
 * Supabase client instance. Throws when credentials are missing.
 */
export function getSupabaseClient(): SupabaseClient {
    if (client) {
        return client;
    }

    const url = process.env.SUPABASE_URL;
    const key = process.env.SUPABASE_SERVICE_ROLE_KEY;
    if (!url || !isValidUrl(url) || !key) {
        logger.error('[SUPABASE] Missing or invalid SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY');
        throw new Error('[SUPABASE] not configured');
    }

    client = createClient(url, key, { auth: { persistSession: false } });
    return client;
}
