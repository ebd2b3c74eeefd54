/**
 * Supabase Client - Centralized database client for scheme persistence
 * 
 * Uses SUPABASE_SERVICE_ROLE_KEY (falling back to SUPABASE_KEY).
 * Created lazily so importing the store never opens a connection.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { DEFAULT_CONFIG } from '../config/default';
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

function resolveCredentials(): { url: string; key: string } | null {
    const url = DEFAULT_CONFIG.SUPABASE_URL;
    const key = DEFAULT_CONFIG.SUPABASE_SERVICE_ROLE_KEY || DEFAULT_CONFIG.SUPABASE_KEY;
    if (!url || !isValidUrl(url) || !key) return null;
    return { url, key };
}

/**
 * Check if Supabase is configured for operations
 */
export function isSupabaseAvailable(): boolean {
    return resolveCredentials() !== null;
}

/**
 * Shared Supabase client; throws when credentials are missing or invalid.
 */
export function getSupabaseClient(): SupabaseClient {
    if (client) return client;

    const credentials = resolveCredentials();
    if (!credentials) {
        logger.error('[SUPABASE] Missing or invalid SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY');
        throw new Error('[SUPABASE] client requested without valid credentials');
    }

    client = createClient(credentials.url, credentials.key);
    return client;
}
