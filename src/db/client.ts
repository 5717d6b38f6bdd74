/**
 * Feedgate — Supabase Client
 *
 * Service-role client for the background pipeline. The pipeline never
 * acts on behalf of an end user, so there is no anon-key client.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from '../lib/config';
import { ConfigError } from '../lib/errors';

export const UNIQUE_VIOLATION = '23505';

// ============================================================
// CLIENT
// ============================================================

/**
 * Build the admin client or throw when it is not configured.
 */
export function createSupabaseAdminClient(config: AppConfig['supabase']): SupabaseClient {
  const issues: string[] = [];
  if (!config.url) issues.push('SUPABASE_URL: Required');
  if (!config.serviceRoleKey) issues.push('SUPABASE_SERVICE_ROLE_KEY: Required');
  if (!config.url || !config.serviceRoleKey) {
    throw new ConfigError(issues);
  }

  return createClient(config.url, config.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

// ============================================================
// UTILITY FUNCTIONS
// ============================================================

/**
 * Check if the database connection is healthy
 */
export async function checkDatabaseHealth(client: SupabaseClient): Promise<{
  healthy: boolean;
  latencyMs: number;
  error?: string;
}> {
  const start = Date.now();
  try {
    const { error } = await client.from('tracked_items').select('id').limit(1);
    const latencyMs = Date.now() - start;

    if (error) {
      return { healthy: false, latencyMs, error: error.message };
    }

    return { healthy: true, latencyMs };
  } catch (err) {
    const latencyMs = Date.now() - start;
    return {
      healthy: false,
      latencyMs,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  }
}

interface SupabaseErrorLike {
  message: string;
  code?: string;
}

function isSupabaseError(error: unknown): error is SupabaseErrorLike {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

export function isUniqueViolation(error: unknown): boolean {
  return isSupabaseError(error) && error.code === UNIQUE_VIOLATION;
}

/**
 * Handle Supabase errors consistently
 */
export function handleSupabaseError(error: unknown): Error {
  if (isSupabaseError(error)) {
    return new Error(
      `Supabase error: ${error.message}${error.code ? ` (code: ${error.code})` : ''}`
    );
  }
  return new Error('Unknown Supabase error');
}
