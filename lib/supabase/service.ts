import { createClient, type SupabaseClient } from "@supabase/supabase-js";

/**
 * Server-only client for the evidence stores and decision ledgers.
 * Requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY.
 */
export function createServiceRoleClient(
  env: Record<string, string | undefined> = process.env,
  fetchImpl?: typeof fetch
): SupabaseClient {
  const url = env.SUPABASE_URL;
  const key = env.SUPABASE_SERVICE_ROLE_KEY;
  if (!url || !key) {
    throw new Error("Missing SUPABASE_URL and/or SUPABASE_SERVICE_ROLE_KEY for service role client");
  }
  return createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false, detectSessionInUrl: false },
    ...(fetchImpl && { global: { fetch: fetchImpl } }),
  });
}
