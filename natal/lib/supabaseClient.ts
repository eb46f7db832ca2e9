import { createClient, type SupabaseClient } from "@supabase/supabase-js";

function missingEnvError() {
  return new Error(
    "Missing Supabase env vars (SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY preferred)"
  );
}

let client: SupabaseClient | null = null;

// Created on first query; importing this module needs no credentials.
export function getSupabase(): SupabaseClient {
  if (client) return client;

  const supabaseUrl = process.env.SUPABASE_URL;
  const key =
    process.env.SUPABASE_SERVICE_ROLE_KEY ??
    process.env.SUPABASE_ANON_KEY ??
    process.env.SUPABASE_KEY;

  if (!supabaseUrl || !key) {
    throw missingEnvError();
  }

  client = createClient(supabaseUrl, key, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
  return client;
}
