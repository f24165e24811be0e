// ============================================
// Supabase client — message archive, directories, conversations
// ============================================

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { config } from "../config/env.js";

export function createSupabaseClient(): SupabaseClient {
  return createClient(config.supabase.url, config.supabase.serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
