/**
 * Supabase 클라이언트 (Singleton)
 *
 * 모든 Supabase Repository가 하나의 클라이언트를 재사용
 */

import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { logger } from "@/config/logger";

let instance: SupabaseClient | null = null;

export function getSupabaseClient(): SupabaseClient {
  if (instance) {
    return instance;
  }

  const supabaseUrl = process.env.SUPABASE_URL;
  const supabaseKey = process.env.SUPABASE_SERVICE_ROLE_KEY;

  if (!supabaseUrl || !supabaseKey) {
    throw new Error(
      "SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set in environment variables",
    );
  }

  instance = createClient(supabaseUrl, supabaseKey);
  logger.info("Supabase client 초기화 완료");

  return instance;
}
