// supabase client initialization (server-only, uses the secret key)
import { createClient, type SupabaseClient } from '@supabase/supabase-js'

let adminClient: SupabaseClient | null = null

export function createAdminClient(url: string, secretKey: string): SupabaseClient {
  if (!adminClient) {
    adminClient = createClient(url, secretKey, {
      auth: { persistSession: false, autoRefreshToken: false },
    })
  }
  return adminClient
}
