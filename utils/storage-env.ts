import { createClient, type SupabaseClient } from '@supabase/supabase-js'
import type { StorageConfig } from '@/lib/config'
import { createDiagnosticLogger, type DiagnosticLogger } from './diagnostics'

export function describeStorageConfig(storage: StorageConfig) {
  return {
    SUPABASE_URL: storage.supabaseUrl,
    SUPABASE_SERVICE_ROLE_KEY: `${storage.serviceRoleKey.length} chars`,
    SUPABASE_STORAGE_BUCKET: storage.bucket,
  }
}

export function createStorageClient(
  storage: StorageConfig,
  log: DiagnosticLogger = createDiagnosticLogger('supabase-env'),
): SupabaseClient {
  const client = createClient(storage.supabaseUrl, storage.serviceRoleKey, {
    auth: { autoRefreshToken: false, persistSession: false },
  })
  log('log', 'client-initialized', describeStorageConfig(storage))
  return client
}
