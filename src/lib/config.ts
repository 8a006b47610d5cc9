// Runtime configuration from Vite env. Anything missing falls back to local-dev values so
// the module stays safe to import in tests.

const DEFAULT_API_BASE = 'http://localhost:8000';
const DEFAULT_TIMEOUT_MS = 30_000;

function readTimeout(raw: string | undefined): number {
  const n = raw ? Number(raw) : NaN;
  return Number.isFinite(n) && n > 0 ? n : DEFAULT_TIMEOUT_MS;
}

export interface AppConfig {
  apiBaseUrl: string;
  apiTimeoutMs: number;
  supabaseUrl: string | null;
  supabaseAnonKey: string | null;
}

type EnvSource = Pick<ImportMetaEnv, 'VITE_API_BASE_URL' | 'VITE_API_TIMEOUT_MS' | 'VITE_SUPABASE_URL' | 'VITE_SUPABASE_ANON_KEY'>;

export function loadConfig(env: EnvSource = import.meta.env): AppConfig {
  return {
    apiBaseUrl: (env.VITE_API_BASE_URL || DEFAULT_API_BASE).replace(/\/+$/, ''),
    apiTimeoutMs: readTimeout(env.VITE_API_TIMEOUT_MS),
    supabaseUrl: env.VITE_SUPABASE_URL || null,
    supabaseAnonKey: env.VITE_SUPABASE_ANON_KEY || null,
  };
}

export const config = loadConfig();
