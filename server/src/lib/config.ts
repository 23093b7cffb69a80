export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function envBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  return raw === '1' || raw.toLowerCase() === 'true';
}

type Env = Record<string, string | undefined>;

export interface LlmConfig {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
  cooldownSeconds: number;
  keysFile: string | null;
}

export interface ServerConfig {
  port: number;
  isProduction: boolean;
  allowedOrigins: string[];
  trustProxy: boolean;
  metricsKey: string | null;
  maxResumeUploadBytes: number;
  sessionTtlMs: number;
  supabase: { url: string; serviceKey: string } | null;
  llm: LlmConfig;
}

const DEV_ORIGINS = ['http://localhost:5173', 'http://localhost:8000'];

export function loadConfig(env: Env = process.env): ServerConfig {
  const isProduction = env.NODE_ENV === 'production';
  const allowedOrigins = env.ALLOWED_ORIGINS
    ? env.ALLOWED_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean)
    : isProduction
      ? []
      : DEV_ORIGINS;

  const supabaseUrl = env.SUPABASE_URL?.trim();
  const supabaseKey = env.SUPABASE_SERVICE_ROLE_KEY?.trim();

  const temperature = Number.parseFloat(env.LLM_TEMPERATURE ?? '');

  return {
    port: parsePositiveInt(env.PORT, 3001),
    isProduction,
    allowedOrigins,
    trustProxy: envBool(env.TRUST_PROXY, false),
    metricsKey: env.METRICS_KEY?.trim() || null,
    maxResumeUploadBytes: parsePositiveInt(env.MAX_RESUME_UPLOAD_BYTES, 10 * 1024 * 1024),
    sessionTtlMs: parsePositiveInt(env.SESSION_TTL_MS, 4 * 60 * 60 * 1000),
    supabase: supabaseUrl && supabaseKey ? { url: supabaseUrl, serviceKey: supabaseKey } : null,
    llm: {
      baseUrl: (env.GROQ_BASE_URL ?? 'https://api.groq.com/openai/v1').replace(/\/$/, ''),
      model: env.GROQ_MODEL ?? 'llama-3.3-70b-versatile',
      timeoutMs: parsePositiveInt(env.LLM_TIMEOUT_MS, 60_000),
      maxTokens: parsePositiveInt(env.LLM_MAX_TOKENS, 2048),
      temperature: Number.isFinite(temperature) && temperature >= 0 ? temperature : 0.7,
      cooldownSeconds: parsePositiveInt(env.LLM_COOLDOWN_SECONDS, 60),
      keysFile: env.GROQ_KEYS_FILE?.trim() || null,
    },
  };
}
