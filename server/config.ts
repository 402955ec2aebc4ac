export function sanitizeEnvValue(value?: string | null): string | undefined {
  if (!value) {
    return undefined;
  }
  return value.replace(/\s+/g, '').trim() || undefined;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export interface ServerConfig {
  port: number;
  corsOrigin: string;
  openaiApiKey?: string;
  openaiBaseURL?: string;
  openaiModel: string;
  openaiTimeoutMs: number;
  geminiApiKey?: string;
  geminiModel: string;
  visionApiKey?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parsePositiveInt(env.PORT, 5000),
    corsOrigin: env.CORS_ORIGIN?.trim() || '*',
    openaiApiKey: sanitizeEnvValue(env.OPENAI_API_KEY),
    // Legacy variable name still accepted
    openaiBaseURL: sanitizeEnvValue(env.OPENAI_BASE_URL) ?? sanitizeEnvValue(env.AI_INTEGRATIONS_OPENAI_BASE_URL),
    openaiModel: sanitizeEnvValue(env.OPENAI_MODEL) ?? 'gpt-4o',
    openaiTimeoutMs: parsePositiveInt(env.OPENAI_TIMEOUT_MS, 45000),
    geminiApiKey: sanitizeEnvValue(env.GEMINI_API_KEY),
    geminiModel: sanitizeEnvValue(env.GEMINI_MODEL) ?? 'gemini-1.5-flash',
    visionApiKey: sanitizeEnvValue(env.GOOGLE_CLOUD_VISION_API_KEY),
  };
}

export function warnMissingKeys(config: ServerConfig): void {
  if (!config.openaiApiKey) {
    console.warn('⚠️ OpenAI API key not configured. Set OPENAI_API_KEY.');
  }

  if (!config.geminiApiKey) {
    console.warn('⚠️ Gemini API key not configured. Tutor fallback will be unavailable.');
  }

  if (!config.visionApiKey) {
    console.warn('⚠️ Google Cloud Vision API key not configured. /process-image will fail.');
  }
}
