export const ANALYSIS_CONFIG = Symbol('ANALYSIS_CONFIG');

export type JobStore = 'memory' | 'postgres';

export interface Thresholds {
  warning: number;
  reject: number;
}

export interface AnalysisConfig {
  moderationTimeoutMs: number;
  retryLimit: number;
  retryBaseDelayMs: number;
  thresholds: Thresholds;
  workerConcurrency: number;
  maxDeliveries: number;
  summaryEnabled: boolean;
  summaryTimeoutMs: number;
  staleAfterMs: number;
  cacheMaxEntries: number;
  knownSafeFingerprints: string[];
  useFakeAi: boolean;
  sightengine: {
    apiUser: string | null;
    apiSecret: string | null;
    models: string[];
  };
  anthropic: {
    apiKey: string | null;
    model: string;
  };
}

export const DEFAULT_SIGHTENGINE_MODELS = ['nudity', 'weapon', 'violence', 'medical', 'spoof'];
export const DEFAULT_SUMMARY_MODEL = 'claude-3-opus-20240229';

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readScore(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`${name} must be a number between 0 and 1, got "${raw}"`);
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  throw new Error(`${name} must be "true" or "false", got "${raw}"`);
}

function readList(env: Env, name: string, fallback: string[]): string[] {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function readOptional(env: Env, name: string): string | null {
  const raw = env[name];
  return raw && raw.trim() !== '' ? raw.trim() : null;
}

/** Read separately from the rest because it decides module wiring. */
export function resolveJobStore(env: Env = process.env): JobStore {
  const store = env.JOB_STORE ?? 'memory';
  if (store !== 'memory' && store !== 'postgres') {
    throw new Error(`JOB_STORE must be "memory" or "postgres", got "${store}"`);
  }
  return store;
}

export function loadAnalysisConfig(env: Env = process.env): AnalysisConfig {
  const thresholds: Thresholds = {
    warning: readScore(env, 'WARNING_THRESHOLD', 0.3),
    reject: readScore(env, 'REJECT_THRESHOLD', 0.7),
  };
  if (thresholds.warning >= thresholds.reject) {
    throw new Error(
      `WARNING_THRESHOLD (${thresholds.warning}) must be lower than REJECT_THRESHOLD (${thresholds.reject})`,
    );
  }

  const config: AnalysisConfig = {
    moderationTimeoutMs: readInt(env, 'MODERATION_TIMEOUT_MS', 10_000, 1),
    retryLimit: readInt(env, 'RETRY_LIMIT', 2),
    retryBaseDelayMs: readInt(env, 'RETRY_BASE_DELAY_MS', 250),
    thresholds,
    workerConcurrency: readInt(env, 'WORKER_CONCURRENCY', 4, 1),
    maxDeliveries: readInt(env, 'MAX_DELIVERIES', 3, 1),
    summaryEnabled: readBool(env, 'SUMMARY_ENABLED', true),
    summaryTimeoutMs: readInt(env, 'SUMMARY_TIMEOUT_MS', 15_000, 1),
    staleAfterMs: readInt(env, 'STALE_AFTER_MS', 600_000),
    cacheMaxEntries: readInt(env, 'CACHE_MAX_ENTRIES', 10_000),
    knownSafeFingerprints: readList(env, 'KNOWN_SAFE_FINGERPRINTS', []),
    useFakeAi: readBool(env, 'USE_FAKE_AI', false),
    sightengine: {
      apiUser: readOptional(env, 'SIGHTENGINE_API_USER'),
      apiSecret: readOptional(env, 'SIGHTENGINE_API_SECRET'),
      models: readList(env, 'SIGHTENGINE_MODELS', DEFAULT_SIGHTENGINE_MODELS),
    },
    anthropic: {
      apiKey: readOptional(env, 'ANTHROPIC_API_KEY'),
      model: readOptional(env, 'SUMMARY_MODEL') ?? DEFAULT_SUMMARY_MODEL,
    },
  };

  if (!config.useFakeAi) {
    if (!config.sightengine.apiUser || !config.sightengine.apiSecret) {
      throw new Error('Missing required environment variable: SIGHTENGINE_API_USER / SIGHTENGINE_API_SECRET');
    }
    if (config.summaryEnabled && !config.anthropic.apiKey) {
      throw new Error('Missing required environment variable: ANTHROPIC_API_KEY');
    }
  }

  return config;
}
