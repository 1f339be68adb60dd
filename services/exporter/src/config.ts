export interface ExporterConfig {
  maxWorkers: number;
  apiKeyPrimary?: string;
  apiKeyBackup?: string;
  gaugesFile: string;
  port: number;
  useMock: boolean;
}

export const DEFAULT_MAX_WORKERS = 10;
export const DEFAULT_GAUGES_FILE = "/config/usgs_gauges.yaml";
export const DEFAULT_PORT = 8000;

function positiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    console.warn(`[config] ${name}="${raw}" is not a positive integer, using ${fallback}`);
    return fallback;
  }
  return value;
}

// Empty strings count as unset, so `USGS_API_KEY=` in a compose file sends no header.
function optional(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name];
  return raw ? raw : undefined;
}

/** Read exporter settings once at startup. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExporterConfig {
  return {
    maxWorkers:    positiveInt(env, "USGS_MAX_WORKERS", DEFAULT_MAX_WORKERS),
    apiKeyPrimary: optional(env, "USGS_API_KEY"),
    apiKeyBackup:  optional(env, "USGS_API_KEY2"),
    gaugesFile:    optional(env, "USGS_GAUGES_FILE") ?? DEFAULT_GAUGES_FILE,
    port:          positiveInt(env, "METRICS_PORT", DEFAULT_PORT),
    useMock:       env.USE_MOCK === "true",
  };
}
