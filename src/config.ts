import { ConfigError } from "./errors.js";

export type ModelProvider = "openai" | "anthropic" | "google";

export type ResearchConfig = {
  model: {
    provider: ModelProvider;
    name: string;
    maxTokens: number;
    timeoutMs: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    backoff: "fixed" | "exponential";
    /** Attempts for a structured call whose output fails its schema. */
    schemaAttempts: number;
  };
  limits: {
    maxCycles: number;
    maxRevisions: number;
    batchConcurrency: number;
    promptTruncation: number;
  };
  search: {
    endpoint: string;
    maxResults: number;
    maxTermsPerTask: number;
    timeoutMs: number;
    cacheTtlMs: number;
    cacheMaxEntries: number;
  };
  sandbox: {
    pythonBin: string;
    timeoutMs: number;
    artifactExtensions: string[];
  };
  storage: {
    bucket: string;
    metadataTable: string;
  };
  history: {
    similarLimit: number;
    templateLimit: number;
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends unknown[] ? T[P] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: ResearchConfig = {
  model: {
    provider: "openai",
    name: "gpt-4o-mini",
    maxTokens: 4_096,
    timeoutMs: 120_000,
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 1_000,
    maxDelayMs: 10_000,
    backoff: "fixed",
    schemaAttempts: 2,
  },
  limits: {
    maxCycles: 30,
    maxRevisions: 2,
    batchConcurrency: 3,
    promptTruncation: 4_000,
  },
  search: {
    endpoint: "https://api.firecrawl.dev/v1/search",
    maxResults: 5,
    maxTermsPerTask: 1,
    timeoutMs: 60_000,
    cacheTtlMs: 10 * 60 * 1000,
    cacheMaxEntries: 200,
  },
  sandbox: {
    pythonBin: "python3",
    timeoutMs: 120_000,
    artifactExtensions: [".png", ".jpg", ".jpeg", ".svg"],
  },
  storage: {
    bucket: "visualizations",
    metadataTable: "visualization_metadata",
  },
  history: {
    similarLimit: 3,
    templateLimit: 5,
  },
};

let current: ResearchConfig = structuredClone(DEFAULTS);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge<T extends Record<string, unknown>>(base: T, overrides: Record<string, unknown>): T {
  const result: Record<string, unknown> = structuredClone(base);
  for (const [key, val] of Object.entries(overrides)) {
    if (val === undefined) continue;
    const existing = result[key];
    result[key] = isPlainObject(val) && isPlainObject(existing) ? deepMerge(existing, val) : val;
  }
  // Keys only ever come from T or from a DeepPartial<T>, so the shape is preserved.
  return result as T;
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<ResearchConfig>): void {
  current = deepMerge(DEFAULTS, overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<ResearchConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<ResearchConfig> = Object.freeze(structuredClone(DEFAULTS));

const PROVIDERS: readonly ModelProvider[] = ["openai", "anthropic", "google"];

function isProvider(value: string): value is ModelProvider {
  return PROVIDERS.some((p) => p === value);
}

function intFromEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return n;
}

/** Read the overrides the environment asks for. Unset variables are left out. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): DeepPartial<ResearchConfig> {
  const provider = env.LLM_PROVIDER?.trim().toLowerCase();
  if (provider && !isProvider(provider)) {
    throw new ConfigError(`LLM_PROVIDER must be one of ${PROVIDERS.join(", ")}, got "${provider}"`);
  }

  return {
    model: {
      provider: provider && isProvider(provider) ? provider : undefined,
      name: env.LLM_MODEL || undefined,
    },
    limits: {
      maxRevisions: intFromEnv(env, "MAX_REVISIONS"),
      maxCycles: intFromEnv(env, "MAX_CYCLES"),
    },
    search: {
      maxResults: intFromEnv(env, "SEARCH_MAX_RESULTS"),
    },
    sandbox: {
      pythonBin: env.PYTHON_BIN || undefined,
    },
  };
}
