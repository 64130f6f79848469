import path from "node:path";
import process from "node:process";
import {
  ASSOCIATED_FILE,
  COMPRESSED_WIKTEXTRACT_FILE,
  dataRoot as defaultDataRoot,
  DEFAULT_BUFFER_SIZE,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_GAP,
  DEFAULT_LANGUAGES,
  DEFAULT_RETRIES,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_THRESHOLD,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_YEAR_SPAN,
  INTERIM_DIR,
  MAPPINGS_FILE,
  PROCESSED_DIR,
  RAW_DIR,
  SEED_FILE,
  WIKTEXTRACT_FILE,
  WIKTEXTRACT_URL,
} from "./constants";

/** Which end of a sense's gloss list is taken as its definition. */
export type GlossEnd = "first" | "last";

export interface ExtractConfig {
  minimumYear: number;
  maximumYear: number;
  glossEnd: GlossEnd;
  /** Accepted `lang_code` / `lang` values, lower-case. */
  languages: string[];
}

export interface MatchConfig {
  threshold: number;
  gap: number;
}

export interface EmbeddingConfig {
  model: string;
  dimensions?: number;
}

export interface IoConfig {
  dataRoot: string;
  url: string;
  rawPath: string;
  interimPath: string;
  mappingsPath: string;
  outputPath: string;
  associatedPath: string;
  bufferSize: number;
  timeoutMs: number;
  retries: number;
  retryBaseDelayMs: number;
  force: boolean;
}

export interface PipelineConfig {
  extract: ExtractConfig;
  match: MatchConfig;
  embedding: EmbeddingConfig;
  io: IoConfig;
}

export interface PipelineOverrides {
  extract?: Partial<ExtractConfig>;
  match?: Partial<MatchConfig>;
  embedding?: Partial<EmbeddingConfig>;
  io?: Partial<IoConfig>;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function defaultExtractConfig(now = new Date()): ExtractConfig {
  const year = now.getFullYear();
  return {
    minimumYear: year - DEFAULT_YEAR_SPAN,
    maximumYear: year,
    glossEnd: "last",
    languages: [...DEFAULT_LANGUAGES],
  };
}

export function defaultMatchConfig(): MatchConfig {
  return { threshold: DEFAULT_THRESHOLD, gap: DEFAULT_GAP };
}

export function defaultIoConfig(dataRoot = defaultDataRoot): IoConfig {
  return {
    dataRoot,
    url: WIKTEXTRACT_URL,
    rawPath: path.join(dataRoot, RAW_DIR, COMPRESSED_WIKTEXTRACT_FILE),
    interimPath: path.join(dataRoot, INTERIM_DIR, WIKTEXTRACT_FILE),
    mappingsPath: path.join(dataRoot, RAW_DIR, MAPPINGS_FILE),
    outputPath: path.join(dataRoot, PROCESSED_DIR, SEED_FILE),
    associatedPath: path.join(dataRoot, PROCESSED_DIR, ASSOCIATED_FILE),
    bufferSize: DEFAULT_BUFFER_SIZE,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    retries: DEFAULT_RETRIES,
    retryBaseDelayMs: DEFAULT_RETRY_BASE_DELAY_MS,
    force: false,
  };
}

/**
 * Builds a config from defaults, then environment variables, then explicit
 * overrides. Throws `ConfigError` when the result is invalid.
 */
export function loadConfig(
  overrides: PipelineOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  now = new Date(),
): PipelineConfig {
  const io = defaultIoConfig(overrides.io?.dataRoot ?? env.DATA_ROOT ?? defaultDataRoot);

  const defaults = defaultExtractConfig(now);
  const extract: ExtractConfig = {
    minimumYear: overrides.extract?.minimumYear ?? envNumber(env, "SENSEMAP_MIN_YEAR") ?? defaults.minimumYear,
    maximumYear: overrides.extract?.maximumYear ?? envNumber(env, "SENSEMAP_MAX_YEAR") ?? defaults.maximumYear,
    glossEnd: overrides.extract?.glossEnd ?? defaults.glossEnd,
    languages: overrides.extract?.languages ?? defaults.languages,
  };

  const match: MatchConfig = {
    threshold: overrides.match?.threshold ?? envNumber(env, "SENSEMAP_THRESHOLD") ?? DEFAULT_THRESHOLD,
    gap: overrides.match?.gap ?? envNumber(env, "SENSEMAP_GAP") ?? DEFAULT_GAP,
  };

  const embedding: EmbeddingConfig = {
    model: overrides.embedding?.model ?? (env.EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODEL),
    dimensions: overrides.embedding?.dimensions ?? envNumber(env, "EMBEDDING_DIMENSIONS"),
  };

  const config: PipelineConfig = {
    extract,
    match,
    embedding,
    io: { ...io, ...overrides.io },
  };

  validateConfig(config);
  return config;
}

export function validateConfig(config: PipelineConfig) {
  const { extract, match, embedding } = config;

  if (!Number.isInteger(extract.minimumYear) || !Number.isInteger(extract.maximumYear)) {
    throw new ConfigError(`Year bounds must be integers, got ${extract.minimumYear}..${extract.maximumYear}`);
  }
  if (extract.minimumYear > extract.maximumYear) {
    throw new ConfigError(`Minimum year ${extract.minimumYear} is after maximum year ${extract.maximumYear}`);
  }
  if (extract.glossEnd !== "first" && extract.glossEnd !== "last") {
    throw new ConfigError(`Unknown gloss end: ${String(extract.glossEnd)}`);
  }
  if (!Number.isFinite(match.threshold)) {
    throw new ConfigError(`Threshold must be a number, got ${match.threshold}`);
  }
  if (!Number.isFinite(match.gap) || match.gap < 0) {
    throw new ConfigError(`Gap must be a non-negative number, got ${match.gap}`);
  }
  if (!embedding.model) {
    throw new ConfigError("Embedding model must not be empty");
  }
  if (embedding.dimensions !== undefined && (!Number.isInteger(embedding.dimensions) || embedding.dimensions <= 0)) {
    throw new ConfigError(`Embedding dimensions must be a positive integer, got ${embedding.dimensions}`);
  }
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigError(`Environment variable ${name} is not a number: ${raw}`);
  }
  return value;
}
