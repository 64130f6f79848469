import { Buffer } from "node:buffer";
import { createWriteStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { logger } from "@sensemap/core";
import { USER_AGENT } from "../constants";
import { sleep } from "../util";

export interface FetchStageConfig {
  url: string;
  outputPath: string;
  timeoutMs: number;
  retries: number;
  retryBaseDelayMs: number;
  force?: boolean;
  fetch?: typeof fetch;
}

export interface FetchResult {
  url: string;
  outputPath: string;
  downloaded: boolean;
  bytes: number;
  fetchedAt: string;
  elapsedMs: number;
}

class HttpError extends Error {
  constructor(public readonly status: number, statusText: string) {
    super(`HTTP ${status} ${statusText}`);
    this.name = "HttpError";
  }
}

/**
 * Streams the raw dump to `outputPath`. An existing file is kept unless
 * `force` is set.
 */
export async function runFetchStage(config: FetchStageConfig): Promise<FetchResult> {
  const startedAt = Date.now();

  if (!config.force && await exists(config.outputPath)) {
    const { size } = await fs.stat(config.outputPath);
    logger.info(`Raw data already exists at ${config.outputPath}`);
    return {
      url: config.url,
      outputPath: config.outputPath,
      downloaded: false,
      bytes: size,
      fetchedAt: new Date().toISOString(),
      elapsedMs: Date.now() - startedAt,
    };
  }

  await fs.mkdir(path.dirname(config.outputPath), { recursive: true });
  const tempPath = `${config.outputPath}.tmp`;

  const bytes = await withRetries(
    () => download(config, tempPath),
    {
      retries: config.retries,
      baseDelayMs: config.retryBaseDelayMs,
      retryOn: isTransient,
    },
  );

  await fs.rename(tempPath, config.outputPath);
  logger.info(`Downloaded ${config.url} to ${config.outputPath}`);

  return {
    url: config.url,
    outputPath: config.outputPath,
    downloaded: true,
    bytes,
    fetchedAt: new Date().toISOString(),
    elapsedMs: Date.now() - startedAt,
  };
}

async function download(config: FetchStageConfig, tempPath: string): Promise<number> {
  const fetchImpl = config.fetch ?? fetch;
  const controller = new AbortController();
  // Only the response headers are bounded by the timeout; the body may take
  // as long as it needs.
  const t = setTimeout(() => controller.abort(), config.timeoutMs);

  let res: Response;
  try {
    logger.info(`Streaming ${config.url}`);
    res = await fetchImpl(config.url, {
      headers: { "user-agent": USER_AGENT },
      signal: controller.signal,
    });
  }
  finally {
    clearTimeout(t);
  }

  if (!res.ok) {
    throw new HttpError(res.status, res.statusText);
  }
  if (!res.body) {
    throw new Error("Response body is empty");
  }

  let bytes = 0;
  let lastLogAt = 0;

  await pipeline(
    Readable.fromWeb(res.body),
    async function* (source) {
      for await (const chunk of source) {
        bytes += typeof chunk === "string" ? Buffer.byteLength(chunk) : chunk.byteLength;

        const now = Date.now();
        if (now - lastLogAt > 1000) {
          lastLogAt = now;
          logger.info(`- Progress ${config.url}: ${(bytes / 1024 / 1024).toFixed(1)}MB`);
        }

        yield chunk;
      }
    },
    createWriteStream(tempPath),
  );

  return bytes;
}

function isTransient(e: unknown): boolean {
  if (e instanceof HttpError) {
    return e.status === 429 || (e.status >= 500 && e.status <= 599);
  }
  const msg = e instanceof Error ? e.message : String(e);
  return msg.includes("aborted") || msg.includes("ECONNRESET") || msg.includes("ETIMEDOUT");
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  }
  catch {
    return false;
  }
}

export async function withRetries<T>(
  fn: () => Promise<T>,
  options: {
    retries: number;
    baseDelayMs: number;
    retryOn: (e: unknown) => boolean;
  },
): Promise<T> {
  let attempt = 0;
  for (;;) {
    try {
      return await fn();
    }
    catch (e) {
      attempt++;
      if (attempt > options.retries || !options.retryOn(e))
        throw e;
      const delay = jitter(options.baseDelayMs * 2 ** (attempt - 1));
      logger.warn(`Attempt ${attempt} failed (${e instanceof Error ? e.message : String(e)}), retrying in ${delay}ms`);
      await sleep(delay);
    }
  }
}

function jitter(ms: number) {
  const j = Math.floor(Math.random() * Math.min(250, Math.max(25, ms * 0.15)));
  return ms + j;
}
