import * as fs from "node:fs";
import * as readline from "node:readline";
import type { Readable } from "node:stream";
import { createGunzip } from "node:zlib";

/**
 * Yields the non-blank lines of a text file, gunzipping it when the path
 * ends in `.gz`.
 */
export async function* readLines(filePath: string): AsyncGenerator<string> {
  const file = fs.createReadStream(filePath);
  let input: Readable = file;
  if (filePath.endsWith(".gz")) {
    const gunzip = createGunzip();
    // pipe() does not forward read errors; readline only sees the gunzip side.
    file.on("error", err => gunzip.destroy(err));
    input = file.pipe(gunzip);
  }
  input.setEncoding("utf8");
  const rl = readline.createInterface({ input, crlfDelay: Infinity });

  try {
    for await (const line of rl) {
      const s = line.trim();
      if (!s)
        continue;
      yield s;
    }
  }
  finally {
    rl.close();
    input.destroy();
    file.destroy();
  }
}

/**
 * Parses one JSONL line, returning an empty record for anything that is not
 * a JSON object.
 */
export function safeParse(line: string): Record<string, unknown> {
  try {
    const value: unknown = JSON.parse(line);
    return isRecord(value) ? value : {};
  }
  catch {
    return {};
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isEmptyRecord(value: Record<string, unknown>): boolean {
  return Object.keys(value).length === 0;
}

export function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function asRecords(value: unknown): Record<string, unknown>[] {
  return asArray(value).filter(isRecord);
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i];
    const y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  if (na === 0 || nb === 0)
    return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
