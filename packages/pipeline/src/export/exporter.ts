import { createWriteStream } from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createGzip } from "node:zlib";
import { logger } from "@sensemap/core";
import { DEFAULT_BUFFER_SIZE, PROGRESS_INTERVAL } from "../constants";

export type Records<T> = AsyncIterable<T> | Iterable<T>;

export interface ExporterOptions {
  /** Write buffer size in bytes. */
  bufferSize?: number;
}

export interface Exporter {
  readonly outputPath: string;
  /** Writes every record and resolves to the written path. */
  export<T>(records: Records<T>, serialize?: (record: T) => unknown): Promise<string>;
}

export type ExporterConstructor = (outputPath: string, options: ExporterOptions) => Exporter;

export const DEFAULT_EXPORTER = "jsonl";

const registry = new Map<string, ExporterConstructor>();

export function registerExporter(create: ExporterConstructor, ...extensions: string[]) {
  for (const extension of extensions) {
    registry.set(extension.toLowerCase(), create);
  }
}

/**
 * Picks an exporter by the output path's extension. Unknown extensions get
 * the JSONL exporter and the path's extension is swapped for `.jsonl`.
 */
export function createExporter(outputPath: string, options: ExporterOptions = {}): Exporter {
  const extension = path.extname(outputPath).replace(/^\./, "").toLowerCase();

  const create = registry.get(extension);
  if (create) {
    return create(outputPath, options);
  }

  const fallback = registry.get(DEFAULT_EXPORTER);
  if (!fallback) {
    throw new Error(`No default exporter registered`);
  }

  const parsed = path.parse(outputPath);
  return fallback(path.join(parsed.dir, `${parsed.name}.${DEFAULT_EXPORTER}`), options);
}

async function* jsonLines<T>(records: Records<T>, serialize: (record: T) => unknown, label: string) {
  let count = 0;
  for await (const record of records) {
    yield `${JSON.stringify(serialize(record))}\n`;
    count++;
    if (count % PROGRESS_INTERVAL === 0) {
      logger.info(`Exporting ${label}: ${count} records`);
    }
  }
  logger.debug(`Exported ${count} records to ${label}`);
}

export class JsonlExporter implements Exporter {
  constructor(
    public readonly outputPath: string,
    protected readonly options: ExporterOptions = {},
  ) {}

  public async export<T>(records: Records<T>, serialize: (record: T) => unknown = r => r): Promise<string> {
    await fsp.mkdir(path.dirname(this.outputPath), { recursive: true });
    const out = createWriteStream(this.outputPath, {
      flags: "w",
      highWaterMark: this.options.bufferSize ?? DEFAULT_BUFFER_SIZE,
    });
    await pipeline(Readable.from(jsonLines(records, serialize, this.outputPath)), out);
    return this.outputPath;
  }
}

export class GzipJsonlExporter extends JsonlExporter {
  public override async export<T>(records: Records<T>, serialize: (record: T) => unknown = r => r): Promise<string> {
    await fsp.mkdir(path.dirname(this.outputPath), { recursive: true });
    const out = createWriteStream(this.outputPath, {
      flags: "w",
      highWaterMark: this.options.bufferSize ?? DEFAULT_BUFFER_SIZE,
    });
    await pipeline(Readable.from(jsonLines(records, serialize, this.outputPath)), createGzip(), out);
    return this.outputPath;
  }
}

registerExporter((outputPath, options) => new JsonlExporter(outputPath, options), "jsonl");
registerExporter((outputPath, options) => new GzipJsonlExporter(outputPath, options), "gz");
