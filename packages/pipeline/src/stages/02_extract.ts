import type { ExtractedEntry } from "@sensemap/core";
import type { ExtractConfig } from "../config";
import { logger, serializeExtractedEntry } from "@sensemap/core";
import { createExporter } from "../export/exporter";
import { PROGRESS_INTERVAL } from "../constants";
import { extractEntry } from "../sources/wiktextract/extract";
import { isEmptyRecord, readLines, safeParse } from "../util";

export interface ExtractStageConfig {
  inputPath: string;
  outputPath: string;
  extract: ExtractConfig;
  bufferSize?: number;
}

export interface ExtractManifestRow {
  inputPath: string;
  outputPath: string;
  recordsIn: number;
  recordsOut: number;
  malformed: number;
  extractedAt: string;
}

export interface ExtractCounts {
  recordsIn: number;
  recordsOut: number;
  malformed: number;
}

/**
 * Yields one extracted entry per raw line that survives extraction.
 * Lines that are not JSON objects are counted and skipped.
 */
export async function* extractEntries(
  lines: AsyncIterable<string> | Iterable<string>,
  config: ExtractConfig,
  counts: ExtractCounts = { recordsIn: 0, recordsOut: 0, malformed: 0 },
): AsyncGenerator<ExtractedEntry> {
  for await (const line of lines) {
    counts.recordsIn++;
    if (counts.recordsIn % PROGRESS_INTERVAL === 0) {
      logger.info(`Extracting: ${counts.recordsIn} lines`);
    }

    const raw = safeParse(line);
    if (isEmptyRecord(raw)) {
      counts.malformed++;
      logger.debug(`Skipping malformed line ${counts.recordsIn}`);
      continue;
    }

    const entry = extractEntry(raw, config);
    if (!entry)
      continue;

    counts.recordsOut++;
    yield entry;
  }
}

export async function runExtractStage(config: ExtractStageConfig): Promise<ExtractManifestRow> {
  logger.info(`Extracting ${config.inputPath} (quotations ${config.extract.minimumYear}-${config.extract.maximumYear})`);

  const counts: ExtractCounts = { recordsIn: 0, recordsOut: 0, malformed: 0 };
  const exporter = createExporter(config.outputPath, { bufferSize: config.bufferSize });
  const outputPath = await exporter.export(
    extractEntries(readLines(config.inputPath), config.extract, counts),
    serializeExtractedEntry,
  );

  const row: ExtractManifestRow = {
    inputPath: config.inputPath,
    outputPath,
    ...counts,
    extractedAt: new Date().toISOString(),
  };

  logger.info(`Extracted ${row.recordsOut} entries from ${row.recordsIn} lines (${row.malformed} malformed)`);
  return row;
}
