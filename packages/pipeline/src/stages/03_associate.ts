import type { ResolvedEntry } from "@sensemap/core";
import type { MappingTable } from "../mapping";
import { logger, serializeResolvedEntry } from "@sensemap/core";
import { createExporter } from "../export/exporter";
import { buildMappings, resolveEntry } from "../mapping";
import { parseExtractedEntry } from "../sources/wiktextract/interim";
import { isEmptyRecord, readLines, safeParse } from "../util";

export interface AssociateStageConfig {
  inputPath: string;
  mappingsPath: string;
  outputPath: string;
  bufferSize?: number;
}

export interface AssociateManifestRow {
  inputPath: string;
  mappingsPath: string;
  outputPath: string;
  mappings: number;
  recordsIn: number;
  recordsOut: number;
  resolvedSenses: number;
  associatedAt: string;
}

export async function loadMappings(mappingsPath: string): Promise<MappingTable> {
  const records: Record<string, unknown>[] = [];
  for await (const line of readLines(mappingsPath)) {
    records.push(safeParse(line));
  }
  return buildMappings(records);
}

/**
 * Attaches translations to senses from a curated mapping file instead of
 * embeddings. Writes one record per extracted entry.
 */
export async function runAssociateStage(config: AssociateStageConfig): Promise<AssociateManifestRow> {
  const mappings = await loadMappings(config.mappingsPath);
  logger.info(`Loaded ${mappings.size} mappings from ${config.mappingsPath}`);

  let recordsIn = 0;
  let recordsOut = 0;
  let resolvedSenses = 0;

  async function* resolved(): AsyncGenerator<ResolvedEntry> {
    for await (const line of readLines(config.inputPath)) {
      recordsIn++;
      const record = safeParse(line);
      const entry = isEmptyRecord(record) ? null : parseExtractedEntry(record);
      if (!entry) {
        logger.debug(`Skipping unusable entry on line ${recordsIn}`);
        continue;
      }

      const out = resolveEntry(entry, mappings);
      resolvedSenses += out.senses.filter(s => s.translations.length > 0).length;
      recordsOut++;
      yield out;
    }
  }

  const exporter = createExporter(config.outputPath, { bufferSize: config.bufferSize });
  const outputPath = await exporter.export(resolved(), serializeResolvedEntry);

  const row: AssociateManifestRow = {
    inputPath: config.inputPath,
    mappingsPath: config.mappingsPath,
    outputPath,
    mappings: mappings.size,
    recordsIn,
    recordsOut,
    resolvedSenses,
    associatedAt: new Date().toISOString(),
  };

  logger.info(`Associated ${recordsOut} entries; ${resolvedSenses} senses received translations`);
  return row;
}
