import type { MatchConfig } from "../config";
import type { EmbeddingProvider } from "../matching/embedding";
import { logger, serializeLemma } from "@sensemap/core";
import { LemmaAggregator } from "../aggregate";
import { PROGRESS_INTERVAL } from "../constants";
import { createExporter } from "../export/exporter";
import { matchTranslations } from "../matching/matcher";
import { parseExtractedEntry } from "../sources/wiktextract/interim";
import { isEmptyRecord, readLines, safeParse } from "../util";

export interface MatchStageConfig {
  inputPath: string;
  outputPath: string;
  match: MatchConfig;
  bufferSize?: number;
}

export interface MatchManifestRow {
  inputPath: string;
  outputPath: string;
  recordsIn: number;
  lemmas: number;
  senses: number;
  assigned: number;
  malformed: number;
  matchedAt: string;
}

/**
 * Matches translations to senses per extracted entry, merges the entries
 * into one lemma per headword and writes the lemmas.
 */
export async function runMatchStage(
  config: MatchStageConfig,
  provider: EmbeddingProvider,
): Promise<MatchManifestRow> {
  logger.info(`Matching ${config.inputPath} with ${provider.model} (threshold ${config.match.threshold}, gap ${config.match.gap})`);

  const aggregator = new LemmaAggregator();
  let recordsIn = 0;
  let malformed = 0;
  let senses = 0;
  let assigned = 0;

  for await (const line of readLines(config.inputPath)) {
    recordsIn++;
    if (recordsIn % PROGRESS_INTERVAL === 0) {
      logger.info(`Matching: ${recordsIn} entries`);
    }

    const record = safeParse(line);
    const entry = isEmptyRecord(record) ? null : parseExtractedEntry(record);
    if (!entry || entry.senses.length === 0) {
      malformed++;
      logger.debug(`Skipping unusable entry on line ${recordsIn}`);
      continue;
    }

    const summary = await matchTranslations(entry.senses, entry.translations, provider, config.match);
    senses += entry.senses.length;
    assigned += summary.assigned;

    aggregator.add(entry.lemma, entry.senses);
  }

  const exporter = createExporter(config.outputPath, { bufferSize: config.bufferSize });
  const outputPath = await exporter.export(aggregator.lemmas(), serializeLemma);

  const row: MatchManifestRow = {
    inputPath: config.inputPath,
    outputPath,
    recordsIn,
    lemmas: aggregator.size,
    senses,
    assigned,
    malformed,
    matchedAt: new Date().toISOString(),
  };

  logger.info(`Wrote ${row.lemmas} lemmas to ${outputPath}; ${assigned} of ${senses} senses received translations`);
  return row;
}
