import type { ExtractedEntry, ResolvedEntry, Translation } from "@sensemap/core";
import { asString, isEmptyRecord, isRecord } from "./util";

/** Sense order (as a string) to translation-group letter. */
export type SenseMapping = Record<string, string>;

export type MappingTable = Map<string, SenseMapping>;

export function mappingKey(lemma: string, etymology: string | null, pos: string | null): string {
  return JSON.stringify([lemma, etymology ?? "", pos ?? ""]);
}

/**
 * Builds the (lemma, etymology, pos) lookup from decoded mapping records.
 * Empty records (malformed lines) are skipped. A key seen twice maps to an
 * empty table from then on.
 */
export function buildMappings(records: Iterable<Record<string, unknown>>): MappingTable {
  const mappings: MappingTable = new Map();

  for (const record of records) {
    if (isEmptyRecord(record))
      continue;

    const key = mappingKey(
      asString(record.lemma) ?? "",
      asString(record.etymology) ?? "",
      asString(record.pos) ?? "",
    );

    if (mappings.has(key)) {
      mappings.set(key, {});
      continue;
    }

    const raw = record.mapping;
    if (isRecord(raw)) {
      const mapping: SenseMapping = {};
      for (const [senseOrder, letter] of Object.entries(raw)) {
        if (typeof letter === "string")
          mapping[senseOrder] = letter;
      }
      mappings.set(key, mapping);
    }
  }

  return mappings;
}

/**
 * Converts a single letter to a zero-based group index ("A" and "a" are 0).
 * Returns null for anything that is not exactly one letter.
 */
export function letterToIndex(letter: string | undefined): number | null {
  if (letter === undefined || letter.length !== 1 || !/^\p{L}$/u.test(letter))
    return null;
  // "ß" upper-cases to "SS"
  const upper = letter.toUpperCase();
  if (upper.length !== 1)
    return null;
  return upper.charCodeAt(0) - "A".charCodeAt(0);
}

/**
 * Attaches to each sense the translation group its mapping letter names,
 * counting groups in file order. Unknown keys, bad letters and out-of-range
 * indices leave the sense without translations.
 */
export function resolveEntry(entry: ExtractedEntry, mappings: MappingTable): ResolvedEntry {
  const mapping = mappings.get(mappingKey(entry.lemma, entry.etymology, entry.pos)) ?? {};
  const labels = [...entry.translations.keys()];

  const senses = entry.senses.map((sense) => {
    let translations: Translation[] = [];

    const index = letterToIndex(mapping[String(sense.senseOrder)]);
    if (index !== null && index >= 0 && index < labels.length) {
      translations = (entry.translations.get(labels[index]) ?? []).map(t => ({ ...t }));
    }

    return { ...sense, translations };
  });

  return {
    lemma: entry.lemma,
    etymology: entry.etymology,
    pos: entry.pos,
    senses,
  };
}
