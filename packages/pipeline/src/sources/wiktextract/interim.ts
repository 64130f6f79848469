import type { ExtractedEntry, Sense, Sentence, Translation, TranslationGroups } from "@sensemap/core";
import { example, quotation } from "@sensemap/core";
import { asRecords, asString } from "../../util";

/**
 * Reads back a record written by the extract stage. Returns null when the
 * record has no lemma; malformed senses, sentences and translations are
 * dropped one by one, as are senses left without sentences.
 */
export function parseExtractedEntry(record: Record<string, unknown>): ExtractedEntry | null {
  const lemma = asString(record.lemma);
  if (!lemma)
    return null;

  const senses: Sense[] = [];
  for (const raw of asRecords(record.senses)) {
    const senseOrder = raw.senseOrder;
    const definition = asString(raw.definition);
    if (typeof senseOrder !== "number" || !Number.isInteger(senseOrder) || definition === undefined)
      continue;
    const sentences = parseSentences(raw.sentences);
    if (sentences.length === 0)
      continue;
    senses.push({
      senseOrder,
      definition,
      sentences,
      translations: parseTranslations(raw.translations),
    });
  }

  const translations: TranslationGroups = new Map();
  for (const group of asRecords(record.translations)) {
    const label = asString(group.label);
    if (label === undefined || translations.has(label))
      continue;
    translations.set(label, parseTranslations(group.translations));
  }

  return {
    lemma,
    etymology: asString(record.etymology) ?? null,
    pos: asString(record.pos) ?? null,
    senses,
    translations,
  };
}

function parseSentences(value: unknown): Sentence[] {
  const sentences: Sentence[] = [];
  for (const raw of asRecords(value)) {
    const sentence = asString(raw.sentence);
    if (sentence === undefined)
      continue;
    const reference = asString(raw.reference);
    if (raw.type === "quotation" && reference !== undefined) {
      sentences.push(quotation(sentence, reference));
    }
    else if (raw.type === "example") {
      sentences.push(example(sentence));
    }
  }
  return sentences;
}

function parseTranslations(value: unknown): Translation[] {
  const translations: Translation[] = [];
  for (const raw of asRecords(value)) {
    const translation = asString(raw.translation);
    const language = asString(raw.language);
    if (translation && language) {
      translations.push({ translation, language });
    }
  }
  return translations;
}
