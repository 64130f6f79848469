import type { ExtractedEntry, Sense, Sentence, Translation, TranslationGroups } from "@sensemap/core";
import type { ExtractConfig } from "../../config";
import { example, quotation } from "@sensemap/core";
import { YEAR_PATTERN } from "../../constants";
import { asArray, asRecords, asString, isRecord } from "../../util";

/**
 * Returns the first 4-digit year (1000-2099) in `reference`, or null.
 */
export function extractYear(reference: string): number | null {
  if (!reference)
    return null;
  const match = YEAR_PATTERN.exec(reference);
  return match ? Number.parseInt(match[1], 10) : null;
}

/**
 * Keeps examples typed `"example"` and quotations dated inside the
 * configured year window. A `ref` makes an example a quotation; an undated
 * quotation is dropped.
 */
export function extractSentences(
  rawExamples: unknown,
  config: Pick<ExtractConfig, "minimumYear" | "maximumYear">,
): Sentence[] {
  const sentences: Sentence[] = [];

  for (const raw of asRecords(rawExamples)) {
    const text = asString(raw.text)?.trim();
    if (!text)
      continue;

    const reference = asString(raw.ref)?.trim();
    if (reference) {
      const year = extractYear(reference);
      if (year === null)
        continue;
      if (year >= config.minimumYear && year <= config.maximumYear) {
        sentences.push(quotation(text, reference));
      }
    }
    else if (raw.type === "example") {
      sentences.push(example(text));
    }
  }

  return sentences;
}

export function extractSenses(rawSenses: unknown, config: ExtractConfig): Sense[] {
  const senses: Sense[] = [];

  asArray(rawSenses).forEach((raw, i) => {
    if (!isRecord(raw))
      return;

    const glosses = asArray(raw.glosses);
    if (glosses.length === 0)
      return;

    const gloss = config.glossEnd === "first" ? glosses[0] : glosses[glosses.length - 1];
    const definition = asString(gloss)?.trim();
    if (!definition)
      return;

    const sentences = extractSentences(raw.examples, config);
    if (sentences.length === 0)
      return;

    senses.push({
      senseOrder: i + 1,
      definition,
      sentences,
      translations: [],
    });
  });

  return senses;
}

/**
 * Groups translations by their trimmed sense label. A language is kept once
 * per group; the first translation for it wins.
 */
export function extractTranslations(rawTranslations: unknown): TranslationGroups {
  const groups: TranslationGroups = new Map();

  for (const raw of asRecords(rawTranslations)) {
    const label = asString(raw.sense)?.trim();
    if (!label)
      continue;

    const word = asString(raw.word)?.trim().toLowerCase();
    if (!word)
      continue;

    const language = asString(raw.lang)?.trim().toLowerCase();
    if (!language)
      continue;

    const group = groups.get(label) ?? [];
    if (!group.some(t => t.language === language)) {
      const translation: Translation = { translation: word, language };
      group.push(translation);
    }
    groups.set(label, group);
  }

  return groups;
}

export function isAcceptedLanguage(entry: Record<string, unknown>, languages: string[]): boolean {
  const language = asString(entry.lang_code) || asString(entry.lang);
  return language !== undefined && languages.includes(language.toLowerCase());
}

/**
 * Extracts one raw Wiktextract record. Returns null when the record is in
 * another language, has no headword, or keeps no senses.
 */
export function extractEntry(entry: Record<string, unknown>, config: ExtractConfig): ExtractedEntry | null {
  if (!isAcceptedLanguage(entry, config.languages))
    return null;

  const lemma = asString(entry.word)?.trim();
  if (!lemma)
    return null;

  const senses = extractSenses(entry.senses, config);
  if (senses.length === 0)
    return null;

  return {
    lemma,
    etymology: asString(entry.etymology_text) ?? null,
    pos: asString(entry.pos) ?? null,
    senses,
    translations: extractTranslations(entry.translations),
  };
}
