export type Sentence = Example | Quotation;

/**
 * A sentence illustrating a sense of a lemma.
 */
export interface Example {
  type: "example";
  sentence: string;
}

/**
 * A dated quotation illustrating a sense of a lemma. `reference` is the
 * bibliographic line the year was parsed from.
 */
export interface Quotation {
  type: "quotation";
  sentence: string;
  reference: string;
}

export interface Translation {
  translation: string;
  language: string;
}

export interface Sense {
  /** 1-based position of the raw sense within its entry. */
  senseOrder: number;
  definition: string;
  sentences: Sentence[];
  translations: Translation[];
}

/**
 * Translations keyed by their free-text sense label, in encounter order.
 */
export type TranslationGroups = Map<string, Translation[]>;

/**
 * One headword occurrence after extraction.
 */
export interface ExtractedEntry {
  lemma: string;
  etymology: string | null;
  pos: string | null;
  senses: Sense[];
  translations: TranslationGroups;
}

export interface Lemma {
  lemma: string;
  senses: Sense[];
}

/**
 * A translation group as written to disk. Groups are stored as a list so
 * their order and labels survive JSON exactly.
 */
export interface SerializedTranslationGroup {
  label: string;
  translations: Translation[];
}

export interface SerializedExtractedEntry {
  lemma: string;
  etymology: string | null;
  pos: string | null;
  senses: Sense[];
  translations: SerializedTranslationGroup[];
}

/**
 * One entry after mapping-file resolution. Not aggregated, so it keeps its
 * etymology and part of speech.
 */
export interface ResolvedEntry {
  lemma: string;
  etymology: string | null;
  pos: string | null;
  senses: Sense[];
}

export function example(sentence: string): Example {
  return { type: "example", sentence };
}

export function quotation(sentence: string, reference: string): Quotation {
  return { type: "quotation", sentence, reference };
}

export function serializeSentence(sentence: Sentence): Sentence {
  switch (sentence.type) {
    case "example":
      return { type: "example", sentence: sentence.sentence };
    case "quotation":
      return { type: "quotation", sentence: sentence.sentence, reference: sentence.reference };
  }
}

export function serializeSense(sense: Sense): Sense {
  return {
    senseOrder: sense.senseOrder,
    definition: sense.definition,
    sentences: sense.sentences.map(serializeSentence),
    translations: sense.translations.map(({ translation, language }) => ({ translation, language })),
  };
}

export function serializeLemma(lemma: Lemma): Lemma {
  return {
    lemma: lemma.lemma,
    senses: lemma.senses.map(serializeSense),
  };
}

export function serializeExtractedEntry(entry: ExtractedEntry): SerializedExtractedEntry {
  const translations: SerializedTranslationGroup[] = [];
  for (const [label, group] of entry.translations) {
    translations.push({
      label,
      translations: group.map(({ translation, language }) => ({ translation, language })),
    });
  }
  return {
    lemma: entry.lemma,
    etymology: entry.etymology,
    pos: entry.pos,
    senses: entry.senses.map(serializeSense),
    translations,
  };
}

export function serializeResolvedEntry(entry: ResolvedEntry): ResolvedEntry {
  return {
    lemma: entry.lemma,
    etymology: entry.etymology,
    pos: entry.pos,
    senses: entry.senses.map(serializeSense),
  };
}
