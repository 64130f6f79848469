import type { Lemma, Sense } from "@sensemap/core";

export function normalizeHeadword(headword: string): string {
  return headword.trim().toLowerCase();
}

/**
 * Collects senses per normalized headword. Lemmas come out in the order
 * their headword was first seen; senses are appended, never merged.
 */
export class LemmaAggregator {
  private readonly byHeadword = new Map<string, Lemma>();

  public get size(): number {
    return this.byHeadword.size;
  }

  public add(headword: string, senses: Sense[]): Lemma {
    const key = normalizeHeadword(headword);
    let lemma = this.byHeadword.get(key);
    if (!lemma) {
      lemma = { lemma: key, senses: [] };
      this.byHeadword.set(key, lemma);
    }
    lemma.senses.push(...senses);
    return lemma;
  }

  public get(headword: string): Lemma | undefined {
    return this.byHeadword.get(normalizeHeadword(headword));
  }

  public *lemmas(): Generator<Lemma> {
    yield* this.byHeadword.values();
  }
}
