import type { Sense, Sentence } from "@sensemap/core";
import type { EmbeddingProvider } from "../src/matching/embedding";

/**
 * In-process provider that looks each text up in a fixed table and records
 * every batch it is asked to encode.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  public readonly model = "fake-embedder";
  public readonly calls: string[][] = [];

  constructor(private readonly vectors: Record<string, number[]>, private readonly fallback?: number[]) {}

  public async encode(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((text) => {
      const vector = this.vectors[text] ?? this.fallback;
      if (!vector) {
        throw new Error(`No vector for "${text}"`);
      }
      return vector;
    });
  }
}

export function sense(senseOrder: number, definition: string, sentences: Sentence[] = [{ type: "example", sentence: `${definition} example` }]): Sense {
  return { senseOrder, definition, sentences, translations: [] };
}
