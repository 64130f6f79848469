import type { EmbeddingConfig } from "../config";
import { logger } from "@sensemap/core";
import OpenAI from "openai";

/**
 * Maps a batch of strings to vectors of one fixed length. The same input
 * and model must always produce the same vectors.
 */
export interface EmbeddingProvider {
  readonly model: string;
  encode(texts: string[]): Promise<number[][]>;
}

/** The slice of the OpenAI client the provider calls. */
export interface EmbeddingsClient {
  embeddings: {
    create(body: { model: string; input: string[]; dimensions?: number }): Promise<{
      data: Array<{ embedding: number[]; index: number }>;
    }>;
  };
}

// Upper bound on inputs per embeddings request.
const MAX_BATCH_SIZE = 2048;

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  public readonly model: string;
  private readonly dimensions?: number;
  private readonly client: EmbeddingsClient;

  constructor(config: EmbeddingConfig, client: EmbeddingsClient = new OpenAI()) {
    this.model = config.model;
    this.dimensions = config.dimensions;
    this.client = client;
  }

  public async encode(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += MAX_BATCH_SIZE) {
      const input = texts.slice(start, start + MAX_BATCH_SIZE);
      const response = await this.client.embeddings.create({
        model: this.model,
        input,
        ...(this.dimensions !== undefined ? { dimensions: this.dimensions } : {}),
      });

      const batch = [...response.data].sort((a, b) => a.index - b.index);
      if (batch.length !== input.length) {
        throw new Error(`Expected ${input.length} embeddings from ${this.model}, got ${batch.length}`);
      }
      vectors.push(...batch.map(d => d.embedding));
    }

    logger.debug(`Created ${vectors.length} embeddings with ${this.model}`);
    return vectors;
  }
}
