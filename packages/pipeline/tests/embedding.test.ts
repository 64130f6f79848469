import type { EmbeddingsClient } from "../src/matching/embedding";
import { describe, expect, it, vi } from "vitest";
import { OpenAIEmbeddingProvider } from "../src/matching/embedding";

function fakeClient() {
  const create = vi.fn(async (body: { model: string; input: string[]; dimensions?: number }) => ({
    // Returned out of order to check the provider sorts by index.
    data: body.input
      .map((text, index) => ({ embedding: [text.length, index], index }))
      .reverse(),
  }));
  const client: EmbeddingsClient = { embeddings: { create } };
  return { client, create };
}

describe("OpenAIEmbeddingProvider", () => {
  it("sends one request per batch and returns vectors in input order", async () => {
    const { client, create } = fakeClient();
    const provider = new OpenAIEmbeddingProvider({ model: "text-embedding-3-large" }, client);

    const vectors = await provider.encode(["to run", "to manage"]);

    expect(vectors).toEqual([[6, 0], [9, 1]]);
    expect(create).toHaveBeenCalledTimes(1);
    expect(create).toHaveBeenCalledWith({ model: "text-embedding-3-large", input: ["to run", "to manage"] });
  });

  it("passes dimensions when configured", async () => {
    const { client, create } = fakeClient();
    const provider = new OpenAIEmbeddingProvider({ model: "text-embedding-3-small", dimensions: 256 }, client);

    await provider.encode(["to run"]);

    expect(create).toHaveBeenCalledWith({ model: "text-embedding-3-small", input: ["to run"], dimensions: 256 });
  });

  it("makes no request for an empty batch", async () => {
    const { client, create } = fakeClient();
    const provider = new OpenAIEmbeddingProvider({ model: "text-embedding-3-large" }, client);

    expect(await provider.encode([])).toEqual([]);
    expect(create).not.toHaveBeenCalled();
  });

  it("splits very large batches", async () => {
    const { client, create } = fakeClient();
    const provider = new OpenAIEmbeddingProvider({ model: "text-embedding-3-large" }, client);
    const texts = Array.from({ length: 2050 }, (_, i) => `gloss ${i}`);

    const vectors = await provider.encode(texts);

    expect(create).toHaveBeenCalledTimes(2);
    expect(vectors).toHaveLength(2050);
    expect(vectors[2049]).toEqual(["gloss 2049".length, 1]);
  });

  it("propagates request failures", async () => {
    const client: EmbeddingsClient = {
      embeddings: {
        create: async () => {
          throw new Error("401 Incorrect API key provided");
        },
      },
    };
    const provider = new OpenAIEmbeddingProvider({ model: "text-embedding-3-large" }, client);
    await expect(provider.encode(["to run"])).rejects.toThrow("401 Incorrect API key provided");
  });
});
