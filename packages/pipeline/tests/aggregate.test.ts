import { describe, expect, it } from "vitest";
import { LemmaAggregator, normalizeHeadword } from "../src/aggregate";
import { sense } from "./helpers";

describe("normalizeHeadword", () => {
  it("trims and lower-cases", () => {
    expect(normalizeHeadword("  Run ")).toBe("run");
  });
});

describe("LemmaAggregator", () => {
  it("merges occurrences that differ only in case and whitespace", () => {
    const aggregator = new LemmaAggregator();
    aggregator.add("Run", [sense(1, "To move swiftly."), sense(2, "To manage.")]);
    aggregator.add("run ", [sense(1, "A quick pace.")]);

    const lemmas = [...aggregator.lemmas()];
    expect(lemmas).toHaveLength(1);
    expect(lemmas[0].lemma).toBe("run");
    expect(lemmas[0].senses.map(s => [s.senseOrder, s.definition])).toEqual([
      [1, "To move swiftly."],
      [2, "To manage."],
      [1, "A quick pace."],
    ]);
  });

  it("keeps identical definitions from different occurrences as separate senses", () => {
    const aggregator = new LemmaAggregator();
    aggregator.add("set", [sense(1, "To put.")]);
    aggregator.add("set", [sense(1, "To put.")]);
    expect(aggregator.get("SET")?.senses).toHaveLength(2);
  });

  it("emits lemmas in first-encounter order", () => {
    const aggregator = new LemmaAggregator();
    aggregator.add("walk", [sense(1, "a")]);
    aggregator.add("Run", [sense(1, "b")]);
    aggregator.add("WALK", [sense(1, "c")]);
    aggregator.add("jump", [sense(1, "d")]);

    expect([...aggregator.lemmas()].map(l => l.lemma)).toEqual(["walk", "run", "jump"]);
    expect(aggregator.size).toBe(3);
  });

  it("returns undefined for an unseen headword", () => {
    expect(new LemmaAggregator().get("run")).toBeUndefined();
  });
});
