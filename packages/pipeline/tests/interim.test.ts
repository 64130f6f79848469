import type { ExtractedEntry } from "@sensemap/core";
import { serializeExtractedEntry } from "@sensemap/core";
import { describe, expect, it } from "vitest";
import { buildMappings, resolveEntry } from "../src/mapping";
import { parseExtractedEntry } from "../src/sources/wiktextract/interim";
import { safeParse } from "../src/util";
import { sense } from "./helpers";

function entry(): ExtractedEntry {
  return {
    lemma: "run",
    etymology: "E1",
    pos: "verb",
    senses: [sense(1, "To move swiftly."), sense(2, "Second sense."), sense(3, "Odd sense.")],
    translations: new Map([
      ["to move quickly", [{ translation: "correr", language: "spanish" }]],
      ["2", [{ translation: "dos", language: "spanish" }]],
      ["__proto__", [{ translation: "raro", language: "spanish" }]],
    ]),
  };
}

function readBack(value: unknown): ExtractedEntry | null {
  return parseExtractedEntry(safeParse(JSON.stringify(value)));
}

describe("parseExtractedEntry", () => {
  it("keeps translation groups and their order through the interim file", () => {
    const parsed = readBack(serializeExtractedEntry(entry()));

    expect(parsed).not.toBeNull();
    expect([...(parsed?.translations.keys() ?? [])]).toEqual(["to move quickly", "2", "__proto__"]);
    expect(parsed?.translations.get("__proto__")).toEqual([{ translation: "raro", language: "spanish" }]);
  });

  it("resolves mapping letters against the groups in written order", () => {
    const parsed = readBack(serializeExtractedEntry(entry()));
    if (!parsed) {
      throw new Error("entry did not parse");
    }
    const mappings = buildMappings([{ lemma: "run", etymology: "E1", pos: "verb", mapping: { 1: "A", 2: "B", 3: "C" } }]);

    const resolved = resolveEntry(parsed, mappings);

    expect(resolved.senses.map(s => s.translations)).toEqual([
      [{ translation: "correr", language: "spanish" }],
      [{ translation: "dos", language: "spanish" }],
      [{ translation: "raro", language: "spanish" }],
    ]);
  });

  it("drops senses left without sentences", () => {
    const parsed = readBack({
      lemma: "run",
      etymology: null,
      pos: null,
      senses: [
        { senseOrder: 1, definition: "No sentences.", sentences: [], translations: [] },
        { senseOrder: 2, definition: "Bad sentence.", sentences: [{ type: "quotation", sentence: "Undated." }], translations: [] },
        { senseOrder: 3, definition: "Kept.", sentences: [{ type: "example", sentence: "Run!" }], translations: [] },
      ],
      translations: [],
    });

    expect(parsed?.senses).toEqual([
      { senseOrder: 3, definition: "Kept.", sentences: [{ type: "example", sentence: "Run!" }], translations: [] },
    ]);
  });

  it("skips unlabeled and repeated groups", () => {
    const parsed = readBack({
      lemma: "run",
      senses: [],
      translations: [
        { translations: [{ translation: "correr", language: "spanish" }] },
        { label: "to manage", translations: [{ translation: "dirigir", language: "spanish" }] },
        { label: "to manage", translations: [{ translation: "gestionar", language: "spanish" }] },
      ],
    });

    expect(parsed?.translations).toEqual(new Map([
      ["to manage", [{ translation: "dirigir", language: "spanish" }]],
    ]));
  });

  it("returns null without a lemma", () => {
    expect(readBack({ senses: [], translations: [] })).toBeNull();
  });
});
