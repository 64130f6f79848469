import { describe, expect, it } from "vitest";
import type { ExtractedEntry, Sense } from "../src/types";
import { example, quotation, serializeExtractedEntry, serializeLemma, serializeSentence } from "../src/types";

function sense(): Sense {
  return {
    senseOrder: 2,
    definition: "To manage.",
    sentences: [example("Run the shop."), quotation("She runs it.", "2001, Shopkeeping")],
    translations: [{ translation: "dirigir", language: "spanish" }],
  };
}

describe("serializeSentence", () => {
  it("keeps only the fields of each variant", () => {
    expect(serializeSentence(example("Run home!"))).toEqual({ type: "example", sentence: "Run home!" });
    expect(serializeSentence(quotation("Run home!", "1999, A Book"))).toEqual({
      type: "quotation",
      sentence: "Run home!",
      reference: "1999, A Book",
    });
  });
});

describe("serializeLemma", () => {
  it("writes fields in a fixed order", () => {
    const json = JSON.stringify(serializeLemma({ lemma: "run", senses: [sense()] }));
    expect(json).toBe(
      `{"lemma":"run","senses":[{"senseOrder":2,"definition":"To manage.","sentences":[`
      + `{"type":"example","sentence":"Run the shop."},`
      + `{"type":"quotation","sentence":"She runs it.","reference":"2001, Shopkeeping"}],`
      + `"translations":[{"translation":"dirigir","language":"spanish"}]}]}`,
    );
  });

  it("copies senses instead of sharing them", () => {
    const source = sense();
    const serialized = serializeLemma({ lemma: "run", senses: [source] });
    serialized.senses[0]?.translations.push({ translation: "gestionar", language: "spanish" });
    expect(source.translations).toHaveLength(1);
  });
});

describe("serializeExtractedEntry", () => {
  it("writes translation groups as a list in encounter order", () => {
    const entry: ExtractedEntry = {
      lemma: "run",
      etymology: null,
      pos: "verb",
      senses: [],
      translations: new Map([
        ["to manage", [{ translation: "dirigir", language: "spanish" }]],
        ["2", [{ translation: "dos", language: "spanish" }]],
        ["__proto__", [{ translation: "raro", language: "spanish" }]],
      ]),
    };

    expect(serializeExtractedEntry(entry)).toEqual({
      lemma: "run",
      etymology: null,
      pos: "verb",
      senses: [],
      translations: [
        { label: "to manage", translations: [{ translation: "dirigir", language: "spanish" }] },
        { label: "2", translations: [{ translation: "dos", language: "spanish" }] },
        { label: "__proto__", translations: [{ translation: "raro", language: "spanish" }] },
      ],
    });
  });
});
