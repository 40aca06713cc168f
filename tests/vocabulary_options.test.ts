import { describe, expect, it } from "vitest";
import { parseErcOptions } from "../src/options.js";
import { decodeIds, splitSequence, textTokenStream } from "../src/token_stream.js";
import { ConfigError } from "../src/util.js";
import { buildVocabulary, idOf, loadVocabulary } from "../src/vocabulary.js";

describe("vocabulary", () => {
  const vocab = loadVocabulary();

  it("expands the default vocabulary file", () => {
    expect(vocab.size).toBe(397);
    expect(vocab.get(0)).toBe("M_B");
    expect(vocab.get(31)).toBe("CIRCUIT_Opamp");
    expect(vocab.get(46)).toBe("NM1");
    expect(vocab.get(81)).toBe("PM1");
    expect(vocab.get(246)).toBe("NET1");
    expect(idOf(vocab, "TRUNCATE")).toBe(396);
    expect(idOf(vocab, "NOPE")).toBeUndefined();
  });

  it("accepts list and id-keyed forms", () => {
    expect([...buildVocabulary(["NM1", "M_G", "NET1"]).entries()]).toEqual([
      [0, "NM1"],
      [1, "M_G"],
      [2, "NET1"],
    ]);
    expect(buildVocabulary({ "7": "VDD", "3": "R1" }).get(7)).toBe("VDD");
    expect(buildVocabulary({ segments: [{ prefixes: ["NM", "PM"], from: 1, to: 2 }] }).get(3)).toBe("PM2");
  });

  it("rejects malformed vocabularies", () => {
    expect(() => buildVocabulary({ x: "NM1" }, "v.yaml")).toThrow(ConfigError);
    expect(() => buildVocabulary(42, "v.yaml")).toThrow(ConfigError);
    expect(() => loadVocabulary("/nonexistent/vocab.yaml")).toThrow("Vocabulary not found: /nonexistent/vocab.yaml");
  });
});

describe("token streams", () => {
  const vocab = buildVocabulary(["NM1", "M_G", "NET1", "TRUNCATE"]);

  it("decodes ids up to and including the truncate token", () => {
    expect(decodeIds([0, 1, 2, 3, 9999], vocab, "TRUNCATE")).toEqual({ ok: true, value: ["NM1", "M_G", "NET1", "TRUNCATE"] });
  });

  it("reports the first id missing from the vocabulary", () => {
    expect(decodeIds([9999, 0], vocab, "TRUNCATE")).toEqual({ ok: false, error: "Vocabulary has no token for id 9999 (position 0)" });
  });

  it("splits joined text and drops empty pieces", () => {
    expect(splitSequence(" NM1 ->M_G->->NET1->")).toEqual(["NM1", "M_G", "NET1"]);
    const s = textTokenStream("A->B");
    expect([s.next(), s.next(), s.next()]).toEqual(["A", "B", undefined]);
  });
});

describe("parseErcOptions", () => {
  it("fills defaults", () => {
    expect(parseErcOptions(undefined)).toEqual({
      grammar: "device_major",
      short_circuit: false,
      min_fanin: 2,
      fanin_count: "pins",
      sample_limit: 5,
    });
    expect(parseErcOptions({ grammar: "walk", min_fanin: 3 })).toMatchObject({ grammar: "walk", min_fanin: 3 });
  });

  it("rejects invalid values", () => {
    expect(() => parseErcOptions({ min_fanin: 0 }, "erc.yaml")).toThrow(ConfigError);
    expect(() => parseErcOptions({ grammar: "zigzag" }, "erc.yaml")).toThrow(/^Invalid ERC options erc\.yaml: grammar: /);
  });
});
