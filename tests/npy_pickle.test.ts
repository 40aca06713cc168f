import { describe, expect, it } from "vitest";
import { npySequences, readNpy } from "../src/npy.js";
import { loads } from "../src/pickle.js";
import { NpyFormatError } from "../src/util.js";
import { bytes, int32le, int64le, npyFile, pDtype, pickle, pInt, pIntList, pNdarray, pStr, utf32le } from "./helpers.js";

function objectArray(entries: Uint8Array[], headerLength = entries.length): Uint8Array {
  const data = bytes("]", "(", ...entries, "e");
  return npyFile("|O", [headerLength], pickle(pNdarray(entries.length, pDtype("O8", "|"), data)));
}

describe("readNpy", () => {
  it("reads a 1-D int64 array as one id sequence", () => {
    const arr = readNpy(npyFile("<i8", [3], int64le([31, 46, 2])));
    expect(arr).toEqual({ descr: "<i8", shape: [3], data: [31, 46, 2] });
    expect(npySequences(arr)).toEqual([{ kind: "ids", ids: [31, 46, 2] }]);
  });

  it("gives one sequence per row of a 2-D array", () => {
    const arr = readNpy(npyFile("<i4", [2, 3], int32le([1, 2, 3, 4, 5, 6])));
    expect(npySequences(arr)).toEqual([
      { kind: "ids", ids: [1, 2, 3] },
      { kind: "ids", ids: [4, 5, 6] },
    ]);
  });

  it("reorders Fortran-ordered data to rows", () => {
    const arr = readNpy(npyFile("<i4", [2, 3], int32le([1, 4, 2, 5, 3, 6]), true));
    expect(arr.data).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it("reads a unicode array of tokens as one sequence", () => {
    const arr = readNpy(npyFile("<U5", [3], utf32le(["NM1", "M_G", "NET1"], 5)));
    expect(npySequences(arr)).toEqual([{ kind: "tokens", tokens: ["NM1", "M_G", "NET1"] }]);
  });

  it("treats each joined string as its own sequence", () => {
    const arr = readNpy(npyFile("<U16", [2], utf32le(["NM1->M_G->NET1", "R1->R_P1->VDD"], 16)));
    expect(npySequences(arr)).toEqual([
      { kind: "tokens", tokens: ["NM1", "M_G", "NET1"] },
      { kind: "tokens", tokens: ["R1", "R_P1", "VDD"] },
    ]);
  });

  it("reads a pickled object array of id lists", () => {
    const arr = readNpy(objectArray([pIntList([31, 46]), pIntList([81, 2, 246])]));
    expect(arr.data).toEqual([
      [31, 46],
      [81, 2, 246],
    ]);
    expect(npySequences(arr)).toEqual([
      { kind: "ids", ids: [31, 46] },
      { kind: "ids", ids: [81, 2, 246] },
    ]);
  });

  it("reads a pickled object array of strings", () => {
    const arr = readNpy(objectArray([pStr("NM1->M_G->NET1")]));
    expect(npySequences(arr)).toEqual([{ kind: "tokens", tokens: ["NM1", "M_G", "NET1"] }]);
  });

  it("rejects malformed files", () => {
    expect(() => readNpy(bytes("not an npy file"))).toThrow("Not a .npy file (bad magic)");
    expect(() => readNpy(npyFile("<i8", [3], int64le([1, 2])))).toThrow("Array data truncated: need 24 bytes, have 16");
    expect(() => readNpy(npyFile("<c16", [1], new Uint8Array(16)))).toThrow("Unsupported dtype '<c16'");
    expect(() => readNpy(objectArray([pIntList([1])], 3))).toThrow("Object array holds 1 items, header says 3");
    expect(() => readNpy(bytes(0x93, "NUMPY", 9, 0, 0, 0))).toThrow(NpyFormatError);
  });

  it("rejects arrays it cannot split into sequences", () => {
    expect(() => npySequences(readNpy(npyFile("<i4", [1, 1, 2], int32le([1, 2]))))).toThrow("Array of 3 dimensions is not supported");
    expect(() => npySequences(readNpy(objectArray([bytes("]", "(", pInt(1), pStr("NM1"), "e")])))).toThrow(
      "Sequence mixes token ids and token strings",
    );
  });
});

describe("loads", () => {
  it("resolves memo references", () => {
    expect(loads(pickle(bytes(pStr("NM1"), "q", 0, "h", 0, 0x86)))).toEqual({ type: "tuple", items: ["NM1", "NM1"] });
  });

  it("decodes signed longs and dicts", () => {
    expect(loads(pickle(bytes(0x8a, 1, 0xff)))).toBe(-1);
    expect(loads(pickle(bytes(0x8a, 2, 0x00, 0x01)))).toBe(256);
    expect(loads(pickle(bytes("}", pStr("a"), pInt(1), "s")))).toEqual({ type: "dict", entries: [["a", 1]] });
  });

  it("reports unsupported opcodes and truncation with byte offsets", () => {
    expect(() => loads(pickle(bytes(0x70)))).toThrow("Unsupported pickle opcode 0x70 at byte 2");
    expect(() => loads(bytes(0x80, 3, "X", 5, 0, 0, 0, "ab"))).toThrow("Pickle data truncated at byte 7");
  });
});
