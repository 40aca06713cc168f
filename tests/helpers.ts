import fs from "fs";
import os from "os";
import path from "path";
import { loadCatalog } from "../src/catalog.js";
import type { ParsedGraph } from "../src/circuit_graph.js";
import { parseSequenceText, type Grammar } from "../src/sequence_parse.js";

export const catalog = loadCatalog();

/** Parses a `->`-joined sequence and fails the test if it does not parse. */
export function graphOf(text: string, grammar: Grammar = "device_major"): ParsedGraph {
  const res = parseSequenceText(text, catalog, grammar);
  if (!res.ok) throw new Error(`expected '${text}' to parse: ${res.error.reason}`);
  return res.value;
}

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "circuit-erc-"));
}

export function writeFile(file: string, data: string | Uint8Array): string {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, data);
  return file;
}

type Part = number | string | Uint8Array;

/** Concatenates bytes, latin1 strings and byte arrays. */
export function bytes(...parts: Part[]): Uint8Array {
  const chunks = parts.map((p) => {
    if (typeof p === "number") return Uint8Array.of(p);
    if (typeof p === "string") return new Uint8Array(Buffer.from(p, "latin1"));
    return p;
  });
  return new Uint8Array(Buffer.concat(chunks));
}

export function int64le(values: readonly number[]): Uint8Array {
  const b = Buffer.alloc(8 * values.length);
  values.forEach((v, i) => b.writeBigInt64LE(BigInt(v), 8 * i));
  return new Uint8Array(b);
}

export function int32le(values: readonly number[]): Uint8Array {
  const b = Buffer.alloc(4 * values.length);
  values.forEach((v, i) => b.writeInt32LE(v, 4 * i));
  return new Uint8Array(b);
}

/** UTF-32LE, each string padded with NULs to `width` characters. */
export function utf32le(values: readonly string[], width: number): Uint8Array {
  const b = Buffer.alloc(4 * width * values.length);
  values.forEach((s, i) => {
    [...s].forEach((ch, k) => b.writeUInt32LE(ch.codePointAt(0) ?? 0, 4 * (i * width + k)));
  });
  return new Uint8Array(b);
}

/** A version 1.0 `.npy` file. */
export function npyFile(descr: string, shape: readonly number[], body: Uint8Array, fortran = false): Uint8Array {
  const shapeText = shape.length === 1 ? `(${shape[0]},)` : `(${shape.join(", ")})`;
  const dict = `{'descr': '${descr}', 'fortran_order': ${fortran ? "True" : "False"}, 'shape': ${shapeText}, }`;
  const pad = (64 - ((10 + dict.length + 1) % 64)) % 64;
  const header = `${dict}${" ".repeat(pad)}\n`;
  const len = Buffer.alloc(2);
  len.writeUInt16LE(header.length, 0);
  return bytes(0x93, "NUMPY", 1, 0, new Uint8Array(len), header, body);
}

// Pickle fragments laid out the way object arrays are stored in .npy files (protocol 3).

export function pInt(n: number): Uint8Array {
  if (n < 256) return bytes("K", n);
  return bytes("M", n & 0xff, n >> 8);
}

export function pStr(s: string): Uint8Array {
  const len = Buffer.alloc(4);
  len.writeUInt32LE(s.length, 0);
  return bytes("X", new Uint8Array(len), s);
}

export function pGlobal(module: string, name: string): Uint8Array {
  return bytes("c", `${module}\n${name}\n`);
}

export function pDtype(str: string, order: string): Uint8Array {
  return bytes(
    pGlobal("numpy", "dtype"),
    pStr(str),
    0x89,
    0x88,
    0x87,
    "R",
    "(",
    pInt(3),
    pStr(order),
    "NNN",
    "J",
    0xff,
    0xff,
    0xff,
    0xff,
    "J",
    0xff,
    0xff,
    0xff,
    0xff,
    pInt(63),
    "t",
    "b",
  );
}

export function pIntList(values: readonly number[]): Uint8Array {
  return bytes("]", "(", ...values.map(pInt), "e");
}

/** `_reconstruct(ndarray, (0,), b'b')` then BUILD with (1, (n,), dtype, False, data). */
export function pNdarray(length: number, dtype: Uint8Array, data: Uint8Array): Uint8Array {
  return bytes(
    pGlobal("numpy.core.multiarray", "_reconstruct"),
    pGlobal("numpy", "ndarray"),
    pInt(0),
    0x85,
    "C",
    1,
    "b",
    0x87,
    "R",
    "(",
    pInt(1),
    pInt(length),
    0x85,
    dtype,
    0x89,
    data,
    "t",
    "b",
  );
}

export function pickle(body: Uint8Array): Uint8Array {
  return bytes(0x80, 3, body, ".");
}
