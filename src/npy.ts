import fs from "fs";
import { pathToFileURL } from "url";
import { isNdarray, isScalar, loads, sequenceItems, type PyDtype, type PyNdarray, type PyValue } from "./pickle.js";
import { splitSequence } from "./token_stream.js";
import { NpyFormatError } from "./util.js";

export type NpyElement = number | string | PyValue;

export type NpyArray = {
  descr: string;
  shape: number[];
  /** Flattened in C (row-major) order, whatever the file's order was. */
  data: NpyElement[];
};

/** One sequence pulled out of an array: token ids still to decode, or token text. */
export type RawSequence = { kind: "ids"; ids: number[] } | { kind: "tokens"; tokens: string[] };

const MAGIC = [0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59]; // \x93NUMPY

type Header = { descr: string; fortranOrder: boolean; shape: number[]; dataOffset: number };

function readHeader(buf: Uint8Array): Header {
  if (buf.length < 10 || MAGIC.some((b, i) => buf[i] !== b)) throw new NpyFormatError("Not a .npy file (bad magic)");
  const view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  const major = buf[6];
  let start: number;
  let length: number;
  if (major === 1) {
    start = 10;
    length = view.getUint16(8, true);
  } else if (major === 2 || major === 3) {
    if (buf.length < 12) throw new NpyFormatError("Truncated .npy header");
    start = 12;
    length = view.getUint32(8, true);
  } else {
    throw new NpyFormatError(`Unsupported .npy version ${major}.${buf[7]}`);
  }
  if (start + length > buf.length) throw new NpyFormatError("Truncated .npy header");
  const text = Buffer.from(buf.subarray(start, start + length)).toString(major === 3 ? "utf8" : "latin1");

  const descr = /'descr'\s*:\s*'([^']*)'/.exec(text)?.[1];
  const fortran = /'fortran_order'\s*:\s*(True|False)/.exec(text)?.[1];
  const shape = /'shape'\s*:\s*\(([^)]*)\)/.exec(text)?.[1];
  if (descr === undefined || fortran === undefined || shape === undefined) {
    throw new NpyFormatError(`Unsupported .npy header ${text.trim()}`);
  }
  const dims = shape
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s) => {
      if (!/^\d+L?$/.test(s)) throw new NpyFormatError(`Bad .npy shape (${shape})`);
      return parseInt(s, 10);
    });
  return { descr, fortranOrder: fortran === "True", shape: dims, dataOffset: start + length };
}

function elementCount(shape: readonly number[]): number {
  return shape.reduce((a, b) => a * b, 1);
}

// Decodes `count` fixed-width elements of a numeric, bool, bytes or unicode dtype.
function decodeFixed(descr: string, bytes: Uint8Array, count: number): NpyElement[] {
  const m = /^([<>|=]?)([iufbUS])(\d+)$/.exec(descr);
  if (!m) throw new NpyFormatError(`Unsupported dtype '${descr}'`);
  const little = m[1] !== ">";
  const kind = m[2];
  const n = parseInt(m[3], 10);
  const width = kind === "U" ? 4 * n : n;
  if (bytes.length < width * count) throw new NpyFormatError(`Array data truncated: need ${width * count} bytes, have ${bytes.length}`);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const out: NpyElement[] = [];
  for (let i = 0; i < count; i += 1) {
    const at = i * width;
    out.push(decodeOne(view, bytes, at, kind, n, little, descr));
  }
  return out;
}

function decodeOne(view: DataView, bytes: Uint8Array, at: number, kind: string, n: number, little: boolean, descr: string): NpyElement {
  switch (`${kind}${n}`) {
    case "b1":
    case "u1":
      return view.getUint8(at);
    case "i1":
      return view.getInt8(at);
    case "i2":
      return view.getInt16(at, little);
    case "u2":
      return view.getUint16(at, little);
    case "i4":
      return view.getInt32(at, little);
    case "u4":
      return view.getUint32(at, little);
    case "i8":
    case "u8": {
      const v = kind === "i" ? view.getBigInt64(at, little) : view.getBigUint64(at, little);
      if (v > BigInt(Number.MAX_SAFE_INTEGER) || v < BigInt(Number.MIN_SAFE_INTEGER)) {
        throw new NpyFormatError(`Integer out of range in '${descr}' array`);
      }
      return Number(v);
    }
    case "f4":
      return view.getFloat32(at, little);
    case "f8":
      return view.getFloat64(at, little);
  }
  if (kind === "U") {
    let s = "";
    for (let k = 0; k < n; k += 1) {
      const cp = view.getUint32(at + 4 * k, little);
      if (cp === 0) break;
      s += String.fromCodePoint(cp);
    }
    return s;
  }
  if (kind === "S") {
    const raw = bytes.subarray(at, at + n);
    const end = raw.indexOf(0);
    return Buffer.from(end < 0 ? raw : raw.subarray(0, end)).toString("latin1");
  }
  throw new NpyFormatError(`Unsupported dtype '${descr}'`);
}

// Column-major storage back to row-major order.
function fromFortran<T>(data: readonly T[], shape: readonly number[]): T[] {
  if (shape.length < 2) return [...data];
  const fStrides: number[] = [];
  let stride = 1;
  for (const d of shape) {
    fStrides.push(stride);
    stride *= d;
  }
  const out: T[] = [];
  const idx = shape.map(() => 0);
  for (let flat = 0; flat < data.length; flat += 1) {
    let off = 0;
    for (let k = 0; k < shape.length; k += 1) off += idx[k] * fStrides[k];
    out.push(data[off]);
    for (let k = shape.length - 1; k >= 0; k -= 1) {
      idx[k] += 1;
      if (idx[k] < shape[k]) break;
      idx[k] = 0;
    }
  }
  return out;
}

function dtypeDescr(dtype: PyDtype): string {
  const order = dtype.order === "|" || dtype.order === "=" ? "<" : dtype.order;
  return `${order}${dtype.str}`;
}

function isObjectDescr(descr: string): boolean {
  return /^[<>|=]?O\d*$/.test(descr);
}

/** Converts a reconstructed pickled ndarray into a flat NpyArray. */
function ndarrayFromPickle(arr: PyNdarray): NpyArray {
  const descr = arr.dtype ? dtypeDescr(arr.dtype) : "|O";
  const count = elementCount(arr.shape);
  let data: NpyElement[];
  if (Array.isArray(arr.data)) {
    data = arr.data;
  } else {
    if (isObjectDescr(descr)) throw new NpyFormatError("Object ndarray carries raw bytes");
    data = decodeFixed(descr, arr.data, count);
  }
  return { descr, shape: arr.shape, data: arr.fortran ? fromFortran(data, arr.shape) : data };
}

export function readNpy(buf: Uint8Array): NpyArray {
  const header = readHeader(buf);
  const body = buf.subarray(header.dataOffset);
  const count = elementCount(header.shape);
  if (isObjectDescr(header.descr)) {
    const value = loads(body);
    const data = isNdarray(value) ? ndarrayFromPickle(value).data : sequenceItems(value) ?? [value];
    if (data.length !== count) throw new NpyFormatError(`Object array holds ${data.length} items, header says ${count}`);
    return { descr: header.descr, shape: header.shape, data };
  }
  const data = decodeFixed(header.descr, body, count);
  return {
    descr: header.descr,
    shape: header.shape,
    data: header.fortranOrder ? fromFortran(data, header.shape) : data,
  };
}

export function readNpyFile(path: string): NpyArray {
  return readNpy(new Uint8Array(fs.readFileSync(path)));
}

function toScalar(v: NpyElement): number | string | undefined {
  if (typeof v === "number" || typeof v === "string") return v;
  if (typeof v === "boolean") return v ? 1 : 0;
  if (isScalar(v)) {
    const [x] = decodeFixed(dtypeDescr(v.dtype), v.bytes, 1);
    if (typeof x === "number" || typeof x === "string") return x;
  }
  return undefined;
}

function idsOf(values: readonly number[]): number[] {
  for (const v of values) {
    if (!Number.isInteger(v)) throw new NpyFormatError(`Token id ${v} is not an integer`);
  }
  return [...values];
}

function fromScalars(values: ReadonlyArray<number | string>): RawSequence {
  const ids = values.filter((v): v is number => typeof v === "number");
  if (ids.length === values.length) return { kind: "ids", ids: idsOf(ids) };
  const tokens = values.filter((v): v is string => typeof v === "string");
  if (tokens.length === values.length) return { kind: "tokens", tokens: tokens.filter((t) => t.length > 0) };
  throw new NpyFormatError("Sequence mixes token ids and token strings");
}

function scalarsOf(values: readonly NpyElement[]): Array<number | string> | undefined {
  const out: Array<number | string> = [];
  for (const v of values) {
    const s = toScalar(v);
    if (s === undefined) return undefined;
    out.push(s);
  }
  return out;
}

function sequenceOf(v: NpyElement): RawSequence {
  if (typeof v === "string") return { kind: "tokens", tokens: splitSequence(v) };
  if (isNdarray(v)) return sequenceOf(ndarrayFromPickle(v).data);
  const items = sequenceItems(v);
  const scalars = items ? scalarsOf(items) : undefined;
  if (!scalars) throw new NpyFormatError("Array entry is not a sequence of token ids or token strings");
  return fromScalars(scalars);
}

/**
 * Splits an array into sequences: a 1-D numeric or string array is one
 * sequence, a 2-D one holds a sequence per row, and an object array holds a
 * sequence per entry. String entries containing `->` are whole sequences.
 */
export function npySequences(arr: NpyArray): RawSequence[] {
  const scalars = scalarsOf(arr.data);
  if (!scalars) {
    if (arr.shape.length > 1) throw new NpyFormatError(`Object array of ${arr.shape.length} dimensions is not supported`);
    return arr.data.map(sequenceOf);
  }
  if (scalars.some((s) => typeof s === "string" && s.includes("->"))) {
    return scalars.map((s): RawSequence => (typeof s === "string" ? { kind: "tokens", tokens: splitSequence(s) } : fromScalars([s])));
  }
  if (arr.shape.length <= 1) return [fromScalars(scalars)];
  if (arr.shape.length > 2) throw new NpyFormatError(`Array of ${arr.shape.length} dimensions is not supported`);
  const [rows, cols] = arr.shape;
  const out: RawSequence[] = [];
  for (let r = 0; r < rows; r += 1) out.push(fromScalars(scalars.slice(r * cols, (r + 1) * cols)));
  return out;
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 3) {
  const arr = readNpyFile(process.argv[2]);
  console.error(`npy: descr=${arr.descr} shape=(${arr.shape.join(", ")}) sequences=${npySequences(arr).length}`);
}
