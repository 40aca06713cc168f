import { NpyFormatError } from "./util.js";

/**
 * Values produced by the unpickler. Lists map onto arrays, tuples and dicts
 * onto tagged records; ndarray reconstruction calls are kept as records so the
 * npy layer can decode their buffers.
 */
export type PyValue =
  | null
  | boolean
  | number
  | string
  | Uint8Array
  | PyValue[]
  | PyTuple
  | PyDict
  | PyGlobal
  | PyObject
  | PyDtype
  | PyNdarray
  | PyScalar;

export type PyTuple = { type: "tuple"; items: PyValue[] };
export type PyDict = { type: "dict"; entries: [PyValue, PyValue][] };
export type PyGlobal = { type: "global"; module: string; name: string };
export type PyObject = { type: "object"; cls: PyValue; args: PyValue[]; state?: PyValue };
/** `str` is the dtype string without byte order (`i8`, `U5`, `O8`); `order` comes from BUILD. */
export type PyDtype = { type: "dtype"; str: string; order: string };
export type PyNdarray = { type: "ndarray"; shape: number[]; dtype?: PyDtype; fortran: boolean; data: Uint8Array | PyValue[] };
export type PyScalar = { type: "scalar"; dtype: PyDtype; bytes: Uint8Array };

const MARK = Symbol("mark");
type StackItem = PyValue | typeof MARK;

const OP = {
  MARK: 0x28, // (
  STOP: 0x2e, // .
  POP: 0x30, // 0
  POP_MARK: 0x31, // 1
  DUP: 0x32, // 2
  BINBYTES: 0x42, // B
  SHORT_BINBYTES: 0x43, // C
  BINFLOAT: 0x47, // G
  BININT: 0x4a, // J
  BININT1: 0x4b, // K
  BININT2: 0x4d, // M
  NONE: 0x4e, // N
  REDUCE: 0x52, // R
  BINSTRING: 0x54, // T
  SHORT_BINSTRING: 0x55, // U
  BINUNICODE: 0x58, // X
  APPEND: 0x61, // a
  BUILD: 0x62, // b
  GLOBAL: 0x63, // c
  DICT: 0x64, // d
  APPENDS: 0x65, // e
  BINGET: 0x68, // h
  LONG_BINGET: 0x6a, // j
  LIST: 0x6c, // l
  BINPUT: 0x71, // q
  LONG_BINPUT: 0x72, // r
  SETITEM: 0x73, // s
  TUPLE: 0x74, // t
  SETITEMS: 0x75, // u
  EMPTY_DICT: 0x7d, // }
  EMPTY_LIST: 0x5d, // ]
  EMPTY_TUPLE: 0x29, // )
  PROTO: 0x80,
  NEWOBJ: 0x81,
  TUPLE1: 0x85,
  TUPLE2: 0x86,
  TUPLE3: 0x87,
  NEWTRUE: 0x88,
  NEWFALSE: 0x89,
  LONG1: 0x8a,
  LONG4: 0x8b,
  SHORT_BINUNICODE: 0x8c,
  BINUNICODE8: 0x8d,
  BINBYTES8: 0x8e,
  STACK_GLOBAL: 0x93,
  MEMOIZE: 0x94,
  FRAME: 0x95,
} as const;

function isTagged<T extends string>(v: PyValue, type: T): v is Extract<PyValue, { type: T }> {
  return typeof v === "object" && v !== null && !Array.isArray(v) && !(v instanceof Uint8Array) && v.type === type;
}

function isTuple(v: PyValue): v is PyTuple {
  return isTagged(v, "tuple");
}

export function isNdarray(v: PyValue): v is PyNdarray {
  return isTagged(v, "ndarray");
}

export function isScalar(v: PyValue): v is PyScalar {
  return isTagged(v, "scalar");
}

function isDtype(v: PyValue): v is PyDtype {
  return isTagged(v, "dtype");
}

function isGlobal(v: PyValue): v is PyGlobal {
  return isTagged(v, "global");
}

/** Items of a list or tuple, else undefined. */
export function sequenceItems(v: PyValue): PyValue[] | undefined {
  if (Array.isArray(v)) return v;
  if (isTuple(v)) return v.items;
  return undefined;
}

class Reader {
  private pos = 0;
  private readonly view: DataView;

  constructor(private readonly buf: Uint8Array) {
    this.view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  }

  get offset(): number {
    return this.pos;
  }

  private need(n: number): number {
    if (n < 0 || this.pos + n > this.buf.length) throw new NpyFormatError(`Pickle data truncated at byte ${this.pos}`);
    const at = this.pos;
    this.pos += n;
    return at;
  }

  u8(): number {
    return this.view.getUint8(this.need(1));
  }

  u16(): number {
    return this.view.getUint16(this.need(2), true);
  }

  u32(): number {
    return this.view.getUint32(this.need(4), true);
  }

  i32(): number {
    return this.view.getInt32(this.need(4), true);
  }

  u64(): number {
    const v = this.view.getBigUint64(this.need(8), true);
    if (v > BigInt(Number.MAX_SAFE_INTEGER)) throw new NpyFormatError("Pickle length out of range");
    return Number(v);
  }

  f64be(): number {
    return this.view.getFloat64(this.need(8), false);
  }

  bytes(n: number): Uint8Array {
    const at = this.need(n);
    return this.buf.slice(at, at + n);
  }

  line(): string {
    const end = this.buf.indexOf(0x0a, this.pos);
    if (end < 0) throw new NpyFormatError(`Unterminated pickle line at byte ${this.pos}`);
    const text = Buffer.from(this.buf.subarray(this.pos, end)).toString("latin1");
    this.pos = end + 1;
    return text;
  }
}

function utf8(b: Uint8Array): string {
  return Buffer.from(b).toString("utf8");
}

function latin1(b: Uint8Array): string {
  return Buffer.from(b).toString("latin1");
}

// Little-endian two's complement, as LONG1/LONG4 store it.
function decodeLong(b: Uint8Array): number {
  if (b.length === 0) return 0;
  let v = 0n;
  for (let i = b.length - 1; i >= 0; i -= 1) v = (v << 8n) | BigInt(b[i]);
  if (b[b.length - 1] & 0x80) v -= 1n << BigInt(8 * b.length);
  if (v > BigInt(Number.MAX_SAFE_INTEGER) || v < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new NpyFormatError("Pickled integer out of range");
  }
  return Number(v);
}

function reduce(callable: PyValue, args: PyValue[]): PyValue {
  if (isGlobal(callable)) {
    switch (callable.name) {
      case "_reconstruct":
        return { type: "ndarray", shape: [], fortran: false, data: [] };
      case "dtype": {
        const [str] = args;
        if (typeof str !== "string") throw new NpyFormatError("dtype() expects a type string");
        return { type: "dtype", str, order: "|" };
      }
      case "scalar": {
        const [dtype, bytes] = args;
        if (!isDtype(dtype) || !(bytes instanceof Uint8Array)) throw new NpyFormatError("scalar() expects (dtype, bytes)");
        return { type: "scalar", dtype, bytes };
      }
      case "encode":
        if (callable.module === "_codecs") {
          const [text] = args;
          if (typeof text !== "string") throw new NpyFormatError("_codecs.encode expects a string");
          return new Uint8Array(Buffer.from(text, "latin1"));
        }
        break;
    }
  }
  return { type: "object", cls: callable, args };
}

function asNumbers(v: PyValue | undefined, what: string): number[] {
  const items = v === undefined ? undefined : sequenceItems(v);
  if (!items || !items.every((x): x is number => typeof x === "number")) {
    throw new NpyFormatError(`Pickled ndarray ${what} is not a tuple of integers`);
  }
  return items;
}

function build(target: PyValue, state: PyValue): void {
  if (isNdarray(target)) {
    const items = sequenceItems(state);
    if (!items || items.length < 5) throw new NpyFormatError("Pickled ndarray state is malformed");
    const [, shape, dtype, fortran, data] = items;
    if (!isDtype(dtype)) throw new NpyFormatError("Pickled ndarray state has no dtype");
    target.shape = asNumbers(shape, "shape");
    target.dtype = dtype;
    target.fortran = fortran === true;
    if (data instanceof Uint8Array) target.data = data;
    else if (Array.isArray(data)) target.data = data;
    else if (typeof data === "string") target.data = new Uint8Array(Buffer.from(data, "latin1"));
    else throw new NpyFormatError("Pickled ndarray data is neither bytes nor a list");
    return;
  }
  if (isDtype(target)) {
    const items = sequenceItems(state);
    const order = items?.[1];
    if (typeof order === "string") target.order = order;
    return;
  }
  if (isTagged(target, "object")) {
    target.state = state;
    return;
  }
  throw new NpyFormatError("BUILD applied to a value that takes no state");
}

/**
 * Runs a pickle program (protocols 2 to 5, without out-of-band buffers) and
 * returns the unpickled value. Only the opcodes that ndarrays and plain containers
 * pickle to are supported; anything else is a format error.
 */
export function loads(buf: Uint8Array): PyValue {
  const r = new Reader(buf);
  const stack: StackItem[] = [];
  const memo = new Map<number, PyValue>();

  const pop = (): PyValue => {
    const v = stack.pop();
    if (v === undefined || v === MARK) throw new NpyFormatError("Pickle stack underflow");
    return v;
  };
  const top = (): PyValue => {
    const v = stack[stack.length - 1];
    if (v === undefined || v === MARK) throw new NpyFormatError("Pickle stack underflow");
    return v;
  };
  const popMark = (): PyValue[] => {
    const at = stack.lastIndexOf(MARK);
    if (at < 0) throw new NpyFormatError("Pickle MARK missing");
    const items = stack.splice(at).slice(1);
    return items.filter((x): x is PyValue => x !== MARK);
  };
  const push = (v: PyValue): void => {
    stack.push(v);
  };
  const list = (): PyValue[] => {
    const l = top();
    if (!Array.isArray(l)) throw new NpyFormatError("APPEND target is not a list");
    return l;
  };
  const dict = (): PyDict => {
    const d = top();
    if (!isTagged(d, "dict")) throw new NpyFormatError("SETITEM target is not a dict");
    return d;
  };
  const setItems = (d: PyDict, flat: PyValue[]): void => {
    for (let i = 0; i + 1 < flat.length; i += 2) d.entries.push([flat[i], flat[i + 1]]);
  };

  for (;;) {
    const op = r.u8();
    switch (op) {
      case OP.PROTO:
        r.u8();
        break;
      case OP.FRAME:
        r.u64();
        break;
      case OP.STOP:
        return pop();
      case OP.MARK:
        stack.push(MARK);
        break;
      case OP.POP:
        stack.pop();
        break;
      case OP.POP_MARK:
        popMark();
        break;
      case OP.DUP:
        push(top());
        break;
      case OP.NONE:
        push(null);
        break;
      case OP.NEWTRUE:
        push(true);
        break;
      case OP.NEWFALSE:
        push(false);
        break;
      case OP.BININT:
        push(r.i32());
        break;
      case OP.BININT1:
        push(r.u8());
        break;
      case OP.BININT2:
        push(r.u16());
        break;
      case OP.LONG1:
        push(decodeLong(r.bytes(r.u8())));
        break;
      case OP.LONG4:
        push(decodeLong(r.bytes(r.i32())));
        break;
      case OP.BINFLOAT:
        push(r.f64be());
        break;
      case OP.SHORT_BINBYTES:
        push(r.bytes(r.u8()));
        break;
      case OP.BINBYTES:
        push(r.bytes(r.u32()));
        break;
      case OP.BINBYTES8:
        push(r.bytes(r.u64()));
        break;
      case OP.SHORT_BINUNICODE:
        push(utf8(r.bytes(r.u8())));
        break;
      case OP.BINUNICODE:
        push(utf8(r.bytes(r.u32())));
        break;
      case OP.BINUNICODE8:
        push(utf8(r.bytes(r.u64())));
        break;
      case OP.SHORT_BINSTRING:
        push(latin1(r.bytes(r.u8())));
        break;
      case OP.BINSTRING:
        push(latin1(r.bytes(r.i32())));
        break;
      case OP.EMPTY_TUPLE:
        push({ type: "tuple", items: [] });
        break;
      case OP.TUPLE:
        push({ type: "tuple", items: popMark() });
        break;
      case OP.TUPLE1: {
        const a = pop();
        push({ type: "tuple", items: [a] });
        break;
      }
      case OP.TUPLE2: {
        const b = pop();
        const a = pop();
        push({ type: "tuple", items: [a, b] });
        break;
      }
      case OP.TUPLE3: {
        const c = pop();
        const b = pop();
        const a = pop();
        push({ type: "tuple", items: [a, b, c] });
        break;
      }
      case OP.EMPTY_LIST:
        push([]);
        break;
      case OP.LIST:
        push(popMark());
        break;
      case OP.APPEND: {
        const v = pop();
        list().push(v);
        break;
      }
      case OP.APPENDS: {
        const items = popMark();
        list().push(...items);
        break;
      }
      case OP.EMPTY_DICT:
        push({ type: "dict", entries: [] });
        break;
      case OP.DICT: {
        const d: PyDict = { type: "dict", entries: [] };
        setItems(d, popMark());
        push(d);
        break;
      }
      case OP.SETITEM: {
        const v = pop();
        const k = pop();
        dict().entries.push([k, v]);
        break;
      }
      case OP.SETITEMS: {
        const items = popMark();
        setItems(dict(), items);
        break;
      }
      case OP.GLOBAL: {
        const module = r.line();
        const name = r.line();
        push({ type: "global", module, name });
        break;
      }
      case OP.STACK_GLOBAL: {
        const name = pop();
        const module = pop();
        if (typeof module !== "string" || typeof name !== "string") throw new NpyFormatError("STACK_GLOBAL expects two strings");
        push({ type: "global", module, name });
        break;
      }
      case OP.REDUCE:
      case OP.NEWOBJ: {
        const args = pop();
        const callable = pop();
        const items = sequenceItems(args);
        if (!items) throw new NpyFormatError("REDUCE arguments are not a tuple");
        push(reduce(callable, items));
        break;
      }
      case OP.BUILD: {
        const state = pop();
        build(top(), state);
        break;
      }
      case OP.BINPUT:
        memo.set(r.u8(), top());
        break;
      case OP.LONG_BINPUT:
        memo.set(r.u32(), top());
        break;
      case OP.MEMOIZE:
        memo.set(memo.size, top());
        break;
      case OP.BINGET:
      case OP.LONG_BINGET: {
        const idx = op === OP.BINGET ? r.u8() : r.u32();
        const v = memo.get(idx);
        if (v === undefined) throw new NpyFormatError(`Pickle memo has no entry ${idx}`);
        push(v);
        break;
      }
      default:
        throw new NpyFormatError(`Unsupported pickle opcode 0x${op.toString(16).padStart(2, "0")} at byte ${r.offset - 1}`);
    }
  }
}
