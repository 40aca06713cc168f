import fs from "fs";
import { pathToFileURL } from "url";
import { classifyToken, describeClassifyError, loadCatalog, type Catalog, type Token } from "./catalog.js";
import {
  addDevice,
  bindEdge,
  finishGraph,
  newGraph,
  type DeviceNode,
  type GraphDraft,
  type ParseError,
  type ParsedGraph,
} from "./circuit_graph.js";
import { textTokenStream, type TokenStream } from "./token_stream.js";
import { err, ok, type Result } from "./util.js";

export type Grammar = "device_major" | "walk";

type DeviceToken = Extract<Token, { kind: "device" }>;
type EdgeToken = Extract<Token, { kind: "edge" }>;
type NetToken = Extract<Token, { kind: "net" }>;
type Structural = DeviceToken | EdgeToken | NetToken;

/** A grammar consumes structural tokens and reports the first violation as a reason string. */
type Machine = {
  step(tok: Structural): string | undefined;
  finish(): string | undefined;
};

// device (edge net)* device (edge net)* ...
function deviceMajor(draft: GraphDraft, catalog: Catalog): Machine {
  let current: DeviceNode | undefined;
  let pending: EdgeToken | undefined;
  return {
    step(tok) {
      switch (tok.kind) {
        case "device":
          if (pending) return `Edge-type '${pending.text}' is followed by device '${tok.text}' instead of a net`;
          current = addDevice(draft, tok.text, tok.device);
          return undefined;
        case "edge":
          if (!current) return `Edge-type '${tok.text}' has no preceding device`;
          if (pending) return `Edge-type '${pending.text}' is followed by edge-type '${tok.text}' instead of a net`;
          if (tok.device !== current.kind) return `Edge-type '${tok.text}' does not belong to ${current.id} (${current.kind})`;
          pending = tok;
          return undefined;
        case "net":
          if (!current) return `Net '${tok.text}' appears before any device`;
          if (!pending) return `Net '${tok.text}' is not preceded by an edge-type`;
          bindEdge(draft, catalog, current, pending, tok);
          pending = undefined;
          return undefined;
      }
    },
    finish() {
      return pending ? `Sequence ends after edge-type '${pending.text}' without a net` : undefined;
    },
  };
}

// node edge node edge node ..., each edge joining one device and one net
function walk(draft: GraphDraft, catalog: Catalog): Machine {
  let prev: DeviceToken | NetToken | undefined;
  let pending: EdgeToken | undefined;
  return {
    step(tok) {
      if (tok.kind === "edge") {
        if (!prev) return `Sequence starts with edge-type '${tok.text}'`;
        if (pending) return `Edge-type '${pending.text}' is followed by edge-type '${tok.text}'`;
        pending = tok;
        return undefined;
      }
      if (prev && !pending) return `Node '${tok.text}' follows node '${prev.text}' without an edge-type`;
      if (tok.kind === "device") addDevice(draft, tok.text, tok.device);
      if (prev && pending) {
        const device = tok.kind === "device" ? tok : prev.kind === "device" ? prev : undefined;
        const net = tok.kind === "net" ? tok : prev.kind === "net" ? prev : undefined;
        if (!device || !net) return `Edge-type '${pending.text}' joins '${prev.text}' and '${tok.text}', not a device and a net`;
        if (pending.device !== device.device) return `Edge-type '${pending.text}' does not belong to ${device.text} (${device.device})`;
        bindEdge(draft, catalog, addDevice(draft, device.text, device.device), pending, net);
        pending = undefined;
      }
      prev = tok;
      return undefined;
    },
    finish() {
      return pending ? `Sequence ends after edge-type '${pending.text}'` : undefined;
    },
  };
}

/**
 * Parses one token sequence into a ParsedGraph. A leading circuit-type token
 * sets the category; the first truncate token ends the sequence. Malformed
 * streams come back as a ParseError, never as an exception.
 */
export function parseSequence(
  stream: TokenStream,
  catalog: Catalog,
  grammar: Grammar = "device_major",
): Result<ParsedGraph, ParseError> {
  const draft = newGraph();
  const machine = grammar === "walk" ? walk(draft, catalog) : deviceMajor(draft, catalog);
  let position = -1;
  let tokenCount = 0;
  let category: string | undefined;
  let last: string | undefined;

  const fail = (reason: string, token?: string): Result<ParsedGraph, ParseError> =>
    err({ reason, position: position >= 0 ? position : undefined, token, category, tokenCount });

  for (let text = stream.next(); text !== undefined; text = stream.next()) {
    position += 1;
    const c = classifyToken(catalog, text);
    if (!c.ok) return fail(describeClassifyError(text, c.error), text);
    const tok = c.value;
    if (tok.kind === "truncate") break;
    if (tok.kind === "circuit") {
      if (position !== 0) return fail(`Circuit-type token '${text}' is only allowed first`, text);
      category = tok.category;
      continue;
    }
    tokenCount += 1;
    last = text;
    const reason = machine.step(tok);
    if (reason) return fail(reason, text);
  }

  const reason = machine.finish();
  if (reason) return fail(reason, last);
  if (draft.devices.size === 0) return fail(tokenCount === 0 ? "Sequence is empty" : "Sequence has no device tokens");
  return ok(finishGraph(draft, tokenCount, category));
}

export function parseSequenceText(text: string, catalog: Catalog, grammar: Grammar = "device_major"): Result<ParsedGraph, ParseError> {
  return parseSequence(textTokenStream(text), catalog, grammar);
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 3) {
  const input = process.argv[2];
  const grammar: Grammar = process.argv[3] === "walk" ? "walk" : "device_major";
  const res = parseSequenceText(fs.readFileSync(input, "utf8"), loadCatalog(), grammar);
  if (!res.ok) {
    console.error(`sequence_parse: ${res.error.reason}`);
    process.exit(1);
  }
  const g = res.value;
  console.error(`sequence_parse: devices=${g.devices.size} nets=${g.nets.size} tokens=${g.tokenCount}`);
  process.stdout.write(JSON.stringify({ category: g.category, devices: [...g.devices.values()], nets: [...g.nets.values()] }, null, 2));
}
