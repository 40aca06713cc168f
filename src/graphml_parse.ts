import fs from "fs";
import { pathToFileURL } from "url";
import { XMLParser } from "fast-xml-parser";
import { classifyToken, describeClassifyError, loadCatalog, type Catalog, type Token } from "./catalog.js";
import { addDevice, bindEdge, finishGraph, newGraph, type ParseError, type ParsedGraph } from "./circuit_graph.js";
import { asArray, err, errorMessage, isRecord, ok, type Result } from "./util.js";

export type GraphmlNode = {
  id: string;
  label?: string;
  attrs: Record<string, string>;
};

export type GraphmlEdge = {
  id?: string;
  source: string;
  target: string;
  label?: string;
  attrs: Record<string, string>;
};

export type GraphmlGraph = {
  nodes: GraphmlNode[];
  edges: GraphmlEdge[];
};

function extractText(val: unknown): string | undefined {
  if (val === undefined || val === null) return undefined;
  if (typeof val === "string" || typeof val === "number" || typeof val === "boolean") {
    return String(val);
  }
  if (isRecord(val)) {
    const text = val["#text"];
    if (text !== undefined && text !== null) return String(text);
  }
  return undefined;
}

function findLabelDeep(val: unknown): string | undefined {
  const scalar = extractText(val);
  if (scalar) return scalar;
  if (!isRecord(val)) return undefined;

  for (const key of ["y:NodeLabel", "y:EdgeLabel", "y:Label"]) {
    if (val[key] !== undefined) {
      const nested = findLabelDeep(val[key]);
      if (nested) return nested;
    }
  }
  for (const [k, v] of Object.entries(val)) {
    if (k.startsWith("@_")) continue;
    if (Array.isArray(v)) {
      for (const item of v) {
        const nested = findLabelDeep(item);
        if (nested) return nested;
      }
      continue;
    }
    const nested = findLabelDeep(v);
    if (nested) return nested;
  }
  return undefined;
}

function attribute(val: unknown, name: string): string | undefined {
  if (!isRecord(val)) return undefined;
  const v = val[`@_${name}`];
  return v === undefined || v === null ? undefined : String(v);
}

function children(val: unknown, name: string): unknown[] {
  if (!isRecord(val)) return [];
  return asArray<unknown>(val[name]);
}

function dataAttrs(items: unknown[], keyMap: ReadonlyMap<string, string>): Record<string, string> {
  const attrs: Record<string, string> = {};
  for (const d of items) {
    const key = attribute(d, "key");
    const value = extractText(d);
    if (key && value !== undefined) attrs[keyMap.get(key) ?? key] = value;
  }
  return attrs;
}

function firstLabel(items: unknown[]): string | undefined {
  for (const d of items) {
    if (extractText(d) !== undefined) continue;
    const label = findLabelDeep(d);
    if (label) return label;
  }
  return undefined;
}

function parseNode(n: unknown, keyMap: ReadonlyMap<string, string>): GraphmlNode {
  const items = children(n, "data");
  const attrs = dataAttrs(items, keyMap);
  return { id: attribute(n, "id") ?? "", label: firstLabel(items) ?? attrs.label ?? attrs.name, attrs };
}

function parseEdge(e: unknown, keyMap: ReadonlyMap<string, string>): GraphmlEdge {
  const items = children(e, "data");
  return {
    id: attribute(e, "id"),
    source: attribute(e, "source") ?? "",
    target: attribute(e, "target") ?? "",
    label: firstLabel(items),
    attrs: dataAttrs(items, keyMap),
  };
}

export function parseGraphml(text: string): GraphmlGraph {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
  });
  const doc: unknown = parser.parse(text);
  const graphml = isRecord(doc) ? doc.graphml : undefined;
  if (!isRecord(graphml)) {
    return { nodes: [], edges: [] };
  }

  const keyMap = new Map<string, string>();
  for (const k of children(graphml, "key")) {
    const keyId = attribute(k, "id");
    const attrName = attribute(k, "attr.name");
    if (keyId && attrName) keyMap.set(keyId, attrName);
  }

  const nodeMap = new Map<string, GraphmlNode>();
  const edgeMap = new Map<string, GraphmlEdge>();

  const visitGraph = (g: unknown): void => {
    for (const n of children(g, "node")) {
      const parsed = parseNode(n, keyMap);
      if (parsed.id) nodeMap.set(parsed.id, parsed);
      for (const nested of children(n, "graph")) {
        visitGraph(nested);
      }
    }
    for (const e of children(g, "edge")) {
      const parsed = parseEdge(e, keyMap);
      if (!parsed.source || !parsed.target) continue;
      const key = parsed.id ?? `${parsed.source}->${parsed.target}::${edgeLabel(parsed) ?? ""}`;
      edgeMap.set(key, parsed);
    }
  };

  for (const g of children(graphml, "graph")) visitGraph(g);
  return { nodes: Array.from(nodeMap.values()), edges: Array.from(edgeMap.values()) };
}

function edgeLabel(e: GraphmlEdge): string | undefined {
  return e.attrs.type ?? e.attrs.pin ?? e.attrs.label ?? e.label;
}

function nodeToken(nodes: ReadonlyMap<string, GraphmlNode>, id: string): string {
  const n = nodes.get(id);
  return n?.attrs.name ?? n?.label ?? id;
}

/**
 * Builds a ParsedGraph from a GraphML circuit: each edge joins a device node
 * and a net node and carries its edge-type label in a `type`, `pin` or `label`
 * data attribute.
 */
export function graphFromGraphml(graph: GraphmlGraph, catalog: Catalog): Result<ParsedGraph, ParseError> {
  const draft = newGraph();
  const fail = (reason: string, token?: string): Result<ParsedGraph, ParseError> =>
    err({ reason, token, tokenCount: draft.devices.size + 2 * draft.bindingCount });
  const nodes = new Map(graph.nodes.map((n) => [n.id, n]));

  for (const n of graph.nodes) {
    const text = nodeToken(nodes, n.id);
    const c = classifyToken(catalog, text);
    if (!c.ok) return fail(`Node: ${describeClassifyError(text, c.error)}`, text);
    if (c.value.kind === "device") addDevice(draft, c.value.text, c.value.device);
    else if (c.value.kind !== "net") return fail(`Node '${text}' is not a device or net`, text);
  }

  for (const e of graph.edges) {
    const ends = [nodeToken(nodes, e.source), nodeToken(nodes, e.target)];
    const classified: Token[] = [];
    for (const text of ends) {
      const c = classifyToken(catalog, text);
      if (!c.ok) return fail(`Edge end: ${describeClassifyError(text, c.error)}`, text);
      classified.push(c.value);
    }
    const device = classified.find((t) => t.kind === "device");
    const net = classified.find((t) => t.kind === "net");
    if (!device || device.kind !== "device" || !net || net.kind !== "net") {
      return fail(`Edge ${ends.join(" - ")} does not join a device and a net`, ends[0]);
    }
    const label = edgeLabel(e);
    if (!label) return fail(`Edge ${ends.join(" - ")} has no edge-type`, ends[0]);
    const c = classifyToken(catalog, label);
    if (!c.ok) return fail(`Edge ${ends.join(" - ")}: ${describeClassifyError(label, c.error)}`, label);
    const edge = c.value;
    if (edge.kind !== "edge") return fail(`Edge ${ends.join(" - ")} is labelled '${label}', not an edge-type`, label);
    if (edge.device !== device.device) return fail(`Edge-type '${label}' does not belong to ${device.text} (${device.device})`, label);
    bindEdge(draft, catalog, addDevice(draft, device.text, device.device), edge, net);
  }

  if (draft.devices.size === 0) return fail("GraphML graph has no device nodes");
  return ok(finishGraph(draft, draft.devices.size + 2 * draft.bindingCount));
}

/** Malformed XML comes back as a ParseError like any other structural failure. */
export function parseGraphmlCircuit(text: string, catalog: Catalog): Result<ParsedGraph, ParseError> {
  let graph: GraphmlGraph;
  try {
    graph = parseGraphml(text);
  } catch (e) {
    return err({ reason: `Malformed GraphML: ${errorMessage(e)}`, tokenCount: 0 });
  }
  return graphFromGraphml(graph, catalog);
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const input = process.argv[2];
  const output = process.argv[3];
  const graph = parseGraphml(fs.readFileSync(input, "utf8"));
  fs.writeFileSync(output, JSON.stringify(graph, null, 2), "utf8");
  console.error(`graphml_parse: nodes=${graph.nodes.length} edges=${graph.edges.length}`);
  const res = graphFromGraphml(graph, loadCatalog());
  if (!res.ok) console.error(`graphml_parse: ${res.error.reason}`);
}
