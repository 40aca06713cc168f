import fs from "fs";
import { pathToFileURL } from "url";
import { classifyToken, describeClassifyError, loadCatalog, type Catalog, type Token } from "./catalog.js";
import { addDevice, bindEdge, finishGraph, newGraph, type ParseError, type ParsedGraph } from "./circuit_graph.js";
import { err, ok, type Result } from "./util.js";

/** Minimal CSV reader: comma separated, double-quoted fields with "" escapes. */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;
  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i += 1;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
      continue;
    }
    if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i += 1;
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += ch;
    }
  }
  if (field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows.filter((r) => r.some((c) => c.trim().length > 0));
}

/**
 * Builds a ParsedGraph from an adjacency matrix: a header row of column
 * labels, then one row per vertex with edge-type labels in the cells. Both the
 * device x net form and the square symmetric all-vertex form are accepted;
 * rows labelled by nets are skipped.
 */
export function parseAdjacencyCsv(text: string, catalog: Catalog): Result<ParsedGraph, ParseError> {
  const rows = parseCsv(text);
  const [header, ...body] = rows;
  const draft = newGraph();
  const fail = (reason: string, token?: string): Result<ParsedGraph, ParseError> =>
    err({ reason, token, tokenCount: draft.devices.size + 2 * draft.bindingCount });
  if (!header) return fail("Adjacency matrix is empty");

  const columns: Token[] = [];
  for (const label of header.slice(1).map((c) => c.trim())) {
    const c = classifyToken(catalog, label);
    if (!c.ok) return fail(`Column label: ${describeClassifyError(label, c.error)}`, label);
    columns.push(c.value);
  }

  for (const row of body) {
    const label = (row[0] ?? "").trim();
    const c = classifyToken(catalog, label);
    if (!c.ok) return fail(`Row label: ${describeClassifyError(label, c.error)}`, label);
    const rowTok = c.value;
    if (rowTok.kind === "net") continue;
    if (rowTok.kind !== "device") return fail(`Row label '${label}' is not a device or net`, label);
    const device = addDevice(draft, rowTok.text, rowTok.device);

    for (let j = 0; j < columns.length; j += 1) {
      const cell = (row[j + 1] ?? "").trim();
      if (cell === "" || cell === "0") continue;
      const col = columns[j];
      if (col.kind !== "net") return fail(`Cell ${label}/${col.text} connects a device to a non-net '${col.text}'`, cell);
      const e = classifyToken(catalog, cell);
      if (!e.ok) return fail(`Cell ${label}/${col.text}: ${describeClassifyError(cell, e.error)}`, cell);
      const edge = e.value;
      if (edge.kind !== "edge") return fail(`Cell ${label}/${col.text} holds '${cell}', not an edge-type`, cell);
      if (edge.device !== device.kind) return fail(`Edge-type '${cell}' does not belong to ${device.id} (${device.kind})`, cell);
      bindEdge(draft, catalog, device, edge, col);
    }
  }

  if (draft.devices.size === 0) return fail("Adjacency matrix has no device rows");
  return ok(finishGraph(draft, draft.devices.size + 2 * draft.bindingCount));
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 3) {
  const res = parseAdjacencyCsv(fs.readFileSync(process.argv[2], "utf8"), loadCatalog());
  if (!res.ok) {
    console.error(`adjacency_parse: ${res.error.reason}`);
    process.exit(1);
  }
  console.error(`adjacency_parse: devices=${res.value.devices.size} nets=${res.value.nets.size}`);
}
