import fs from "fs";
import yaml from "js-yaml";
import { pathToFileURL } from "url";
import { z } from "zod";
import { configPath, die, errorMessage, err, ok, readText, type Result } from "./util.js";

export const DEVICE_KINDS = [
  "MOSFET",
  "BJT",
  "RESISTOR",
  "CAPACITOR",
  "INDUCTOR",
  "DIODE",
  "INVERTER",
  "XOR",
  "PFD",
  "TRANSMISSION_GATE",
] as const;

export type DeviceKind = (typeof DEVICE_KINDS)[number];

const DeviceEntrySchema = z.object({
  prefixes: z.array(z.string().min(1)).min(1),
  edge_prefix: z.string().min(1),
  pins: z.array(z.string().min(1)).min(1),
  pin_aliases: z.record(z.string(), z.string()).default({}),
  combined_edges: z.boolean().default(false),
  terminal_alias: z.string().min(1).optional(),
});

export const CatalogSchema = z.object({
  truncate_token: z.string().min(1).default("TRUNCATE"),
  circuit_type_prefix: z.string().min(1).default("CIRCUIT_"),
  circuit_types: z.array(z.string().min(1)).min(1),
  device_types: z.record(z.string(), DeviceEntrySchema),
  nets: z.object({
    supplies: z.array(z.string()).default(["VDD", "VSS"]),
    ground: z.array(z.string()).default(["0", "GND"]),
    port_prefixes: z.array(z.string().min(1)).default([]),
    internal_patterns: z.array(z.string().min(1)).min(1),
  }),
});

export type CatalogFile = z.infer<typeof CatalogSchema>;

export type DeviceSpec = {
  kind: DeviceKind;
  prefixes: readonly string[];
  edgePrefix: string;
  pins: readonly string[];
  pinAliases: ReadonlyMap<string, string>;
  combinedEdges: boolean;
  terminalAlias?: string;
};

export type Catalog = {
  truncateToken: string;
  circuitTypePrefix: string;
  circuitTypes: readonly string[];
  devices: ReadonlyMap<DeviceKind, DeviceSpec>;
  edgePrefixes: ReadonlyMap<string, DeviceKind>;
  supplies: ReadonlySet<string>;
  ground: ReadonlySet<string>;
  portPattern?: RegExp;
  internalPatterns: readonly RegExp[];
};

/** Where an edge-type token attaches on its device. */
export type EdgeTarget = { kind: "pins"; pins: readonly string[] } | { kind: "terminal" };

export type Token =
  | { kind: "circuit"; text: string; category: string }
  | { kind: "truncate"; text: string }
  | { kind: "device"; text: string; device: DeviceKind }
  | { kind: "edge"; text: string; device: DeviceKind; target: EdgeTarget }
  | { kind: "net"; text: string; external: boolean };

export type TokenKind = Token["kind"];

export type ClassifyError = { reason: "unknown" } | { reason: "ambiguous"; matches: TokenKind[] };

function isDeviceKind(s: string): s is DeviceKind {
  return DEVICE_KINDS.some((k) => k === s);
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compileRegExp(pattern: string, source: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (e) {
    return die(`Invalid net pattern '${pattern}' in ${source}: ${errorMessage(e)}`, source);
  }
}

function compileDevice(kind: DeviceKind, entry: CatalogFile["device_types"][string], source: string): DeviceSpec {
  const pinAliases = new Map<string, string>();
  for (const [alias, pin] of Object.entries(entry.pin_aliases)) {
    if (!entry.pins.includes(pin)) {
      die(`Device type ${kind}: alias '${alias}' points to unknown pin '${pin}' in ${source}`, source);
    }
    pinAliases.set(alias, pin);
  }
  if (new Set(entry.pins).size !== entry.pins.length) {
    die(`Device type ${kind}: duplicate pin roles in ${source}`, source);
  }
  return Object.freeze({
    kind,
    prefixes: Object.freeze([...entry.prefixes]),
    edgePrefix: entry.edge_prefix,
    pins: Object.freeze([...entry.pins]),
    pinAliases,
    combinedEdges: entry.combined_edges,
    terminalAlias: entry.terminal_alias,
  });
}

/** Validates a raw catalog object (as read from YAML) and compiles it. */
export function compileCatalog(raw: unknown, source = "<inline catalog>"): Catalog {
  const parsed = CatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    return die(`Invalid device catalog ${source}: ${issues}`, source);
  }
  const file = parsed.data;

  for (const name of Object.keys(file.device_types)) {
    if (!isDeviceKind(name)) die(`Unknown device type '${name}' in ${source}`, source);
  }

  const devices = new Map<DeviceKind, DeviceSpec>();
  const edgePrefixes = new Map<string, DeviceKind>();
  for (const kind of DEVICE_KINDS) {
    const entry = file.device_types[kind];
    if (!entry) die(`Device catalog ${source} has no entry for ${kind}`, source);
    const spec = compileDevice(kind, entry, source);
    const clash = edgePrefixes.get(spec.edgePrefix);
    if (clash) die(`Edge prefix '${spec.edgePrefix}' used by both ${clash} and ${kind} in ${source}`, source);
    edgePrefixes.set(spec.edgePrefix, kind);
    devices.set(kind, spec);
  }

  const ports = file.nets.port_prefixes.map(escapeRegExp);
  return Object.freeze({
    truncateToken: file.truncate_token,
    circuitTypePrefix: file.circuit_type_prefix,
    circuitTypes: Object.freeze([...file.circuit_types]),
    devices,
    edgePrefixes,
    supplies: new Set(file.nets.supplies),
    ground: new Set(file.nets.ground),
    portPattern: ports.length > 0 ? new RegExp(`^(?:${ports.join("|")})\\d*$`) : undefined,
    internalPatterns: Object.freeze(file.nets.internal_patterns.map((p) => compileRegExp(p, source))),
  });
}

export function loadCatalog(path = configPath("catalog.yaml")): Catalog {
  if (!fs.existsSync(path)) die(`Device catalog not found: ${path}`, path);
  let raw: unknown;
  try {
    raw = yaml.load(readText(path));
  } catch (e) {
    return die(`Cannot read device catalog ${path}: ${errorMessage(e)}`, path);
  }
  return compileCatalog(raw, path);
}

export function deviceSpec(catalog: Catalog, kind: DeviceKind): DeviceSpec {
  const spec = catalog.devices.get(kind);
  if (!spec) return die(`Device catalog has no entry for ${kind}`);
  return spec;
}

function resolvePin(spec: DeviceSpec, name: string): string | undefined {
  return spec.pins.includes(name) ? name : spec.pinAliases.get(name);
}

/** Maps an edge-label suffix (the part after `M_`) onto the device's pins. */
function resolveEdgeSuffix(spec: DeviceSpec, suffix: string): EdgeTarget | undefined {
  const single = resolvePin(spec, suffix);
  if (single) return { kind: "pins", pins: [single] };
  if (spec.terminalAlias === suffix) return { kind: "terminal" };
  if (!spec.combinedEdges || suffix.length < 2) return undefined;
  const pins: string[] = [];
  for (const ch of suffix) {
    const pin = resolvePin(spec, ch);
    if (!pin || pins.includes(pin)) return undefined;
    pins.push(pin);
  }
  return { kind: "pins", pins };
}

function matchDevice(catalog: Catalog, text: string): DeviceKind | undefined {
  for (const spec of catalog.devices.values()) {
    for (const prefix of spec.prefixes) {
      if (text.startsWith(prefix) && /^\d+$/.test(text.slice(prefix.length))) return spec.kind;
    }
  }
  return undefined;
}

function matchEdge(catalog: Catalog, text: string): Token | undefined {
  const cut = text.indexOf("_");
  if (cut <= 0) return undefined;
  const kind = catalog.edgePrefixes.get(text.slice(0, cut));
  if (!kind) return undefined;
  const target = resolveEdgeSuffix(deviceSpec(catalog, kind), text.slice(cut + 1));
  return target ? { kind: "edge", text, device: kind, target } : undefined;
}

function isExternalNet(catalog: Catalog, text: string): boolean {
  return catalog.supplies.has(text) || catalog.ground.has(text) || (catalog.portPattern?.test(text) ?? false);
}

function isInternalNet(catalog: Catalog, text: string): boolean {
  return catalog.internalPatterns.some((re) => re.test(text));
}

/**
 * Classifies one token. Every category is tried (circuit type, truncate,
 * device, edge type, net) and a token matching more than one is rejected as
 * ambiguous.
 */
export function classifyToken(catalog: Catalog, text: string): Result<Token, ClassifyError> {
  const matches: Token[] = [];
  if (text.startsWith(catalog.circuitTypePrefix)) {
    const category = text.slice(catalog.circuitTypePrefix.length);
    if (catalog.circuitTypes.includes(category)) matches.push({ kind: "circuit", text, category });
  }
  if (text === catalog.truncateToken) matches.push({ kind: "truncate", text });
  const device = matchDevice(catalog, text);
  if (device) matches.push({ kind: "device", text, device });
  const edge = matchEdge(catalog, text);
  if (edge) matches.push(edge);
  const external = isExternalNet(catalog, text);
  if (external || isInternalNet(catalog, text)) matches.push({ kind: "net", text, external });

  const [first] = matches;
  if (!first) return err({ reason: "unknown" });
  if (matches.length > 1) return err({ reason: "ambiguous", matches: matches.map((m) => m.kind) });
  return ok(first);
}

export function describeClassifyError(text: string, e: ClassifyError): string {
  if (e.reason === "ambiguous") return `Token '${text}' is ambiguous (matches ${e.matches.join(", ")})`;
  return `Unknown token '${text}'`;
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain) {
  const catalog = loadCatalog(process.argv[2]);
  for (const spec of catalog.devices.values()) {
    console.error(`${spec.kind}: prefixes=${spec.prefixes.join(",")} edge=${spec.edgePrefix}_* pins=${spec.pins.join(",")}`);
  }
}
