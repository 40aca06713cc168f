import { deviceSpec, type Catalog, type DeviceKind } from "./catalog.js";
import type { ParsedGraph } from "./circuit_graph.js";
import type { FaninCount } from "./options.js";

export type IsolatedDevice = { device: string; kind: DeviceKind };
export type MissingPins = { device: string; kind: DeviceKind; missing: string[] };
export type PinConflict = { device: string; pin: string; nets: string[] };
export type UnderConnectedNet = { net: string; incidences: number };

export type RuleStatus = "pass" | "fail" | "skipped";

export type RuleOutcome<V> = {
  status: RuleStatus;
  violations: V[];
};

export type ErcVerdict = {
  passed: boolean;
  rule1: RuleOutcome<IsolatedDevice>;
  rule2: RuleOutcome<MissingPins>;
  rule3: RuleOutcome<PinConflict>;
  rule4: RuleOutcome<UnderConnectedNet>;
};

export type ErcRunOptions = {
  minFanin: number;
  faninCount: FaninCount;
  shortCircuit: boolean;
};

const DEFAULT_ERC_RUN: ErcRunOptions = { minFanin: 2, faninCount: "pins", shortCircuit: false };

export const RULE_NAMES = {
  rule1: "Node-Edge Pattern",
  rule2: "Required Pins",
  rule3: "Pin-Level Net Uniqueness",
  rule4: "Internal Net Fan-in",
} as const;

export type RuleKey = keyof typeof RULE_NAMES;
export const RULE_KEYS: readonly RuleKey[] = ["rule1", "rule2", "rule3", "rule4"];

// Rule 1: every device carries at least one pin binding.
export function checkNodeEdgePattern(graph: ParsedGraph): IsolatedDevice[] {
  const out: IsolatedDevice[] = [];
  for (const d of graph.devices.values()) {
    if (d.bindings.length === 0) out.push({ device: d.id, kind: d.kind });
  }
  return out;
}

// Rule 2: required − bound, in catalog pin order.
export function checkRequiredPins(graph: ParsedGraph, catalog: Catalog): MissingPins[] {
  const out: MissingPins[] = [];
  for (const d of graph.devices.values()) {
    const bound = new Set(d.bindings.map((b) => b.pin));
    const missing = deviceSpec(catalog, d.kind).pins.filter((p) => !bound.has(p));
    if (missing.length > 0) out.push({ device: d.id, kind: d.kind, missing });
  }
  return out;
}

// Rule 3: at most one distinct net per (device, pin).
export function checkPinUniqueness(graph: ParsedGraph): PinConflict[] {
  const out: PinConflict[] = [];
  for (const d of graph.devices.values()) {
    const nets = new Map<string, string[]>();
    for (const b of d.bindings) {
      const seen = nets.get(b.pin) ?? [];
      if (!seen.includes(b.net)) seen.push(b.net);
      nets.set(b.pin, seen);
    }
    for (const [pin, list] of nets) {
      if (list.length > 1) out.push({ device: d.id, pin, nets: list });
    }
  }
  return out;
}

// Rule 4: internal nets need min_fanin incidences; external nets are exempt.
export function checkInternalFanin(graph: ParsedGraph, options: Pick<ErcRunOptions, "minFanin" | "faninCount">): UnderConnectedNet[] {
  const out: UnderConnectedNet[] = [];
  for (const n of graph.nets.values()) {
    if (n.external) continue;
    const count = options.faninCount === "devices" ? new Set(n.incidences.map((i) => i.device)).size : n.incidences.length;
    if (count < options.minFanin) out.push({ net: n.id, incidences: count });
  }
  return out;
}

function outcome<V>(violations: V[]): RuleOutcome<V> {
  return { status: violations.length === 0 ? "pass" : "fail", violations };
}

function skipped<V>(): RuleOutcome<V> {
  return { status: "skipped", violations: [] };
}

/**
 * Runs the four checks over a parsed graph. All of them run unless
 * `shortCircuit` is set, in which case the checks after the first failing one
 * are reported as skipped.
 */
export function runErc(graph: ParsedGraph, catalog: Catalog, options: ErcRunOptions = DEFAULT_ERC_RUN): ErcVerdict {
  let stop = false;
  const run = <V>(check: () => V[]): RuleOutcome<V> => {
    if (stop) return skipped();
    const o = outcome(check());
    if (options.shortCircuit && o.status === "fail") stop = true;
    return o;
  };
  const rule1 = run(() => checkNodeEdgePattern(graph));
  const rule2 = run(() => checkRequiredPins(graph, catalog));
  const rule3 = run(() => checkPinUniqueness(graph));
  const rule4 = run(() => checkInternalFanin(graph, options));
  return {
    passed: [rule1, rule2, rule3, rule4].every((r) => r.status === "pass"),
    rule1,
    rule2,
    rule3,
    rule4,
  };
}

/** One human-readable line per violation, rule by rule. */
export function describeViolations(verdict: ErcVerdict): string[] {
  return [
    ...verdict.rule1.violations.map((v) => `Device ${v.device} (${v.kind}) has no pin connections`),
    ...verdict.rule2.violations.map((v) => `Device ${v.device} missing required pins: ${v.missing.join(", ")}`),
    ...verdict.rule3.violations.map((v) => `Device ${v.device} pin ${v.pin} connected to multiple nets: ${v.nets.join(", ")}`),
    ...verdict.rule4.violations.map((v) => `Internal net ${v.net} has only ${v.incidences} connection${v.incidences === 1 ? "" : "s"}`),
  ];
}
