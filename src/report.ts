import type { ParseError, ParsedGraph } from "./circuit_graph.js";
import {
  describeViolations,
  RULE_KEYS,
  RULE_NAMES,
  type ErcVerdict,
  type IsolatedDevice,
  type MissingPins,
  type PinConflict,
  type RuleKey,
  type UnderConnectedNet,
} from "./erc.js";

export const NO_TYPE = "NO_TYPE";

export type ItemError = {
  kind: "parse" | "io";
  reason: string;
  position?: number;
  token?: string;
};

export type ItemViolations = {
  rule1: IsolatedDevice[];
  rule2: MissingPins[];
  rule3: PinConflict[];
  rule4: UnderConnectedNet[];
};

export type ItemRecord = {
  source: string;
  category: string;
  parse_ok: boolean;
  token_count: number;
  rule1: boolean | null;
  rule2: boolean | null;
  rule3: boolean | null;
  rule4: boolean | null;
  overall: boolean;
  violation_count: number;
  error: ItemError | null;
  violations: ItemViolations | null;
  messages: string[];
};

export type CategoryCounts = {
  total: number;
  pass: number;
  rule_fail: number;
  parse_fail: number;
  io_error: number;
  rule1_fail: number;
  rule2_fail: number;
  rule3_fail: number;
  rule4_fail: number;
};

export type Sample = {
  source: string;
  category: string;
  sequence?: string;
  messages: string[];
};

export type WorstItem = {
  source: string;
  category: string;
  token_count: number;
  violations: number;
};

/** Batch accumulator. One owner mutates it; partial results combine through mergeStatistics. */
export type Statistics = {
  byCategory: Map<string, CategoryCounts>;
  overall: CategoryCounts;
  lengths: { count: number; sum: number; min: number; max: number };
  violationDistribution: Map<number, number>;
  violationsByRule: Record<RuleKey, number>;
  deviceViolations: Map<string, number>;
  worst: WorstItem[];
  samples: Sample[];
  sampleLimit: number;
};

const WORST_LIMIT = 10;

const FAIL_KEY = {
  rule1: "rule1_fail",
  rule2: "rule2_fail",
  rule3: "rule3_fail",
  rule4: "rule4_fail",
} as const satisfies Record<RuleKey, keyof CategoryCounts>;

function emptyCounts(): CategoryCounts {
  return {
    total: 0,
    pass: 0,
    rule_fail: 0,
    parse_fail: 0,
    io_error: 0,
    rule1_fail: 0,
    rule2_fail: 0,
    rule3_fail: 0,
    rule4_fail: 0,
  };
}

export function createStatistics(categories: readonly string[], sampleLimit = 5): Statistics {
  return {
    byCategory: new Map(categories.map((c) => [c, emptyCounts()])),
    overall: emptyCounts(),
    lengths: { count: 0, sum: 0, min: 0, max: 0 },
    violationDistribution: new Map(),
    violationsByRule: { rule1: 0, rule2: 0, rule3: 0, rule4: 0 },
    deviceViolations: new Map(),
    worst: [],
    samples: [],
    sampleLimit,
  };
}

function ruleResult(verdict: ErcVerdict, key: RuleKey): boolean | null {
  const status = verdict[key].status;
  return status === "skipped" ? null : status === "pass";
}

export function recordFromVerdict(source: string, category: string, graph: ParsedGraph, verdict: ErcVerdict): ItemRecord {
  const violations: ItemViolations = {
    rule1: verdict.rule1.violations,
    rule2: verdict.rule2.violations,
    rule3: verdict.rule3.violations,
    rule4: verdict.rule4.violations,
  };
  return {
    source,
    category,
    parse_ok: true,
    token_count: graph.tokenCount,
    rule1: ruleResult(verdict, "rule1"),
    rule2: ruleResult(verdict, "rule2"),
    rule3: ruleResult(verdict, "rule3"),
    rule4: ruleResult(verdict, "rule4"),
    overall: verdict.passed,
    violation_count: RULE_KEYS.reduce((n, k) => n + violations[k].length, 0),
    error: null,
    violations,
    messages: describeViolations(verdict),
  };
}

export function recordFromParseError(source: string, category: string, e: ParseError): ItemRecord {
  return {
    source,
    category,
    parse_ok: false,
    token_count: e.tokenCount,
    rule1: null,
    rule2: null,
    rule3: null,
    rule4: null,
    overall: false,
    violation_count: 0,
    error: { kind: "parse", reason: e.reason, position: e.position, token: e.token },
    violations: null,
    messages: [e.reason],
  };
}

export function recordFromIoError(source: string, category: string, reason: string): ItemRecord {
  return {
    source,
    category,
    parse_ok: false,
    token_count: 0,
    rule1: null,
    rule2: null,
    rule3: null,
    rule4: null,
    overall: false,
    violation_count: 0,
    error: { kind: "io", reason },
    violations: null,
    messages: [reason],
  };
}

function bump<K>(m: Map<K, number>, key: K, by = 1): void {
  m.set(key, (m.get(key) ?? 0) + by);
}

function countInto(c: CategoryCounts, r: ItemRecord): void {
  c.total += 1;
  if (r.error?.kind === "io") {
    c.io_error += 1;
    return;
  }
  if (!r.parse_ok) {
    c.parse_fail += 1;
    return;
  }
  if (r.overall) c.pass += 1;
  else c.rule_fail += 1;
  for (const k of RULE_KEYS) {
    if (r[k] === false) c[FAIL_KEY[k]] += 1;
  }
}

function addCounts(into: CategoryCounts, from: CategoryCounts): void {
  into.total += from.total;
  into.pass += from.pass;
  into.rule_fail += from.rule_fail;
  into.parse_fail += from.parse_fail;
  into.io_error += from.io_error;
  into.rule1_fail += from.rule1_fail;
  into.rule2_fail += from.rule2_fail;
  into.rule3_fail += from.rule3_fail;
  into.rule4_fail += from.rule4_fail;
}

function addLength(stats: Statistics, n: number): void {
  const l = stats.lengths;
  l.min = l.count === 0 ? n : Math.min(l.min, n);
  l.max = l.count === 0 ? n : Math.max(l.max, n);
  l.count += 1;
  l.sum += n;
}

function keepWorst(list: WorstItem[]): WorstItem[] {
  return [...list].sort((a, b) => b.violations - a.violations).slice(0, WORST_LIMIT);
}

function categoryCounts(stats: Statistics, category: string): CategoryCounts {
  let c = stats.byCategory.get(category);
  if (!c) {
    c = emptyCounts();
    stats.byCategory.set(category, c);
  }
  return c;
}

function devicesOf(v: ItemViolations): string[] {
  return [...v.rule1.map((x) => x.device), ...v.rule2.map((x) => x.device), ...v.rule3.map((x) => x.device)];
}

/** Folds one item into the accumulator. `sequence` is kept for the samples file. */
export function recordItem(stats: Statistics, record: ItemRecord, sequence?: string): void {
  countInto(categoryCounts(stats, record.category), record);
  countInto(stats.overall, record);
  if (record.error?.kind !== "io") addLength(stats, record.token_count);

  if (record.parse_ok && record.violations) {
    bump(stats.violationDistribution, record.violation_count);
    for (const k of RULE_KEYS) stats.violationsByRule[k] += record.violations[k].length;
    for (const d of devicesOf(record.violations)) bump(stats.deviceViolations, d);
    if (record.violation_count > 0) {
      stats.worst = keepWorst([
        ...stats.worst,
        { source: record.source, category: record.category, token_count: record.token_count, violations: record.violation_count },
      ]);
    }
  }

  if (!record.overall && stats.samples.length < stats.sampleLimit) {
    stats.samples.push({ source: record.source, category: record.category, sequence, messages: record.messages });
  }
}

/** Combines two accumulators into a new one; neither input is modified. */
export function mergeStatistics(a: Statistics, b: Statistics): Statistics {
  const out = createStatistics([], a.sampleLimit);
  for (const s of [a, b]) {
    for (const [cat, c] of s.byCategory) addCounts(categoryCounts(out, cat), c);
    addCounts(out.overall, s.overall);
    if (s.lengths.count > 0) {
      const l = out.lengths;
      l.min = l.count === 0 ? s.lengths.min : Math.min(l.min, s.lengths.min);
      l.max = l.count === 0 ? s.lengths.max : Math.max(l.max, s.lengths.max);
      l.count += s.lengths.count;
      l.sum += s.lengths.sum;
    }
    for (const [n, c] of s.violationDistribution) bump(out.violationDistribution, n, c);
    for (const k of RULE_KEYS) out.violationsByRule[k] += s.violationsByRule[k];
    for (const [d, c] of s.deviceViolations) bump(out.deviceViolations, d, c);
    out.worst = keepWorst([...out.worst, ...s.worst]);
    out.samples.push(...s.samples.slice(0, Math.max(0, out.sampleLimit - out.samples.length)));
  }
  return out;
}

/** pass / total as an exact fraction, or null when there is nothing to divide by. */
export function passRate(c: CategoryCounts): number | null {
  return c.total === 0 ? null : c.pass / c.total;
}

export function formatPercent(k: number, n: number): string {
  return n === 0 ? "N/A" : `${((100 * k) / n).toFixed(1)}%`;
}

export type CategoryReport = CategoryCounts & { pass_rate: number | null };

export type Report = {
  input: string;
  per_item: ItemRecord[];
  by_category: Record<string, CategoryReport>;
  overall: CategoryReport;
  buckets: { valid: number; rule_violation: number; unparseable: number };
  summary: {
    total_items: number;
    total_violations: number;
    avg_violations: number;
    sequence_length: { avg: number; min: number; max: number };
    violations_by_rule: Record<RuleKey, number>;
    violation_distribution: Record<string, number>;
    device_violations: Record<string, number>;
    worst_items: WorstItem[];
  };
};

function withRate(c: CategoryCounts): CategoryReport {
  return { ...c, pass_rate: passRate(c) };
}

function sortedRecord<K extends string | number>(m: ReadonlyMap<K, number>, byCount: boolean): Record<string, number> {
  const entries = [...m.entries()];
  if (byCount) entries.sort((a, b) => b[1] - a[1]);
  else entries.sort((a, b) => Number(a[0]) - Number(b[0]));
  return Object.fromEntries(entries.map(([k, v]) => [String(k), v]));
}

export function buildReport(input: string, records: readonly ItemRecord[], stats: Statistics): Report {
  const by_category: Record<string, CategoryReport> = {};
  for (const [cat, c] of stats.byCategory) by_category[cat] = withRate(c);
  const totalViolations = RULE_KEYS.reduce((n, k) => n + stats.violationsByRule[k], 0);
  const parsed = stats.overall.pass + stats.overall.rule_fail;
  const l = stats.lengths;
  return {
    input,
    per_item: [...records],
    by_category,
    overall: withRate(stats.overall),
    buckets: {
      valid: stats.overall.pass,
      rule_violation: stats.overall.rule_fail,
      unparseable: stats.overall.parse_fail + stats.overall.io_error,
    },
    summary: {
      total_items: stats.overall.total,
      total_violations: totalViolations,
      avg_violations: parsed === 0 ? 0 : totalViolations / parsed,
      sequence_length: { avg: l.count === 0 ? 0 : l.sum / l.count, min: l.min, max: l.max },
      violations_by_rule: { ...stats.violationsByRule },
      violation_distribution: sortedRecord(stats.violationDistribution, false),
      device_violations: sortedRecord(stats.deviceViolations, true),
      worst_items: [...stats.worst],
    },
  };
}

function row(cells: readonly string[]): string {
  const [name, ...rest] = cells;
  return [name.padEnd(20), ...rest.map((c) => c.padStart(10))].join(" ");
}

function countsRow(name: string, c: CategoryCounts): string {
  return row([name, String(c.total), String(c.pass), String(c.rule_fail), String(c.parse_fail + c.io_error), formatPercent(c.pass, c.total)]);
}

/** Console summary: per-category table with a TOTAL line, the three buckets, then the per-rule breakdown. */
export function formatSummaryTable(stats: Statistics): string[] {
  const o = stats.overall;
  const lines = [row(["Category", "Total", "Pass", "Rule fail", "Unparsed", "Pass rate"])];
  for (const [cat, c] of stats.byCategory) lines.push(countsRow(cat, c));
  lines.push(countsRow("TOTAL", o));
  lines.push("");
  lines.push(`Valid: ${o.pass} (${formatPercent(o.pass, o.total)})`);
  lines.push(`Invalid (rule violation): ${o.rule_fail} (${formatPercent(o.rule_fail, o.total)})`);
  const unparsed = o.parse_fail + o.io_error;
  lines.push(`Invalid (unsupported/unparseable): ${unparsed} (${formatPercent(unparsed, o.total)})`);
  lines.push("");
  RULE_KEYS.forEach((k, i) => {
    const failed = o[FAIL_KEY[k]];
    lines.push(`Rule ${i + 1} ${RULE_NAMES[k]}: ${failed} failing (${formatPercent(failed, o.total)}), ${stats.violationsByRule[k]} violations`);
  });
  return lines;
}

export function formatViolationSamples(stats: Statistics): string {
  const blocks = stats.samples.map((s) => {
    const lines = [`=== ${s.source} [${s.category}] ===`];
    if (s.sequence !== undefined) lines.push(`Sequence: ${s.sequence}`);
    for (const m of s.messages) lines.push(`- ${m}`);
    return lines.join("\n");
  });
  return blocks.length === 0 ? "No failing items.\n" : `${blocks.join("\n\n")}\n`;
}
