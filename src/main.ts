#!/usr/bin/env node
import fs from "fs";
import { pathToFileURL } from "url";
import { parseAdjacencyCsv } from "./adjacency_parse.js";
import { loadCatalog, type Catalog } from "./catalog.js";
import type { ParseError, ParsedGraph } from "./circuit_graph.js";
import { runErc } from "./erc.js";
import { parseGraphmlCircuit } from "./graphml_parse.js";
import { loadErcOptions, type ErcOptions } from "./options.js";
import {
  buildReport,
  createStatistics,
  formatSummaryTable,
  formatViolationSamples,
  NO_TYPE,
  recordFromIoError,
  recordFromParseError,
  recordFromVerdict,
  recordItem,
  type ItemRecord,
  type Statistics,
} from "./report.js";
import { parseSequence, type Grammar } from "./sequence_parse.js";
import { arrayTokenStream } from "./token_stream.js";
import { discoverInputs, loadItems, type SourceItem } from "./sources.js";
import { ConfigError, err, ok, writeText, type Result } from "./util.js";
import { loadVocabulary, type Vocabulary } from "./vocabulary.js";

const USAGE =
  "Usage: circuit-erc <input> [--out FILE] [--rules FILE] [--catalog FILE] [--vocab FILE] " +
  "[--grammar device_major|walk] [--short-circuit] [--samples FILE] [--quiet]";

export type CliArgs = {
  input: string;
  out: string;
  rules?: string;
  catalog?: string;
  vocab?: string;
  grammar?: Grammar;
  shortCircuit: boolean;
  samples?: string;
  quiet: boolean;
};

export function parseCliArgs(argv: readonly string[]): Result<CliArgs, string> {
  const positional: string[] = [];
  const args: Omit<CliArgs, "input"> = { out: "erc_report.json", shortCircuit: false, quiet: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const nextArg: string | undefined = argv[i + 1];
    switch (arg) {
      case "--out":
      case "--rules":
      case "--catalog":
      case "--vocab":
      case "--samples": {
        const v = nextArg;
        i += 1;
        if (!v) return err(`${arg} needs a file argument`);
        if (arg === "--out") args.out = v;
        else if (arg === "--rules") args.rules = v;
        else if (arg === "--catalog") args.catalog = v;
        else if (arg === "--vocab") args.vocab = v;
        else args.samples = v;
        break;
      }
      case "--grammar": {
        const v = nextArg;
        i += 1;
        if (v !== "device_major" && v !== "walk") return err(`--grammar must be device_major or walk, got '${v ?? ""}'`);
        args.grammar = v;
        break;
      }
      case "--short-circuit":
        args.shortCircuit = true;
        break;
      case "--quiet":
        args.quiet = true;
        break;
      default:
        if (arg.startsWith("--")) return err(`Unknown option ${arg}`);
        positional.push(arg);
    }
  }
  if (positional.length !== 1) return err(positional.length === 0 ? "Missing input path" : "Expected a single input path");
  return ok({ input: positional[0], ...args });
}

export type BatchContext = {
  catalog: Catalog;
  options: ErcOptions;
  vocabulary: () => Vocabulary;
  log: (msg: string) => void;
};

export type BatchResult = {
  records: ItemRecord[];
  stats: Statistics;
};

function parseItem(item: Exclude<SourceItem, { kind: "failed" }>, ctx: BatchContext): Result<ParsedGraph, ParseError> {
  switch (item.kind) {
    case "sequence":
      return parseSequence(arrayTokenStream(item.tokens), ctx.catalog, ctx.options.grammar);
    case "adjacency":
      return parseAdjacencyCsv(item.text, ctx.catalog);
    case "graphml":
      return parseGraphmlCircuit(item.text, ctx.catalog);
  }
}

/** Validates one loaded item into its report record. */
export function checkItem(item: SourceItem, ctx: BatchContext): ItemRecord {
  if (item.kind === "failed") return recordFromIoError(item.source, item.hint ?? NO_TYPE, item.reason);
  const parsed = parseItem(item, ctx);
  if (!parsed.ok) return recordFromParseError(item.source, parsed.error.category ?? item.hint ?? NO_TYPE, parsed.error);
  const graph = parsed.value;
  const verdict = runErc(graph, ctx.catalog, {
    minFanin: ctx.options.min_fanin,
    faninCount: ctx.options.fanin_count,
    shortCircuit: ctx.options.short_circuit,
  });
  return recordFromVerdict(item.source, graph.category ?? item.hint ?? NO_TYPE, graph, verdict);
}

export function runBatch(input: string, ctx: BatchContext): BatchResult {
  const files = discoverInputs(input, ctx.catalog.circuitTypePrefix);
  const stats = createStatistics(ctx.catalog.circuitTypes, ctx.options.sample_limit);
  const records: ItemRecord[] = [];
  const every = Math.max(1, Math.floor(files.length / 20));
  ctx.log(`circuit-erc: checking ${files.length} file(s) from ${input}`);
  files.forEach((file, i) => {
    for (const item of loadItems(file, { vocabulary: ctx.vocabulary, truncateToken: ctx.catalog.truncateToken })) {
      const record = checkItem(item, ctx);
      records.push(record);
      recordItem(stats, record, item.kind === "sequence" ? item.tokens.join("->") : undefined);
    }
    if ((i + 1) % every === 0 || i + 1 === files.length) {
      ctx.log(`circuit-erc: ${i + 1}/${files.length} files, ${records.length} items`);
    }
  });
  return { records, stats };
}

/** Runs the checker with command-line arguments; returns the process exit code. */
export function runCli(argv: readonly string[]): number {
  const parsed = parseCliArgs(argv);
  if (!parsed.ok) {
    console.error(`circuit-erc: ${parsed.error}`);
    console.error(USAGE);
    return 1;
  }
  const args = parsed.value;
  const log = args.quiet ? () => undefined : (msg: string) => console.error(msg);
  try {
    const catalog = loadCatalog(args.catalog);
    const fileOptions = loadErcOptions(args.rules);
    const options: ErcOptions = {
      ...fileOptions,
      grammar: args.grammar ?? fileOptions.grammar,
      short_circuit: args.shortCircuit || fileOptions.short_circuit,
    };
    let vocab: Vocabulary | undefined;
    const vocabulary = (): Vocabulary => {
      vocab ??= loadVocabulary(args.vocab);
      return vocab;
    };

    const { records, stats } = runBatch(args.input, { catalog, options, vocabulary, log });
    const report = buildReport(args.input, records, stats);
    writeText(args.out, JSON.stringify(report, null, 2));
    for (const line of formatSummaryTable(stats)) console.log(line);
    log(`circuit-erc: report written to ${args.out}`);
    if (args.samples) {
      writeText(args.samples, formatViolationSamples(stats));
      log(`circuit-erc: violation samples written to ${args.samples}`);
    }
    return 0;
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(`circuit-erc: ${e.message}`);
      return 1;
    }
    throw e;
  }
}

const isMain = !!process.argv[1] && fs.existsSync(process.argv[1]) && import.meta.url === pathToFileURL(fs.realpathSync(process.argv[1])).href;
if (isMain) {
  try {
    process.exitCode = runCli(process.argv.slice(2));
  } catch (e) {
    console.error(e);
    process.exit(1);
  }
}
