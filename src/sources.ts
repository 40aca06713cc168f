import fs from "fs";
import path from "path";
import { readNpyFile, npySequences } from "./npy.js";
import { decodeIds, splitSequence } from "./token_stream.js";
import type { Vocabulary } from "./vocabulary.js";
import { ConfigError, die, errorMessage, naturalCompare, readText } from "./util.js";

const SUPPORTED_EXTENSIONS = [".txt", ".npy", ".csv", ".graphml"] as const;

export type InputFile = {
  path: string;
  /** Category taken from an enclosing `Inference_CIRCUIT_<Type>` directory. */
  hint?: string;
};

type ItemBase = { source: string; hint?: string };

export type SourceItem =
  | (ItemBase & { kind: "sequence"; tokens: string[] })
  | (ItemBase & { kind: "adjacency"; text: string })
  | (ItemBase & { kind: "graphml"; text: string })
  | (ItemBase & { kind: "failed"; reason: string });

export type LoadContext = {
  /** Called only when a file holds token ids. */
  vocabulary: () => Vocabulary;
  truncateToken: string;
};

function isSupported(file: string): boolean {
  const ext = path.extname(file).toLowerCase();
  return SUPPORTED_EXTENSIONS.some((e) => e === ext);
}

function categoryDirPattern(circuitTypePrefix: string): RegExp {
  return new RegExp(`^Inference_${circuitTypePrefix.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}(.+)$`);
}

function listDir(dir: string) {
  try {
    return fs.readdirSync(dir, { withFileTypes: true });
  } catch (e) {
    return die(`Cannot read directory ${dir}: ${errorMessage(e)}`, dir);
  }
}

function supportedFiles(dir: string, hint?: string): InputFile[] {
  return listDir(dir)
    .filter((e) => e.isFile() && isSupported(e.name))
    .map((e) => e.name)
    .sort(naturalCompare)
    .map((name) => ({ path: path.join(dir, name), hint }));
}

/**
 * Expands the input path into the files to check. A `Inference_CIRCUIT_<Type>`
 * directory (or one holding such directories) is batch-by-category mode and
 * may be empty; any other directory must hold at least one supported file.
 */
export function discoverInputs(input: string, circuitTypePrefix = "CIRCUIT_"): InputFile[] {
  if (!fs.existsSync(input)) die(`Input path not found: ${input}`, input);
  const pattern = categoryDirPattern(circuitTypePrefix);
  const stat = fs.statSync(input);

  if (stat.isFile()) {
    if (!isSupported(input)) die(`Unsupported input file ${input} (expected ${SUPPORTED_EXTENSIONS.join(", ")})`, input);
    const parent = pattern.exec(path.basename(path.dirname(path.resolve(input))));
    return [{ path: input, hint: parent?.[1] }];
  }
  if (!stat.isDirectory()) die(`Input path is neither a file nor a directory: ${input}`, input);

  const own = pattern.exec(path.basename(path.resolve(input)));
  if (own) return supportedFiles(input, own[1]);

  const categoryDirs = listDir(input)
    .filter((e) => e.isDirectory() && pattern.test(e.name))
    .map((e) => e.name)
    .sort(naturalCompare);
  if (categoryDirs.length > 0) {
    return categoryDirs.flatMap((name) => supportedFiles(path.join(input, name), pattern.exec(name)?.[1]));
  }

  const files = supportedFiles(input);
  if (files.length === 0) die(`No supported input files (${SUPPORTED_EXTENSIONS.join(", ")}) in ${input}`, input);
  return files;
}

// Configuration problems still abort the run; everything else is a per-item failure.
function failureReason(e: unknown): string {
  if (e instanceof ConfigError) throw e;
  return errorMessage(e);
}

function textItems(file: InputFile, text: string): SourceItem[] {
  const lines = text.split(/\r?\n/).map((l) => l.trim()).filter((l) => l.length > 0);
  if (lines.length <= 1) return [{ kind: "sequence", source: file.path, hint: file.hint, tokens: splitSequence(lines[0] ?? "") }];
  return lines.map((l, i): SourceItem => ({ kind: "sequence", source: `${file.path}:${i + 1}`, hint: file.hint, tokens: splitSequence(l) }));
}

function npyItems(file: InputFile, ctx: LoadContext): SourceItem[] {
  const sequences = npySequences(readNpyFile(file.path));
  return sequences.map((seq, i): SourceItem => {
    const source = sequences.length === 1 ? file.path : `${file.path}[${i}]`;
    if (seq.kind === "tokens") return { kind: "sequence", source, hint: file.hint, tokens: seq.tokens };
    const decoded = decodeIds(seq.ids, ctx.vocabulary(), ctx.truncateToken);
    if (!decoded.ok) return { kind: "failed", source, hint: file.hint, reason: decoded.error };
    return { kind: "sequence", source, hint: file.hint, tokens: decoded.value };
  });
}

/** Reads one input file into items. Read and decode failures come back as `failed` items. */
export function loadItems(file: InputFile, ctx: LoadContext): SourceItem[] {
  const ext = path.extname(file.path).toLowerCase();
  try {
    switch (ext) {
      case ".npy":
        return npyItems(file, ctx);
      case ".csv":
        return [{ kind: "adjacency", source: file.path, hint: file.hint, text: readText(file.path) }];
      case ".graphml":
        return [{ kind: "graphml", source: file.path, hint: file.hint, text: readText(file.path) }];
      default:
        return textItems(file, readText(file.path));
    }
  } catch (e) {
    return [{ kind: "failed", source: file.path, hint: file.hint, reason: failureReason(e) }];
  }
}
