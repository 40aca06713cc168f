import fs from "fs";
import yaml from "js-yaml";
import { z } from "zod";
import { configPath, die, errorMessage, readText } from "./util.js";

const SegmentSchema = z.union([
  z.object({ tokens: z.array(z.string().min(1)) }),
  z.object({
    prefixes: z.array(z.string().min(1)).min(1),
    from: z.number().int(),
    to: z.number().int(),
  }),
]);

const VocabularyFileSchema = z.union([
  z.object({ segments: z.array(SegmentSchema) }),
  z.array(z.string().min(1)),
  z.record(z.string().regex(/^\d+$/, "vocabulary ids must be non-negative integers"), z.string().min(1)),
]);

export type VocabularyFile = z.infer<typeof VocabularyFileSchema>;

/** Token id -> token text. */
export type Vocabulary = ReadonlyMap<number, string>;

function expandSegments(segments: z.infer<typeof SegmentSchema>[]): string[] {
  const out: string[] = [];
  for (const seg of segments) {
    if ("tokens" in seg) {
      out.push(...seg.tokens);
      continue;
    }
    for (let i = seg.from; i <= seg.to; i += 1) {
      for (const prefix of seg.prefixes) out.push(`${prefix}${i}`);
    }
  }
  return out;
}

export function buildVocabulary(raw: unknown, source = "<inline vocabulary>"): Vocabulary {
  const parsed = VocabularyFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    return die(`Invalid vocabulary ${source}: ${issues}`, source);
  }
  const file = parsed.data;
  if (Array.isArray(file)) return new Map(file.map((t, i) => [i, t]));
  if ("segments" in file && Array.isArray(file.segments)) {
    return new Map(expandSegments(file.segments).map((t, i) => [i, t]));
  }
  const vocab = new Map<number, string>();
  for (const [id, token] of Object.entries(file)) {
    if (typeof token === "string") vocab.set(Number(id), token);
  }
  return vocab;
}

/** Loads a vocabulary from YAML or JSON (both go through the YAML loader). */
export function loadVocabulary(path = configPath("vocabulary.yaml")): Vocabulary {
  if (!fs.existsSync(path)) die(`Vocabulary not found: ${path}`, path);
  let raw: unknown;
  try {
    raw = yaml.load(readText(path));
  } catch (e) {
    return die(`Cannot read vocabulary ${path}: ${errorMessage(e)}`, path);
  }
  return buildVocabulary(raw, path);
}

export function idOf(vocab: Vocabulary, token: string): number | undefined {
  for (const [id, t] of vocab) {
    if (t === token) return id;
  }
  return undefined;
}
