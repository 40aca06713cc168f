import fs from "fs";
import yaml from "js-yaml";
import { z } from "zod";
import { configPath, die, errorMessage, readText } from "./util.js";

const ErcOptionsSchema = z.object({
  grammar: z.enum(["device_major", "walk"]).default("device_major"),
  short_circuit: z.boolean().default(false),
  min_fanin: z.number().int().min(1).default(2),
  fanin_count: z.enum(["pins", "devices"]).default("pins"),
  sample_limit: z.number().int().min(0).default(5),
});

export type ErcOptions = z.infer<typeof ErcOptionsSchema>;
export type FaninCount = ErcOptions["fanin_count"];

export function parseErcOptions(raw: unknown, source = "<inline options>"): ErcOptions {
  const parsed = ErcOptionsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    return die(`Invalid ERC options ${source}: ${issues}`, source);
  }
  return parsed.data;
}

export function loadErcOptions(path = configPath("erc.yaml")): ErcOptions {
  if (!fs.existsSync(path)) die(`ERC options not found: ${path}`, path);
  let raw: unknown;
  try {
    raw = yaml.load(readText(path));
  } catch (e) {
    return die(`Cannot read ERC options ${path}: ${errorMessage(e)}`, path);
  }
  return parseErcOptions(raw, path);
}
