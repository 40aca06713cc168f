import fs from "fs";
import { fileURLToPath } from "url";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Raised for problems with the run itself (missing catalog entries, bad rule
 * files, unknown input paths). The only error class that aborts a batch.
 */
export class ConfigError extends Error {
  public readonly code = "CONFIG_ERROR";
  public readonly resource?: string;

  constructor(message: string, resource?: string) {
    super(message);
    this.name = "ConfigError";
    this.resource = resource;
  }
}

/** Malformed `.npy` or pickle payload; the loader turns it into a per-item io record. */
export class NpyFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NpyFormatError";
  }
}

export function die(msg: string, resource?: string): never {
  throw new ConfigError(msg, resource);
}

export function readText(path: string): string {
  return fs.readFileSync(path, "utf8");
}

export function writeText(path: string, data: string): void {
  try {
    fs.writeFileSync(path, data, "utf8");
  } catch (e) {
    die(`Cannot write ${path}: ${errorMessage(e)}`, path);
  }
}

export function asArray<T>(v: T | T[] | undefined | null): T[] {
  if (v === undefined || v === null) return [];
  return Array.isArray(v) ? v : [v];
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Absolute path of a file under the package's config/ directory. */
export function configPath(name: string): string {
  return fileURLToPath(new URL(`../config/${name}`, import.meta.url));
}

export function naturalCompare(a: string, b: string): number {
  return a.localeCompare(b, "en", { numeric: true });
}
