import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

const argv = process.argv.slice(2);

/** Value that follows `--name`; null when the option is missing or has no value. */
export function getArg(name: string): string | null {
  const at = argv.indexOf(`--${name}`);
  const value = at === -1 ? undefined : argv[at + 1];
  return value === undefined || value.startsWith("--") ? null : value;
}

export function hasFlag(name: string): boolean {
  return argv.includes(`--${name}`);
}

export function getArgNumber(name: string, fallback: number): number {
  const raw = getArg(name);
  if (raw === null) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

export function ensureDir(dbPath: string): void {
  if (dbPath === ":memory:") return;
  mkdirSync(dirname(dbPath), { recursive: true });
}
