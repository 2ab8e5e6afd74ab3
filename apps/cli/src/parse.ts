/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */
import { readFile } from "node:fs/promises";

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

export function requireArg(kv: Record<string, string>, key: string, label?: string): string {
  const val = kv[key];
  if (!val) {
    throw new Error(`Missing required argument: --${key}${label ? ` (${label})` : ""}`);
  }
  return val;
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

export function boolArg(kv: Record<string, string>, key: string, defaultVal: boolean): boolean {
  const val = kv[key];
  if (!val) return defaultVal;
  return val === "true" || val === "1";
}

/** Comma-separated integers, e.g. `--ngrams=3,4,5`. */
export function intListArg(kv: Record<string, string>, key: string): number[] | undefined {
  const val = kv[key];
  if (val === undefined) return undefined;
  if (val.trim() === "") return [];
  return val.split(",").map((part) => parseInt(part.trim(), 10));
}

function flagValue(value: unknown): string {
  if (Array.isArray(value)) return value.map(flagValue).join(",");
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * Flatten a JSON object into flag strings, the same shape `parseKV` returns.
 * Arrays become comma-separated lists.
 */
export function configToKV(config: unknown): Record<string, string> {
  if (config === null || typeof config !== "object" || Array.isArray(config)) {
    throw new Error("Config file must contain a JSON object");
  }
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(config)) {
    if (value !== undefined && value !== null) result[key] = flagValue(value);
  }
  return result;
}

/** Load a JSON config file and merge with CLI overrides. */
export async function loadConfig(kv: Record<string, string>): Promise<Record<string, string>> {
  const configPath = kv["config"];
  if (!configPath) return kv;
  const raw = await readFile(configPath, "utf-8");
  const config = configToKV(JSON.parse(raw));
  // CLI overrides take precedence
  return { ...config, ...kv };
}
