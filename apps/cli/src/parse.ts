/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */

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

export function intArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  const val = kv[key];
  return val ? parseInt(val, 10) : defaultVal;
}

export function floatArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  const val = kv[key];
  return val ? parseFloat(val) : defaultVal;
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

/** Comma-separated integers, e.g. `--layers=4,4,1`. */
export function intListArg(kv: Record<string, string>, key: string, defaultVal: readonly number[]): number[] {
  const val = kv[key];
  if (!val) return [...defaultVal];
  return val.split(",").map((s) => parseInt(s.trim(), 10));
}

/** Load a JSON config file and merge with CLI overrides. */
export async function loadConfig(kv: Record<string, string>): Promise<Record<string, string>> {
  const configPath = kv["config"];
  if (!configPath) return kv;
  const fs = await import("node:fs/promises");
  const raw = await fs.readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Config file ${configPath} must contain a JSON object`);
  }
  const config: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    config[key] = Array.isArray(value) ? value.join(",") : String(value);
  }
  // CLI overrides take precedence
  return { ...config, ...kv };
}
