import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseKV, intArg, floatArg, intListArg, strArg, loadConfig } from "../../../apps/cli/src/parse.js";

describe("CLI argument parsing", () => {
  it("reads --key=value pairs and bare flags", () => {
    const kv = parseKV(["--iters=20", "--lr=0.1", "--verbose", "positional"]);
    expect(kv).toEqual({ iters: "20", lr: "0.1", verbose: "true" });
  });

  it("falls back to defaults for missing keys", () => {
    const kv = parseKV(["--iters=20", "--lr=0.1"]);
    expect(intArg(kv, "iters", 5)).toBe(20);
    expect(intArg(kv, "seed", 42)).toBe(42);
    expect(floatArg(kv, "lr", 0.5)).toBe(0.1);
    expect(strArg(kv, "log", "info")).toBe("info");
  });

  it("parses comma-separated layer widths", () => {
    expect(intListArg(parseKV(["--layers=8, 4,1"]), "layers", [2])).toEqual([8, 4, 1]);
    expect(intListArg({}, "layers", [4, 1])).toEqual([4, 1]);
  });
});

describe("config file merge", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "valuegraph-cli-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns the arguments unchanged without --config", async () => {
    expect(await loadConfig({ iters: "3" })).toEqual({ iters: "3" });
  });

  it("flattens arrays to comma lists and lets the command line win", async () => {
    const path = join(dir, "train.json");
    await writeFile(path, JSON.stringify({ layers: [8, 1], iters: 5 }));

    const kv = await loadConfig(parseKV([`--config=${path}`, "--iters=7"]));
    expect(kv["layers"]).toBe("8,1");
    expect(kv["iters"]).toBe("7");
    expect(intListArg(kv, "layers", [2])).toEqual([8, 1]);

    const fromFile = await loadConfig(parseKV([`--config=${path}`]));
    expect(fromFile["iters"]).toBe("5");
  });

  it("rejects a file that is not a JSON object", async () => {
    const path = join(dir, "list.json");
    await writeFile(path, "[1, 2]");
    await expect(loadConfig({ config: path })).rejects.toThrow(`Config file ${path} must contain a JSON object`);
  });
});
