import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, relative, resolve } from "node:path";

import { expandSource } from "@chainset/derive";

import { resolveConfig, toExpandOptions } from "../config.js";

export type ExpandArgs = {
  readonly dir: string;
  readonly argv: readonly string[];
};

export type ExpandParsed = {
  readonly inputPath: string;
  readonly outPath?: string;
  readonly configPath?: string;
  readonly check: boolean;
};

export type ExpandDeps = {
  readonly stdout?: (text: string) => void;
  readonly log?: (line: string) => void;
};

export function parseExpandArgs(args: ExpandArgs): ExpandParsed {
  let inputPath: string | undefined;
  let outPath: string | undefined;
  let configPath: string | undefined;
  let check = false;

  const it = args.argv[Symbol.iterator]();
  while (true) {
    const next = it.next();
    if (next.done) break;
    const a = next.value;
    switch (a) {
      case "--out": {
        const v = it.next();
        if (v.done) throw new Error("expand: --out requires a value");
        outPath = resolve(args.dir, v.value);
        break;
      }
      case "--config": {
        const v = it.next();
        if (v.done) throw new Error("expand: --config requires a value");
        configPath = resolve(args.dir, v.value);
        break;
      }
      case "--check":
        check = true;
        break;
      case "--help":
      case "-h":
        throw new Error("Usage: chainset expand <input.rs> [--out <file>] [--config <chainset.json>] [--check]");
      default:
        if (a.startsWith("-")) throw new Error(`expand: unknown arg: ${a}`);
        if (inputPath !== undefined) throw new Error(`expand: unexpected extra input: ${a}`);
        inputPath = resolve(args.dir, a);
    }
  }

  if (!inputPath) {
    throw new Error("expand: missing required <input.rs>");
  }
  if (check && !outPath) {
    throw new Error("expand: --check requires --out <file>");
  }

  return { inputPath, outPath, configPath, check };
}

// Returns the names of the expanded types.
export function runExpand(args: ExpandArgs, deps?: ExpandDeps): readonly string[] {
  const parsed = parseExpandArgs(args);
  const stdout = deps?.stdout ?? ((text: string) => process.stdout.write(text));
  const log = deps?.log ?? ((line: string) => console.log(line));

  const config = resolveConfig(dirname(parsed.inputPath), parsed.configPath);
  const source = readFileSync(parsed.inputPath, "utf-8");
  const result = expandSource(source, toExpandOptions(config, parsed.inputPath));

  if (!parsed.outPath) {
    stdout(result.text);
    return result.expanded;
  }

  const shown = relative(args.dir, parsed.outPath) || parsed.outPath;
  if (parsed.check) {
    const current = existsSync(parsed.outPath) ? readFileSync(parsed.outPath, "utf-8") : undefined;
    if (current !== result.text) {
      throw new Error(`expand: ${shown} is out of date.`);
    }
    log(`${shown} is up to date.`);
    return result.expanded;
  }

  writeFileSync(parsed.outPath, result.text, "utf-8");
  const names = result.expanded.length === 0 ? "no builders" : result.expanded.join(", ");
  log(`Wrote ${shown} (${names}).`);
  return result.expanded;
}
