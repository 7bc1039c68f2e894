import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

import { DEFAULT_FORWARDED_ATTRIBUTES, DEFAULT_MARKER, SETTER_VISIBILITIES, type ExpandOptions, type SetterVisibility } from "@chainset/derive";

export const CONFIG_FILE_NAME = "chainset.json";

export type ChainsetConfig = {
  readonly schema: 1;
  readonly marker: string;
  readonly setterVisibility: SetterVisibility;
  readonly valueParam: string;
  readonly forwardAttributes: readonly string[];
};

export const DEFAULT_CONFIG: ChainsetConfig = {
  schema: 1,
  marker: DEFAULT_MARKER,
  setterVisibility: "pub",
  valueParam: "VALUE",
  forwardAttributes: DEFAULT_FORWARDED_ATTRIBUTES,
};

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${label} must be a JSON object.`);
  }
  return Object.fromEntries(Object.entries(value));
}

function assertKnownKeys(value: Record<string, unknown>, allowed: readonly string[], label: string): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      throw new Error(`${label}: unknown key '${key}'.`);
    }
  }
}

function asIdentifier(value: unknown, label: string): string {
  if (typeof value !== "string" || !IDENTIFIER.test(value)) {
    throw new Error(`${label} must be an identifier.`);
  }
  return value;
}

function asStringArray(value: unknown, label: string): readonly string[] {
  if (!Array.isArray(value)) {
    throw new Error(`${label} must be an array of non-empty strings.`);
  }
  const out: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string" || entry.length === 0) {
      throw new Error(`${label} must be an array of non-empty strings.`);
    }
    out.push(entry);
  }
  return out;
}

function asSetterVisibility(value: unknown, label: string): SetterVisibility {
  const found = SETTER_VISIBILITIES.find((v) => v === value);
  if (found === undefined) {
    throw new Error(`${label} must be one of ${SETTER_VISIBILITIES.map((v) => `'${v}'`).join(", ")}.`);
  }
  return found;
}

export function parseChainsetConfig(value: unknown): ChainsetConfig {
  const root = asRecord(value, CONFIG_FILE_NAME);
  assertKnownKeys(root, ["schema", "marker", "setterVisibility", "valueParam", "forwardAttributes"], CONFIG_FILE_NAME);

  if (root.schema !== 1) {
    throw new Error(`Unsupported ${CONFIG_FILE_NAME} schema.`);
  }

  return {
    schema: 1,
    marker: root.marker === undefined ? DEFAULT_CONFIG.marker : asIdentifier(root.marker, `${CONFIG_FILE_NAME}: 'marker'`),
    setterVisibility:
      root.setterVisibility === undefined
        ? DEFAULT_CONFIG.setterVisibility
        : asSetterVisibility(root.setterVisibility, `${CONFIG_FILE_NAME}: 'setterVisibility'`),
    valueParam:
      root.valueParam === undefined
        ? DEFAULT_CONFIG.valueParam
        : asIdentifier(root.valueParam, `${CONFIG_FILE_NAME}: 'valueParam'`),
    forwardAttributes:
      root.forwardAttributes === undefined
        ? DEFAULT_CONFIG.forwardAttributes
        : asStringArray(root.forwardAttributes, `${CONFIG_FILE_NAME}: 'forwardAttributes'`),
  };
}

function readJson(path: string): unknown {
  const raw = readFileSync(path, "utf-8");
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`${path}: invalid JSON (${reason}).`);
  }
}

export function findConfigFile(fromDir: string): string | undefined {
  let cur = resolve(fromDir);
  while (true) {
    const candidate = join(cur, CONFIG_FILE_NAME);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(cur);
    if (parent === cur) return undefined;
    cur = parent;
  }
}

export function loadConfig(path: string): ChainsetConfig {
  return parseChainsetConfig(readJson(path));
}

// An explicit path wins; otherwise the nearest chainset.json above the input, or the defaults.
export function resolveConfig(inputDir: string, explicitPath?: string): ChainsetConfig {
  if (explicitPath !== undefined) return loadConfig(explicitPath);
  const found = findConfigFile(inputDir);
  return found ? loadConfig(found) : DEFAULT_CONFIG;
}

export function toExpandOptions(config: ChainsetConfig, fileName: string): ExpandOptions {
  return {
    fileName,
    marker: config.marker,
    setterVisibility: config.setterVisibility,
    valueParam: config.valueParam,
    forwardAttributes: config.forwardAttributes,
  };
}
