import { expect } from "chai";
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { DEFAULT_CONFIG, findConfigFile, loadConfig, parseChainsetConfig, resolveConfig, toExpandOptions } from "./config.js";

function writeJson(path: string, value: unknown): void {
  writeFileSync(path, JSON.stringify(value, null, 2) + "\n", "utf-8");
}

describe("@chainset/cli config", () => {
  it("findConfigFile picks the nearest chainset.json", () => {
    const root = mkdtempSync(join(tmpdir(), "chainset-config-find-"));
    const nested = join(root, "crates", "demo");
    const deep = join(nested, "src", "model");
    mkdirSync(deep, { recursive: true });
    writeJson(join(root, "chainset.json"), { schema: 1 });
    writeJson(join(nested, "chainset.json"), { schema: 1 });

    expect(findConfigFile(deep)).to.equal(join(nested, "chainset.json"));
    expect(findConfigFile(root)).to.equal(join(root, "chainset.json"));
  });

  it("fills missing keys with defaults", () => {
    expect(parseChainsetConfig({ schema: 1 })).to.deep.equal(DEFAULT_CONFIG);
    expect(parseChainsetConfig({ schema: 1, valueParam: "V" }).valueParam).to.equal("V");
  });

  it("loads every key from disk", () => {
    const root = mkdtempSync(join(tmpdir(), "chainset-config-load-"));
    const path = join(root, "chainset.json");
    writeJson(path, {
      schema: 1,
      marker: "Setters",
      setterVisibility: "pub(crate)",
      valueParam: "V",
      forwardAttributes: ["doc"],
    });

    expect(loadConfig(path)).to.deep.equal({
      schema: 1,
      marker: "Setters",
      setterVisibility: "pub(crate)",
      valueParam: "V",
      forwardAttributes: ["doc"],
    });
  });

  it("rejects unknown keys and schemas", () => {
    expect(() => parseChainsetConfig({ schema: 1, extra: true })).to.throw("chainset.json: unknown key 'extra'.");
    expect(() => parseChainsetConfig({ schema: 2 })).to.throw("Unsupported chainset.json schema.");
    expect(() => parseChainsetConfig([])).to.throw("chainset.json must be a JSON object.");
  });

  it("type-checks each key with a labelled message", () => {
    expect(() => parseChainsetConfig({ schema: 1, setterVisibility: "public" })).to.throw(
      "chainset.json: 'setterVisibility' must be one of 'pub', 'pub(crate)', 'private'."
    );
    expect(() => parseChainsetConfig({ schema: 1, valueParam: "1V" })).to.throw(
      "chainset.json: 'valueParam' must be an identifier."
    );
    expect(() => parseChainsetConfig({ schema: 1, forwardAttributes: ["doc", ""] })).to.throw(
      "chainset.json: 'forwardAttributes' must be an array of non-empty strings."
    );
  });

  it("reports malformed JSON with the file path", () => {
    const root = mkdtempSync(join(tmpdir(), "chainset-config-bad-"));
    const path = join(root, "chainset.json");
    writeFileSync(path, "{ schema: 1 }\n", "utf-8");
    expect(() => loadConfig(path)).to.throw(`${path}: invalid JSON`);
  });

  it("prefers an explicit path over the directory lookup", () => {
    const root = mkdtempSync(join(tmpdir(), "chainset-config-resolve-"));
    const explicit = join(root, "other.json");
    writeJson(join(root, "chainset.json"), { schema: 1, marker: "Found" });
    writeJson(explicit, { schema: 1, marker: "Explicit" });

    expect(resolveConfig(root).marker).to.equal("Found");
    expect(resolveConfig(root, explicit).marker).to.equal("Explicit");
  });

  it("turns a config into expansion options", () => {
    expect(toExpandOptions(DEFAULT_CONFIG, "lib.rs")).to.deep.equal({
      fileName: "lib.rs",
      marker: "Builder",
      setterVisibility: "pub",
      valueParam: "VALUE",
      forwardAttributes: ["doc", "cfg", "allow"],
    });
  });
});
