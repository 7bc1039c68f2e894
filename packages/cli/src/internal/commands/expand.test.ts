import { expect } from "chai";
import { mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { parseExpandArgs, runExpand } from "./expand.js";

const INPUT = "#[derive(Builder)]\nstruct A { x: u8 }\n";

function setter(prefix: string): string {
  return [
    "impl A {",
    `  ${prefix}fn x<VALUE: Into<u8>>(&mut self, value: VALUE) -> &mut Self {`,
    "    self.x = value.into();",
    "    self",
    "  }",
    "}",
  ].join("\n");
}

const EXPANDED = `#[derive(Builder)]\nstruct A { x: u8 }\n${setter("pub ")}\n`;

function project(): string {
  const dir = mkdtempSync(join(tmpdir(), "chainset-expand-"));
  writeFileSync(join(dir, "model.rs"), INPUT, "utf-8");
  return dir;
}

function capture(): { readonly lines: string[]; readonly deps: { stdout: (t: string) => void; log: (l: string) => void } } {
  const lines: string[] = [];
  return { lines, deps: { stdout: (t) => lines.push(t), log: (l) => lines.push(l) } };
}

describe("@chainset/cli expand", () => {
  it("parses args and resolves paths against dir", () => {
    const parsed = parseExpandArgs({
      dir: "/repo",
      argv: ["src/model.rs", "--out", "gen/model.rs", "--config", "cfg/chainset.json", "--check"],
    });
    expect(parsed).to.deep.equal({
      inputPath: "/repo/src/model.rs",
      outPath: "/repo/gen/model.rs",
      configPath: "/repo/cfg/chainset.json",
      check: true,
    });
  });

  it("rejects bad args", () => {
    expect(() => parseExpandArgs({ dir: "/repo", argv: [] })).to.throw("expand: missing required <input.rs>");
    expect(() => parseExpandArgs({ dir: "/repo", argv: ["a.rs", "--out"] })).to.throw(
      "expand: --out requires a value"
    );
    expect(() => parseExpandArgs({ dir: "/repo", argv: ["a.rs", "--nope"] })).to.throw("expand: unknown arg: --nope");
    expect(() => parseExpandArgs({ dir: "/repo", argv: ["a.rs", "b.rs"] })).to.throw(
      "expand: unexpected extra input: b.rs"
    );
    expect(() => parseExpandArgs({ dir: "/repo", argv: ["a.rs", "--check"] })).to.throw(
      "expand: --check requires --out <file>"
    );
  });

  it("writes the expanded text to stdout without --out", () => {
    const dir = project();
    const { lines, deps } = capture();
    expect(runExpand({ dir, argv: ["model.rs"] }, deps)).to.deep.equal(["A"]);
    expect(lines).to.deep.equal([EXPANDED]);
  });

  it("writes --out and reports the expanded types", () => {
    const dir = project();
    const { lines, deps } = capture();
    runExpand({ dir, argv: ["model.rs", "--out", "model.gen.rs"] }, deps);
    expect(readFileSync(join(dir, "model.gen.rs"), "utf-8")).to.equal(EXPANDED);
    expect(lines).to.deep.equal(["Wrote model.gen.rs (A)."]);
  });

  it("--check passes when --out is current and fails otherwise", () => {
    const dir = project();
    const { lines, deps } = capture();
    const argv = ["model.rs", "--out", "model.gen.rs", "--check"];

    expect(() => runExpand({ dir, argv }, deps)).to.throw("expand: model.gen.rs is out of date.");

    writeFileSync(join(dir, "model.gen.rs"), EXPANDED, "utf-8");
    runExpand({ dir, argv }, deps);
    expect(lines).to.deep.equal(["model.gen.rs is up to date."]);

    writeFileSync(join(dir, "model.gen.rs"), INPUT, "utf-8");
    expect(() => runExpand({ dir, argv }, deps)).to.throw("expand: model.gen.rs is out of date.");
  });

  it("applies chainset.json found beside the input", () => {
    const dir = project();
    writeFileSync(join(dir, "chainset.json"), JSON.stringify({ schema: 1, setterVisibility: "private" }), "utf-8");
    const { lines, deps } = capture();
    runExpand({ dir, argv: ["model.rs"] }, deps);
    expect(lines).to.deep.equal([`#[derive(Builder)]\nstruct A { x: u8 }\n${setter("")}\n`]);
  });

  it("applies an explicit --config", () => {
    const dir = project();
    writeFileSync(join(dir, "setters.json"), JSON.stringify({ schema: 1, marker: "Setters" }), "utf-8");
    const { lines, deps } = capture();
    expect(runExpand({ dir, argv: ["model.rs", "--config", "setters.json"] }, deps)).to.deep.equal([]);
    expect(lines).to.deep.equal([INPUT]);
  });
});
