import { expect } from "chai";
import { readFileSync, readdirSync, statSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import {
  assertDiagnosticCode,
  DIAGNOSTIC_CODES,
  DiagnosticError,
  diagnosticDomain,
  lexError,
} from "./diagnostics.js";

describe("@chainset/syntax diagnostics registry", () => {
  function packagesRoot(): string {
    const here = fileURLToPath(import.meta.url);
    return resolve(dirname(here), "../..");
  }

  function sourceFiles(): readonly string[] {
    const out: string[] = [];
    const walk = (dir: string): void => {
      for (const entry of readdirSync(dir)) {
        const abs = join(dir, entry);
        if (statSync(abs).isDirectory()) {
          walk(abs);
          continue;
        }
        if (!abs.endsWith(".ts") || abs.endsWith(".test.ts")) continue;
        out.push(abs);
      }
    };
    for (const pkg of ["syntax", "derive"]) walk(join(packagesRoot(), pkg, "src"));
    return out.sort((a, b) => a.localeCompare(b));
  }

  it("keeps codes normalized and unique", () => {
    const values = [...DIAGNOSTIC_CODES];
    expect(new Set(values).size).to.equal(values.length);
    for (const code of values) {
      expect(code).to.match(/^CHN\d{4}$/);
    }
  });

  it("keeps code usage synchronized with the registry", () => {
    const used = new Set<string>();
    for (const file of sourceFiles()) {
      if (file.endsWith("diagnostics.ts")) continue;
      for (const code of readFileSync(file, "utf-8").match(/\bCHN\d{4}\b/g) ?? []) used.add(code);
    }
    expect([...used].sort((a, b) => a.localeCompare(b))).to.deep.equal([...DIAGNOSTIC_CODES].sort((a, b) => a.localeCompare(b)));
  });

  it("rejects unknown codes", () => {
    expect(() => assertDiagnosticCode("CHN9999")).to.throw("Unregistered diagnostic code 'CHN9999'.");
    expect(() => new DiagnosticError("CHN9999", "boom")).to.throw("Unregistered diagnostic code");
  });

  it("maps codes to their domain", () => {
    expect(diagnosticDomain("CHN1004")).to.equal("lex");
    expect(diagnosticDomain("CHN1101")).to.equal("parse");
    expect(diagnosticDomain("CHN2003")).to.equal("shape");
  });

  it("prefixes lex errors", () => {
    const error = lexError("CHN1001", "unexpected character '`'", { fileName: "a.rs", start: 0, end: 1 });
    expect(error.message).to.equal("lex error: unexpected character '`'");
    expect(error.name).to.equal("RustSyntaxError");
    expect(error.domain).to.equal("lex");
  });
});
