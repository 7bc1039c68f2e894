import { expect } from "chai";

import { parseTypeDeclaration } from "@chainset/syntax";

import { forwardedAttributes } from "./attrs.js";
import { namedFields } from "./errors.js";

describe("@chainset/derive attribute forwarding", () => {
  const decl = parseTypeDeclaration(
    [
      "struct S {",
      "    /// Docs.",
      "    #[cfg(test)]",
      '    #[serde(rename = "y")]',
      "    #[allow(dead_code)]",
      "    #[rustfmt::skip]",
      "    x: u8,",
      "}",
    ].join("\n")
  );
  const [field] = namedFields(decl);

  it("keeps doc, cfg and allow attributes verbatim by default", () => {
    expect(forwardedAttributes(field?.attrs ?? []).map((a) => a.text)).to.deep.equal([
      "/// Docs.",
      "#[cfg(test)]",
      "#[allow(dead_code)]",
    ]);
  });

  it("honors a custom allow-list", () => {
    expect(forwardedAttributes(field?.attrs ?? [], ["serde"]).map((a) => a.text)).to.deep.equal([
      '#[serde(rename = "y")]',
    ]);
  });
});
