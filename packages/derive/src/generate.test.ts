import { expect } from "chai";

import { parseTypeDeclaration } from "@chainset/syntax";

import { ShapeError } from "./errors.js";
import { generateBuilder, writeBuilderImpl, type BuilderOptions } from "./generate.js";

function expand(text: string, options?: BuilderOptions): string {
  return writeBuilderImpl(generateBuilder(parseTypeDeclaration(text), options));
}

function shapeFailure(text: string): ShapeError {
  try {
    generateBuilder(parseTypeDeclaration(text));
  } catch (error) {
    if (error instanceof ShapeError) return error;
    throw error;
  }
  throw new Error(`expected '${text}' to be rejected`);
}

describe("@chainset/derive builder generator", () => {
  it("writes one chained setter per field", () => {
    const text = [
      "struct Lorem<T: Clone> where T: Default {",
      "    /// The ipsum.",
      "    ipsum: String,",
      "    #[serde(skip)]",
      "    pub dolor: Option<T>,",
      "}",
    ].join("\n");
    expect(expand(text)).to.equal(
      [
        "impl<T: Clone> Lorem<T> where T: Default {",
        "  /// The ipsum.",
        "  pub fn ipsum<VALUE: Into<String>>(&mut self, value: VALUE) -> &mut Self {",
        "    self.ipsum = value.into();",
        "    self",
        "  }",
        "",
        "  pub fn dolor<VALUE: Into<Option<T>>>(&mut self, value: VALUE) -> &mut Self {",
        "    self.dolor = value.into();",
        "    self",
        "  }",
        "}",
      ].join("\n")
    );
  });

  it("applies setter visibility and the value parameter name", () => {
    const crate = expand("struct A { x: u8 }", { setterVisibility: "pub(crate)", valueParam: "V" });
    expect(crate.split("\n")[1]).to.equal("  pub(crate) fn x<V: Into<u8>>(&mut self, value: V) -> &mut Self {");
    const hidden = expand("struct A { x: u8 }", { setterVisibility: "private" });
    expect(hidden.split("\n")[1]).to.equal("  fn x<VALUE: Into<u8>>(&mut self, value: VALUE) -> &mut Self {");
  });

  it("renames the value parameter when the type already declares it", () => {
    const generated = generateBuilder(parseTypeDeclaration("struct Wrap<VALUE> { inner: VALUE }"));
    expect(generated.valueParam).to.equal("VALUE0");
    expect(writeBuilderImpl(generated).split("\n").slice(0, 2)).to.deep.equal([
      "impl<VALUE> Wrap<VALUE> {",
      "  pub fn inner<VALUE0: Into<VALUE>>(&mut self, value: VALUE0) -> &mut Self {",
    ]);
  });

  it("passes lifetimes and const parameters through the self type", () => {
    const impl = expand("struct Buf<'a, const N: usize> { data: &'a [u8; N] }");
    expect(impl.split("\n").slice(0, 2)).to.deep.equal([
      "impl<'a, const N: usize> Buf<'a, N> {",
      "  pub fn data<VALUE: Into<&'a [u8; N]>>(&mut self, value: VALUE) -> &mut Self {",
    ]);
  });

  it("builds the impl header from the split generics", () => {
    const generated = generateBuilder(parseTypeDeclaration("struct Lorem<'a, T: Clone = u8> where T: Default { x: &'a T }"));
    expect(generated.generics).to.deep.equal({
      implGenerics: "<'a, T: Clone>",
      tyGenerics: "<'a, T>",
      whereClause: "where T: Default",
    });
    expect(writeBuilderImpl(generated).split("\n")[0]).to.equal("impl<'a, T: Clone> Lorem<'a, T> where T: Default {");
    const narrowed = { ...generated, generics: { implGenerics: "<'a, T>", tyGenerics: "<'a, T>", whereClause: "" } };
    expect(writeBuilderImpl(narrowed).split("\n")[0]).to.equal("impl<'a, T> Lorem<'a, T> {");
  });

  it("writes an empty impl for a struct without fields", () => {
    expect(expand("struct Empty {}")).to.equal("impl Empty {\n}");
  });

  it("rejects every shape but a named-field struct", () => {
    const tuple = shapeFailure("struct Pair(u8, u8);");
    expect(tuple.code).to.equal("CHN2001");
    expect(tuple.domain).to.equal("shape");
    expect(tuple.message).to.equal("Builder can only be derived for structs with named fields; 'Pair' is a tuple struct");
    expect(shapeFailure("struct Unit;").code).to.equal("CHN2002");
    expect(shapeFailure("enum E { A }").code).to.equal("CHN2003");
    expect(shapeFailure("union U { a: u8 }").code).to.equal("CHN2004");
  });
});
