import { expect } from "chai";

import { RustSyntaxError } from "../diagnostics.js";
import { emitGenericParams, emitType, emitWhereClause } from "../write.js";
import { parseTypeDeclaration, scanItems } from "./items.js";

function parseFailure(text: string): RustSyntaxError {
  try {
    parseTypeDeclaration(text);
  } catch (error) {
    if (error instanceof RustSyntaxError) return error;
    throw error;
  }
  throw new Error(`expected '${text}' to fail parsing`);
}

describe("@chainset/syntax item parser", () => {
  it("parses a generic named-field struct", () => {
    const decl = parseTypeDeclaration(
      [
        "#[derive(Builder)]",
        "pub struct Lorem<'a, T: Clone = u8, const N: usize> where T: Default {",
        "    /// The ipsum.",
        "    pub ipsum: &'a str,",
        "    dolor: [T; N],",
        "}",
      ].join("\n")
    );
    expect(decl.kind).to.equal("struct");
    expect(decl.name).to.equal("Lorem");
    expect(decl.vis).to.deep.equal({ kind: "pub" });
    expect(decl.attrs.map((a) => a.text)).to.deep.equal(["#[derive(Builder)]"]);
    expect(decl.attrs[0]?.path).to.deep.equal(["derive"]);
    expect(decl.generics.params.map((p) => p.kind)).to.deep.equal(["lifetime", "type", "const"]);
    expect(emitGenericParams(decl.generics.params, { bounds: true })).to.equal("<'a, T: Clone, const N: usize>");
    expect(emitGenericParams(decl.generics.params, { bounds: false })).to.equal("<'a, T, N>");
    expect(emitWhereClause(decl.generics.whereClause)).to.equal("where T: Default");

    if (decl.shape.kind !== "named") throw new Error("expected named fields");
    const [ipsum, dolor] = decl.shape.fields;
    expect(ipsum?.name).to.equal("ipsum");
    expect(ipsum?.vis).to.deep.equal({ kind: "pub" });
    expect(ipsum?.attrs.map((a) => a.text)).to.deep.equal(["/// The ipsum."]);
    expect(ipsum ? emitType(ipsum.type) : "").to.equal("&'a str");
    expect(dolor?.name).to.equal("dolor");
    expect(dolor ? emitType(dolor.type) : "").to.equal("[T; N]");
  });

  it("parses tuple, unit, enum and union declarations", () => {
    const pair = parseTypeDeclaration("struct Pair<T>(pub T, T) where T: Copy;");
    expect(pair.shape.kind).to.equal("tuple");
    expect(pair.shape.kind === "tuple" ? pair.shape.fields.length : 0).to.equal(2);
    expect(pair.generics.whereClause?.length).to.equal(1);

    expect(parseTypeDeclaration("struct Marker;").shape).to.deep.equal({ kind: "unit" });

    const shape = parseTypeDeclaration("enum Shape { Circle { r: f64 }, Square(f64), Empty = 3 }");
    expect(shape.shape).to.deep.equal({ kind: "enum", variants: ["Circle", "Square", "Empty"] });

    const bits = parseTypeDeclaration("union Bits { i: u32, f: f32 }");
    expect(bits.kind).to.equal("union");
    expect(bits.shape.kind === "union" ? bits.shape.fields.map((f) => f.name) : []).to.deep.equal(["i", "f"]);
  });

  it("parses restricted visibility", () => {
    expect(parseTypeDeclaration("pub(crate) struct A;").vis).to.deep.equal({ kind: "pub", restriction: "crate" });
    expect(parseTypeDeclaration("pub(in crate::a) struct B;").vis).to.deep.equal({
      kind: "pub",
      restriction: "in crate::a",
    });
  });

  it("reports trailing tokens and malformed fields", () => {
    const trailing = parseFailure("struct A; struct B;");
    expect(trailing.code).to.equal("CHN1103");
    expect(trailing.message).to.equal("unexpected 'struct' after type declaration");

    const missingColon = parseFailure("struct A { x }");
    expect(missingColon.code).to.equal("CHN1101");
    expect(missingColon.message).to.equal("expected ':', found '}'");

    expect(parseFailure("struct A {").code).to.equal("CHN1004");
  });

  it("splits a file into top-level items", () => {
    const text = [
      "use std::fmt;",
      "#[derive(Builder)]",
      "struct A { x: u8 }",
      "const B: S = S { a: 1 };",
      "fn f() {}",
      "",
    ].join("\n");
    const items = scanItems(text).map((item) => text.slice(item.start, item.end));
    expect(items).to.deep.equal([
      "use std::fmt;",
      "#[derive(Builder)]\nstruct A { x: u8 }",
      "const B: S = S { a: 1 };",
      "fn f() {}",
    ]);
  });

  it("keeps inner attributes as their own items", () => {
    const text = "#![allow(dead_code)]\nstruct A;";
    const items = scanItems(text).map((item) => text.slice(item.start, item.end));
    expect(items).to.deep.equal(["#![allow(dead_code)]", "struct A;"]);
  });

  it("rejects an unterminated final item", () => {
    expect(() => scanItems("struct A")).to.throw(RustSyntaxError, "expected ';' or '}' to end the item");
  });
});
