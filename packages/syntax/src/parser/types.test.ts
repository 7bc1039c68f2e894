import { expect } from "chai";

import type { RustType } from "../ast.js";
import { RustSyntaxError } from "../diagnostics.js";
import { typeToString } from "../print.js";
import { emitType } from "../write.js";
import { cursorForText, expectEnd } from "./items.js";
import { parseType } from "./types.js";

function type(text: string): RustType {
  const c = cursorForText(text);
  const parsed = parseType(c);
  expectEnd(c, "type");
  return parsed;
}

describe("@chainset/syntax type parser", () => {
  it("parses nested generic types and closes `>>` as two lists", () => {
    const parsed = type("Vec<Option<&'a mut [u8; 4]>>");
    expect(emitType(parsed)).to.equal("Vec<Option<&'a mut [u8; 4]>>");
    expect(typeToString(parsed)).to.equal("Vec < Option < & 'a mut [u8 ; 4] > >");
  });

  it("parses trait-object and impl-trait bounds", () => {
    expect(emitType(type("impl Fn(u8) -> bool + Send"))).to.equal("impl Fn(u8) -> bool + Send");
    expect(emitType(type("Box<dyn for<'a> Fn(&'a str) + 'static>"))).to.equal("Box<dyn for<'a> Fn(&'a str) + 'static>");
  });

  it("parses qualified paths, pointers and function pointers", () => {
    expect(emitType(type("<T as Iterator>::Item"))).to.equal("<T as Iterator>::Item");
    expect(emitType(type("*const T"))).to.equal("*const T");
    expect(emitType(type('unsafe extern "C" fn(i32) -> !'))).to.equal('unsafe extern "C" fn(i32) -> !');
  });

  it("distinguishes one-element tuples from parenthesized types", () => {
    expect(type("(u8,)").kind).to.equal("tuple");
    expect(emitType(type("(u8,)"))).to.equal("(u8,)");
    expect(type("(u8)").kind).to.equal("paren");
    expect(emitType(type("()"))).to.equal("()");
  });

  it("parses const generic arguments and array lengths as expressions", () => {
    expect(emitType(type("[u8; N * 2]"))).to.equal("[u8; N * 2]");
    expect(emitType(type("Foo<'a, N = u8, { N + 1 }, 3>"))).to.equal("Foo<'a, N = u8, { N + 1 }, 3>");
  });

  it("reports a missing type at end of input", () => {
    expect(() => type("&")).to.throw(RustSyntaxError, "expected type, found end of input");
  });
});
