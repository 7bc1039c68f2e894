import { expect } from "chai";

import { RustSyntaxError, type RustExpr } from "@chainset/syntax";

import { BlockContents } from "./block.js";

function blockFailure(text: string, anchor?: { fileName: string; start: number }): RustSyntaxError {
  try {
    BlockContents.parse(text, anchor);
  } catch (error) {
    if (error instanceof RustSyntaxError) return error;
    throw error;
  }
  throw new Error(`expected '${text}' to fail parsing`);
}

describe("@chainset/derive block contents", () => {
  it("re-emits parsed statements as a brace-delimited token stream", () => {
    expect(BlockContents.parse("let x = 2; { x+1 }").toString()).to.equal("{ let x = 2 ; { x + 1 } }");
    expect(BlockContents.parse("42").toString()).to.equal("{ 42 }");
  });

  it("treats an empty fragment as an empty block", () => {
    const empty = BlockContents.parse("");
    expect(empty.isEmpty()).to.equal(true);
    expect(empty.toString()).to.equal("{}");
    expect(BlockContents.parse("  \n ").isEmpty()).to.equal(true);
    expect(BlockContents.parse("42").isEmpty()).to.equal(false);
  });

  it("reports an unbalanced fragment as a lex error at the anchor", () => {
    const error = blockFailure("let x = 2; { x+1", { fileName: "lib.rs", start: 40 });
    expect(error.code).to.equal("CHN1004");
    expect(error.message).to.equal("lex error: unclosed delimiter '{'");
    expect(error.span).to.deep.equal({ fileName: "lib.rs", start: 40, end: 41 });
  });

  it("maps parse errors to their offset inside the string literal", () => {
    const error = blockFailure("let = 1;", { fileName: "lib.rs", start: 100 });
    expect(error.code).to.equal("CHN1101");
    expect(error.span?.start).to.equal(105);
  });

  it("requires the block to consume the whole fragment", () => {
    const error = blockFailure("} {");
    expect(error.code).to.equal("CHN1103");
    expect(error.message).to.equal("unexpected '{' after block");
  });

  it("wraps a single expression without a semicolon", () => {
    const expr: RustExpr = { kind: "binary", op: "+", left: { kind: "lit", text: "1" }, right: { kind: "lit", text: "2" } };
    const block = BlockContents.fromExpr(expr);
    expect(block.isEmpty()).to.equal(false);
    expect(block.stmts).to.have.length(1);
    expect(block.toString()).to.equal("{ 1 + 2 }");
  });

  it("re-emits idempotently", () => {
    const once = BlockContents.parse("if a { return Err(e)?; } for i in 0..n { total += i; }").toString();
    expect(once).to.equal("{ if a { return Err (e) ? ; } for i in 0 .. n { total += i ; } }");
    expect(BlockContents.parse(once.slice(1, -1)).toString()).to.equal(once);
  });

  it("accepts nested items and attributed statements", () => {
    expect(BlockContents.parse("use std::fmt::Write; x").toString()).to.equal("{ use std :: fmt :: Write ; x }");
    expect(BlockContents.parse("#[allow(unused)] let y = 1;").toString()).to.equal(
      "{ # [allow (unused)] let y = 1 ; }"
    );
    const helper = BlockContents.parse("fn helper() -> u8 { 1 } helper()");
    expect(helper.stmts.map((stmt) => stmt.kind)).to.deep.equal(["item", "expr"]);
    expect(helper.toString()).to.equal("{ fn helper () -> u8 { 1 } helper () }");
  });

  it("keeps match arms without commas as written", () => {
    expect(BlockContents.parse("match x { Some(y) => { y } None => 0 }").toString()).to.equal(
      "{ match x { Some (y) => { y } None => 0 } }"
    );
  });

  it("rejects inner attributes", () => {
    const error = blockFailure("#![allow(unused)] x");
    expect(error.code).to.equal("CHN1104");
    expect(error.span?.start).to.equal(1);
  });

  it("is immutable", () => {
    const block = BlockContents.parse("a; b");
    expect(Object.isFrozen(block)).to.equal(true);
    expect(Object.isFrozen(block.stmts)).to.equal(true);
  });
});
