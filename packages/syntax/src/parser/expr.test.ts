import { expect } from "chai";

import { RustSyntaxError } from "../diagnostics.js";
import { printBlock, streamToString } from "../print.js";
import { parseBlock } from "./expr.js";
import { cursorForText, expectEnd } from "./items.js";

function reprint(text: string): string {
  const c = cursorForText(text);
  const block = parseBlock(c);
  expectEnd(c, "block");
  return streamToString([printBlock(block)]);
}

function blockFailure(text: string): RustSyntaxError {
  try {
    reprint(text);
  } catch (error) {
    if (error instanceof RustSyntaxError) return error;
    throw error;
  }
  throw new Error(`expected '${text}' to fail parsing`);
}

describe("@chainset/syntax block parser", () => {
  it("parses statements and nested blocks", () => {
    expect(reprint("{ let x = 2; { x+1 } }")).to.equal("{ let x = 2 ; { x + 1 } }");
  });

  it("ends a statement after a block-like expression", () => {
    expect(reprint("{ if a { b } else { c } *x = 1; }")).to.equal("{ if a { b } else { c } * x = 1 ; }");
  });

  it("parses method chains with turbofish and closures", () => {
    expect(reprint("{ v.iter().map(|x| x * 2).collect::<Vec<_>>() }")).to.equal(
      "{ v . iter () . map (| x | x * 2) . collect :: < Vec < _ > > () }"
    );
  });

  it("parses let-else and let chains", () => {
    expect(reprint("{ let Some(v) = opt else { return; }; if let Ok(n) = r && n > 1 { n } }")).to.equal(
      "{ let Some (v) = opt else { return ; } ; if let Ok (n) = r && n > 1 { n } }"
    );
  });

  it("reprints its own output unchanged", () => {
    const once = reprint(
      "{ match x { Some(ref y) if *y > 0 => y, _ => &0 } 'outer: loop { break 'outer; } Point { x: 1, ..p } }"
    );
    expect(reprint(once)).to.equal(once);
  });

  it("keeps nested items as opaque statements", () => {
    expect(reprint("{ use std::fmt::Write; x }")).to.equal("{ use std :: fmt :: Write ; x }");
    expect(reprint("{ fn helper() -> u8 { 1 } helper() }")).to.equal("{ fn helper () -> u8 { 1 } helper () }");
    expect(reprint("{ pub(crate) const fn one() -> u8 { 1 } one() }")).to.equal(
      "{ pub (crate) const fn one () -> u8 { 1 } one () }"
    );
  });

  it("ends const and static items at their semicolon", () => {
    const c = cursorForText("{ static N: Point = Point { x: 1 }; N }");
    const block = parseBlock(c);
    expect(block.stmts.map((stmt) => stmt.kind)).to.deep.equal(["item", "expr"]);
    expect(streamToString([printBlock(block)])).to.equal("{ static N : Point = Point { x : 1 } ; N }");
  });

  it("keeps outer attributes on statements", () => {
    expect(reprint("{ #[allow(unused)] let y = 1; #[cfg(test)] run(); }")).to.equal(
      "{ # [allow (unused)] let y = 1 ; # [cfg (test)] run () ; }"
    );
    expect(reprint("{ /// note\n let a = 1; }")).to.equal('{ # [doc = " note"] let a = 1 ; }');
  });

  it("rejects inner attributes and unterminated items", () => {
    const inner = blockFailure("{ #![allow(unused)] x }");
    expect(inner.code).to.equal("CHN1104");
    expect(inner.message).to.equal("inner attributes are not supported inside blocks");
    expect(blockFailure("{ struct A }").message).to.equal("expected ';' or '}' to end the item, found '}'");
  });

  it("re-emits only the match-arm commas that were written", () => {
    expect(reprint("{ match x { Some(y) => { y } None => 0 } }")).to.equal("{ match x { Some (y) => { y } None => 0 } }");
    expect(reprint("{ match x { A => 1, B => 2, } }")).to.equal("{ match x { A => 1 , B => 2 , } }");
  });

  it("reports the token where parsing stopped", () => {
    expect(blockFailure("{ let = 1; }").message).to.equal("expected pattern, found '='");
    expect(blockFailure("{ a b }").message).to.equal("expected ';' or '}', found 'b'");
  });
});
