import { expect } from "chai";

import { RustSyntaxError } from "./diagnostics.js";
import { tokenize, tokenText } from "./lexer.js";

function texts(source: string): string[] {
  return tokenize(source).map(tokenText);
}

function lexFailure(source: string): RustSyntaxError {
  try {
    tokenize(source);
  } catch (error) {
    if (error instanceof RustSyntaxError) return error;
    throw error;
  }
  throw new Error(`expected '${source}' to fail lexing`);
}

describe("@chainset/syntax lexer", () => {
  it("lexes punctuation one character at a time with joint flags", () => {
    const tokens = tokenize("a >>= b");
    expect(tokens.map(tokenText)).to.deep.equal(["a", ">", ">", "=", "b"]);
    expect(tokens.map((t) => (t.kind === "punct" ? t.joint : null))).to.deep.equal([null, true, true, false, null]);
  });

  it("tells lifetimes from character literals", () => {
    const tokens = tokenize("'a 'b' b'c' '\\n'");
    expect(tokens.map((t) => t.kind)).to.deep.equal(["lifetime", "literal", "literal", "literal"]);
    expect(tokens.map(tokenText)).to.deep.equal(["'a", "'b'", "b'c'", "'\\n'"]);
  });

  it("keeps tuple indices apart from float literals", () => {
    expect(texts("t.0.1 + 1.5e3 + 0xffu8")).to.deep.equal(["t", ".", "0", ".", "1", "+", "1.5e3", "+", "0xffu8"]);
    expect(texts("..1.5")).to.deep.equal([".", ".", "1.5"]);
  });

  it("reads raw strings up to the matching hashes", () => {
    expect(texts('r#"a"b"# x')).to.deep.equal(['r#"a"b"#', "x"]);
  });

  it("turns doc comments into doc attribute tokens", () => {
    const tokens = tokenize("/// Hello\nstruct S;");
    expect(tokens.map(tokenText)).to.deep.equal(["#", "[", "doc", "=", '" Hello"', "]", "struct", "S", ";"]);
    expect(tokens[0]?.span).to.deep.equal({ fileName: "<input>", start: 0, end: 9 });
  });

  it("drops plain comments", () => {
    expect(texts("a // note\n/* outer /* nested */ */ b")).to.deep.equal(["a", "b"]);
  });

  it("offsets spans by the base offset", () => {
    const [token] = tokenize("x", { fileName: "lib.rs", baseOffset: 10 });
    expect(token?.span).to.deep.equal({ fileName: "lib.rs", start: 10, end: 11 });
  });

  it("reports unbalanced delimiters", () => {
    const unclosed = lexFailure("{ (a");
    expect(unclosed.code).to.equal("CHN1004");
    expect(unclosed.message).to.equal("lex error: unclosed delimiter '('");
    expect(unclosed.span?.start).to.equal(2);

    const mismatched = lexFailure("(]");
    expect(mismatched.code).to.equal("CHN1006");
    expect(mismatched.message).to.equal("lex error: mismatched closing delimiter ']' (expected ')')");

    expect(lexFailure(")").code).to.equal("CHN1005");
  });

  it("reports malformed literals and comments", () => {
    expect(lexFailure('"abc').message).to.equal("lex error: unterminated string literal");
    expect(lexFailure("/* open").code).to.equal("CHN1003");
    expect(lexFailure("a ` b").code).to.equal("CHN1001");
    expect(lexFailure("a ` b").domain).to.equal("lex");
  });

  it("reads identifiers by whole code points", () => {
    const tokens = tokenize("\u{20000}x: u8");
    expect(tokens.map(tokenText)).to.deep.equal(["\u{20000}x", ":", "u8"]);
    expect(tokens[0]?.span).to.deep.equal({ fileName: "<input>", start: 0, end: 3 });
    expect(texts("'\u{20000}a")).to.deep.equal(["'\u{20000}a"]);
  });

  it("reports an astral character that starts no token whole", () => {
    const error = lexFailure("a \u{1F600}");
    expect(error.message).to.equal("lex error: unexpected character '\u{1F600}'");
    expect(error.span).to.deep.equal({ fileName: "<input>", start: 2, end: 4 });
  });
});
