import type { RustAttribute, Token } from "../ast.js";
import { tokensToString } from "../print.js";
import type { Cursor } from "./cursor.js";

function attributeText(c: Cursor, start: number, path: readonly string[], tokens: readonly Token[]): string {
  const fromSource = c.textBetween(start, c.index);
  if (fromSource !== undefined) return fromSource;
  const rest = tokens.length > 0 ? ` ${tokensToString(tokens)}` : "";
  return `#[${path.join("::")}${rest}]`;
}

function parseAttribute(c: Cursor): RustAttribute {
  const start = c.index;
  c.expectPunct("#");
  if (!c.isOpen("bracket")) throw c.fail("'['");
  const group = c.takeGroup();
  const path: string[] = [];
  let i = 0;
  while (true) {
    const token = group.tokens[i];
    if (token?.kind !== "ident") break;
    path.push(token.text);
    i++;
    const a = group.tokens[i];
    const b = group.tokens[i + 1];
    if (a?.kind === "punct" && a.text === ":" && a.joint && b?.kind === "punct" && b.text === ":") {
      i += 2;
      continue;
    }
    break;
  }
  if (path.length === 0) throw c.fail("attribute path", group.tokens[0]);
  const tokens = group.tokens.slice(i);
  return { style: "outer", path, tokens, text: attributeText(c, start, path, tokens), span: c.spanFrom(start) };
}

export function parseOuterAttributes(c: Cursor): RustAttribute[] {
  const attrs: RustAttribute[] = [];
  while (c.isPunct("#") && !c.isPunct("#!")) {
    attrs.push(parseAttribute(c));
  }
  return attrs;
}
