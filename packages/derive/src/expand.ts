import {
  Cursor,
  expectEnd,
  lastSegmentName,
  parsePath,
  parseItemHead,
  parseTypeDeclaration,
  parseTypeDeclarationFrom,
  scanItems,
  type RustAttribute,
  type SourceItem,
  type Span,
} from "@chainset/syntax";

import { generateBuilder, writeBuilderImpl, type BuilderOptions } from "./generate.js";

export type ExpandOptions = BuilderOptions & {
  // Derive name that requests a builder; matched on the last path segment.
  readonly marker?: string;
  readonly fileName?: string;
};

export type ExpandResult = {
  readonly text: string;
  readonly expanded: readonly string[];
};

export const DEFAULT_MARKER = "Builder";

export function deriveBuilder(input: string, options: ExpandOptions = {}): string {
  const decl = parseTypeDeclaration(input, { fileName: options.fileName ?? "<input>" });
  const impl = generateBuilder(decl, options);
  return `${input}\n${writeBuilderImpl(impl)}`;
}

function attributeCursor(attr: RustAttribute, fallback: Span): Cursor {
  return new Cursor(attr.tokens, attr.span ?? fallback);
}

// Names listed by `#[derive(A, b::C)]`, last segment only.
export function derivedNames(attr: RustAttribute, fallback: Span): string[] {
  if (attr.path.length !== 1 || attr.path[0] !== "derive") return [];
  const c = attributeCursor(attr, fallback);
  c.expectOpen("paren");
  const names: string[] = [];
  while (!c.isClose("paren")) {
    const name = lastSegmentName(parsePath(c, "expr"));
    if (name !== undefined) names.push(name);
    if (!c.eatPunct(",")) break;
  }
  c.expectClose("paren");
  expectEnd(c, "derive list");
  return names;
}

const TYPE_KEYWORDS = new Set(["struct", "enum", "union"]);

function itemCursor(text: string, item: SourceItem, fileName: string): Cursor {
  return new Cursor(item.tokens, { fileName, start: item.end, end: item.end }, { text, baseOffset: 0 });
}

function isMarked(c: Cursor, marker: string, eof: Span): boolean {
  const head = parseItemHead(c);
  if (head.keyword === undefined || !TYPE_KEYWORDS.has(head.keyword)) return false;
  if (head.keyword === "union" && !c.isName(1)) return false;
  return head.attrs.some((attr) => derivedNames(attr, eof).includes(marker));
}

export function expandSource(text: string, options: ExpandOptions = {}): ExpandResult {
  const fileName = options.fileName ?? "<input>";
  const marker = options.marker ?? DEFAULT_MARKER;
  const expanded: string[] = [];
  let out = "";
  let copied = 0;
  for (const item of scanItems(text, { fileName })) {
    const c = itemCursor(text, item, fileName);
    const eof: Span = { fileName, start: item.end, end: item.end };
    if (!isMarked(c, marker, eof)) continue;
    c.reset(0);
    const decl = parseTypeDeclarationFrom(c);
    expectEnd(c, "type declaration");
    const impl = generateBuilder(decl, options);
    out += `${text.slice(copied, item.end)}\n${writeBuilderImpl(impl)}`;
    copied = item.end;
    expanded.push(decl.name);
  }
  out += text.slice(copied);
  return { text: out, expanded };
}
