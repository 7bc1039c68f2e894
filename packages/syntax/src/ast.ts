export type Span = {
  readonly fileName: string;
  readonly start: number;
  readonly end: number;
};

export type NodeBase = {
  readonly span?: Span;
};

export type Delimiter = "paren" | "bracket" | "brace";

export type Token =
  | { readonly kind: "ident"; readonly text: string; readonly span: Span }
  | { readonly kind: "lifetime"; readonly text: string; readonly span: Span }
  | { readonly kind: "literal"; readonly text: string; readonly span: Span }
  | { readonly kind: "punct"; readonly text: string; readonly joint: boolean; readonly span: Span }
  | { readonly kind: "open"; readonly delim: Delimiter; readonly span: Span }
  | { readonly kind: "close"; readonly delim: Delimiter; readonly span: Span };

export type RustPath = {
  readonly global: boolean;
  readonly segments: readonly RustPathSegment[];
};

export type RustPathSegment = {
  readonly name: string;
  readonly args?: RustGenericArgs;
};

export type RustGenericArgs =
  | { readonly kind: "angle"; readonly turbofish: boolean; readonly args: readonly RustGenericArg[] }
  | { readonly kind: "paren"; readonly inputs: readonly RustType[]; readonly output?: RustType };

export type RustGenericArg =
  | { readonly kind: "lifetime"; readonly name: string }
  | { readonly kind: "type"; readonly type: RustType }
  | { readonly kind: "const"; readonly expr: RustExpr }
  | { readonly kind: "binding"; readonly name: string; readonly type: RustType }
  | { readonly kind: "constraint"; readonly name: string; readonly bounds: readonly RustBound[] };

export type RustBound =
  | {
      readonly kind: "trait";
      readonly maybe: boolean;
      readonly forLifetimes: readonly string[];
      readonly path: RustPath;
    }
  | { readonly kind: "lifetime"; readonly name: string };

export type RustType =
  | (NodeBase & { readonly kind: "path"; readonly path: RustPath })
  | (NodeBase & {
      readonly kind: "qpath";
      readonly self: RustType;
      readonly trait?: RustPath;
      readonly rest: readonly RustPathSegment[];
    })
  | (NodeBase & {
      readonly kind: "ref";
      readonly lifetime?: string;
      readonly mut: boolean;
      readonly inner: RustType;
    })
  | (NodeBase & { readonly kind: "ptr"; readonly mut: boolean; readonly inner: RustType })
  | (NodeBase & { readonly kind: "slice"; readonly inner: RustType })
  | (NodeBase & { readonly kind: "array"; readonly elem: RustType; readonly len: RustExpr })
  | (NodeBase & { readonly kind: "tuple"; readonly elems: readonly RustType[] })
  | (NodeBase & { readonly kind: "paren"; readonly inner: RustType })
  | (NodeBase & {
      readonly kind: "fn";
      readonly unsafe: boolean;
      readonly abi?: string;
      readonly inputs: readonly RustType[];
      readonly output?: RustType;
    })
  | (NodeBase & { readonly kind: "impl"; readonly bounds: readonly RustBound[] })
  | (NodeBase & { readonly kind: "dyn"; readonly explicit: boolean; readonly bounds: readonly RustBound[] })
  | (NodeBase & { readonly kind: "never" })
  | (NodeBase & { readonly kind: "infer" });

export type RustAttribute = NodeBase & {
  readonly style: "outer" | "inner";
  readonly path: readonly string[];
  readonly tokens: readonly Token[];
  // Exact source text, doc comments included, so forwarded attributes stay verbatim.
  readonly text: string;
};

export type RustVisibility =
  | { readonly kind: "private" }
  | { readonly kind: "pub"; readonly restriction?: string };

export type RustGenericParam =
  | (NodeBase & {
      readonly kind: "lifetime";
      readonly attrs: readonly RustAttribute[];
      readonly name: string;
      readonly bounds: readonly string[];
    })
  | (NodeBase & {
      readonly kind: "type";
      readonly attrs: readonly RustAttribute[];
      readonly name: string;
      readonly bounds: readonly RustBound[];
      readonly default?: RustType;
    })
  | (NodeBase & {
      readonly kind: "const";
      readonly attrs: readonly RustAttribute[];
      readonly name: string;
      readonly type: RustType;
      readonly default?: RustExpr;
    });

export type RustWherePredicate =
  | {
      readonly kind: "bound";
      readonly forLifetimes: readonly string[];
      readonly bounded: RustType;
      readonly bounds: readonly RustBound[];
    }
  | { readonly kind: "lifetime"; readonly name: string; readonly bounds: readonly string[] };

export type RustGenerics = {
  readonly params: readonly RustGenericParam[];
  readonly whereClause?: readonly RustWherePredicate[];
};

export type RustField = NodeBase & {
  readonly attrs: readonly RustAttribute[];
  readonly vis: RustVisibility;
  readonly name?: string;
  readonly type: RustType;
};

export type RustNamedField = RustField & { readonly name: string };

export type RustDataShape =
  | { readonly kind: "named"; readonly fields: readonly RustNamedField[] }
  | { readonly kind: "tuple"; readonly fields: readonly RustField[] }
  | { readonly kind: "unit" }
  | { readonly kind: "enum"; readonly variants: readonly string[] }
  | { readonly kind: "union"; readonly fields: readonly RustNamedField[] };

export type TypeDeclaration = NodeBase & {
  readonly kind: "struct" | "enum" | "union";
  readonly attrs: readonly RustAttribute[];
  readonly vis: RustVisibility;
  readonly name: string;
  readonly generics: RustGenerics;
  readonly shape: RustDataShape;
};

export type RustPattern =
  | (NodeBase & { readonly kind: "wild" })
  | (NodeBase & { readonly kind: "rest" })
  | (NodeBase & {
      readonly kind: "ident";
      readonly byRef: boolean;
      readonly mut: boolean;
      readonly name: string;
      readonly sub?: RustPattern;
    })
  | (NodeBase & { readonly kind: "lit"; readonly negative: boolean; readonly text: string })
  | (NodeBase & {
      readonly kind: "range";
      readonly from?: RustPattern;
      readonly to?: RustPattern;
      readonly limits: ".." | "..=";
    })
  | (NodeBase & { readonly kind: "path"; readonly path: RustPath })
  | (NodeBase & { readonly kind: "tuple_struct"; readonly path: RustPath; readonly elems: readonly RustPattern[] })
  | (NodeBase & {
      readonly kind: "struct";
      readonly path: RustPath;
      readonly fields: readonly { readonly name: string; readonly pat?: RustPattern }[];
      readonly rest: boolean;
    })
  | (NodeBase & { readonly kind: "tuple"; readonly elems: readonly RustPattern[] })
  | (NodeBase & { readonly kind: "paren"; readonly pat: RustPattern })
  | (NodeBase & { readonly kind: "slice"; readonly elems: readonly RustPattern[] })
  | (NodeBase & { readonly kind: "ref"; readonly mut: boolean; readonly pat: RustPattern })
  | (NodeBase & { readonly kind: "or"; readonly cases: readonly RustPattern[] });

export type RustBlock = NodeBase & {
  readonly stmts: readonly RustStmt[];
};

export type RustMatchArm = NodeBase & {
  readonly pat: RustPattern;
  readonly guard?: RustExpr;
  readonly body: RustExpr;
  // Whether the source wrote a `,` after this arm.
  readonly comma: boolean;
};

export type RustClosureParam = {
  readonly pat: RustPattern;
  readonly type?: RustType;
};

export type RustExpr =
  | (NodeBase & { readonly kind: "lit"; readonly text: string })
  | (NodeBase & { readonly kind: "path"; readonly path: RustPath })
  | (NodeBase & {
      readonly kind: "qpath";
      readonly self: RustType;
      readonly trait?: RustPath;
      readonly rest: readonly RustPathSegment[];
    })
  | (NodeBase & { readonly kind: "unary"; readonly op: "-" | "!" | "*"; readonly expr: RustExpr })
  | (NodeBase & { readonly kind: "ref"; readonly mut: boolean; readonly expr: RustExpr })
  | (NodeBase & { readonly kind: "binary"; readonly op: string; readonly left: RustExpr; readonly right: RustExpr })
  | (NodeBase & { readonly kind: "assign"; readonly op: string; readonly target: RustExpr; readonly expr: RustExpr })
  | (NodeBase & { readonly kind: "cast"; readonly expr: RustExpr; readonly type: RustType })
  | (NodeBase & { readonly kind: "call"; readonly callee: RustExpr; readonly args: readonly RustExpr[] })
  | (NodeBase & {
      readonly kind: "method";
      readonly receiver: RustExpr;
      readonly name: string;
      readonly turbofish?: readonly RustGenericArg[];
      readonly args: readonly RustExpr[];
    })
  | (NodeBase & { readonly kind: "field"; readonly expr: RustExpr; readonly member: string })
  | (NodeBase & { readonly kind: "index"; readonly expr: RustExpr; readonly index: RustExpr })
  | (NodeBase & { readonly kind: "try"; readonly expr: RustExpr })
  | (NodeBase & { readonly kind: "await"; readonly expr: RustExpr })
  | (NodeBase & {
      readonly kind: "range";
      readonly from?: RustExpr;
      readonly to?: RustExpr;
      readonly limits: ".." | "..=";
    })
  | (NodeBase & { readonly kind: "tuple"; readonly elems: readonly RustExpr[] })
  | (NodeBase & { readonly kind: "paren"; readonly expr: RustExpr })
  | (NodeBase & { readonly kind: "array"; readonly elems: readonly RustExpr[] })
  | (NodeBase & { readonly kind: "array_repeat"; readonly elem: RustExpr; readonly len: RustExpr })
  | (NodeBase & {
      readonly kind: "struct";
      readonly path: RustPath;
      readonly fields: readonly { readonly name: string; readonly expr?: RustExpr }[];
      readonly base?: RustExpr;
    })
  | (NodeBase & {
      readonly kind: "block";
      readonly label?: string;
      readonly modifier?: "unsafe" | "async" | "async move";
      readonly block: RustBlock;
    })
  | (NodeBase & { readonly kind: "if"; readonly cond: RustExpr; readonly then: RustBlock; readonly else?: RustExpr })
  | (NodeBase & { readonly kind: "let"; readonly pat: RustPattern; readonly expr: RustExpr })
  | (NodeBase & { readonly kind: "while"; readonly label?: string; readonly cond: RustExpr; readonly body: RustBlock })
  | (NodeBase & { readonly kind: "loop"; readonly label?: string; readonly body: RustBlock })
  | (NodeBase & {
      readonly kind: "for";
      readonly label?: string;
      readonly pat: RustPattern;
      readonly iter: RustExpr;
      readonly body: RustBlock;
    })
  | (NodeBase & { readonly kind: "match"; readonly expr: RustExpr; readonly arms: readonly RustMatchArm[] })
  | (NodeBase & {
      readonly kind: "closure";
      readonly move: boolean;
      readonly params: readonly RustClosureParam[];
      readonly ret?: RustType;
      readonly body: RustExpr;
    })
  | (NodeBase & { readonly kind: "return"; readonly expr?: RustExpr })
  | (NodeBase & { readonly kind: "break"; readonly label?: string; readonly expr?: RustExpr })
  | (NodeBase & { readonly kind: "continue"; readonly label?: string })
  | (NodeBase & {
      readonly kind: "macro";
      readonly path: RustPath;
      readonly delim: Delimiter;
      readonly tokens: readonly Token[];
    });

export type RustStmt =
  | (NodeBase & {
      readonly kind: "let";
      readonly attrs?: readonly RustAttribute[];
      readonly pat: RustPattern;
      readonly type?: RustType;
      readonly init?: RustExpr;
      readonly else?: RustBlock;
    })
  | (NodeBase & {
      readonly kind: "expr";
      readonly attrs?: readonly RustAttribute[];
      readonly expr: RustExpr;
      readonly semi: boolean;
    })
  // Items nested in a block are kept as their tokens, attributes excluded.
  | (NodeBase & { readonly kind: "item"; readonly attrs?: readonly RustAttribute[]; readonly tokens: readonly Token[] })
  | (NodeBase & { readonly kind: "empty" });

export type RustReceiver = "self" | "&self" | "&mut self" | "mut self";

export type RustParam = {
  readonly name: string;
  readonly type: RustType;
};

export type RustMethod = {
  readonly attrs: readonly RustAttribute[];
  readonly vis: RustVisibility;
  readonly name: string;
  readonly generics: RustGenerics;
  readonly receiver?: RustReceiver;
  readonly params: readonly RustParam[];
  readonly ret?: RustType;
  readonly body: RustBlock;
};

export type RustImplBlock = {
  readonly generics: RustGenerics;
  readonly selfType: RustType;
  readonly trait?: RustPath;
  readonly methods: readonly RustMethod[];
};

export function simplePath(segments: readonly string[]): RustPath {
  return { global: false, segments: segments.map((name) => ({ name })) };
}

export function genericPath(segments: readonly string[], args: readonly RustGenericArg[] = []): RustPath {
  const names = [...segments];
  const last = names.pop();
  if (last === undefined) throw new Error("A path requires at least one segment.");
  const head: RustPathSegment[] = names.map((name) => ({ name }));
  const tail: RustPathSegment = args.length === 0 ? { name: last } : { name: last, args: { kind: "angle", turbofish: false, args } };
  return { global: false, segments: [...head, tail] };
}

export function pathType(segments: readonly string[], args: readonly RustType[] = []): RustType {
  return { kind: "path", path: genericPath(segments, args.map((type) => ({ kind: "type", type }))) };
}

export function identExpr(name: string): RustExpr {
  return { kind: "path", path: simplePath([name]) };
}

export function lastSegmentName(path: RustPath): string | undefined {
  return path.segments.at(-1)?.name;
}

export function joinSpans(a: Span | undefined, b: Span | undefined): Span | undefined {
  if (!a) return b;
  if (!b) return a;
  return { fileName: a.fileName, start: Math.min(a.start, b.start), end: Math.max(a.end, b.end) };
}
