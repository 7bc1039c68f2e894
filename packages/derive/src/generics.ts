import { emitGenericParams, emitWhereClause, type RustGenerics } from "@chainset/syntax";

export type SplitGenerics = {
  // `<'a, T: Clone, const N: usize>`: declared parameters with bounds, defaults dropped.
  readonly implGenerics: string;
  // `<'a, T, N>`
  readonly tyGenerics: string;
  readonly whereClause: string;
};

export function splitForImpl(generics: RustGenerics): SplitGenerics {
  return {
    implGenerics: emitGenericParams(generics.params, { bounds: true }),
    tyGenerics: emitGenericParams(generics.params, { bounds: false }),
    whereClause: emitWhereClause(generics.whereClause),
  };
}

export function freshTypeParam(generics: RustGenerics, base = "VALUE"): string {
  const taken = new Set(generics.params.filter((p) => p.kind !== "lifetime").map((p) => p.name));
  if (!taken.has(base)) return base;
  for (let i = 0; ; i++) {
    const candidate = `${base}${i}`;
    if (!taken.has(candidate)) return candidate;
  }
}
