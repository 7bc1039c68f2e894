export { DEFAULT_FORWARDED_ATTRIBUTES, forwardedAttributes } from "./attrs.js";
export { BlockContents } from "./block.js";
export type { Anchor } from "./block.js";
export { namedFields, ShapeError } from "./errors.js";
export { DEFAULT_MARKER, deriveBuilder, derivedNames, expandSource } from "./expand.js";
export type { ExpandOptions, ExpandResult } from "./expand.js";
export { generateBuilder, SETTER_VISIBILITIES, writeBuilderImpl } from "./generate.js";
export type { BuilderImpl, BuilderOptions, GeneratedMethod, SetterVisibility } from "./generate.js";
export { freshTypeParam, splitForImpl } from "./generics.js";
export type { SplitGenerics } from "./generics.js";
