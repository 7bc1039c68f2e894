import type { RustAttribute } from "@chainset/syntax";

export const DEFAULT_FORWARDED_ATTRIBUTES: readonly string[] = ["doc", "cfg", "allow"];

// Doc comments carry the path `doc`, so they are kept with it.
export function forwardedAttributes(
  attrs: readonly RustAttribute[],
  allowed: readonly string[] = DEFAULT_FORWARDED_ATTRIBUTES
): RustAttribute[] {
  return attrs.filter((a) => {
    const [name] = a.path;
    return a.style === "outer" && a.path.length === 1 && name !== undefined && allowed.includes(name);
  });
}
