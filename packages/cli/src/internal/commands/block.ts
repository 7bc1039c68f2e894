import { BlockContents } from "@chainset/derive";

// File name reported for spans inside a fragment given on the command line.
export const BLOCK_FILE_NAME = "<block>";

export type BlockArgs = {
  readonly argv: readonly string[];
};

export function parseBlockArgs(args: BlockArgs): string {
  const [text, ...rest] = args.argv;
  if (text === undefined) {
    throw new Error("block: missing required <text>");
  }
  if (rest.length > 0) {
    throw new Error(`block: unexpected extra arg: ${rest.join(" ")}`);
  }
  return text;
}

// The fragment is parsed as if wrapped in braces starting at offset 0.
export function blockSource(text: string): string {
  return `{${text}}`;
}

export function runBlock(text: string): string {
  return BlockContents.parse(text, { fileName: BLOCK_FILE_NAME, start: 0 }).toString();
}
