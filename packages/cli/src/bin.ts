import { argv, cwd, exit } from "node:process";
import { existsSync, readFileSync } from "node:fs";
import { pathToFileURL } from "node:url";

import { DiagnosticError } from "@chainset/syntax";

import { BLOCK_FILE_NAME, blockSource, parseBlockArgs, runBlock } from "./internal/commands/block.js";
import { runExpand } from "./internal/commands/expand.js";

export type Cmd = "expand" | "block" | "help";

export type SourceReader = (fileName: string) => string | undefined;

function usage(): void {
  console.log(
    [
      "chainset",
      "",
      "Usage:",
      "  chainset expand <input.rs> [--out <file>] [--config <chainset.json>] [--check]",
      "  chainset block <text>",
      "  chainset help",
      "",
    ].join("\n")
  );
}

export function parseCommand(args: readonly string[]): Cmd {
  const [cmd] = args;
  if (!cmd) return "help";
  if (cmd === "expand" || cmd === "block" || cmd === "help") return cmd;
  return "help";
}

export function posToLineCol(text: string, pos: number): { readonly line: number; readonly col: number } {
  // 1-based, like most compilers.
  let line = 1;
  let col = 1;
  for (let i = 0; i < pos && i < text.length; i++) {
    const ch = text.charCodeAt(i);
    if (ch === 10 /* \n */) {
      line++;
      col = 1;
    } else {
      col++;
    }
  }
  return { line, col };
}

function readSourceFile(fileName: string): string | undefined {
  return existsSync(fileName) ? readFileSync(fileName, "utf-8") : undefined;
}

export function formatError(err: unknown, readSource: SourceReader = readSourceFile): string {
  if (err instanceof DiagnosticError) {
    const text = err.span ? readSource(err.span.fileName) : undefined;
    if (err.span && text !== undefined) {
      const pos = posToLineCol(text, err.span.start);
      return `${err.span.fileName}:${pos.line}:${pos.col}: ${err.code}: ${err.message}`;
    }
    return `${err.code}: ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}

// Returns the process exit code.
export function main(args: readonly string[], dir: string = cwd()): number {
  const cmd = parseCommand(args);
  const rest = args.slice(1);
  const inline = new Map<string, string>();
  try {
    switch (cmd) {
      case "expand":
        runExpand({ dir, argv: rest });
        return 0;
      case "block": {
        const text = parseBlockArgs({ argv: rest });
        inline.set(BLOCK_FILE_NAME, blockSource(text));
        console.log(runBlock(text));
        return 0;
      }
      case "help":
        break;
    }
  } catch (err: unknown) {
    console.error(formatError(err, (fileName) => inline.get(fileName) ?? readSourceFile(fileName)));
    return 1;
  }
  usage();
  return 1;
}

if (argv[1] && import.meta.url === pathToFileURL(argv[1]).href) {
  exit(main(argv.slice(2)));
}
