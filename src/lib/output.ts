import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { CommandResult } from "../comments/result.ts";

let palette: ChalkInstance = chalk;

export function configureOutput(opts: { color?: boolean }): void {
  palette = opts.color === false ? new Chalk({ level: 0 }) : chalk;
}

export function colors(): ChalkInstance {
  return palette;
}

export function pruneEmpty(value: unknown): unknown {
  const pruned = pruneEmptyInternal(value);
  return pruned === undefined ? {} : pruned;
}

function pruneEmptyInternal(value: unknown): unknown {
  if (value === null || value === undefined) {
    return undefined;
  }

  if (typeof value === "string") {
    return value.trim() === "" ? undefined : value;
  }

  if (typeof value === "number" || typeof value === "boolean") {
    return value;
  }

  if (Array.isArray(value)) {
    const next = value
      .map((v) => pruneEmptyInternal(v))
      .filter((v) => v !== undefined);
    return next.length === 0 ? undefined : next;
  }

  if (typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      const next = pruneEmptyInternal(v);
      if (next !== undefined) {
        out[k] = next;
      }
    }
    return Object.keys(out).length === 0 ? undefined : out;
  }

  return value;
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(pruneEmpty(data), null, 2));
}

export function printLine(text: string): void {
  console.log(text);
}

export function printSuccess(message: string): void {
  console.log(`${palette.green("Success:")} ${message}`);
}

export function printError(message: string): void {
  console.error(`${palette.red("Error:")} ${message}`);
  process.exitCode = 1;
}

/** Left-align a `key:` label in a fixed-width column. */
export function padLabel(key: string, width: number): string {
  return `${key}:`.padEnd(width);
}

export function printResult(result: CommandResult): void {
  if (!result.ok) {
    printError(result.error);
    return;
  }
  for (const out of result.lines) {
    switch (out.kind) {
      case "success":
        printSuccess(out.text);
        break;
      case "heading":
        printLine(palette.yellow(out.text));
        break;
      default:
        printLine(out.text);
    }
  }
  if (result.exitCode !== undefined) {
    process.exitCode = result.exitCode;
  }
}
