import type { CommentFields } from "../store/types.ts";
import { CliError } from "./errors.ts";

/**
 * Parse `--<field>=<value>` tokens (or `--<field> <value>`) into an ordered
 * field map. A repeated field keeps its last value.
 */
export function parseFieldArgs(tokens: string[]): CommentFields {
  const fields: CommentFields = {};

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? "";
    if (!token.startsWith("--") || token === "--") {
      throw new CliError(`Unexpected argument '${token}'. Fields are passed as --<field>=<value>.`);
    }

    const body = token.slice(2);
    const eq = body.indexOf("=");
    if (eq > 0) {
      fields[body.slice(0, eq)] = body.slice(eq + 1);
      continue;
    }
    if (eq === 0) {
      throw new CliError(`Missing field name in '${token}'.`);
    }

    const next = tokens[i + 1];
    if (next === undefined || next.startsWith("--")) {
      throw new CliError(`Missing value for field '${body}'. Use --${body}=<value>.`);
    }
    fields[body] = next;
    i++;
  }

  return fields;
}
