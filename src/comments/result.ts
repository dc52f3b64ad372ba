export type OutputLine = {
  kind: "line" | "heading" | "success";
  text: string;
};

/**
 * Outcome of one comment command. Operations never print or exit themselves;
 * the CLI boundary renders the result and sets the exit code.
 */
export type CommandResult =
  | { ok: true; lines: OutputLine[]; exitCode?: number }
  | { ok: false; error: string };

export function line(text: string): OutputLine {
  return { kind: "line", text };
}

export function heading(text: string): OutputLine {
  return { kind: "heading", text };
}

export function success(text: string): OutputLine {
  return { kind: "success", text };
}

export function done(...lines: OutputLine[]): CommandResult {
  return { ok: true, lines };
}

export function fail(error: string): CommandResult {
  return { ok: false, error };
}
