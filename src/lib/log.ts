import { colors } from "./output.ts";

let debugEnabled = false;

export function configureLogging(opts: { debug?: boolean }): void {
  const env = process.env["WP_COMMENT_DEBUG"];
  debugEnabled = opts.debug === true || env === "1" || env === "true";
}

/** Diagnostics go to stderr so they never mix with porcelain output. */
export function debug(message: string): void {
  if (!debugEnabled) return;
  console.error(colors().dim(`Debug: ${message}`));
}
