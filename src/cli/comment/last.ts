import type { Command } from "commander";
import { lastComment } from "../../comments/operations.ts";
import { runCommand, type CommentDeps } from "./run.ts";

export function registerLast(comment: Command, deps: CommentDeps): void {
  comment
    .command("last")
    .description("Get the last approved comment")
    .option("--id", "Output just the last comment id")
    .option("--full", "Output complete comment information")
    .action(async (opts: { id?: boolean; full?: boolean }) => {
      await runCommand(deps, (store) => lastComment(store, opts));
    });
}
