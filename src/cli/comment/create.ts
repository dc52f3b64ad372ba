import type { Command } from "commander";
import { createComment } from "../../comments/operations.ts";
import { parseFieldArgs } from "../../lib/fields.ts";
import { runCommand, type CommentDeps } from "./run.ts";

export function registerCreate(comment: Command, deps: CommentDeps): void {
  comment
    .command("create")
    .description("Insert a comment")
    .argument("[fields...]", "Field values as --<field>=<value> (comment_post_ID is required)")
    .option("--porcelain", "Output just the new comment id")
    .allowUnknownOption()
    .action(async (tokens: string[], opts: { porcelain?: boolean }) => {
      await runCommand(deps, async (store) =>
        createComment(store, parseFieldArgs(tokens), { porcelain: opts.porcelain }),
      );
    });
}
