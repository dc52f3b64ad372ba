import type { Command } from "commander";
import { deleteComment } from "../../comments/operations.ts";
import { runCommand, type CommentDeps } from "./run.ts";

export function registerDelete(comment: Command, deps: CommentDeps): void {
  comment
    .command("delete")
    .description("Delete a comment")
    .argument("<id>", "Comment ID")
    .option("--force", "Skip the trash bin")
    .action(async (id: string, opts: { force?: boolean }) => {
      await runCommand(deps, (store) => deleteComment(store, id, { force: opts.force }));
    });
}
