import type { Command } from "commander";
import { commentStatus } from "../../comments/operations.ts";
import { runCommand, type CommentDeps } from "./run.ts";

export function registerStatus(comment: Command, deps: CommentDeps): void {
  comment
    .command("status")
    .description("Get the status of a comment")
    .argument("<id>", "Comment ID")
    .action(async (id: string) => {
      await runCommand(deps, (store) => commentStatus(store, id));
    });
}
