import type { Command } from "commander";
import { countComments } from "../../comments/operations.ts";
import { runCommand, type CommentDeps } from "./run.ts";

export function registerCount(comment: Command, deps: CommentDeps): void {
  comment
    .command("count")
    .description("Count comments on the whole site or on a given post")
    .argument("[post-id]", "Post ID (omit for the whole site)")
    .action(async (postId: string | undefined) => {
      await runCommand(deps, (store) => countComments(store, postId));
    });
}
