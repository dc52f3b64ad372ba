import type { Command } from "commander";
import { moderateComment, type ModerationVerb } from "../../comments/operations.ts";
import { runCommand, type CommentDeps } from "./run.ts";

export function registerModeration(
  comment: Command,
  verb: ModerationVerb,
  deps: CommentDeps,
): void {
  comment
    .command(verb)
    .description(verb === "approve" ? "Approve a comment" : "Unapprove a comment")
    .argument("<id>", "Comment ID")
    .action(async (id: string) => {
      await runCommand(deps, (store) => moderateComment(store, verb, id));
    });
}
