import type { Command } from "commander";
import { transitionComment } from "../../comments/operations.ts";
import type { TransitionVerb } from "../../store/types.ts";
import { runCommand, type CommentDeps } from "./run.ts";

const DESCRIPTIONS: Record<TransitionVerb, string> = {
  trash: "Trash a comment",
  untrash: "Untrash a comment",
  spam: "Mark a comment as spam",
  unspam: "Unmark a comment as spam",
};

export function registerTransition(
  comment: Command,
  verb: TransitionVerb,
  deps: CommentDeps,
): void {
  comment
    .command(verb)
    .description(DESCRIPTIONS[verb])
    .argument("<id>", "Comment ID")
    .action(async (id: string) => {
      await runCommand(deps, (store) => transitionComment(store, verb, id));
    });
}
