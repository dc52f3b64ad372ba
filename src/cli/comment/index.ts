import type { Command } from "commander";
import { TRANSITION_VERBS } from "../../comments/transitions.ts";
import { registerCreate } from "./create.ts";
import { registerDelete } from "./delete.ts";
import { registerTransition } from "./transition.ts";
import { registerModeration } from "./approve.ts";
import { registerCount } from "./count.ts";
import { registerStatus } from "./status.ts";
import { registerLast } from "./last.ts";
import { registerUsage } from "./usage.ts";
import type { CommentDeps } from "./run.ts";

export function registerCommentCommand(program: Command, deps: CommentDeps): void {
  const comment = program.command("comment").description("Manage comments");
  registerCreate(comment, deps);
  registerDelete(comment, deps);
  for (const verb of TRANSITION_VERBS) {
    registerTransition(comment, verb, deps);
  }
  registerModeration(comment, "approve", deps);
  registerModeration(comment, "unapprove", deps);
  registerCount(comment, deps);
  registerStatus(comment, deps);
  registerLast(comment, deps);
  registerUsage(comment);
}
