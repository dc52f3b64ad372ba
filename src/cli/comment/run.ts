import type { CommandResult } from "../../comments/result.ts";
import { handleAction } from "../../lib/errors.ts";
import { printResult } from "../../lib/output.ts";
import type { CommentStore } from "../../store/interface.ts";
import type { StoreRunner } from "../../store/client.ts";

export type CommentDeps = {
  withStore: StoreRunner;
};

/**
 * Run one comment operation against a fresh store and print its result.
 * This is the only place a comment command sets the exit code.
 */
export async function runCommand(
  deps: CommentDeps,
  op: (store: CommentStore) => Promise<CommandResult>,
): Promise<void> {
  await handleAction(async () => {
    const result = await deps.withStore(op);
    printResult(result);
  });
}
