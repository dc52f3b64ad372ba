import { Command } from "commander";
import { registerCommentCommand } from "./cli/comment/index.ts";
import type { CommentDeps } from "./cli/comment/run.ts";
import { registerConfigCommand } from "./cli/config/index.ts";
import { readConfig } from "./lib/config.ts";
import { configureLogging } from "./lib/log.ts";
import { configureOutput } from "./lib/output.ts";
import { getPackageVersion } from "./lib/version.ts";
import { withStore } from "./store/client.ts";

/**
 * Build the CLI from an explicit command table. The store runner is passed
 * in so tests can drive the real command tree against an in-memory store.
 */
export function buildProgram(deps: CommentDeps = { withStore }): Command {
  const program = new Command()
    .name("wp-comment")
    .description("Manage WordPress comments from the command line")
    .version(getPackageVersion());

  program.option("--debug", "Print SQL statements and connection details to stderr");
  program.option("--no-color", "Disable colored output");

  program.hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    const config = readConfig();
    configureOutput({
      color: opts["color"] !== false && config.settings?.color !== false,
    });
    configureLogging({ debug: opts["debug"] === true });
  });

  registerCommentCommand(program, deps);
  registerConfigCommand(program);

  return program;
}
