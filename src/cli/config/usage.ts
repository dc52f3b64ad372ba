import type { Command } from "commander";

const USAGE_TEXT = `wp-comment config — Connection and output settings

SUBCOMMANDS:
  config get [key]            Show one setting or all settings
  config set <key> <value>    Update a setting
  config reset [key]          Reset one setting or all settings
  config list-keys            List keys with descriptions and defaults

KEYS:
  db.host, db.port, db.user, db.password, db.name, db.socketPath,
  db.tablePrefix, output.color

PRECEDENCE:
  Environment (WP_DB_HOST, WP_DB_PORT, WP_DB_USER, WP_DB_PASSWORD, WP_DB_NAME,
  WP_DB_SOCKET, WP_TABLE_PREFIX) > config file > defaults.

FILE:
  $XDG_CONFIG_HOME/wp-comment/config.json (default ~/.config/wp-comment/config.json)
`;

export function registerUsage(config: Command): void {
  config
    .command("usage")
    .description("Print detailed config documentation")
    .action(() => {
      console.log(USAGE_TEXT.trim());
    });
}
