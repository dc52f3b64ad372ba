import type { Command } from "commander";
import { DATABASE_DEFAULTS, parsePort, validateTablePrefix, type Config } from "../../lib/config.ts";
import { registerGet } from "./get.ts";
import { registerSet } from "./set.ts";
import { registerReset } from "./reset.ts";
import { registerListKeys } from "./list-keys.ts";
import { registerUsage } from "./usage.ts";

export type SettingDef = {
  /** How to read/write this setting on the Config object */
  get: (c: Config) => unknown;
  /** Parse the raw CLI value, store it, and return what was stored */
  apply: (c: Config, raw: string) => unknown;
  reset: (c: Config) => void;
  description: string;
  default: unknown;
  secret?: boolean;
};

function nonEmpty(key: string, v: string): string {
  if (!v.trim()) {
    throw new Error(`${key} cannot be empty.`);
  }
  return v.trim();
}

function parseBoolean(v: string): boolean {
  switch (v.trim().toLowerCase()) {
    case "true":
    case "1":
    case "yes":
    case "on":
      return true;
    case "false":
    case "0":
    case "no":
    case "off":
      return false;
    default:
      throw new Error(`Invalid value: ${v}. Must be true or false.`);
  }
}

export const SETTING_DEFS: Record<string, SettingDef> = {
  "db.host": {
    get: (c) => c.database?.host,
    apply: (c, v) => ((c.database ??= {}).host = nonEmpty("Host", v)),
    reset: (c) => {
      if (c.database) delete c.database.host;
    },
    description: "Database host (env: WP_DB_HOST)",
    default: DATABASE_DEFAULTS.host,
  },
  "db.port": {
    get: (c) => c.database?.port,
    apply: (c, v) => ((c.database ??= {}).port = parsePort(v)),
    reset: (c) => {
      if (c.database) delete c.database.port;
    },
    description: "Database port (env: WP_DB_PORT)",
    default: DATABASE_DEFAULTS.port,
  },
  "db.user": {
    get: (c) => c.database?.user,
    apply: (c, v) => ((c.database ??= {}).user = nonEmpty("User", v)),
    reset: (c) => {
      if (c.database) delete c.database.user;
    },
    description: "Database user (env: WP_DB_USER)",
    default: DATABASE_DEFAULTS.user,
  },
  "db.password": {
    get: (c) => c.database?.password,
    apply: (c, v) => ((c.database ??= {}).password = v),
    reset: (c) => {
      if (c.database) delete c.database.password;
    },
    description: "Database password, stored in the config file with mode 0600 (env: WP_DB_PASSWORD)",
    default: DATABASE_DEFAULTS.password,
    secret: true,
  },
  "db.name": {
    get: (c) => c.database?.name,
    apply: (c, v) => ((c.database ??= {}).name = nonEmpty("Database name", v)),
    reset: (c) => {
      if (c.database) delete c.database.name;
    },
    description: "Database name (env: WP_DB_NAME)",
    default: DATABASE_DEFAULTS.database,
  },
  "db.socketPath": {
    get: (c) => c.database?.socket_path,
    apply: (c, v) => ((c.database ??= {}).socket_path = nonEmpty("Socket path", v)),
    reset: (c) => {
      if (c.database) delete c.database.socket_path;
    },
    description: "Unix socket path; overrides host and port when set (env: WP_DB_SOCKET)",
    default: undefined,
  },
  "db.tablePrefix": {
    get: (c) => c.database?.table_prefix,
    apply: (c, v) => ((c.database ??= {}).table_prefix = validateTablePrefix(v.trim())),
    reset: (c) => {
      if (c.database) delete c.database.table_prefix;
    },
    description: "Table prefix (env: WP_TABLE_PREFIX)",
    default: DATABASE_DEFAULTS.tablePrefix,
  },
  "output.color": {
    get: (c) => c.settings?.color,
    apply: (c, v) => ((c.settings ??= {}).color = parseBoolean(v)),
    reset: (c) => {
      if (c.settings) delete c.settings.color;
    },
    description: "Colorize Success/Error prefixes (default: true; --no-color overrides)",
    default: true,
  },
};

export const VALID_KEYS = Object.keys(SETTING_DEFS);

export function registerConfigCommand(program: Command): void {
  const config = program.command("config").description("View and update CLI settings");
  registerGet(config);
  registerSet(config);
  registerReset(config);
  registerListKeys(config);
  registerUsage(config);
}
