import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

// --- Types ---

const DatabaseSettingsSchema = z.object({
  host: z.string().optional(),
  port: z.number().int().positive().optional(),
  user: z.string().optional(),
  password: z.string().optional(),
  name: z.string().optional(),
  socket_path: z.string().optional(),
  table_prefix: z.string().optional(),
});

const SettingsSchema = z.object({
  color: z.boolean().optional(),
});

const ConfigSchema = z.object({
  database: DatabaseSettingsSchema.optional(),
  settings: SettingsSchema.optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export type DatabaseConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  socketPath?: string;
  tablePrefix: string;
};

export const DATABASE_DEFAULTS = {
  host: "localhost",
  port: 3306,
  user: "root",
  password: "",
  database: "wordpress",
  tablePrefix: "wp_",
} as const;

const TABLE_PREFIX_PATTERN = /^[A-Za-z0-9_]+$/;

// --- Config directory ---

function configDir(): string {
  const xdg = process.env["XDG_CONFIG_HOME"];
  if (xdg) {
    return join(xdg, "wp-comment");
  }
  return join(homedir(), ".config", "wp-comment");
}

function ensureConfigDir(): void {
  const dir = configDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

export function configPath(): string {
  return join(configDir(), "config.json");
}

// --- Config read/write ---

export function readConfig(): Config {
  const path = configPath();
  if (!existsSync(path)) {
    return {};
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch {
    return {};
  }
  const parsed = ConfigSchema.safeParse(raw);
  return parsed.success ? parsed.data : {};
}

export function writeConfig(config: Config): void {
  ensureConfigDir();
  // Clean up empty top-level objects
  if (config.database && Object.keys(config.database).length === 0) {
    delete config.database;
  }
  if (config.settings && Object.keys(config.settings).length === 0) {
    delete config.settings;
  }
  writeFileSync(configPath(), JSON.stringify(config, null, 2) + "\n", {
    encoding: "utf8",
    mode: 0o600,
  });
}

// --- Database connection ---

export function validateTablePrefix(prefix: string): string {
  if (!TABLE_PREFIX_PATTERN.test(prefix)) {
    throw new Error(
      `Invalid table prefix: '${prefix}'. Only letters, digits and underscores are allowed.`,
    );
  }
  return prefix;
}

export function parsePort(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1 || n > 65535) {
    throw new Error(`Invalid port: ${value}. Must be an integer between 1 and 65535.`);
  }
  return n;
}

function fromEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Resolve the database connection for this invocation.
 *
 * Each field is taken from the environment first (WP_DB_*, WP_TABLE_PREFIX),
 * then the config file, then the defaults.
 */
export function resolveDatabaseConfig(
  config: Config = readConfig(),
  env: NodeJS.ProcessEnv = process.env,
): DatabaseConfig {
  const db = config.database ?? {};
  const envPort = fromEnv(env, "WP_DB_PORT");

  // Password may legitimately be empty, so only undefined falls through
  const password = env["WP_DB_PASSWORD"] ?? db.password ?? DATABASE_DEFAULTS.password;

  return {
    host: fromEnv(env, "WP_DB_HOST") ?? db.host ?? DATABASE_DEFAULTS.host,
    port: envPort !== undefined ? parsePort(envPort) : (db.port ?? DATABASE_DEFAULTS.port),
    user: fromEnv(env, "WP_DB_USER") ?? db.user ?? DATABASE_DEFAULTS.user,
    password,
    database: fromEnv(env, "WP_DB_NAME") ?? db.name ?? DATABASE_DEFAULTS.database,
    socketPath: fromEnv(env, "WP_DB_SOCKET") ?? db.socket_path,
    tablePrefix: validateTablePrefix(
      fromEnv(env, "WP_TABLE_PREFIX") ?? db.table_prefix ?? DATABASE_DEFAULTS.tablePrefix,
    ),
  };
}
