import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  configPath,
  readConfig,
  type Config,
  resolveDatabaseConfig,
  writeConfig,
} from "../src/lib/config.ts";
import { SETTING_DEFS } from "../src/cli/config/index.ts";
import { buildProgram } from "../src/program.ts";

// Override XDG_CONFIG_HOME to use a temp directory for tests
const originalXdg = process.env["XDG_CONFIG_HOME"];
let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), "wp-comment-test-"));
  process.env["XDG_CONFIG_HOME"] = tempDir;
});

afterEach(() => {
  if (originalXdg !== undefined) {
    process.env["XDG_CONFIG_HOME"] = originalXdg;
  } else {
    delete process.env["XDG_CONFIG_HOME"];
  }
  rmSync(tempDir, { recursive: true, force: true });
});

describe("config read/write", () => {
  test("readConfig returns empty object when no config file exists", () => {
    expect(readConfig()).toEqual({});
  });

  test("writeConfig + readConfig roundtrip", () => {
    writeConfig({ database: { host: "db.local", port: 3307 } });
    expect(readConfig()).toEqual({ database: { host: "db.local", port: 3307 } });
  });

  test("config file is private to the user", () => {
    writeConfig({ database: { password: "test-secret" } });
    expect(statSync(configPath()).mode & 0o777).toBe(0o600);
  });

  test("writeConfig drops empty sections", () => {
    writeConfig({ database: {}, settings: {} });
    expect(readFileSync(configPath(), "utf8")).toBe("{}\n");
  });

  test("unparseable file reads as empty", () => {
    mkdirSync(join(tempDir, "wp-comment"), { recursive: true });
    writeFileSync(configPath(), "{ not json");
    expect(readConfig()).toEqual({});
  });

  test("file with wrong types reads as empty", () => {
    mkdirSync(join(tempDir, "wp-comment"), { recursive: true });
    writeFileSync(configPath(), JSON.stringify({ database: { port: "3306" } }));
    expect(readConfig()).toEqual({});
  });
});

describe("resolveDatabaseConfig", () => {
  test("uses defaults when nothing is configured", () => {
    expect(resolveDatabaseConfig({}, {})).toEqual({
      host: "localhost",
      port: 3306,
      user: "root",
      password: "",
      database: "wordpress",
      socketPath: undefined,
      tablePrefix: "wp_",
    });
  });

  test("environment overrides the config file", () => {
    const resolved = resolveDatabaseConfig(
      { database: { host: "file-host", name: "file_db", table_prefix: "blog_" } },
      { WP_DB_HOST: "env-host", WP_DB_PORT: "3307", WP_DB_PASSWORD: "" },
    );
    expect(resolved.host).toBe("env-host");
    expect(resolved.port).toBe(3307);
    expect(resolved.password).toBe("");
    expect(resolved.database).toBe("file_db");
    expect(resolved.tablePrefix).toBe("blog_");
  });

  test("blank environment values fall through", () => {
    const resolved = resolveDatabaseConfig({ database: { user: "editor" } }, { WP_DB_USER: "  " });
    expect(resolved.user).toBe("editor");
  });

  test("rejects unsafe table prefixes", () => {
    expect(() => resolveDatabaseConfig({}, { WP_TABLE_PREFIX: "wp_; DROP" })).toThrow(
      "Invalid table prefix: 'wp_; DROP'. Only letters, digits and underscores are allowed.",
    );
  });

  test("rejects an invalid port", () => {
    expect(() => resolveDatabaseConfig({}, { WP_DB_PORT: "mysql" })).toThrow(
      "Invalid port: mysql. Must be an integer between 1 and 65535.",
    );
  });
});

describe("setting definitions", () => {
  test("apply stores parsed values", () => {
    const cfg: Config = {};
    expect(SETTING_DEFS["db.port"]?.apply(cfg, "3307")).toBe(3307);
    expect(SETTING_DEFS["output.color"]?.apply(cfg, "off")).toBe(false);
    expect(cfg).toEqual({ database: { port: 3307 }, settings: { color: false } });
  });

  test("reset removes a single value", () => {
    const cfg: Config = { database: { host: "db.local", user: "editor" } };
    SETTING_DEFS["db.host"]?.reset(cfg);
    expect(cfg).toEqual({ database: { user: "editor" } });
  });
});

describe("config commands", () => {
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    stdout = [];
    stderr = [];
    vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      stdout.push(args.map(String).join(" "));
    });
    vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      stderr.push(args.map(String).join(" "));
    });
    process.exitCode = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = 0;
  });

  async function run(...args: string[]): Promise<void> {
    await buildProgram().parseAsync(["node", "wp-comment", "--no-color", ...args]);
  }

  test("set writes the config file", async () => {
    await run("config", "set", "db.tablePrefix", "blog_");
    expect(JSON.parse(stdout.join("\n"))).toEqual({ "db.tablePrefix": "blog_" });
    expect(readConfig()).toEqual({ database: { table_prefix: "blog_" } });
  });

  test("get masks the password", async () => {
    writeConfig({ database: { password: "test-secret" } });
    await run("config", "get", "db.password");
    expect(JSON.parse(stdout.join("\n"))).toEqual({ "db.password": "********" });
  });

  test("set rejects invalid values", async () => {
    await run("config", "set", "db.port", "0");
    expect(stderr).toEqual(["Error: Invalid port: 0. Must be an integer between 1 and 65535."]);
    expect(process.exitCode).toBe(1);
    expect(readConfig()).toEqual({});
  });

  test("unknown keys are reported", async () => {
    await run("config", "reset", "db.nope");
    expect(stderr[0]).toMatch(/^Error: Unknown setting: db\.nope\. Valid keys: db\.host, /);
  });
});
