import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { debug } from "./log.ts";

let cachedVersion: string | undefined;

export function getPackageVersion(): string {
  if (cachedVersion !== undefined) {
    return cachedVersion;
  }

  const envVersion =
    process.env.WP_COMMENT_VERSION?.trim() || process.env.npm_package_version?.trim();
  if (envVersion) {
    cachedVersion = envVersion;
    return cachedVersion;
  }

  try {
    let dir = dirname(fileURLToPath(import.meta.url));
    for (let i = 0; i < 6; i++) {
      const candidate = join(dir, "package.json");
      if (existsSync(candidate)) {
        const raw = readFileSync(candidate, "utf8");
        const pkg: unknown = JSON.parse(raw);
        const version =
          typeof pkg === "object" && pkg !== null && "version" in pkg ? pkg.version : undefined;
        const v = typeof version === "string" ? version.trim() : "";
        cachedVersion = v || "0.0.0";
        return cachedVersion;
      }
      const next = dirname(dir);
      if (next === dir) {
        break;
      }
      dir = next;
    }
  } catch (err) {
    debug(`could not read package version: ${err instanceof Error ? err.message : String(err)}`);
  }

  cachedVersion = "0.0.0";
  return cachedVersion;
}
