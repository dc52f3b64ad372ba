import type { Command } from "commander";
import { SETTING_DEFS } from "./index.ts";

export function registerListKeys(config: Command): void {
  config
    .command("list-keys")
    .description("List all setting keys with descriptions and defaults")
    .action(() => {
      const keys = Object.entries(SETTING_DEFS).map(([key, def]) => ({
        key,
        description: def.description,
        default: def.default ?? null,
      }));
      console.log(JSON.stringify(keys, null, 2));
    });
}
