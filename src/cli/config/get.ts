import type { Command } from "commander";
import { printJson, printError } from "../../lib/output.ts";
import { readConfig } from "../../lib/config.ts";
import { SETTING_DEFS, VALID_KEYS, type SettingDef } from "./index.ts";

const MASK = "********";

function display(def: SettingDef, value: unknown): unknown {
  if (def.secret && typeof value === "string" && value !== "") {
    return MASK;
  }
  return value;
}

export function registerGet(config: Command): void {
  config
    .command("get")
    .argument("[key]", "Setting key (omit to show all)")
    .description("Show current settings")
    .action((key?: string) => {
      const cfg = readConfig();

      if (!key) {
        const all: Record<string, unknown> = {};
        for (const [k, def] of Object.entries(SETTING_DEFS)) {
          all[k] = display(def, def.get(cfg));
        }
        printJson(all);
        return;
      }

      const def = SETTING_DEFS[key];
      if (!def) {
        printError(`Unknown setting: ${key}. Valid keys: ${VALID_KEYS.join(", ")}`);
        return;
      }

      const value = display(def, def.get(cfg));
      console.log(JSON.stringify({ [key]: value ?? null }, null, 2));
    });
}
