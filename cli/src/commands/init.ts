import { Command } from "commander";
import { existsSync } from "node:fs";
import { DEFAULT_RELAYS, isValidRelayUrl } from "@fanpost/core";
import { defaultConfigYaml, HOME_CONFIG_PATH, localConfigPath, writeConfig } from "../utils/config.js";
import { banner, error, info, success, warn } from "../utils/display.js";

export const initCommand = new Command("init")
  .description("Write a starter config.yaml")
  .option("--local", "Write ./.fanpost/config.yaml instead of ~/.fanpost/config.yaml", false)
  .option("--relay <urls...>", "Relays to publish to (default: built-in list)")
  .option("--force", "Overwrite an existing config", false)
  .action((opts: { local: boolean; relay?: string[]; force: boolean }) => {
    banner();

    const path = opts.local ? localConfigPath() : HOME_CONFIG_PATH;
    if (existsSync(path) && !opts.force) {
      warn(`Config already exists at ${path}. Use --force to overwrite.`);
      return;
    }

    const relays = opts.relay && opts.relay.length > 0 ? opts.relay : [...DEFAULT_RELAYS];
    const invalid = relays.filter((url) => !isValidRelayUrl(url));
    if (invalid.length > 0) {
      error(`Invalid relay URL(s): ${invalid.join(", ")}`);
      process.exitCode = 1;
      return;
    }

    writeConfig(path, defaultConfigYaml(relays));
    success(`Wrote ${path}`);
    info("Next: fanpost keygen, then fanpost accounts add --platform nostr --key <nsec>");
  });
