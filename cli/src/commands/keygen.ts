import { Command } from "commander";
import chalk from "chalk";
import { generateKeyPair } from "@fanpost/core";
import { table, warn } from "../utils/display.js";

export const keygenCommand = new Command("keygen")
  .description("Generate a new Nostr key pair")
  .option("--json", "Print the keys as JSON", false)
  .action((opts: { json: boolean }) => {
    const keys = generateKeyPair();

    if (opts.json) {
      console.log(JSON.stringify({ publicKey: keys.publicKey, npub: keys.npub, nsec: keys.nsec }, null, 2));
      return;
    }

    console.log(chalk.bold.underline("\n  New Nostr identity"));
    table(
      ["Field", "Value"],
      [
        ["npub", keys.npub],
        ["public key (hex)", keys.publicKey],
        ["nsec", keys.nsec],
      ],
    );
    console.log();
    warn("Keep the nsec secret. Anyone holding it can post as you.");
  });
