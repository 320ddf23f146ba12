#!/usr/bin/env tsx

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { initCommand } from "./commands/init.js";
import { keygenCommand } from "./commands/keygen.js";
import { accountsCommand } from "./commands/accounts.js";
import { relaysCommand } from "./commands/relays.js";
import { postCommand } from "./commands/post.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** Walk up from current file to find the nearest package.json */
function findPackageJson(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "package.json");
    try {
      readFileSync(candidate);
      return candidate;
    } catch {
      dir = dirname(dir);
    }
  }
  throw new Error("Could not find package.json");
}

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(findPackageJson(), "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

const program = new Command();

program
  .name("fanpost")
  .description("Compose once, post everywhere")
  .version(readVersion());

program.addCommand(initCommand);
program.addCommand(keygenCommand);
program.addCommand(accountsCommand);
program.addCommand(relaysCommand);
program.addCommand(postCommand);

await program.parseAsync(process.argv);
