import { Command } from "commander";
import chalk from "chalk";
import {
  derivePublicKey,
  npubEncode,
  parseSecretKey,
  platformFromId,
  type Account,
  type CredentialValue,
} from "@fanpost/core";
import { withApp } from "../utils/app.js";
import { requireConfig } from "../utils/config.js";
import { createSpinner, error, info, success, table } from "../utils/display.js";
import { findAccount } from "../utils/selection.js";

export interface CredentialFlags {
  key?: string;
  relay?: string[];
  blossom?: string;
  credential?: string[];
}

/** Build the credential map from `accounts add` flags. */
export function buildCredentials(flags: CredentialFlags): Record<string, CredentialValue> {
  const credentials: Record<string, CredentialValue> = {};

  for (const pair of flags.credential ?? []) {
    const eq = pair.indexOf("=");
    if (eq <= 0) throw new Error(`Credential must look like name=value, got "${pair}"`);
    credentials[pair.slice(0, eq).trim()] = pair.slice(eq + 1);
  }
  if (flags.key) credentials["private_key"] = flags.key.trim();
  if (flags.relay && flags.relay.length > 0) credentials["relays"] = [...flags.relay];
  if (flags.blossom) credentials["blossom_server"] = flags.blossom.trim();

  return credentials;
}

/** Username shown for a Nostr account: its npub. */
function nostrUsername(key: string): string {
  return npubEncode(derivePublicKey(parseSecretKey(key)));
}

function accountRow(account: Account): string[] {
  return [
    account.id.slice(0, 8),
    platformFromId(account.platform).displayName,
    account.displayName,
    account.username.length > 24 ? `${account.username.slice(0, 21)}...` : account.username,
    account.isActive ? chalk.green("active") : chalk.dim("disabled"),
  ];
}

function fail(err: unknown): void {
  error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
}

const listCommand = new Command("list").description("List stored accounts").action(async () => {
  const config = requireConfig();
  await withApp(config, async (app) => {
    const accounts = app.accounts.all;
    if (accounts.length === 0) {
      info("No accounts yet. Add one with: fanpost accounts add --platform nostr --key <nsec>");
      return;
    }
    table(["ID", "Platform", "Name", "Username", "Status"], accounts.map(accountRow));
  });
});

const addCommand = new Command("add")
  .description("Add an account")
  .requiredOption("--platform <id>", "mastodon | bluesky | nostr | microblog | x")
  .option("--name <displayName>", "Display name")
  .option("--username <username>", "Username (nostr: derived from the key)")
  .option("--key <secret>", "Nostr secret key, nsec1... or 64-char hex")
  .option("--relay <urls...>", "Relays stored with the account")
  .option("--blossom <url>", "Blossom server for image uploads")
  .option("--credential <pairs...>", "Other credentials as name=value")
  .option("--skip-validation", "Save without testing the connection", false)
  .action(
    async (
      opts: CredentialFlags & { platform: string; name?: string; username?: string; skipValidation: boolean },
    ) => {
      const config = requireConfig();
      try {
        const platform = platformFromId(opts.platform.trim().toLowerCase());
        const credentials = buildCredentials(opts);
        const username =
          opts.username ?? (platform.id === "nostr" && opts.key ? nostrUsername(opts.key) : undefined);
        if (!username) throw new Error("--username is required for this platform");

        await withApp(config, async (app) => {
          const spinner = createSpinner(
            opts.skipValidation ? "Saving account..." : `Checking ${platform.displayName} connection...`,
          );
          spinner.start();
          try {
            const account = await app.accounts.addAccount({
              platform: platform.id,
              displayName: opts.name ?? username,
              username,
              credentials,
              validate: !opts.skipValidation,
            });
            spinner.succeed(`Added ${platform.displayName} account ${account.id}`);
          } catch (err) {
            spinner.fail("Account not added");
            throw err;
          }
        });
      } catch (err) {
        fail(err);
      }
    },
  );

function setActiveCommand(name: "enable" | "disable", isActive: boolean): Command {
  return new Command(name)
    .description(`${isActive ? "Enable" : "Disable"} an account for posting`)
    .argument("<id>", "Account id or unique prefix")
    .action(async (id: string) => {
      const config = requireConfig();
      try {
        await withApp(config, async (app) => {
          const account = findAccount(app.accounts.all, id);
          await app.accounts.setAccountActive(account.id, isActive);
          success(`${isActive ? "Enabled" : "Disabled"} ${account.displayName} (${account.id})`);
        });
      } catch (err) {
        fail(err);
      }
    });
}

const removeCommand = new Command("remove")
  .description("Delete an account and its credentials")
  .argument("<id>", "Account id or unique prefix")
  .action(async (id: string) => {
    const config = requireConfig();
    try {
      await withApp(config, async (app) => {
        const account = findAccount(app.accounts.all, id);
        await app.accounts.removeAccount(account.id);
        success(`Removed ${account.displayName} (${account.id})`);
      });
    } catch (err) {
      fail(err);
    }
  });

export const accountsCommand = new Command("accounts")
  .description("Manage posting accounts")
  .addCommand(listCommand)
  .addCommand(addCommand)
  .addCommand(removeCommand)
  .addCommand(setActiveCommand("enable", true))
  .addCommand(setActiveCommand("disable", false));
