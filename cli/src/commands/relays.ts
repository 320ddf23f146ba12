import { Command } from "commander";
import chalk from "chalk";
import { RelayClient } from "@fanpost/core";
import { requireConfig } from "../utils/config.js";
import { banner, createSpinner, info, table, warn } from "../utils/display.js";

export interface RelayProbe {
  url: string;
  reachable: boolean;
  latencyMs: number | null;
}

/** Probe every relay concurrently; latency covers connect, REQ and first reply. */
export async function probeRelays(client: RelayClient, relays: readonly string[]): Promise<RelayProbe[]> {
  return Promise.all(
    relays.map(async (url) => {
      const start = Date.now();
      const reachable = await client.testConnection(url);
      return { url, reachable, latencyMs: reachable ? Date.now() - start : null };
    }),
  );
}

export const relaysCommand = new Command("relays")
  .description("Check which relays answer")
  .option("--relay <urls...>", "Relays to check instead of the configured list")
  .action(async (opts: { relay?: string[] }) => {
    banner();

    const config = requireConfig();
    const relays = opts.relay && opts.relay.length > 0 ? opts.relay : config.nostr.relays;
    if (relays.length === 0) {
      info("No relays configured.");
      return;
    }

    const spinner = createSpinner(`Probing ${relays.length} relay(s)...`);
    spinner.start();
    const results = await probeRelays(new RelayClient(config.relay.timeouts), relays);
    spinner.stop();

    table(
      ["Relay", "Status", "Latency"],
      results.map((r) => [
        r.url,
        r.reachable ? chalk.green("connected") : chalk.red("unreachable"),
        r.latencyMs === null ? "-" : `${r.latencyMs}ms`,
      ]),
    );

    const down = results.filter((r) => !r.reachable).length;
    if (down === results.length) {
      warn("No relay answered. Posts to Nostr will fail.");
      process.exitCode = 1;
    } else if (down > 0) {
      warn(`${down} of ${results.length} relay(s) did not answer.`);
    }
  });
