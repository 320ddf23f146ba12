/**
 * Shared config loader for fanpost CLI commands.
 * Reads .fanpost/config.yaml from the home directory or the working directory.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import {
  applyEnvOverrides,
  ConfigError,
  DEFAULT_DB_PATH,
  DEFAULT_RELAY_TIMEOUTS,
  DEFAULT_RELAYS,
  parseConfig,
  type FanpostConfig,
} from "@fanpost/core";

export const HOME_CONFIG_PATH = join(homedir(), ".fanpost", "config.yaml");

export function localConfigPath(cwd: string = process.cwd()): string {
  return join(cwd, ".fanpost", "config.yaml");
}

/** Find the config file path, or null if not found. */
export function findConfigPath(searchPaths: string[] = [HOME_CONFIG_PATH, localConfigPath()]): string | null {
  for (const p of searchPaths) {
    if (existsSync(p)) return p;
  }
  return null;
}

/** Parse config.yaml text into a validated config. */
export function parseConfigYaml(text: string): FanpostConfig {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new ConfigError(`config.yaml is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseConfig(raw);
}

/**
 * Load config.yaml (defaults when there is none) with FANPOST_* environment
 * overrides applied.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FanpostConfig {
  const p = findConfigPath();
  const config = p ? parseConfigYaml(readFileSync(p, "utf-8")) : parseConfig(undefined);
  return applyEnvOverrides(config, env);
}

/** Load config or exit with error if it is invalid. */
export function requireConfig(): FanpostConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error(`  ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

/** The YAML document `fanpost init` writes. */
export function defaultConfigYaml(relays: readonly string[] = DEFAULT_RELAYS): string {
  return stringifyYaml({
    nostr: { relays: [...relays] },
    storage: { db_path: DEFAULT_DB_PATH },
    relay: {
      connect_timeout_ms: DEFAULT_RELAY_TIMEOUTS.connectTimeoutMs,
      ack_timeout_ms: DEFAULT_RELAY_TIMEOUTS.ackTimeoutMs,
      probe_connect_timeout_ms: DEFAULT_RELAY_TIMEOUTS.probeConnectTimeoutMs,
      probe_read_timeout_ms: DEFAULT_RELAY_TIMEOUTS.probeReadTimeoutMs,
    },
    posting: { dry_run: false },
  });
}

export function writeConfig(path: string, yamlText: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, yamlText, "utf-8");
}
