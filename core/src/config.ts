/**
 * Runtime configuration.
 *
 * The on-disk form is YAML with snake_case keys (see `cli/src/utils/config.ts`);
 * {@link parseConfig} validates it and fills in defaults, and
 * {@link applyEnvOverrides} layers FANPOST_* environment variables on top.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

import { ConfigError } from './errors/types.js';
import { DEFAULT_RELAY_TIMEOUTS, isValidRelayUrl, type RelayTimeouts } from './nostr/relay-client.js';
import { DEFAULT_RELAYS } from './platforms/nostr.js';

export interface FanpostConfig {
  nostr: {
    relays: string[];
  };
  storage: {
    dbPath: string;
  };
  relay: {
    timeouts: RelayTimeouts;
  };
  posting: {
    /** Publish through in-process mock services instead of the network. */
    dryRun: boolean;
  };
}

export const DEFAULT_DB_PATH = join(homedir(), '.fanpost', 'fanpost.db');

export function defaultConfig(): FanpostConfig {
  return {
    nostr: { relays: [...DEFAULT_RELAYS] },
    storage: { dbPath: DEFAULT_DB_PATH },
    relay: { timeouts: { ...DEFAULT_RELAY_TIMEOUTS } },
    posting: { dryRun: false },
  };
}

// ---- Parsing ----

type Section = Record<string, unknown>;

function section(root: Section, name: string): Section {
  const value = root[name];
  if (value === undefined || value === null) return {};
  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new ConfigError(`"${name}" must be a mapping`);
  }
  return { ...value };
}

function positiveInt(value: unknown, path: string, fallback: number): number {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`"${path}" must be a positive integer`);
  }
  return value;
}

function relayList(value: unknown, path: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(`"${path}" must be a list of relay URLs`);
  }
  const relays = value.map((v) => v.trim()).filter((v) => v.length > 0);
  const invalid = relays.filter((url) => !isValidRelayUrl(url));
  if (invalid.length > 0) {
    throw new ConfigError(`"${path}" contains invalid relay URL(s): ${invalid.join(', ')}`);
  }
  return relays;
}

/** Validate a parsed YAML document. Missing keys take their defaults. */
export function parseConfig(raw: unknown): FanpostConfig {
  const config = defaultConfig();
  if (raw === undefined || raw === null) return config;
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError('Config must be a mapping');
  }
  const root: Section = { ...raw };

  const nostr = section(root, 'nostr');
  if (nostr['relays'] !== undefined) {
    const relays = relayList(nostr['relays'], 'nostr.relays');
    if (relays.length > 0) config.nostr.relays = relays;
  }

  const dbPath = section(root, 'storage')['db_path'];
  if (dbPath !== undefined) {
    if (typeof dbPath !== 'string' || dbPath.trim() === '') {
      throw new ConfigError('"storage.db_path" must be a non-empty string');
    }
    config.storage.dbPath = dbPath;
  }

  const relay = section(root, 'relay');
  const t = config.relay.timeouts;
  config.relay.timeouts = {
    connectTimeoutMs: positiveInt(relay['connect_timeout_ms'], 'relay.connect_timeout_ms', t.connectTimeoutMs),
    ackTimeoutMs: positiveInt(relay['ack_timeout_ms'], 'relay.ack_timeout_ms', t.ackTimeoutMs),
    probeConnectTimeoutMs: positiveInt(
      relay['probe_connect_timeout_ms'],
      'relay.probe_connect_timeout_ms',
      t.probeConnectTimeoutMs,
    ),
    probeReadTimeoutMs: positiveInt(relay['probe_read_timeout_ms'], 'relay.probe_read_timeout_ms', t.probeReadTimeoutMs),
  };

  const dryRun = section(root, 'posting')['dry_run'];
  if (dryRun !== undefined) {
    if (typeof dryRun !== 'boolean') {
      throw new ConfigError('"posting.dry_run" must be true or false');
    }
    config.posting.dryRun = dryRun;
  }

  return config;
}

// ---- Environment ----

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer`);
  }
  return value;
}

/** Return a copy of `config` with FANPOST_* variables applied. */
export function applyEnvOverrides(config: FanpostConfig, env: NodeJS.ProcessEnv = process.env): FanpostConfig {
  const next: FanpostConfig = {
    nostr: { relays: [...config.nostr.relays] },
    storage: { ...config.storage },
    relay: { timeouts: { ...config.relay.timeouts } },
    posting: { ...config.posting },
  };

  const relays = env['FANPOST_NOSTR_RELAYS'];
  if (relays && relays.trim() !== '') {
    next.nostr.relays = relayList(relays.split(','), 'FANPOST_NOSTR_RELAYS');
  }

  const dbPath = env['FANPOST_DB_PATH'];
  if (dbPath && dbPath.trim() !== '') {
    next.storage.dbPath = dbPath;
  }

  const connect = envInt(env, 'FANPOST_RELAY_CONNECT_TIMEOUT_MS');
  if (connect !== undefined) next.relay.timeouts.connectTimeoutMs = connect;

  const ack = envInt(env, 'FANPOST_RELAY_ACK_TIMEOUT_MS');
  if (ack !== undefined) next.relay.timeouts.ackTimeoutMs = ack;

  return next;
}
