/**
 * Relay transport (NIP-01 over WebSocket).
 *
 * Every operation opens its own short-lived connection and closes it before
 * returning. Nothing is pooled, so concurrent publishes never share a socket.
 *
 * ---- Wire frames ----
 *   -> ["EVENT", event]
 *   <- ["OK", id, accepted, message]
 *   -> ["REQ", subscriptionId, filter]
 */

import WebSocket, { type RawData } from 'ws';
import { bytesToHex, randomBytes } from '@noble/hashes/utils';

import { errorMessage } from '../errors/classify.js';
import { RelayError } from '../errors/types.js';
import type { SignedEvent } from './event.js';

export interface RelayTimeouts {
  /** Opening a connection for a publish. Default: 10000 */
  connectTimeoutMs: number;
  /** Waiting for the OK frame after sending an event. Default: 10000 */
  ackTimeoutMs: number;
  /** Opening a connection for a probe. Default: 5000 */
  probeConnectTimeoutMs: number;
  /** Waiting for any frame after a probe REQ. Default: 3000 */
  probeReadTimeoutMs: number;
}

export const DEFAULT_RELAY_TIMEOUTS: Readonly<RelayTimeouts> = Object.freeze({
  connectTimeoutMs: 10_000,
  ackTimeoutMs: 10_000,
  probeConnectTimeoutMs: 5_000,
  probeReadTimeoutMs: 3_000,
});

export interface RelayFailure {
  relayUrl: string;
  error: Error;
}

export interface PublishSummary {
  successCount: number;
  /** Relays that answered OK true. */
  accepted: string[];
  /** Relay URL to failure message, one entry per failed relay. */
  perRelayErrors: Record<string, string>;
  failures: RelayFailure[];
}

export function isValidRelayUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return (parsed.protocol === 'ws:' || parsed.protocol === 'wss:') && parsed.hostname.length > 0;
  } catch {
    return false;
  }
}

type Frame = unknown[];

function frameText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

function parseFrame(data: RawData): Frame | null {
  try {
    const parsed: unknown = JSON.parse(frameText(data));
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function closeQuietly(ws: WebSocket): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.close();
  } else if (ws.readyState === WebSocket.CONNECTING) {
    ws.terminate();
  }
}

export class RelayClient {
  private readonly timeouts: RelayTimeouts;

  constructor(timeouts: Partial<RelayTimeouts> = {}) {
    this.timeouts = { ...DEFAULT_RELAY_TIMEOUTS, ...timeouts };
  }

  get settings(): Readonly<RelayTimeouts> {
    return this.timeouts;
  }

  /**
   * Check that a relay answers a subscription. Any frame at all counts as
   * success; write acceptance is not verified.
   */
  async testConnection(url: string): Promise<boolean> {
    if (!isValidRelayUrl(url)) return false;

    let ws: WebSocket;
    try {
      ws = await this.open(url, this.timeouts.probeConnectTimeoutMs);
    } catch (err) {
      console.warn(`[relay] Probe of ${url} failed: ${errorMessage(err)}`);
      return false;
    }

    const subscriptionId = bytesToHex(randomBytes(8));
    try {
      return await new Promise<boolean>((resolve) => {
        const finish = (ok: boolean) => {
          clearTimeout(timer);
          ws.off('message', onMessage);
          ws.off('close', onClose);
          resolve(ok);
        };
        const onMessage = () => finish(true);
        const onClose = () => finish(false);
        const timer = setTimeout(() => finish(false), this.timeouts.probeReadTimeoutMs);

        ws.on('message', onMessage);
        ws.on('close', onClose);
        ws.send(JSON.stringify(['REQ', subscriptionId, { kinds: [1], limit: 1 }]), (err) => {
          if (err) finish(false);
        });
      });
    } finally {
      closeQuietly(ws);
    }
  }

  /** Publish to one relay, reporting failure as `false`. */
  async publish(url: string, event: SignedEvent): Promise<boolean> {
    try {
      await this.publishOrThrow(url, event);
      return true;
    } catch (err) {
      console.warn(`[relay] Publish to ${url} failed: ${errorMessage(err)}`);
      return false;
    }
  }

  /**
   * Send `event` and wait for the relay's OK for that id.
   *
   * Frames that do not parse, and OKs for other ids, are ignored.
   * @throws RelayError
   */
  async publishOrThrow(url: string, event: SignedEvent): Promise<void> {
    if (!isValidRelayUrl(url)) {
      throw new RelayError('invalid-url', url, `Invalid relay URL: ${url}`);
    }

    const ws = await this.open(url, this.timeouts.connectTimeoutMs);
    try {
      await new Promise<void>((resolve, reject) => {
        const settle = (error?: RelayError) => {
          clearTimeout(timer);
          ws.off('message', onMessage);
          ws.off('close', onClose);
          if (error) reject(error);
          else resolve();
        };
        const onMessage = (data: RawData) => {
          const frame = parseFrame(data);
          if (!frame || frame[0] !== 'OK' || frame[1] !== event.id) return;
          if (frame[2] === true) {
            settle();
            return;
          }
          const reason = typeof frame[3] === 'string' ? frame[3] : '';
          settle(new RelayError('rejected', url, `${url} rejected event${reason ? `: ${reason}` : ''}`, reason));
        };
        const onClose = () => settle(new RelayError('closed', url, `${url} closed the connection before acknowledging`));
        const timer = setTimeout(
          () => settle(new RelayError('ack-timeout', url, `No OK from ${url} within ${this.timeouts.ackTimeoutMs}ms`)),
          this.timeouts.ackTimeoutMs,
        );

        ws.on('message', onMessage);
        ws.on('close', onClose);
        ws.send(JSON.stringify(['EVENT', event]), (err) => {
          if (err) settle(new RelayError('closed', url, `Failed to send to ${url}: ${err.message}`));
        });
      });
    } finally {
      closeQuietly(ws);
    }
  }

  /** Publish to every relay concurrently. No relay's failure stops the others. */
  async publishToAll(relays: readonly string[], event: SignedEvent): Promise<PublishSummary> {
    const unique = [...new Set(relays)];
    const settled = await Promise.allSettled(unique.map((url) => this.publishOrThrow(url, event)));

    const summary: PublishSummary = { successCount: 0, accepted: [], perRelayErrors: {}, failures: [] };
    settled.forEach((outcome, i) => {
      const url = unique[i];
      if (outcome.status === 'fulfilled') {
        summary.successCount++;
        summary.accepted.push(url);
        return;
      }
      const error = outcome.reason instanceof Error ? outcome.reason : new Error(String(outcome.reason));
      summary.perRelayErrors[url] = error.message;
      summary.failures.push({ relayUrl: url, error });
      console.warn(`[relay] ${url}: ${error.message}`);
    });
    return summary;
  }

  // ---- Internals ----

  private open(url: string, timeoutMs: number): Promise<WebSocket> {
    return new Promise((resolve, reject) => {
      let ws: WebSocket;
      try {
        ws = new WebSocket(url);
      } catch (err) {
        reject(new RelayError('invalid-url', url, `Invalid relay URL ${url}: ${errorMessage(err)}`));
        return;
      }

      const onOpen = () => {
        clearTimeout(timer);
        ws.off('error', onError);
        ws.on('error', (err) => console.warn(`[relay] ${url}: ${err.message}`));
        resolve(ws);
      };
      const onError = (err: Error) => {
        clearTimeout(timer);
        ws.off('open', onOpen);
        reject(new RelayError('connect-failed', url, `Failed to connect to ${url}: ${err.message}`));
      };
      const timer = setTimeout(() => {
        ws.off('open', onOpen);
        ws.terminate();
        reject(new RelayError('connect-timeout', url, `Connection to ${url} timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      ws.once('open', onOpen);
      ws.once('error', onError);
    });
  }
}
