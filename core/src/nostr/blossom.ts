/**
 * Blossom media uploads.
 *
 * The upload is authorized by a signed kind 24242 event passed in the
 * Authorization header as `Nostr <base64(event JSON)>`.
 */

import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex } from '@noble/hashes/utils';

import { SocialPlatformError } from '../errors/types.js';
import type { MediaAttachment } from '../models/post-data.js';
import { finalizeEvent, KIND_BLOSSOM_AUTH, nowSeconds, type SignedEvent } from './event.js';

/** Lifetime of an upload authorization, in seconds. */
export const UPLOAD_AUTH_TTL_SECONDS = 3600;

export const DEFAULT_UPLOAD_TIMEOUT_MS = 30_000;

const MIME_TYPES: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
  svg: 'image/svg+xml',
  bmp: 'image/bmp',
  ico: 'image/x-icon',
  pdf: 'application/pdf',
  txt: 'text/plain',
  json: 'application/json',
  mp4: 'video/mp4',
  mp3: 'audio/mpeg',
  wav: 'audio/wav',
};

function extensionOf(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot >= 0 ? fileName.slice(dot + 1).toLowerCase() : '';
}

function serverBase(server: string): string {
  return server.endsWith('/') ? server.slice(0, -1) : server;
}

export function mimeTypeFor(fileName: string): string {
  return MIME_TYPES[extensionOf(fileName)] ?? 'application/octet-stream';
}

/**
 * The URL a Blossom server conventionally serves a blob at:
 * `<server>/<sha256>.<ext>`. Servers behind a CDN may answer with another one.
 */
export function expectedBlobUrl(server: string, attachment: MediaAttachment): string {
  const ext = extensionOf(attachment.fileName);
  return `${serverBase(server)}/${bytesToHex(sha256(attachment.bytes))}${ext ? `.${ext}` : ''}`;
}

export function createUploadAuthEvent(secretKey: Uint8Array, fileBytes: Uint8Array, now = nowSeconds()): SignedEvent {
  return finalizeEvent(
    {
      kind: KIND_BLOSSOM_AUTH,
      created_at: now,
      tags: [
        ['t', 'upload'],
        ['x', bytesToHex(sha256(fileBytes))],
        ['expiration', String(now + UPLOAD_AUTH_TTL_SECONDS)],
      ],
      content: 'Upload image to Blossom server',
    },
    secretKey,
  );
}

export function uploadAuthorizationHeader(event: SignedEvent): string {
  return `Nostr ${Buffer.from(JSON.stringify(event), 'utf8').toString('base64')}`;
}

export interface UploadOptions {
  fetch?: typeof fetch;
  timeoutMs?: number;
  /** Unix seconds used for the authorization event. */
  now?: number;
}

/**
 * Upload one attachment and return the URL the server reports.
 *
 * @throws SocialPlatformError `rateLimitError` on 429, `serverError` for any
 *   other non-2xx status or a response without a URL
 */
export async function uploadToBlossom(
  server: string,
  attachment: MediaAttachment,
  secretKey: Uint8Array,
  options: UploadOptions = {},
): Promise<string> {
  const doFetch = options.fetch ?? fetch;
  const base = serverBase(server);
  const authEvent = createUploadAuthEvent(secretKey, attachment.bytes, options.now);

  const response = await doFetch(`${base}/upload`, {
    method: 'PUT',
    headers: {
      Authorization: uploadAuthorizationHeader(authEvent),
      'Content-Type': attachment.mimeType ?? mimeTypeFor(attachment.fileName),
    },
    body: attachment.bytes,
    signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_UPLOAD_TIMEOUT_MS),
  });

  if (!response.ok) {
    const body = await response.text();
    throw new SocialPlatformError(
      'nostr',
      response.status === 429 ? 'rateLimitError' : 'serverError',
      `Blossom upload failed: ${response.status}${body ? ` - ${body}` : ''}`,
    );
  }

  const data: unknown = await response.json();
  if (typeof data === 'object' && data !== null && 'url' in data && typeof data.url === 'string' && data.url) {
    return data.url;
  }
  throw new SocialPlatformError('nostr', 'serverError', 'No URL returned from Blossom server');
}

/** Append URLs to the content, each on its own line. */
export function appendMediaUrls(content: string, urls: readonly string[]): string {
  let out = content;
  for (const url of urls) {
    if (out.length > 0 && !out.endsWith('\n')) out += '\n';
    out += url;
  }
  return out;
}
