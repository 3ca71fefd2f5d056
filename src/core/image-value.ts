/**
 * Base64 encoding of images for icon state values.
 *
 * The controller shows a state holding base64 image data as an icon. The
 * image comes from an http(s) URL, whose content type must be one of the
 * accepted formats, or from a local file.
 */

import { readFile as readFileAsync } from 'node:fs/promises';

import { ErrorCode } from '../types/errors.js';
import { ClientError, toError, usageError } from './client-error.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Where to look for the image. `auto` tries a URL first, then a file. */
export type ImageSource = 'auto' | 'web' | 'local';

export interface EncodeImageOptions {
  source?: ImageSource;
  /** MIME types accepted from a URL. */
  formats?: readonly string[];
  timeoutMs?: number;
  fetch?: typeof fetch;
  readFile?: (path: string) => Promise<Uint8Array>;
}

export const DEFAULT_IMAGE_FORMATS: readonly string[] = ['image/png', 'image/jpeg', 'image/jpg'];

const DOWNLOAD_TIMEOUT_MS = 30_000;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseWebUrl(image: string): URL | undefined {
  try {
    const url = new URL(image);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url : undefined;
  } catch {
    return undefined;
  }
}

/** `image/png; charset=binary` → `image/png`. */
function mediaType(header: string | null): string {
  return (header ?? '').split(';')[0]?.trim().toLowerCase() ?? '';
}

async function request(
  fetchFn: typeof fetch,
  url: URL,
  method: 'HEAD' | 'GET',
  timeoutMs: number,
): Promise<Response> {
  let res: Response;
  try {
    res = await fetchFn(url, { method, signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    throw new ClientError({
      code: ErrorCode.TRANSPORT_ERROR,
      message: `Cannot fetch image ${url.href}: ${toError(err).message}`,
      cause: err,
    });
  }
  if (!res.ok) {
    throw new ClientError({
      code: ErrorCode.TRANSPORT_ERROR,
      message: `Cannot fetch image ${url.href}: HTTP ${res.status}`,
    });
  }
  return res;
}

async function download(
  url: URL,
  formats: readonly string[],
  fetchFn: typeof fetch,
  timeoutMs: number,
): Promise<Uint8Array> {
  const head = await request(fetchFn, url, 'HEAD', timeoutMs);
  const type = mediaType(head.headers.get('content-type'));
  if (!formats.includes(type)) {
    throw usageError(
      `Returned image content type (${type || 'none'}) is not one of: ${formats.join(', ')}`,
      'image',
    );
  }
  const res = await request(fetchFn, url, 'GET', timeoutMs);
  return new Uint8Array(await res.arrayBuffer());
}

// ---------------------------------------------------------------------------
// encodeImage
// ---------------------------------------------------------------------------

/**
 * Base64 text of the image at `image`, a URL or a file path.
 *
 * @throws ClientError (USAGE_ERROR) when `image` is neither a usable URL
 *   nor a readable file, or the URL serves a content type not in `formats`.
 * @throws ClientError (TRANSPORT_ERROR) when the URL cannot be fetched.
 */
export async function encodeImage(image: string, options: EncodeImageOptions = {}): Promise<string> {
  const source = options.source ?? 'auto';
  const readFile: (path: string) => Promise<Uint8Array> = options.readFile ?? readFileAsync;

  if (source !== 'local') {
    const url = parseWebUrl(image);
    if (url !== undefined) {
      const data = await download(
        url,
        options.formats ?? DEFAULT_IMAGE_FORMATS,
        options.fetch ?? fetch,
        options.timeoutMs ?? DOWNLOAD_TIMEOUT_MS,
      );
      return Buffer.from(data).toString('base64');
    }
    if (source === 'web') {
      throw usageError(`'${image}' is not a valid http(s) URL`, 'image');
    }
  }

  let data: Uint8Array;
  try {
    data = await readFile(image);
  } catch (err) {
    const detail = toError(err).message;
    throw usageError(
      source === 'auto'
        ? `'${image}' is neither a valid URL nor an existing file: ${detail}`
        : `Cannot read image file '${image}': ${detail}`,
      'image',
    );
  }
  return Buffer.from(data).toString('base64');
}
