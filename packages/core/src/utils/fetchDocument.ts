import path from 'node:path';

import { InvalidTargetError } from '../errors.js';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_BYTES = 50 * 1024 * 1024;

export interface FetchDocumentOptions {
  /** Abort the request after this many milliseconds. Default: 30s. */
  timeoutMs?: number;

  /** Maximum allowed document size in bytes. Default: 50MB. */
  maxBytes?: number;
}

export interface FetchedPdf {
  bytes: Uint8Array;
  filename: string;
}

/**
 * Download a PDF linked from an audited page so it can be audited as its own run.
 */
export async function fetchPdf(url: string, options: FetchDocumentOptions = {}): Promise<FetchedPdf> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;

  let resolved: URL;
  try {
    resolved = new URL(url);
  } catch {
    throw new InvalidTargetError(`Not a valid URL: ${url}`);
  }
  if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
    throw new InvalidTargetError(`Unsupported URL scheme: ${resolved.protocol}`);
  }

  const res = await fetch(resolved, {
    signal: AbortSignal.timeout(timeoutMs),
    redirect: 'follow',
  });
  if (!res.ok) {
    throw new InvalidTargetError(`Fetching ${url} failed with HTTP ${res.status}`);
  }

  const contentLength = Number(res.headers.get('content-length') ?? Number.NaN);
  if (Number.isFinite(contentLength) && contentLength > maxBytes) {
    throw new InvalidTargetError(`${url} exceeds the ${maxBytes} byte limit`);
  }

  const contentType = (res.headers.get('content-type') ?? '').split(';')[0]?.trim().toLowerCase() ?? '';
  if (contentType && contentType !== 'application/pdf' && contentType !== 'application/octet-stream') {
    throw new InvalidTargetError(`${url} is not a PDF (content-type ${contentType})`);
  }

  const bytes = new Uint8Array(await res.arrayBuffer());
  if (bytes.byteLength > maxBytes) {
    throw new InvalidTargetError(`${url} exceeds the ${maxBytes} byte limit`);
  }

  return { bytes, filename: filenameFromUrl(resolved) };
}

/**
 * Last path segment of a URL, decoded; `document.pdf` when there is none.
 */
export function filenameFromUrl(url: URL): string {
  const base = path.posix.basename(url.pathname);
  if (!base) return 'document.pdf';
  try {
    return decodeURIComponent(base);
  } catch {
    return base;
  }
}
