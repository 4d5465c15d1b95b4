import { afterEach, describe, expect, it, vi } from 'vitest';

import { InvalidTargetError } from '../errors.js';

import { fetchPdf, filenameFromUrl } from './fetchDocument.js';

function pdfResponse(body: string, headers: Record<string, string> = { 'content-type': 'application/pdf' }) {
  return new Response(body, { status: 200, headers });
}

describe('fetchPdf', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the bytes and a filename from the URL path', async () => {
    const fetchMock = vi.fn(async () => pdfResponse('%PDF-1.7'));
    vi.stubGlobal('fetch', fetchMock);

    const fetched = await fetchPdf('https://example.test/files/Annual%20Report.pdf');

    expect(fetched.filename).toBe('Annual Report.pdf');
    expect(new TextDecoder().decode(fetched.bytes)).toBe('%PDF-1.7');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('rejects non-PDF content types', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => pdfResponse('<html>', { 'content-type': 'text/html; charset=utf-8' })));

    await expect(fetchPdf('https://example.test/a.pdf')).rejects.toThrow(
      'https://example.test/a.pdf is not a PDF (content-type text/html)',
    );
  });

  it('rejects HTTP errors and oversized bodies', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('missing', { status: 404 })));
    await expect(fetchPdf('https://example.test/a.pdf')).rejects.toBeInstanceOf(InvalidTargetError);

    vi.stubGlobal('fetch', vi.fn(async () => pdfResponse('0123456789')));
    await expect(fetchPdf('https://example.test/a.pdf', { maxBytes: 4 })).rejects.toThrow('exceeds the 4 byte limit');
  });

  it('refuses unsupported schemes before fetching', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    await expect(fetchPdf('file:///etc/passwd')).rejects.toThrow('Unsupported URL scheme: file:');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('filenameFromUrl', () => {
  it('falls back to a default name', () => {
    expect(filenameFromUrl(new URL('https://example.test/'))).toBe('document.pdf');
  });
});
