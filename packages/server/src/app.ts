import {
  AuditError,
  InvalidTargetError,
  ReportNotFoundError,
  silentLogger,
  toError,
  toReportPayload,
  type AuditTarget,
  type Auditor,
  type Logger,
  type ReportStore,
} from '@accessaudit/core';
import { Hono, type Context } from 'hono';
import { z } from 'zod';

const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

const submissionSchema = z.union([
  z.object({ url: z.string().min(1) }).strict(),
  z.object({ html: z.string(), filename: z.string().min(1).default('document.html') }).strict(),
]);

export interface AppOptions {
  auditor: Auditor;
  store: ReportStore;
  logger?: Logger;

  /** Largest accepted PDF upload. Default: 50MB. */
  maxUploadBytes?: number;
}

/**
 * HTTP surface over an auditor and its report store.
 *
 * - `POST /audits`: JSON `{url}` or `{html, filename}`, or a raw
 *   `application/pdf` body with `?filename=`; answers `202 {ticket}`
 * - `GET /audits/:ticket`: state of a submitted run
 * - `GET /reports/:runId`: the stored report payload
 * - `GET /reports?since=<ISO date>`: run summaries, oldest first
 */
export function createApp(options: AppOptions): Hono {
  const { auditor, store } = options;
  const logger = (options.logger ?? silentLogger()).child({ component: 'http' });
  const maxUploadBytes = options.maxUploadBytes ?? DEFAULT_MAX_UPLOAD_BYTES;

  const app = new Hono();

  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.post('/audits', async (c) => {
    const contentType = (c.req.header('content-type') ?? '').split(';')[0]?.trim().toLowerCase() ?? '';

    let target: AuditTarget;
    if (contentType === 'application/pdf') {
      const declared = Number(c.req.header('content-length') ?? Number.NaN);
      if (Number.isFinite(declared) && declared > maxUploadBytes) return tooLarge(c, maxUploadBytes);

      const bytes = new Uint8Array(await c.req.arrayBuffer());
      if (bytes.byteLength > maxUploadBytes) return tooLarge(c, maxUploadBytes);
      target = { kind: 'pdf', bytes, filename: c.req.query('filename') ?? 'upload.pdf' };
    } else if (contentType === 'application/json') {
      const body: unknown = await c.req.json().catch(() => null);
      const parsed = submissionSchema.safeParse(body);
      if (!parsed.success) {
        return errorResponse(c, 400, 'invalid-target', 'Expected a JSON body with "url", or "html" and "filename"');
      }
      target =
        'url' in parsed.data
          ? { kind: 'web', url: parsed.data.url }
          : { kind: 'html', html: parsed.data.html, filename: parsed.data.filename };
    } else {
      return errorResponse(c, 415, 'invalid-target', 'Submit JSON or an application/pdf body');
    }

    const ticket = auditor.submit(target);
    logger.info({ ticket, kind: target.kind }, 'audit submitted');
    return c.json({ ticket }, 202);
  });

  app.get('/audits/:ticket', (c) => {
    const state = auditor.poll(c.req.param('ticket'));
    if (!state) return errorResponse(c, 404, 'ticket-not-found', `Unknown ticket ${c.req.param('ticket')}`);
    return c.json(state);
  });

  app.get('/reports', async (c) => {
    const since = c.req.query('since');
    let sinceDate: Date | undefined;
    if (since !== undefined) {
      sinceDate = new Date(since);
      if (Number.isNaN(sinceDate.getTime())) {
        return errorResponse(c, 400, 'invalid-query', `"since" is not a date: ${since}`);
      }
    }
    return c.json({ runs: await store.list({ since: sinceDate }) });
  });

  app.get('/reports/:runId', async (c) => {
    const runId = c.req.param('runId');
    return c.json(toReportPayload(await store.load(runId), runId));
  });

  app.onError((error, c) => {
    if (error instanceof InvalidTargetError) return errorResponse(c, 400, error.code, error.message);
    if (error instanceof ReportNotFoundError) return errorResponse(c, 404, error.code, error.message);

    const err = toError(error);
    logger.error({ err, path: c.req.path }, 'request failed');
    const code = err instanceof AuditError ? err.code : 'internal-error';
    return errorResponse(c, 500, code, 'Internal server error');
  });

  return app;
}

function tooLarge(c: Context, limit: number): Response {
  return errorResponse(c, 413, 'invalid-target', `Uploads are limited to ${limit} bytes`);
}

function errorResponse(c: Context, status: 400 | 404 | 413 | 415 | 500, code: string, message: string): Response {
  return c.json({ error: { code, message } }, status);
}
