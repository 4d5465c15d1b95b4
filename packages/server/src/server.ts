import type { Auditor, Logger, ReportStore } from '@accessaudit/core';
import { silentLogger } from '@accessaudit/core';
import { serve } from '@hono/node-server';
import type { Hono } from 'hono';

import { createApp } from './app.js';

const DEFAULT_PORT = 8787;

export interface AuditServerOptions {
  auditor: Auditor;
  store: ReportStore;
  logger?: Logger;
  port?: number;
  hostname?: string;
  maxUploadBytes?: number;
}

/**
 * Serves the HTTP app on a Node.js listener.
 */
export class AuditServer {
  readonly app: Hono;
  readonly port: number;
  readonly hostname: string;

  private readonly logger: Logger;
  private server: ReturnType<typeof serve> | null = null;

  constructor(options: AuditServerOptions) {
    this.logger = options.logger ?? silentLogger();
    this.port = options.port ?? DEFAULT_PORT;
    this.hostname = options.hostname ?? '127.0.0.1';
    this.app = createApp({
      auditor: options.auditor,
      store: options.store,
      logger: this.logger,
      maxUploadBytes: options.maxUploadBytes,
    });
  }

  start(): void {
    if (this.server) return;
    this.server = serve({ fetch: this.app.fetch, port: this.port, hostname: this.hostname });
    this.logger.info({ port: this.port, hostname: this.hostname }, 'HTTP server started');
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    this.logger.info('HTTP server stopped');
  }

  get url(): string {
    return `http://${this.hostname}:${this.port}`;
  }
}
