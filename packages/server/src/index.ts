export { createApp } from './app.js';
export type { AppOptions } from './app.js';
export { AuditServer } from './server.js';
export type { AuditServerOptions } from './server.js';
