/**
 * Brisk
 *
 * A small HTTP/1.x server for raw TCP connections: one request per
 * connection, pattern routing, middleware and static files.
 *
 * @module brisk
 */

// Application
export { Application, createApp, type ApplicationOptions } from './app.ts';

// HTTP
export * from './http/mod.ts';

// Routing
export * from './router/mod.ts';

// Middleware
export * from './middleware/mod.ts';

// Configuration
export * from './config/mod.ts';

// Telemetry
export * from './telemetry/mod.ts';
