/**
 * Trellis HTTP Server
 *
 * Exports `createServerApp` (opens storage and builds the Hono app) and
 * `startServer` (also listens through node:http).
 */

import { mkdirSync } from 'node:fs';
import { createServer, type IncomingMessage, type Server } from 'node:http';
import { dirname } from 'node:path';
import type { Hono } from 'hono';
import { openStorage } from '@trellis/storage';
import { createRecordStore } from '../api/record-store.js';
import type { RecordStore } from '../api/types.js';
import { loadConfig } from '../config/config.js';
import type { Configuration, LoadConfigOptions } from '../config/types.js';
import type { AuthServiceResolver } from '../systems/identity.js';
import { createLogger } from '../utils/logger.js';
import { createApp } from './app.js';
import { createHttpAuthServiceResolver } from './auth-client.js';
import type { ServerEnv } from './types.js';

export { createApp, PRINCIPAL_HEADER } from './app.js';
export { createHttpAuthService, createHttpAuthServiceResolver, type HttpAuthServiceOptions } from './auth-client.js';
export type { RouteServices, ServerEnv } from './types.js';

const logger = createLogger('server');

// ============================================================================
// Options & Return Types
// ============================================================================

export interface ServerOptions {
  /** Used as is; otherwise loaded with `configOptions` */
  config?: Configuration;
  configOptions?: LoadConfigOptions;
  resolveAuthService?: AuthServiceResolver;
}

export interface ServerApp {
  app: Hono<ServerEnv>;
  store: RecordStore;
  config: Configuration;
}

export interface RunningServer extends ServerApp {
  server: Server;
  /** Stops listening, then closes the store */
  close(): Promise<void>;
}

// ============================================================================
// createServerApp
// ============================================================================

export function createServerApp(options: ServerOptions = {}): ServerApp {
  const config = options.config ?? loadConfig(options.configOptions);

  let store: RecordStore;
  try {
    if (config.database !== ':memory:') {
      mkdirSync(dirname(config.database), { recursive: true });
    }
    store = createRecordStore({ backend: openStorage({ path: config.database }), config });
    logger.info(`Connected to database: ${config.database}`);
  } catch (error) {
    throw new Error(`Failed to initialize database: ${error instanceof Error ? error.message : String(error)}`);
  }

  const app = createApp({
    store,
    config,
    resolveAuthService: options.resolveAuthService ?? createHttpAuthServiceResolver(),
  });
  return { app, store, config };
}

// ============================================================================
// Node bridge
// ============================================================================

/** Request bodies are JSON or JSONL text */
function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    req.on('error', reject);
  });
}

function createNodeServer(app: Hono<ServerEnv>, origin: string): Server {
  return createServer(async (req, res) => {
    try {
      const headers = new Headers();
      for (const [key, value] of Object.entries(req.headers)) {
        if (value) headers.set(key, Array.isArray(value) ? value.join(', ') : value);
      }
      const method = req.method ?? 'GET';
      const body = ['GET', 'HEAD'].includes(method) ? undefined : await readBody(req);

      const response = await app.fetch(new Request(`${origin}${req.url ?? '/'}`, { method, headers, body }));
      res.writeHead(response.status, Object.fromEntries(response.headers.entries()));
      res.end(Buffer.from(await response.arrayBuffer()));
    } catch (error) {
      logger.error('Request error:', error);
      res.writeHead(500).end('Internal Server Error');
    }
  });
}

// ============================================================================
// startServer
// ============================================================================

export function startServer(options: ServerOptions = {}): Promise<RunningServer> {
  const serverApp = createServerApp(options);
  const { port, host } = serverApp.config.server;
  const server = createNodeServer(serverApp.app, `http://${host}:${port}`);

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      logger.info(`Listening on http://${host}:${port}`);
      resolve({
        ...serverApp,
        server,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => {
              serverApp.store.close();
              if (error) fail(error);
              else done();
            });
          }),
      });
    });
  });
}
