/**
 * Admin Routes Factory
 *
 * Integrity audit and repair, snapshot export and restore. Controllers only.
 */

import { Hono } from 'hono';
import { requireController } from '../../systems/identity.js';
import { callerOf, errorResponse } from '../http.js';
import type { RouteServices, ServerEnv } from '../types.js';

export const SNAPSHOT_CONTENT_TYPE = 'application/x-ndjson';

export function createAdminRoutes(services: RouteServices) {
  const { store } = services;
  const app = new Hono<ServerEnv>();

  app.get('/api/admin/audit', (c) => {
    try {
      requireController(store.settings.getControllers(), callerOf(c));
      return c.json(store.audit());
    } catch (error) {
      return errorResponse(c, error, 'Failed to audit store');
    }
  });

  app.post('/api/admin/repair', (c) => {
    try {
      requireController(store.settings.getControllers(), callerOf(c));
      return c.json(store.repair());
    } catch (error) {
      return errorResponse(c, error, 'Failed to repair store');
    }
  });

  // GET /api/admin/export - JSONL snapshot of every record and setting
  app.get('/api/admin/export', (c) => {
    try {
      requireController(store.settings.getControllers(), callerOf(c));
      const result = store.exportSnapshot();
      return c.body(result.content, 200, {
        'Content-Type': SNAPSHOT_CONTENT_TYPE,
        'X-Snapshot-Records': String(result.records),
      });
    } catch (error) {
      return errorResponse(c, error, 'Failed to export snapshot');
    }
  });

  // POST /api/admin/import - Replaces the store contents with a snapshot body
  app.post('/api/admin/import', async (c) => {
    try {
      requireController(store.settings.getControllers(), callerOf(c));
      const content = await c.req.text();
      return c.json(store.importSnapshot(content));
    } catch (error) {
      return errorResponse(c, error, 'Failed to import snapshot');
    }
  });

  return app;
}
