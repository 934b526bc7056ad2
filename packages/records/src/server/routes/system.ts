/**
 * System Routes Factory
 *
 * Health, stats and server configuration (auth service and controllers).
 */

import { Hono } from 'hono';
import { BodyReader } from '../body.js';
import { callerOf, errorResponse, readJsonObject } from '../http.js';
import type { RouteServices, ServerEnv } from '../types.js';

export function createSystemRoutes(services: RouteServices) {
  const { store } = services;
  const app = new Hono<ServerEnv>();

  // GET /api/health - Liveness; the only route that needs no principal
  app.get('/api/health', (c) => {
    try {
      return c.json({ status: store.health(), timestamp: new Date().toISOString() });
    } catch (error) {
      return errorResponse(c, error, 'Health check failed');
    }
  });

  app.get('/api/stats', (c) => {
    try {
      return c.json(store.stats());
    } catch (error) {
      return errorResponse(c, error, 'Failed to get stats');
    }
  });

  // ============================================================================
  // Configuration
  // ============================================================================

  app.get('/api/config/auth-service', (c) => {
    try {
      return c.json({ authService: store.settings.getAuthService() ?? null });
    } catch (error) {
      return errorResponse(c, error, 'Failed to get auth service');
    }
  });

  // PUT /api/config/auth-service - Controllers only
  app.put('/api/config/auth-service', async (c) => {
    try {
      const body = new BodyReader(await readJsonObject(c));
      const authService = store.settings.setAuthService(callerOf(c), body.string('authService'));
      return c.json({ authService });
    } catch (error) {
      return errorResponse(c, error, 'Failed to set auth service');
    }
  });

  // DELETE /api/config/auth-service - Controllers only; back to the configured reference
  app.delete('/api/config/auth-service', (c) => {
    try {
      return c.json({ authService: store.settings.resetAuthService(callerOf(c)) ?? null });
    } catch (error) {
      return errorResponse(c, error, 'Failed to reset auth service');
    }
  });

  app.get('/api/config/controllers', (c) => {
    try {
      return c.json({ controllers: store.settings.getControllers() });
    } catch (error) {
      return errorResponse(c, error, 'Failed to get controllers');
    }
  });

  // PUT /api/config/controllers - Controllers only; replaces the whole list
  app.put('/api/config/controllers', async (c) => {
    try {
      const body = new BodyReader(await readJsonObject(c));
      const list = body.optionalStringList('controllers') ?? [];
      return c.json({ controllers: store.settings.setControllers(callerOf(c), list) });
    } catch (error) {
      return errorResponse(c, error, 'Failed to set controllers');
    }
  });

  return app;
}
