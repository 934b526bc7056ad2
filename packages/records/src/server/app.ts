/**
 * HTTP application: CORS, caller resolution and every route group
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { resolvePrincipal } from '../systems/identity.js';
import { errorResponse } from './http.js';
import { createAdminRoutes } from './routes/admin.js';
import { createCaptureRoutes } from './routes/captures.js';
import { createDocumentRoutes } from './routes/documents.js';
import { createSprintRoutes } from './routes/sprints.js';
import { createSystemRoutes } from './routes/system.js';
import { createTemplateRoutes } from './routes/templates.js';
import { createWorkspaceRoutes } from './routes/workspaces.js';
import type { RouteServices, ServerEnv } from './types.js';

export const PRINCIPAL_HEADER = 'X-Principal';

/** Routes served without a caller principal */
const PUBLIC_PATHS = new Set(['/api/health']);

export function createApp(services: RouteServices): Hono<ServerEnv> {
  const { store, config } = services;
  const app = new Hono<ServerEnv>();

  const origins = config.server.corsOrigins;
  app.use(
    '*',
    cors({
      origin: origins.length > 0 ? origins : '*',
      allowMethods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'Authorization', PRINCIPAL_HEADER],
      credentials: origins.length > 0,
    })
  );

  // Every other /api route runs as the resolved caller
  app.use('/api/*', async (c, next) => {
    if (PUBLIC_PATHS.has(c.req.path)) {
      await next();
      return;
    }
    try {
      const principal = await resolvePrincipal({
        authorization: c.req.header('Authorization'),
        principalHeader: c.req.header(PRINCIPAL_HEADER),
        trustPrincipalHeader: config.identity.trustPrincipalHeader,
        authServiceReference: store.settings.getAuthService(),
        resolveAuthService: services.resolveAuthService,
      });
      c.set('principal', principal);
    } catch (error) {
      return errorResponse(c, error, 'Failed to resolve caller');
    }
    await next();
  });

  app.route('/', createSystemRoutes(services));
  app.route('/', createCaptureRoutes(services));
  app.route('/', createSprintRoutes(services));
  app.route('/', createWorkspaceRoutes(services));
  app.route('/', createDocumentRoutes(services));
  app.route('/', createTemplateRoutes(services));
  app.route('/', createAdminRoutes(services));

  return app;
}
