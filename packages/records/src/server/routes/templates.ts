/**
 * Template Routes Factory
 *
 * Private templates are visible to their owner only; public ones to every
 * authenticated caller.
 */

import { Hono } from 'hono';
import { validateCaptureType, validateTemplateKind, validateVisibility } from '@trellis/core';
import { BodyReader } from '../body.js';
import { callerOf, errorResponse, parsePageOptions, readJsonObject } from '../http.js';
import type { RouteServices, ServerEnv } from '../types.js';

export function createTemplateRoutes(services: RouteServices) {
  const { store } = services;
  const app = new Hono<ServerEnv>();

  // GET /api/templates - The caller's own templates
  app.get('/api/templates', (c) => {
    try {
      return c.json(store.templates.listMine(callerOf(c), parsePageOptions(c)));
    } catch (error) {
      return errorResponse(c, error, 'Failed to list templates');
    }
  });

  // GET /api/templates/public - Public templates of every owner
  app.get('/api/templates/public', (c) => {
    try {
      return c.json(store.templates.listPublic(callerOf(c), parsePageOptions(c)));
    } catch (error) {
      return errorResponse(c, error, 'Failed to list public templates');
    }
  });

  app.post('/api/templates', async (c) => {
    try {
      const body = new BodyReader(await readJsonObject(c));
      const template = store.templates.create(callerOf(c), {
        templateKind: validateTemplateKind(body.string('templateKind')),
        name: body.string('name'),
        description: body.optionalString('description'),
        visibility: body.optional('visibility', validateVisibility),
        captureType: body.optional('captureType', validateCaptureType),
        defaultTitle: body.optionalString('defaultTitle'),
        defaultFields: body.optionalObject('defaultFields'),
        defaultContent: body.optionalString('defaultContent'),
      });
      return c.json(template, 201);
    } catch (error) {
      return errorResponse(c, error, 'Failed to create template');
    }
  });

  app.get('/api/templates/:id', (c) => {
    try {
      return c.json(store.templates.get(callerOf(c), c.req.param('id')));
    } catch (error) {
      return errorResponse(c, error, 'Failed to get template');
    }
  });

  app.patch('/api/templates/:id', async (c) => {
    try {
      const body = new BodyReader(await readJsonObject(c));
      const template = store.templates.update(callerOf(c), c.req.param('id'), {
        name: body.optionalString('name'),
        description: body.nullableString('description'),
        visibility: body.optional('visibility', validateVisibility),
        captureType: body.optional('captureType', validateCaptureType),
        defaultTitle: body.nullableString('defaultTitle'),
        defaultFields: body.optionalObject('defaultFields'),
        defaultContent: body.optionalString('defaultContent'),
      });
      return c.json(template);
    } catch (error) {
      return errorResponse(c, error, 'Failed to update template');
    }
  });

  app.delete('/api/templates/:id', (c) => {
    try {
      return c.json(store.templates.delete(callerOf(c), c.req.param('id')));
    } catch (error) {
      return errorResponse(c, error, 'Failed to delete template');
    }
  });

  return app;
}
