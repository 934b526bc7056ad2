/**
 * Sprint Routes Factory
 *
 * Sprint CRUD and membership with capacity enforcement.
 */

import { Hono } from 'hono';
import { validateSprintStatus } from '@trellis/core';
import { BodyReader } from '../body.js';
import { callerOf, errorResponse, parsePageOptions, readJsonObject } from '../http.js';
import type { RouteServices, ServerEnv } from '../types.js';

export function createSprintRoutes(services: RouteServices) {
  const { store } = services;
  const app = new Hono<ServerEnv>();

  app.get('/api/sprints', (c) => {
    try {
      return c.json(store.sprints.list(callerOf(c), parsePageOptions(c)));
    } catch (error) {
      return errorResponse(c, error, 'Failed to list sprints');
    }
  });

  app.post('/api/sprints', async (c) => {
    try {
      const body = new BodyReader(await readJsonObject(c));
      const sprint = store.sprints.create(callerOf(c), {
        name: body.string('name'),
        goal: body.optionalString('goal'),
        status: body.optional('status', validateSprintStatus),
        startDate: body.optionalString('startDate'),
        endDate: body.optionalString('endDate'),
        capacity: body.optionalNumber('capacity'),
      });
      return c.json(sprint, 201);
    } catch (error) {
      return errorResponse(c, error, 'Failed to create sprint');
    }
  });

  app.get('/api/sprints/:id', (c) => {
    try {
      return c.json(store.sprints.get(callerOf(c), c.req.param('id')));
    } catch (error) {
      return errorResponse(c, error, 'Failed to get sprint');
    }
  });

  // GET /api/sprints/:id/load - Capacity, current load and remaining points
  app.get('/api/sprints/:id/load', (c) => {
    try {
      return c.json(store.sprints.getLoad(callerOf(c), c.req.param('id')));
    } catch (error) {
      return errorResponse(c, error, 'Failed to get sprint load');
    }
  });

  app.patch('/api/sprints/:id', async (c) => {
    try {
      const body = new BodyReader(await readJsonObject(c));
      const sprint = store.sprints.update(callerOf(c), c.req.param('id'), {
        name: body.optionalString('name'),
        goal: body.nullableString('goal'),
        status: body.optional('status', validateSprintStatus),
        startDate: body.nullableString('startDate'),
        endDate: body.nullableString('endDate'),
        capacity: body.nullableNumber('capacity'),
      });
      return c.json(sprint);
    } catch (error) {
      return errorResponse(c, error, 'Failed to update sprint');
    }
  });

  app.delete('/api/sprints/:id', (c) => {
    try {
      return c.json(store.sprints.delete(callerOf(c), c.req.param('id')));
    } catch (error) {
      return errorResponse(c, error, 'Failed to delete sprint');
    }
  });

  // POST /api/sprints/:id/captures/:captureId - Add a capture to the sprint
  app.post('/api/sprints/:id/captures/:captureId', (c) => {
    try {
      const load = store.sprints.addCapture(callerOf(c), c.req.param('id'), c.req.param('captureId'));
      return c.json(load, 201);
    } catch (error) {
      return errorResponse(c, error, 'Failed to add capture to sprint');
    }
  });

  app.delete('/api/sprints/:id/captures/:captureId', (c) => {
    try {
      return c.json(store.sprints.removeCapture(callerOf(c), c.req.param('id'), c.req.param('captureId')));
    } catch (error) {
      return errorResponse(c, error, 'Failed to remove capture from sprint');
    }
  });

  return app;
}
