/**
 * Capture Routes Factory
 *
 * CRUD for captures, the capture hierarchy and template instantiation.
 */

import { Hono } from 'hono';
import {
  RecordKind,
  validateCaptureStatus,
  validateCaptureType,
  validatePriority,
  validateRecordId,
} from '@trellis/core';
import type { CaptureFilter } from '../../query/query-engine.js';
import { BodyReader } from '../body.js';
import { callerOf, errorResponse, parseListParam, parsePageOptions, readJsonObject } from '../http.js';
import type { RouteServices, ServerEnv } from '../types.js';

export function createCaptureRoutes(services: RouteServices) {
  const { store } = services;
  const app = new Hono<ServerEnv>();

  // GET /api/captures - List the caller's captures
  app.get('/api/captures', (c) => {
    try {
      const captureType = parseListParam(c.req.query('captureType'));
      const status = parseListParam(c.req.query('status'));
      const priority = parseListParam(c.req.query('priority'));
      const labels = parseListParam(c.req.query('labels'));
      const parentParam = c.req.query('parentId');
      const filter: CaptureFilter = { ...parsePageOptions(c) };

      if (captureType !== undefined) filter.captureType = captureType.map(validateCaptureType);
      if (status !== undefined) filter.status = status.map(validateCaptureStatus);
      if (priority !== undefined) filter.priority = priority.map(validatePriority);
      if (labels !== undefined) filter.labels = labels;
      if (parentParam !== undefined) {
        filter.parentId =
          parentParam === 'null' || parentParam === 'root'
            ? null
            : validateRecordId(parentParam, 'parentId', RecordKind.CAPTURE);
      }

      const sprintId = c.req.query('sprintId');
      const workspaceId = c.req.query('workspaceId');
      if (sprintId !== undefined) filter.sprintId = validateRecordId(sprintId, 'sprintId', RecordKind.SPRINT);
      if (workspaceId !== undefined) {
        filter.workspaceId = validateRecordId(workspaceId, 'workspaceId', RecordKind.WORKSPACE);
      }

      for (const key of ['createdAfter', 'createdBefore', 'dueAfter', 'dueBefore', 'titleContains'] as const) {
        const value = c.req.query(key);
        if (value !== undefined) filter[key] = value;
      }

      return c.json(store.captures.list(callerOf(c), filter));
    } catch (error) {
      return errorResponse(c, error, 'Failed to list captures');
    }
  });

  // POST /api/captures - Create capture
  app.post('/api/captures', async (c) => {
    try {
      const body = new BodyReader(await readJsonObject(c));
      const capture = store.captures.create(callerOf(c), {
        captureType: validateCaptureType(body.string('captureType')),
        title: body.string('title'),
        description: body.optionalString('description'),
        content: body.optionalString('content'),
        status: body.optional('status', validateCaptureStatus),
        priority: body.optional('priority', validatePriority),
        parentId: body.optionalId('parentId', RecordKind.CAPTURE),
        workspaceId: body.optionalId('workspaceId', RecordKind.WORKSPACE),
        fields: body.optionalObject('fields'),
      });
      return c.json(capture, 201);
    } catch (error) {
      return errorResponse(c, error, 'Failed to create capture');
    }
  });

  // POST /api/captures/from-template/:templateId - Instantiate a capture template
  app.post('/api/captures/from-template/:templateId', async (c) => {
    try {
      const body = new BodyReader(await readJsonObject(c));
      const capture = store.captures.createFromTemplate(callerOf(c), c.req.param('templateId'), {
        title: body.optionalString('title'),
        description: body.optionalString('description'),
        content: body.optionalString('content'),
        status: body.optional('status', validateCaptureStatus),
        priority: body.optional('priority', validatePriority),
        parentId: body.optionalId('parentId', RecordKind.CAPTURE),
        workspaceId: body.optionalId('workspaceId', RecordKind.WORKSPACE),
        fields: body.optionalObject('fields'),
      });
      return c.json(capture, 201);
    } catch (error) {
      return errorResponse(c, error, 'Failed to create capture from template');
    }
  });

  // GET /api/captures/:id - Get capture
  app.get('/api/captures/:id', (c) => {
    try {
      return c.json(store.captures.get(callerOf(c), c.req.param('id')));
    } catch (error) {
      return errorResponse(c, error, 'Failed to get capture');
    }
  });

  // GET /api/captures/:id/children - Direct children
  app.get('/api/captures/:id/children', (c) => {
    try {
      const items = store.captures.getChildren(callerOf(c), c.req.param('id'));
      return c.json({ items, total: items.length });
    } catch (error) {
      return errorResponse(c, error, 'Failed to get capture children');
    }
  });

  // GET /api/captures/:id/ancestors - Parent chain, nearest first
  app.get('/api/captures/:id/ancestors', (c) => {
    try {
      const items = store.captures.getAncestors(callerOf(c), c.req.param('id'));
      return c.json({ items, total: items.length });
    } catch (error) {
      return errorResponse(c, error, 'Failed to get capture ancestors');
    }
  });

  // PATCH /api/captures/:id - Partial update
  app.patch('/api/captures/:id', async (c) => {
    try {
      const body = new BodyReader(await readJsonObject(c));
      const capture = store.captures.update(callerOf(c), c.req.param('id'), {
        captureType: body.optional('captureType', validateCaptureType),
        title: body.optionalString('title'),
        description: body.nullableString('description'),
        content: body.nullableString('content'),
        status: body.optional('status', validateCaptureStatus),
        priority: body.optional('priority', validatePriority),
        parentId: body.nullableId('parentId', RecordKind.CAPTURE),
        workspaceId: body.nullableId('workspaceId', RecordKind.WORKSPACE),
        fields: body.optionalObject('fields'),
      });
      return c.json(capture);
    } catch (error) {
      return errorResponse(c, error, 'Failed to update capture');
    }
  });

  // DELETE /api/captures/:id - Delete capture, re-parenting its children
  app.delete('/api/captures/:id', (c) => {
    try {
      return c.json(store.captures.delete(callerOf(c), c.req.param('id')));
    } catch (error) {
      return errorResponse(c, error, 'Failed to delete capture');
    }
  });

  return app;
}
