/**
 * Document Routes Factory
 */

import { Hono } from 'hono';
import { RecordKind, ValidationError, ErrorCode } from '@trellis/core';
import type { DocumentListOptions } from '../../services/document-store.js';
import { BodyReader } from '../body.js';
import { callerOf, errorResponse, parsePageOptions, readJsonObject } from '../http.js';
import type { RouteServices, ServerEnv } from '../types.js';

export function createDocumentRoutes(services: RouteServices) {
  const { store } = services;
  const app = new Hono<ServerEnv>();

  // GET /api/documents?workspaceId=...&folderNodeId=... - Documents of one workspace
  app.get('/api/documents', (c) => {
    try {
      const workspaceId = c.req.query('workspaceId');
      if (workspaceId === undefined || workspaceId === '') {
        throw new ValidationError('workspaceId is required', ErrorCode.MISSING_REQUIRED_FIELD, {
          field: 'workspaceId',
        });
      }
      const options: DocumentListOptions = { ...parsePageOptions(c) };
      const folder = c.req.query('folderNodeId');
      if (folder !== undefined) {
        options.folderNodeId = folder === 'null' || folder === 'root' ? null : folder;
      }
      return c.json(store.documents.list(callerOf(c), workspaceId, options));
    } catch (error) {
      return errorResponse(c, error, 'Failed to list documents');
    }
  });

  app.post('/api/documents', async (c) => {
    try {
      const body = new BodyReader(await readJsonObject(c));
      const workspaceId = body.optionalId('workspaceId', RecordKind.WORKSPACE);
      if (workspaceId === undefined) {
        throw new ValidationError('workspaceId is required', ErrorCode.MISSING_REQUIRED_FIELD, {
          field: 'workspaceId',
        });
      }
      const document = store.documents.create(callerOf(c), {
        workspaceId,
        folderNodeId: body.optionalString('folderNodeId'),
        title: body.optionalString('title'),
        content: body.optionalString('content'),
        templateId: body.optionalId('templateId', RecordKind.TEMPLATE),
      });
      return c.json(document, 201);
    } catch (error) {
      return errorResponse(c, error, 'Failed to create document');
    }
  });

  app.get('/api/documents/:id', (c) => {
    try {
      return c.json(store.documents.get(callerOf(c), c.req.param('id')));
    } catch (error) {
      return errorResponse(c, error, 'Failed to get document');
    }
  });

  app.patch('/api/documents/:id', async (c) => {
    try {
      const body = new BodyReader(await readJsonObject(c));
      const document = store.documents.update(callerOf(c), c.req.param('id'), {
        title: body.optionalString('title'),
        content: body.optionalString('content'),
        folderNodeId: body.nullableString('folderNodeId'),
      });
      return c.json(document);
    } catch (error) {
      return errorResponse(c, error, 'Failed to update document');
    }
  });

  app.delete('/api/documents/:id', (c) => {
    try {
      return c.json(store.documents.delete(callerOf(c), c.req.param('id')));
    } catch (error) {
      return errorResponse(c, error, 'Failed to delete document');
    }
  });

  return app;
}
