/**
 * Workspace Routes Factory
 *
 * Workspace CRUD plus folder tree edits. Deleting a workspace deletes its
 * documents and detaches its captures.
 */

import { Hono } from 'hono';
import { validateFolderTree, validateIsArchived } from '@trellis/core';
import { BodyReader } from '../body.js';
import { callerOf, errorResponse, parsePageOptions, readJsonObject } from '../http.js';
import type { RouteServices, ServerEnv } from '../types.js';

export function createWorkspaceRoutes(services: RouteServices) {
  const { store } = services;
  const app = new Hono<ServerEnv>();

  app.get('/api/workspaces', (c) => {
    try {
      return c.json(store.workspaces.list(callerOf(c), parsePageOptions(c)));
    } catch (error) {
      return errorResponse(c, error, 'Failed to list workspaces');
    }
  });

  app.post('/api/workspaces', async (c) => {
    try {
      const body = new BodyReader(await readJsonObject(c));
      const workspace = store.workspaces.create(callerOf(c), {
        name: body.string('name'),
        description: body.optionalString('description'),
        icon: body.optionalString('icon'),
        folderTree: body.optional('folderTree', validateFolderTree),
      });
      return c.json(workspace, 201);
    } catch (error) {
      return errorResponse(c, error, 'Failed to create workspace');
    }
  });

  app.get('/api/workspaces/:id', (c) => {
    try {
      return c.json(store.workspaces.get(callerOf(c), c.req.param('id')));
    } catch (error) {
      return errorResponse(c, error, 'Failed to get workspace');
    }
  });

  app.patch('/api/workspaces/:id', async (c) => {
    try {
      const body = new BodyReader(await readJsonObject(c));
      const workspace = store.workspaces.update(callerOf(c), c.req.param('id'), {
        name: body.optionalString('name'),
        description: body.nullableString('description'),
        icon: body.nullableString('icon'),
        isArchived: body.optional('isArchived', validateIsArchived),
        folderTree: body.optional('folderTree', validateFolderTree),
      });
      return c.json(workspace);
    } catch (error) {
      return errorResponse(c, error, 'Failed to update workspace');
    }
  });

  app.delete('/api/workspaces/:id', (c) => {
    try {
      return c.json(store.workspaces.delete(callerOf(c), c.req.param('id')));
    } catch (error) {
      return errorResponse(c, error, 'Failed to delete workspace');
    }
  });

  // ============================================================================
  // Folder tree
  // ============================================================================

  app.post('/api/workspaces/:id/folders', async (c) => {
    try {
      const body = new BodyReader(await readJsonObject(c));
      const workspace = store.workspaces.addFolder(callerOf(c), c.req.param('id'), {
        id: body.optionalString('id'),
        name: body.string('name'),
        parentId: body.nullableString('parentId'),
      });
      return c.json(workspace, 201);
    } catch (error) {
      return errorResponse(c, error, 'Failed to add folder');
    }
  });

  // PATCH /api/workspaces/:id/folders/:folderId - Rename and/or move a folder
  app.patch('/api/workspaces/:id/folders/:folderId', async (c) => {
    try {
      const caller = callerOf(c);
      const id = c.req.param('id');
      const folderId = c.req.param('folderId');
      const body = new BodyReader(await readJsonObject(c));
      const name = body.optionalString('name');
      const parentId = body.nullableString('parentId');
      const index = body.optionalNumber('index');

      let workspace = store.workspaces.get(caller, id);
      if (name !== undefined) {
        workspace = store.workspaces.renameFolder(caller, id, folderId, name);
      }
      if (parentId !== undefined || index !== undefined) {
        const current = workspace.folderTree.find((node) => node.id === folderId);
        const target = parentId !== undefined ? parentId : (current?.parentId ?? null);
        workspace = store.workspaces.moveFolder(caller, id, folderId, target, index);
      }
      return c.json(workspace);
    } catch (error) {
      return errorResponse(c, error, 'Failed to update folder');
    }
  });

  // DELETE /api/workspaces/:id/folders/:folderId - Remove a folder and its subtree
  app.delete('/api/workspaces/:id/folders/:folderId', (c) => {
    try {
      return c.json(store.workspaces.removeFolder(callerOf(c), c.req.param('id'), c.req.param('folderId')));
    } catch (error) {
      return errorResponse(c, error, 'Failed to remove folder');
    }
  });

  return app;
}
