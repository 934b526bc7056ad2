/**
 * Document Store - markdown documents anchored to a workspace folder
 */

import {
  RecordKind,
  TemplateKind,
  createDocument,
  folderNotFound,
  resolveInstanceTitle,
  typeMismatch,
  validateDocumentContent,
  validateTitle,
  type CreateDocumentInput,
  type Document,
  type RecordId,
  type UpdateDocumentInput,
  type Workspace,
} from '@trellis/core';
import { requireAuthenticated, requireOwned, requireReadable } from '../systems/identity.js';
import type { Page, PageOptions, WhereClause } from '../query/query-engine.js';
import { resolveOwnedReference, type StoreContext } from './context.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('document-store');

export interface DocumentListOptions extends PageOptions {
  /** A folder id selects that folder only; null selects the workspace root */
  folderNodeId?: string | null;
}

export class DocumentStore {
  constructor(private readonly ctx: StoreContext) {}

  /**
   * Creates a document in an owned workspace, optionally from a document
   * template. Explicit title and content win over the template defaults.
   */
  create(caller: string, input: CreateDocumentInput): Document {
    const owner = requireAuthenticated(caller);
    return this.ctx.backend.transaction(() => {
      const { table } = this.ctx;
      const workspace = resolveOwnedReference(table, 'workspaceId', RecordKind.WORKSPACE, input.workspaceId, owner);
      if (input.folderNodeId !== undefined) {
        requireFolderNode(workspace, input.folderNodeId);
      }

      let title: unknown = input.title;
      let content: unknown = input.content;
      let templateId: RecordId | undefined;
      if (input.templateId !== undefined) {
        const template = requireReadable(
          table.get(RecordKind.TEMPLATE, input.templateId),
          'template',
          input.templateId,
          owner
        );
        if (template.templateKind !== TemplateKind.DOCUMENT) {
          throw typeMismatch(template.id, TemplateKind.DOCUMENT, template.templateKind);
        }
        title = resolveInstanceTitle(template, input.title);
        content = input.content ?? template.defaultContent;
        templateId = template.id;
      }

      const context = table.newRecordContext(RecordKind.DOCUMENT, String(title), owner);
      const document = createDocument(
        {
          workspaceId: workspace.id,
          title: validateTitle(title),
          content: validateDocumentContent(content),
          ...(input.folderNodeId !== undefined && { folderNodeId: input.folderNodeId }),
          ...(templateId !== undefined && { templateId }),
        },
        context
      );
      table.insert(document);
      logger.debug(`Created document ${document.id} in workspace ${workspace.id}`);
      return document;
    });
  }

  get(caller: string, id: string): Document {
    const owner = requireAuthenticated(caller);
    return requireOwned(this.ctx.table.get(RecordKind.DOCUMENT, id), 'document', id, owner);
  }

  /**
   * Documents of one owned workspace in listing order
   */
  list(caller: string, workspaceId: string, options: DocumentListOptions = {}): Page<Document> {
    const owner = requireAuthenticated(caller);
    const workspace = requireOwned(
      this.ctx.table.get(RecordKind.WORKSPACE, workspaceId),
      'workspace',
      workspaceId,
      owner
    );

    const extra: WhereClause = {
      conditions: ["json_extract(r.data, '$.workspaceId') = ?"],
      params: [workspace.id],
    };
    if (options.folderNodeId === null) {
      extra.conditions.push("json_extract(r.data, '$.folderNodeId') IS NULL");
    } else if (options.folderNodeId !== undefined) {
      extra.conditions.push("json_extract(r.data, '$.folderNodeId') = ?");
      extra.params.push(options.folderNodeId);
    }
    return this.ctx.query.listOwned(RecordKind.DOCUMENT, owner, options, extra);
  }

  /**
   * Replaces title and/or content; folderNodeId re-anchors (null = root)
   */
  update(caller: string, id: string, input: UpdateDocumentInput): Document {
    const owner = requireAuthenticated(caller);
    return this.ctx.backend.transaction(() => {
      const { table } = this.ctx;
      const existing = requireOwned(table.get(RecordKind.DOCUMENT, id), 'document', id, owner);
      const next: Document = { ...existing };

      if (input.title !== undefined) {
        next.title = validateTitle(input.title);
      }
      if (input.content !== undefined) {
        next.content = validateDocumentContent(input.content);
      }
      if (input.folderNodeId === null) {
        delete next.folderNodeId;
      } else if (input.folderNodeId !== undefined) {
        const workspace = table.get(RecordKind.WORKSPACE, existing.workspaceId);
        if (!workspace) {
          throw folderNotFound(existing.workspaceId, input.folderNodeId);
        }
        requireFolderNode(workspace, input.folderNodeId);
        next.folderNodeId = input.folderNodeId;
      }

      next.updatedAt = table.now();
      table.update(next);
      logger.debug(`Updated document ${next.id}`);
      return next;
    });
  }

  delete(caller: string, id: string): { id: RecordId } {
    const owner = requireAuthenticated(caller);
    return this.ctx.backend.transaction(() => {
      const document = requireOwned(this.ctx.table.get(RecordKind.DOCUMENT, id), 'document', id, owner);
      this.ctx.table.delete(document.id);
      logger.debug(`Deleted document ${document.id}`);
      return { id: document.id };
    });
  }
}

function requireFolderNode(workspace: Workspace, folderNodeId: string): void {
  if (!workspace.folderTree.some((node) => node.id === folderNodeId)) {
    throw folderNotFound(workspace.id, folderNodeId);
  }
}
