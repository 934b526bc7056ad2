/**
 * Workspace Store - workspaces and their folder trees
 *
 * Every structural edit re-validates the whole tree. An edit that would drop
 * a folder node still anchoring a document fails with HAS_DEPENDENTS.
 */

import {
  MAX_DESCRIPTION_LENGTH,
  MAX_FOLDER_NAME_LENGTH,
  MAX_ICON_LENGTH,
  RecordKind,
  cloneCapture,
  cloneFolderTree,
  collectSubtree,
  createWorkspace,
  folderNotFound,
  hasDependents,
  invalidInput,
  validateFolderTree,
  validateIsArchived,
  validateName,
  validateOptionalText,
  type CreateWorkspaceInput,
  type Document,
  type FolderNode,
  type PrincipalId,
  type RecordId,
  type UpdateWorkspaceInput,
  type Workspace,
} from '@trellis/core';
import { requireAuthenticated, requireOwned } from '../systems/identity.js';
import type { Page, PageOptions } from '../query/query-engine.js';
import type { StoreContext } from './context.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('workspace-store');

// ============================================================================
// Types
// ============================================================================

export interface AddFolderInput {
  /** Generated as f1, f2, ... when omitted */
  id?: string;
  name: string;
  /** Omitted or null for a top-level folder */
  parentId?: string | null;
}

export interface RemoveFolderResult {
  workspace: Workspace;
  /** The folder and every folder beneath it */
  removed: string[];
}

export interface WorkspaceDeleteResult {
  id: RecordId;
  deletedDocuments: RecordId[];
  /** Captures whose workspaceId was cleared */
  detachedCaptures: RecordId[];
}

// ============================================================================
// Workspace Store
// ============================================================================

export class WorkspaceStore {
  constructor(private readonly ctx: StoreContext) {}

  create(caller: string, input: CreateWorkspaceInput): Workspace {
    const owner = requireAuthenticated(caller);
    return this.ctx.backend.transaction(() => {
      const context = this.ctx.table.newRecordContext(RecordKind.WORKSPACE, String(input.name), owner);
      const workspace = createWorkspace(input, context);
      this.ctx.table.insert(workspace);
      logger.debug(`Created workspace ${workspace.id} for ${owner}`);
      return workspace;
    });
  }

  get(caller: string, id: string): Workspace {
    const owner = requireAuthenticated(caller);
    return requireOwned(this.ctx.table.get(RecordKind.WORKSPACE, id), 'workspace', id, owner);
  }

  list(caller: string, options: PageOptions = {}): Page<Workspace> {
    return this.ctx.query.listOwned(RecordKind.WORKSPACE, requireAuthenticated(caller), options);
  }

  /**
   * Partial update; a supplied folderTree replaces the whole tree
   */
  update(caller: string, id: string, input: UpdateWorkspaceInput): Workspace {
    return this.edit(caller, id, (workspace) => {
      if (input.name !== undefined) {
        workspace.name = validateName(input.name);
      }
      if (input.description === null) {
        delete workspace.description;
      } else if (input.description !== undefined) {
        workspace.description = validateOptionalText(input.description, 'description', MAX_DESCRIPTION_LENGTH);
      }
      if (input.icon === null) {
        delete workspace.icon;
      } else if (input.icon !== undefined) {
        workspace.icon = validateOptionalText(input.icon, 'icon', MAX_ICON_LENGTH);
      }
      if (input.isArchived !== undefined) {
        workspace.isArchived = validateIsArchived(input.isArchived);
      }
      if (input.folderTree !== undefined) {
        workspace.folderTree = validateFolderTree(input.folderTree);
      }
    });
  }

  // --------------------------------------------------------------------------
  // Folder Edits
  // --------------------------------------------------------------------------

  /**
   * Appends a folder after its last sibling
   */
  addFolder(caller: string, id: string, input: AddFolderInput): Workspace {
    return this.edit(caller, id, (workspace) => {
      const parentId = input.parentId ?? null;
      if (parentId !== null) {
        this.requireFolder(workspace, parentId);
      }
      const folderId = input.id ?? nextFolderId(workspace.folderTree);
      workspace.folderTree = validateFolderTree([
        ...workspace.folderTree,
        { id: folderId, name: input.name, parentId },
      ]);
    });
  }

  renameFolder(caller: string, id: string, folderId: string, name: string): Workspace {
    return this.edit(caller, id, (workspace) => {
      const node = this.requireFolder(workspace, folderId);
      node.name = validateName(name, `folder ${folderId} name`, MAX_FOLDER_NAME_LENGTH);
    });
  }

  /**
   * Moves a folder under a new parent (null = top level). With `index` the
   * folder is placed at that position among its new siblings, else last.
   */
  moveFolder(caller: string, id: string, folderId: string, parentId: string | null, index?: number): Workspace {
    return this.edit(caller, id, (workspace) => {
      const node = this.requireFolder(workspace, folderId);
      if (parentId !== null) {
        this.requireFolder(workspace, parentId);
      }
      if (index !== undefined && (!Number.isInteger(index) || index < 0)) {
        throw invalidInput('index', index, 'non-negative integer');
      }

      const rest = workspace.folderTree.filter((candidate) => candidate.id !== folderId);
      const moved: FolderNode = { ...node, parentId };
      const siblings = rest.filter((candidate) => candidate.parentId === parentId);
      const anchor = index !== undefined ? siblings[index] : undefined;
      const position = anchor !== undefined ? rest.indexOf(anchor) : rest.length;
      rest.splice(position, 0, moved);

      // validateFolderTree reports a move beneath the folder's own subtree as a cycle
      workspace.folderTree = validateFolderTree(rest);
    });
  }

  /**
   * Removes a folder and its subtree
   *
   * @throws ConstraintError HAS_DEPENDENTS when a document sits in the subtree
   */
  removeFolder(caller: string, id: string, folderId: string): RemoveFolderResult {
    let removed: string[] = [];
    const workspace = this.edit(caller, id, (current) => {
      this.requireFolder(current, folderId);
      const subtree = collectSubtree(current.folderTree, folderId);
      current.folderTree = current.folderTree.filter((node) => !subtree.has(node.id));
      removed = [...subtree];
    });
    return { workspace, removed };
  }

  /**
   * Deletes a workspace with its documents and detaches captures filed under it
   */
  delete(caller: string, id: string): WorkspaceDeleteResult {
    const owner = requireAuthenticated(caller);
    return this.ctx.backend.transaction(() => {
      const { table } = this.ctx;
      const workspace = requireOwned(table.get(RecordKind.WORKSPACE, id), 'workspace', id, owner);
      const now = table.now();

      const deletedDocuments: RecordId[] = [];
      for (const document of this.documentsIn(workspace.id)) {
        table.delete(document.id);
        deletedDocuments.push(document.id);
      }

      const detachedCaptures: RecordId[] = [];
      const captures = table.select(
        RecordKind.CAPTURE,
        `SELECT * FROM records WHERE kind = 'capture' AND json_extract(data, '$.workspaceId') = ?
         ORDER BY created_at ASC, id ASC`,
        [workspace.id]
      );
      for (const capture of captures) {
        const detached = cloneCapture(capture);
        delete detached.workspaceId;
        detached.updatedAt = now;
        table.update(detached);
        detachedCaptures.push(capture.id);
      }

      table.delete(workspace.id);
      logger.info(
        `Deleted workspace ${workspace.id}: ${deletedDocuments.length} document(s) deleted, ` +
          `${detachedCaptures.length} capture(s) detached`
      );
      return { id: workspace.id, deletedDocuments, detachedCaptures };
    });
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  /**
   * Applies a mutation to a copy of an owned workspace, then rejects it if a
   * document would lose its folder
   */
  private edit(caller: string, id: string, mutate: (workspace: Workspace) => void): Workspace {
    const owner: PrincipalId = requireAuthenticated(caller);
    return this.ctx.backend.transaction(() => {
      const { table } = this.ctx;
      const existing = requireOwned(table.get(RecordKind.WORKSPACE, id), 'workspace', id, owner);
      const next: Workspace = { ...existing, folderTree: cloneFolderTree(existing.folderTree) };
      mutate(next);
      this.checkDroppedFolders(existing, next);

      next.updatedAt = table.now();
      table.update(next);
      logger.debug(`Updated workspace ${next.id}`);
      return next;
    });
  }

  private requireFolder(workspace: Workspace, folderId: string): FolderNode {
    const node = workspace.folderTree.find((candidate) => candidate.id === folderId);
    if (!node) {
      throw folderNotFound(workspace.id, folderId);
    }
    return node;
  }

  private checkDroppedFolders(previous: Workspace, next: Workspace): void {
    const kept = new Set(next.folderTree.map((node) => node.id));
    const dropped = previous.folderTree.filter((node) => !kept.has(node.id)).map((node) => node.id);
    if (dropped.length === 0) {
      return;
    }
    const droppedSet = new Set(dropped);
    const dependents = this.documentsIn(previous.id).filter(
      (document) => document.folderNodeId !== undefined && droppedSet.has(document.folderNodeId)
    );
    if (dependents.length > 0) {
      throw hasDependents(dropped[0] ?? previous.id, dependents.length, {
        recordId: previous.id,
        folderIds: dropped,
        documentIds: dependents.map((document) => document.id),
      });
    }
  }

  private documentsIn(workspaceId: RecordId): Document[] {
    return this.ctx.table.select(
      RecordKind.DOCUMENT,
      `SELECT * FROM records WHERE kind = 'document' AND json_extract(data, '$.workspaceId') = ?
       ORDER BY created_at ASC, id ASC`,
      [workspaceId]
    );
  }
}

/**
 * First unused id of the form f1, f2, ...
 */
export function nextFolderId(nodes: readonly FolderNode[]): string {
  const taken = new Set(nodes.map((node) => node.id));
  let n = 1;
  while (taken.has(`f${n}`)) {
    n++;
  }
  return `f${n}`;
}
