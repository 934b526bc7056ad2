/**
 * Workspace Type - containers for documents with an ordered folder tree
 *
 * The folder tree is a flat list of nodes; sibling order is list order.
 * Node ids are unique within the workspace, every parentId resolves inside
 * the tree, and the parent chain never loops.
 */

import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';
import { cycleDetected, invalidFolderTree } from '../errors/factories.js';
import type { NewRecordContext } from './capture.js';
import {
  MAX_DESCRIPTION_LENGTH,
  RecordKind,
  validateName,
  validateOptionalText,
  type BaseRecord,
} from './record.js';

// ============================================================================
// Constants
// ============================================================================

/** Maximum folder nodes per workspace */
export const MAX_FOLDER_NODES = 1000;

/** Maximum folder name length */
export const MAX_FOLDER_NAME_LENGTH = 200;

/** Maximum icon length (emoji or short identifier) */
export const MAX_ICON_LENGTH = 64;

const FOLDER_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

// ============================================================================
// Types
// ============================================================================

export interface FolderNode {
  /** Unique within the workspace */
  id: string;
  name: string;
  /** Parent folder; null for top-level folders */
  parentId: string | null;
}

export interface Workspace extends BaseRecord {
  readonly kind: typeof RecordKind.WORKSPACE;
  name: string;
  description?: string;
  icon?: string;
  isArchived: boolean;
  folderTree: FolderNode[];
}

// ============================================================================
// Folder Tree Validation
// ============================================================================

export function isValidFolderId(value: unknown): value is string {
  return typeof value === 'string' && FOLDER_ID_PATTERN.test(value);
}

/**
 * Validates and normalizes a folder tree.
 * Throws INVALID_FOLDER_TREE for shape errors and CYCLE_DETECTED for loops.
 */
export function validateFolderTree(value: unknown): FolderNode[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw invalidFolderTree('expected a list of folder nodes', { value });
  }
  const items: unknown[] = value;
  if (items.length > MAX_FOLDER_NODES) {
    throw invalidFolderTree(`at most ${MAX_FOLDER_NODES} nodes allowed`, { actual: items.length });
  }

  const nodes: FolderNode[] = [];
  const ids = new Set<string>();
  for (const item of items) {
    if (typeof item !== 'object' || item === null) {
      throw invalidFolderTree('folder node must be an object', { value: item });
    }
    const obj: Record<string, unknown> = Object.fromEntries(Object.entries(item));
    const id = obj.id;
    if (!isValidFolderId(id)) {
      throw invalidFolderTree(`invalid folder id ${JSON.stringify(id)}`, {
        value: id,
        expected: '1-64 chars of [A-Za-z0-9_-]',
      });
    }
    if (ids.has(id)) {
      throw invalidFolderTree(`duplicate folder id ${id}`, { value: id });
    }
    ids.add(id);
    const name = validateName(obj.name, `folder ${id} name`, MAX_FOLDER_NAME_LENGTH);
    const rawParent = obj.parentId ?? null;
    if (rawParent !== null && typeof rawParent !== 'string') {
      throw invalidFolderTree(`invalid parentId for folder ${id}`, { value: rawParent });
    }
    nodes.push({ id, name, parentId: typeof rawParent === 'string' ? rawParent : null });
  }

  for (const node of nodes) {
    if (node.parentId !== null && !ids.has(node.parentId)) {
      throw invalidFolderTree(`folder ${node.id} references unknown parent ${node.parentId}`, {
        value: node.parentId,
      });
    }
  }

  assertFolderTreeAcyclic(nodes);
  return nodes;
}

/**
 * Throws CYCLE_DETECTED when any node's parent chain revisits a node
 */
export function assertFolderTreeAcyclic(nodes: readonly FolderNode[]): void {
  const parentOf = new Map<string, string | null>(nodes.map((node) => [node.id, node.parentId]));
  const cleared = new Set<string>();

  for (const node of nodes) {
    const path: string[] = [];
    const onPath = new Set<string>();
    let current: string | null = node.id;
    while (current !== null && !cleared.has(current)) {
      if (onPath.has(current)) {
        throw cycleDetected(node.id, parentOf.get(node.id) ?? current, [...path, current], {
          field: 'folderTree',
        });
      }
      onPath.add(current);
      path.push(current);
      current = parentOf.get(current) ?? null;
    }
    for (const id of path) {
      cleared.add(id);
    }
  }
}

/**
 * Returns the id of a node and every node beneath it
 */
export function collectSubtree(nodes: readonly FolderNode[], rootId: string): Set<string> {
  const subtree = new Set<string>([rootId]);
  let grew = true;
  while (grew) {
    grew = false;
    for (const node of nodes) {
      if (node.parentId !== null && subtree.has(node.parentId) && !subtree.has(node.id)) {
        subtree.add(node.id);
        grew = true;
      }
    }
  }
  return subtree;
}

// ============================================================================
// Factory Functions
// ============================================================================

export interface CreateWorkspaceInput {
  name: string;
  description?: string;
  icon?: string;
  folderTree?: FolderNode[];
}

export function createWorkspace(input: CreateWorkspaceInput, context: NewRecordContext): Workspace {
  const name = validateName(input.name);
  const description = validateOptionalText(input.description, 'description', MAX_DESCRIPTION_LENGTH);
  const icon = validateOptionalText(input.icon, 'icon', MAX_ICON_LENGTH);
  const folderTree = validateFolderTree(input.folderTree);

  return {
    id: context.id,
    kind: RecordKind.WORKSPACE,
    owner: context.owner,
    createdAt: context.now,
    updatedAt: context.now,
    name,
    isArchived: false,
    folderTree,
    ...(description !== undefined && { description }),
    ...(icon !== undefined && { icon }),
  };
}

/**
 * Partial workspace update. Supplying folderTree replaces the whole tree.
 */
export interface UpdateWorkspaceInput {
  name?: string;
  description?: string | null;
  icon?: string | null;
  isArchived?: boolean;
  folderTree?: FolderNode[];
}

export function validateIsArchived(value: unknown): boolean {
  if (typeof value !== 'boolean') {
    throw new ValidationError('isArchived must be a boolean', ErrorCode.INVALID_INPUT, {
      field: 'isArchived',
      value,
      expected: 'boolean',
    });
  }
  return value;
}

export function cloneFolderTree(nodes: readonly FolderNode[]): FolderNode[] {
  return nodes.map((node) => ({ ...node }));
}
