/**
 * Document Type - markdown content anchored to one workspace
 */

import type { NewRecordContext } from './capture.js';
import {
  MAX_CONTENT_LENGTH,
  RecordKind,
  validateOptionalText,
  validateTitle,
  type BaseRecord,
  type RecordId,
} from './record.js';

export interface Document extends BaseRecord {
  readonly kind: typeof RecordKind.DOCUMENT;
  /** Owning workspace; fixed for the document's lifetime */
  readonly workspaceId: RecordId;
  /** Folder node of the workspace tree; absent means the workspace root */
  folderNodeId?: string;
  title: string;
  /** Markdown */
  content: string;
  /** Template this document was instantiated from (provenance only) */
  templateId?: RecordId;
}

export interface CreateDocumentInput {
  workspaceId: RecordId;
  folderNodeId?: string;
  /** Falls back to the template's default title when instantiating */
  title?: string;
  /** Falls back to the template's default content when instantiating */
  content?: string;
  templateId?: RecordId;
}

/**
 * Whole-value replacement of title/content; folderNodeId null moves to the root
 */
export interface UpdateDocumentInput {
  title?: string;
  content?: string;
  folderNodeId?: string | null;
}

export function validateDocumentContent(value: unknown): string {
  return validateOptionalText(value, 'content', MAX_CONTENT_LENGTH) ?? '';
}

export interface DocumentFields {
  workspaceId: RecordId;
  folderNodeId?: string;
  title: string;
  content: string;
  templateId?: RecordId;
}

export function createDocument(input: DocumentFields, context: NewRecordContext): Document {
  return {
    id: context.id,
    kind: RecordKind.DOCUMENT,
    owner: context.owner,
    createdAt: context.now,
    updatedAt: context.now,
    workspaceId: input.workspaceId,
    title: validateTitle(input.title),
    content: validateDocumentContent(input.content),
    ...(input.folderNodeId !== undefined && { folderNodeId: input.folderNodeId }),
    ...(input.templateId !== undefined && { templateId: input.templateId }),
  };
}
