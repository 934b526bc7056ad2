/**
 * Capture Store - captures and their parent/child hierarchy
 */

import {
  FieldKind,
  FieldName,
  MAX_CONTENT_LENGTH,
  MAX_DESCRIPTION_LENGTH,
  RecordKind,
  TemplateKind,
  capacityExceeded,
  cloneCapture,
  cloneFields,
  createCapture,
  cycleDetected,
  getEstimate,
  getRelatedCaptureIds,
  invalidField,
  maxDepthExceeded,
  mergeFieldPatch,
  resolveInstanceTitle,
  typeMismatch,
  validateCaptureStatus,
  validateCaptureType,
  validateFields,
  validateOptionalText,
  validatePriority,
  validateTitle,
  type Capture,
  type CaptureStatus,
  type CreateCaptureInput,
  type PrincipalId,
  type Priority,
  type RecordId,
  type UpdateCaptureInput,
} from '@trellis/core';
import { requireAuthenticated, requireOwned, requireReadable } from '../systems/identity.js';
import type { CaptureFilter, Page } from '../query/query-engine.js';
import { resolveOwnedReference, type StoreContext } from './context.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('capture-store');

// ============================================================================
// Types
// ============================================================================

/**
 * What a capture delete changed besides removing the capture
 */
export interface CaptureDeleteResult {
  id: RecordId;
  /** Children moved to the deleted capture's parent */
  reparented: RecordId[];
  /** Sprints the capture was removed from */
  removedFromSprints: RecordId[];
  /** Captures whose relatedCaptures no longer list it */
  unlinkedFrom: RecordId[];
}

/**
 * Per-instance values when creating a capture from a template
 */
export interface InstantiateCaptureInput {
  /** Falls back to the template's defaultTitle, then its name */
  title?: string;
  description?: string;
  /** Falls back to the template's defaultContent */
  content?: string;
  status?: CaptureStatus;
  priority?: Priority;
  parentId?: RecordId;
  workspaceId?: RecordId;
  /** Merged over the template's default fields; a null value drops a default */
  fields?: Record<string, unknown>;
}

// ============================================================================
// Capture Store
// ============================================================================

export class CaptureStore {
  constructor(private readonly ctx: StoreContext) {}

  /**
   * Creates a capture owned by the caller
   */
  create(caller: string, input: CreateCaptureInput): Capture {
    const owner = requireAuthenticated(caller);
    // templateId is provenance set only by createFromTemplate
    return this.ctx.backend.transaction(() => this.insertCapture(owner, { ...input, templateId: undefined }));
  }

  /**
   * Creates a capture from a capture template the caller can read. The
   * template's defaults are copied; later template edits never reach it.
   */
  createFromTemplate(caller: string, templateId: string, input: InstantiateCaptureInput = {}): Capture {
    const owner = requireAuthenticated(caller);
    return this.ctx.backend.transaction(() => {
      const template = requireReadable(
        this.ctx.table.get(RecordKind.TEMPLATE, templateId),
        'template',
        templateId,
        owner
      );
      if (template.templateKind !== TemplateKind.CAPTURE || template.captureType === undefined) {
        throw typeMismatch(template.id, TemplateKind.CAPTURE, template.templateKind);
      }

      const defaults = cloneFields(template.defaultFields);
      const fields = input.fields !== undefined ? mergeFieldPatch(defaults, input.fields) : defaults;
      const content = input.content ?? (template.defaultContent.length > 0 ? template.defaultContent : undefined);

      const capture = this.insertCapture(owner, {
        captureType: template.captureType,
        title: resolveInstanceTitle(template, input.title),
        fields,
        templateId: template.id,
        ...(content !== undefined && { content }),
        ...(input.description !== undefined && { description: input.description }),
        ...(input.status !== undefined && { status: input.status }),
        ...(input.priority !== undefined && { priority: input.priority }),
        ...(input.parentId !== undefined && { parentId: input.parentId }),
        ...(input.workspaceId !== undefined && { workspaceId: input.workspaceId }),
      });
      logger.debug(`Instantiated capture ${capture.id} from template ${template.id}`);
      return capture;
    });
  }

  get(caller: string, id: string): Capture {
    const owner = requireAuthenticated(caller);
    return requireReadable(this.ctx.table.get(RecordKind.CAPTURE, id), 'capture', id, owner);
  }

  list(caller: string, filter: CaptureFilter = {}): Page<Capture> {
    return this.ctx.query.listCaptures(requireAuthenticated(caller), filter);
  }

  /**
   * Direct children in listing order
   */
  getChildren(caller: string, id: string): Capture[] {
    const capture = this.get(caller, id);
    return this.childrenOf(capture.id, capture.owner);
  }

  /**
   * Ancestors from the parent up to the root
   */
  getAncestors(caller: string, id: string): Capture[] {
    const capture = this.get(caller, id);
    const ancestors: Capture[] = [];
    let current = capture.parentId;
    while (current !== undefined) {
      if (ancestors.length >= this.ctx.maxDepth) {
        throw maxDepthExceeded(ancestors.length + 1, this.ctx.maxDepth, { recordId: capture.id });
      }
      const parent = this.ctx.table.get(RecordKind.CAPTURE, current);
      if (!parent || parent.owner !== capture.owner) {
        break;
      }
      ancestors.push(parent);
      current = parent.parentId;
    }
    return ancestors;
  }

  /**
   * Partial update. See UpdateCaptureInput for null handling.
   */
  update(caller: string, id: string, input: UpdateCaptureInput): Capture {
    const owner = requireAuthenticated(caller);
    return this.ctx.backend.transaction(() => {
      const { table } = this.ctx;
      const existing = requireOwned(table.get(RecordKind.CAPTURE, id), 'capture', id, owner);
      const next = cloneCapture(existing);

      if (input.title !== undefined) {
        next.title = validateTitle(input.title);
      }
      if (input.description === null) {
        delete next.description;
      } else if (input.description !== undefined) {
        next.description = validateOptionalText(input.description, 'description', MAX_DESCRIPTION_LENGTH);
      }
      if (input.content === null) {
        delete next.content;
      } else if (input.content !== undefined) {
        next.content = validateOptionalText(input.content, 'content', MAX_CONTENT_LENGTH);
      }
      if (input.status !== undefined) {
        next.status = validateCaptureStatus(input.status);
      }
      if (input.priority !== undefined) {
        next.priority = validatePriority(input.priority);
      }

      // Fields a new type does not recognize are rejected unless the patch removes them
      if (input.captureType !== undefined) {
        next.captureType = validateCaptureType(input.captureType);
      }
      if (input.fields !== undefined || next.captureType !== existing.captureType) {
        const merged = input.fields !== undefined ? mergeFieldPatch(existing.fields, input.fields) : existing.fields;
        next.fields = validateFields(next.captureType, merged);
      }

      if (input.parentId === null) {
        delete next.parentId;
      } else if (input.parentId !== undefined) {
        const parent = resolveOwnedReference(table, 'parentId', RecordKind.CAPTURE, input.parentId, owner);
        this.checkAncestry(existing.id, parent.id, this.subtreeHeight(existing.id));
        next.parentId = parent.id;
      }

      if (input.workspaceId === null) {
        delete next.workspaceId;
      } else if (input.workspaceId !== undefined) {
        next.workspaceId = resolveOwnedReference(table, 'workspaceId', RecordKind.WORKSPACE, input.workspaceId, owner).id;
      }

      if (input.fields !== undefined) {
        this.checkRelatedCaptures(next);
      }

      const previousEstimate = getEstimate(existing.fields);
      const nextEstimate = getEstimate(next.fields);
      if (nextEstimate > previousEstimate) {
        this.checkSprintCapacity(existing.id, previousEstimate, nextEstimate);
      }

      next.updatedAt = table.now();
      table.update(next);
      logger.debug(`Updated capture ${next.id}`);
      return next;
    });
  }

  /**
   * Deletes a capture. Its children move to its parent, and it leaves every
   * sprint and every other capture's relatedCaptures, all in one transaction.
   */
  delete(caller: string, id: string): CaptureDeleteResult {
    const owner = requireAuthenticated(caller);
    return this.ctx.backend.transaction(() => {
      const { table } = this.ctx;
      const capture = requireOwned(table.get(RecordKind.CAPTURE, id), 'capture', id, owner);
      const now = table.now();

      const reparented: RecordId[] = [];
      for (const child of this.childrenOf(capture.id)) {
        const moved = cloneCapture(child);
        if (capture.parentId !== undefined) {
          moved.parentId = capture.parentId;
        } else {
          delete moved.parentId;
        }
        moved.updatedAt = now;
        table.update(moved);
        reparented.push(moved.id);
      }

      const removedFromSprints: RecordId[] = [];
      for (const sprint of table.getSprintsContaining(capture.id)) {
        table.removeSprintMember(sprint.id, capture.id);
        table.touch(sprint.id, now);
        removedFromSprints.push(sprint.id);
      }

      const unlinkedFrom: RecordId[] = [];
      for (const referrer of this.referrersOf(capture.id)) {
        const unlinked = cloneCapture(referrer);
        const remaining = getRelatedCaptureIds(referrer.fields).filter((related) => related !== capture.id);
        if (remaining.length > 0) {
          unlinked.fields[FieldName.RELATED_CAPTURES] = { kind: FieldKind.CAPTURES, value: remaining };
        } else {
          delete unlinked.fields[FieldName.RELATED_CAPTURES];
        }
        unlinked.updatedAt = now;
        table.update(unlinked);
        unlinkedFrom.push(unlinked.id);
      }

      table.delete(capture.id);
      logger.info(
        `Deleted capture ${capture.id}: ${reparented.length} child(ren) re-parented, ` +
          `removed from ${removedFromSprints.length} sprint(s), unlinked from ${unlinkedFrom.length} capture(s)`
      );
      return { id: capture.id, reparented, removedFromSprints, unlinkedFrom };
    });
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  /**
   * Validates and inserts a new capture; runs inside the caller's transaction
   */
  private insertCapture(owner: PrincipalId, input: CreateCaptureInput): Capture {
    const { table } = this.ctx;
    const context = table.newRecordContext(RecordKind.CAPTURE, String(input.title), owner);
    const capture = createCapture(input, context);

    if (capture.parentId !== undefined) {
      resolveOwnedReference(table, 'parentId', RecordKind.CAPTURE, capture.parentId, owner);
      this.checkAncestry(capture.id, capture.parentId);
    }
    if (capture.workspaceId !== undefined) {
      resolveOwnedReference(table, 'workspaceId', RecordKind.WORKSPACE, capture.workspaceId, owner);
    }
    this.checkRelatedCaptures(capture);

    table.insert(capture);
    logger.debug(`Created capture ${capture.id} for ${owner}`);
    return capture;
  }

  /**
   * Walks up from the proposed parent. Reaching the capture itself closes a
   * cycle. The ancestors plus the levels already below the capture must
   * stay within maxDepth.
   */
  private checkAncestry(captureId: RecordId, parentId: RecordId, subtreeHeight = 0): void {
    const path: RecordId[] = [];
    let current: RecordId | undefined = parentId;
    while (current !== undefined) {
      if (current === captureId) {
        throw cycleDetected(captureId, parentId, [...path, current]);
      }
      path.push(current);
      if (path.length > this.ctx.maxDepth) {
        throw maxDepthExceeded(path.length, this.ctx.maxDepth, { recordId: captureId, parentId });
      }
      current = this.ctx.table.get(RecordKind.CAPTURE, current)?.parentId;
    }
    const depth = path.length + subtreeHeight;
    if (depth > this.ctx.maxDepth) {
      throw maxDepthExceeded(depth, this.ctx.maxDepth, { recordId: captureId, parentId, subtreeHeight });
    }
  }

  /**
   * Levels below the capture, counted to at most one past maxDepth
   */
  private subtreeHeight(id: RecordId): number {
    let height = 0;
    let level: RecordId[] = [id];
    while (height <= this.ctx.maxDepth) {
      const next = level.flatMap((current) => this.childrenOf(current).map((child) => child.id));
      if (next.length === 0) {
        break;
      }
      height += 1;
      level = next;
    }
    return height;
  }

  private checkRelatedCaptures(capture: Capture): void {
    for (const relatedId of getRelatedCaptureIds(capture.fields)) {
      if (relatedId === capture.id) {
        throw invalidField(FieldName.RELATED_CAPTURES, 'a capture cannot relate to itself', { value: relatedId });
      }
      resolveOwnedReference(this.ctx.table, FieldName.RELATED_CAPTURES, RecordKind.CAPTURE, relatedId, capture.owner);
    }
  }

  /**
   * Re-checks every sprint holding the capture against its capacity
   */
  private checkSprintCapacity(captureId: RecordId, previousEstimate: number, nextEstimate: number): void {
    for (const sprint of this.ctx.table.getSprintsContaining(captureId)) {
      if (sprint.capacity === undefined) {
        continue;
      }
      const currentLoad = this.ctx.table.getSprintLoad(sprint.id);
      const projectedLoad = currentLoad - previousEstimate + nextEstimate;
      if (projectedLoad > sprint.capacity) {
        throw capacityExceeded(
          sprint.id,
          { capacity: sprint.capacity, currentLoad, estimate: nextEstimate, projectedLoad },
          { captureId }
        );
      }
    }
  }

  private childrenOf(id: RecordId, owner?: PrincipalId): Capture[] {
    const ownerCondition = owner !== undefined ? ' AND owner = ?' : '';
    return this.ctx.table.select(
      RecordKind.CAPTURE,
      `SELECT * FROM records
       WHERE kind = 'capture' AND json_extract(data, '$.parentId') = ?${ownerCondition}
       ORDER BY created_at ASC, id ASC`,
      owner !== undefined ? [id, owner] : [id]
    );
  }

  private referrersOf(id: RecordId): Capture[] {
    return this.ctx.table.select(
      RecordKind.CAPTURE,
      `SELECT * FROM records r
       WHERE r.kind = 'capture' AND r.id != ?
         AND EXISTS (SELECT 1 FROM json_each(r.data, '$.fields.relatedCaptures.value') j WHERE j.value = ?)
       ORDER BY r.created_at ASC, r.id ASC`,
      [id, id]
    );
  }
}
