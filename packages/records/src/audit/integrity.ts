/**
 * Integrity Audit - cross-record invariant checks and repair
 *
 * The stores keep these invariants on every write; the audit exists for
 * restored snapshots and databases edited outside the store.
 */

import {
  FieldKind,
  FieldName,
  RecordKind,
  cloneCapture,
  getEstimate,
  getRelatedCaptureIds,
  isTrellisError,
  validateFolderTree,
  type Capture,
  type Document,
  type PrincipalId,
  type RecordId,
  type Sprint,
  type Workspace,
} from '@trellis/core';
import type { StorageBackend } from '@trellis/storage';
import type { AnyRecord, RecordTable } from '../services/record-table.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('integrity');

// ============================================================================
// Types
// ============================================================================

export const FindingKind = {
  /** Capture parent missing or owned by another principal */
  DANGLING_PARENT: 'dangling_parent',
  /** Capture parent chain loops */
  PARENT_CYCLE: 'parent_cycle',
  /** Capture has more ancestors than hierarchy.maxDepth allows */
  DEPTH_EXCEEDED: 'depth_exceeded',
  /** Capture workspace missing or foreign */
  DANGLING_WORKSPACE: 'dangling_workspace',
  /** relatedCaptures entry missing or foreign */
  DANGLING_RELATED: 'dangling_related',
  /** Sprint member missing or foreign */
  DANGLING_MEMBERSHIP: 'dangling_membership',
  /** Sprint load above capacity */
  CAPACITY_OVERRUN: 'capacity_overrun',
  /** Document workspace missing or foreign */
  DOCUMENT_WORKSPACE_MISSING: 'document_workspace_missing',
  /** Document folder node absent from its workspace tree */
  DOCUMENT_FOLDER_MISSING: 'document_folder_missing',
  /** Workspace folder tree fails validation */
  INVALID_FOLDER_TREE: 'invalid_folder_tree',
} as const;

export type FindingKind = (typeof FindingKind)[keyof typeof FindingKind];

export interface IntegrityFinding {
  kind: FindingKind;
  /** Record the finding is reported against */
  recordId: RecordId;
  message: string;
  /** Whether repair() can fix it */
  repairable: boolean;
  details: Record<string, unknown>;
}

export interface AuditReport {
  valid: boolean;
  /** Records examined, by kind */
  checked: Record<RecordKind, number>;
  findings: IntegrityFinding[];
}

export interface RepairResult {
  repaired: IntegrityFinding[];
  remaining: IntegrityFinding[];
}

/** Kinds repair() can fix without deleting records */
const REPAIRABLE: ReadonlySet<FindingKind> = new Set<FindingKind>([
  FindingKind.DANGLING_PARENT,
  FindingKind.PARENT_CYCLE,
  FindingKind.DEPTH_EXCEEDED,
  FindingKind.DANGLING_WORKSPACE,
  FindingKind.DANGLING_RELATED,
  FindingKind.DANGLING_MEMBERSHIP,
  FindingKind.DOCUMENT_FOLDER_MISSING,
]);

const MAX_REPAIR_PASSES = 5;

interface Snapshot {
  captures: Map<RecordId, Capture>;
  sprints: Sprint[];
  workspaces: Map<RecordId, Workspace>;
  documents: Document[];
  counts: Record<RecordKind, number>;
}

// ============================================================================
// Auditor
// ============================================================================

export class IntegrityAuditor {
  constructor(
    private readonly backend: StorageBackend,
    private readonly table: RecordTable,
    private readonly maxDepth: number
  ) {}

  audit(): AuditReport {
    const snapshot = this.load();
    const findings: IntegrityFinding[] = [];
    const add = (kind: FindingKind, recordId: RecordId, message: string, details: Record<string, unknown> = {}) => {
      findings.push({ kind, recordId, message, repairable: REPAIRABLE.has(kind), details });
    };

    for (const capture of snapshot.captures.values()) {
      if (capture.parentId !== undefined && !ownedBy(snapshot.captures.get(capture.parentId), capture.owner)) {
        add(FindingKind.DANGLING_PARENT, capture.id, `Capture ${capture.id} references missing parent ${capture.parentId}`, {
          parentId: capture.parentId,
        });
      }
      if (capture.workspaceId !== undefined && !ownedBy(snapshot.workspaces.get(capture.workspaceId), capture.owner)) {
        add(
          FindingKind.DANGLING_WORKSPACE,
          capture.id,
          `Capture ${capture.id} references missing workspace ${capture.workspaceId}`,
          { workspaceId: capture.workspaceId }
        );
      }
      for (const relatedId of getRelatedCaptureIds(capture.fields)) {
        if (relatedId === capture.id || !ownedBy(snapshot.captures.get(relatedId), capture.owner)) {
          add(
            FindingKind.DANGLING_RELATED,
            capture.id,
            `Capture ${capture.id} relates to unavailable capture ${relatedId}`,
            { relatedId }
          );
        }
      }
    }

    const cycles = findParentCycles(snapshot.captures);
    for (const cycle of cycles) {
      const [first] = cycle;
      if (first !== undefined) {
        add(FindingKind.PARENT_CYCLE, first, `Parent cycle: ${cycle.join(' -> ')}`, { path: cycle });
      }
    }

    // Only the topmost capture past the limit is reported; detaching it fixes its subtree
    const depths = computeCaptureDepths(snapshot.captures, new Set(cycles.flat()));
    for (const [captureId, depth] of depths) {
      if (depth === this.maxDepth + 1) {
        add(
          FindingKind.DEPTH_EXCEEDED,
          captureId,
          `Capture ${captureId} has ${depth} ancestors (max ${this.maxDepth})`,
          { depth, maxDepth: this.maxDepth }
        );
      }
    }

    for (const sprint of snapshot.sprints) {
      let load = 0;
      for (const captureId of sprint.captureIds) {
        const member = snapshot.captures.get(captureId);
        if (!ownedBy(member, sprint.owner)) {
          add(
            FindingKind.DANGLING_MEMBERSHIP,
            sprint.id,
            `Sprint ${sprint.id} lists unavailable capture ${captureId}`,
            { captureId }
          );
          continue;
        }
        load += member ? getEstimate(member.fields) : 0;
      }
      if (sprint.capacity !== undefined && load > sprint.capacity) {
        add(
          FindingKind.CAPACITY_OVERRUN,
          sprint.id,
          `Sprint ${sprint.id} load ${load} exceeds capacity ${sprint.capacity}`,
          { load, capacity: sprint.capacity }
        );
      }
    }

    for (const workspace of snapshot.workspaces.values()) {
      try {
        validateFolderTree(workspace.folderTree);
      } catch (error) {
        if (!isTrellisError(error)) {
          throw error;
        }
        add(FindingKind.INVALID_FOLDER_TREE, workspace.id, `Workspace ${workspace.id}: ${error.message}`, {
          code: error.code,
        });
      }
    }

    for (const document of snapshot.documents) {
      const workspace = snapshot.workspaces.get(document.workspaceId);
      if (!workspace || workspace.owner !== document.owner) {
        add(
          FindingKind.DOCUMENT_WORKSPACE_MISSING,
          document.id,
          `Document ${document.id} references missing workspace ${document.workspaceId}`,
          { workspaceId: document.workspaceId }
        );
        continue;
      }
      if (
        document.folderNodeId !== undefined &&
        !workspace.folderTree.some((node) => node.id === document.folderNodeId)
      ) {
        add(
          FindingKind.DOCUMENT_FOLDER_MISSING,
          document.id,
          `Document ${document.id} references missing folder ${document.folderNodeId}`,
          { workspaceId: workspace.id, folderNodeId: document.folderNodeId }
        );
      }
    }

    for (const finding of findings) {
      logger.warn(`${finding.kind}: ${finding.message}`);
    }
    return { valid: findings.length === 0, checked: snapshot.counts, findings };
  }

  /**
   * Fixes every repairable finding in one transaction. Capacity overruns,
   * invalid folder trees and orphaned documents are reported, never changed.
   */
  repair(): RepairResult {
    return this.backend.transaction(() => {
      const repaired: IntegrityFinding[] = [];
      let report = this.audit();
      for (let pass = 0; pass < MAX_REPAIR_PASSES; pass++) {
        const fixable = report.findings.filter((finding) => finding.repairable);
        if (fixable.length === 0) {
          break;
        }
        for (const finding of fixable) {
          this.fix(finding);
          repaired.push(finding);
        }
        report = this.audit();
      }
      logger.info(`Repaired ${repaired.length} finding(s), ${report.findings.length} remaining`);
      return { repaired, remaining: report.findings };
    });
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private load(): Snapshot {
    const captures = this.table.all(RecordKind.CAPTURE);
    const sprints = this.table.all(RecordKind.SPRINT);
    const workspaces = this.table.all(RecordKind.WORKSPACE);
    const documents = this.table.all(RecordKind.DOCUMENT);
    return {
      captures: new Map(captures.map((capture) => [capture.id, capture])),
      sprints,
      workspaces: new Map(workspaces.map((workspace) => [workspace.id, workspace])),
      documents,
      counts: {
        capture: captures.length,
        sprint: sprints.length,
        workspace: workspaces.length,
        document: documents.length,
        template: this.table.count(RecordKind.TEMPLATE),
      },
    };
  }

  private fix(finding: IntegrityFinding): void {
    const now = this.table.now();
    switch (finding.kind) {
      case FindingKind.DANGLING_PARENT:
      case FindingKind.PARENT_CYCLE:
      case FindingKind.DEPTH_EXCEEDED:
        this.updateCapture(finding.recordId, (capture) => {
          delete capture.parentId;
        });
        return;
      case FindingKind.DANGLING_WORKSPACE:
        this.updateCapture(finding.recordId, (capture) => {
          delete capture.workspaceId;
        });
        return;
      case FindingKind.DANGLING_RELATED: {
        const relatedId = finding.details.relatedId;
        this.updateCapture(finding.recordId, (capture) => {
          const remaining = getRelatedCaptureIds(capture.fields).filter((id) => id !== relatedId);
          if (remaining.length > 0) {
            capture.fields[FieldName.RELATED_CAPTURES] = { kind: FieldKind.CAPTURES, value: remaining };
          } else {
            delete capture.fields[FieldName.RELATED_CAPTURES];
          }
        });
        return;
      }
      case FindingKind.DANGLING_MEMBERSHIP: {
        const captureId = finding.details.captureId;
        if (typeof captureId === 'string') {
          this.table.removeSprintMember(finding.recordId, captureId);
          this.table.touch(finding.recordId, now);
        }
        return;
      }
      case FindingKind.DOCUMENT_FOLDER_MISSING: {
        const document = this.table.get(RecordKind.DOCUMENT, finding.recordId);
        if (document) {
          const anchored: Document = { ...document, updatedAt: now };
          delete anchored.folderNodeId;
          this.table.update(anchored);
        }
        return;
      }
      default:
        return;
    }
  }

  private updateCapture(id: RecordId, mutate: (capture: Capture) => void): void {
    const existing = this.table.get(RecordKind.CAPTURE, id);
    if (!existing) {
      return;
    }
    const next = cloneCapture(existing);
    mutate(next);
    next.updatedAt = this.table.now();
    this.table.update(next);
  }
}

function ownedBy(record: AnyRecord | undefined, owner: PrincipalId): boolean {
  return record !== undefined && record.owner === owner;
}

/**
 * Every distinct parent cycle, each rotated to start at its smallest id
 */
export function findParentCycles(captures: ReadonlyMap<RecordId, Capture>): RecordId[][] {
  const cycles: RecordId[][] = [];
  const done = new Set<RecordId>();

  for (const start of captures.keys()) {
    const path: RecordId[] = [];
    const onPath = new Map<RecordId, number>();
    let current: RecordId | undefined = start;
    while (current !== undefined && !done.has(current)) {
      const seenAt = onPath.get(current);
      if (seenAt !== undefined) {
        const members = path.slice(seenAt);
        const smallest = members.reduce((min, id) => (id < min ? id : min));
        const offset = members.indexOf(smallest);
        cycles.push([...members.slice(offset), ...members.slice(0, offset)]);
        break;
      }
      onPath.set(current, path.length);
      path.push(current);
      current = captures.get(current)?.parentId;
    }
    for (const id of path) {
      done.add(id);
    }
  }
  return cycles;
}

/**
 * Ancestor count of every capture. Chains end at a missing or foreign
 * parent and at cycle members.
 */
export function computeCaptureDepths(
  captures: ReadonlyMap<RecordId, Capture>,
  cycleMembers: ReadonlySet<RecordId>
): Map<RecordId, number> {
  const depths = new Map<RecordId, number>();

  for (const start of captures.keys()) {
    const chain: RecordId[] = [];
    let depth = 0;
    let current: RecordId | undefined = start;
    while (current !== undefined) {
      const known = depths.get(current);
      if (known !== undefined) {
        depth = known + 1;
        break;
      }
      chain.push(current);
      const capture = captures.get(current);
      const parentId = capture?.parentId;
      if (
        !capture ||
        parentId === undefined ||
        cycleMembers.has(current) ||
        !ownedBy(captures.get(parentId), capture.owner)
      ) {
        break;
      }
      current = parentId;
    }
    for (let i = chain.length - 1; i >= 0; i--) {
      const id = chain[i];
      if (id !== undefined) {
        depths.set(id, depth);
        depth += 1;
      }
    }
  }
  return depths;
}
