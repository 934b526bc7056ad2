/**
 * Sprint Store - sprints and capacity-checked capture membership
 */

import {
  MAX_DESCRIPTION_LENGTH,
  RecordKind,
  alreadyAssigned,
  capacityExceeded,
  createSprint,
  describeLoad,
  getEstimate,
  notAssigned,
  validateCapacity,
  validateDateValue,
  validateName,
  validateOptionalText,
  validateSprintDates,
  validateSprintStatus,
  type CreateSprintInput,
  type RecordId,
  type Sprint,
  type SprintLoad,
  type UpdateSprintInput,
} from '@trellis/core';
import { requireAuthenticated, requireOwned } from '../systems/identity.js';
import type { Page, PageOptions } from '../query/query-engine.js';
import { resolveOwnedReference, type StoreContext } from './context.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('sprint-store');

export interface SprintDeleteResult {
  id: RecordId;
  /** Captures that were members; they are not deleted */
  releasedCaptures: RecordId[];
}

export class SprintStore {
  constructor(private readonly ctx: StoreContext) {}

  create(caller: string, input: CreateSprintInput): Sprint {
    const owner = requireAuthenticated(caller);
    return this.ctx.backend.transaction(() => {
      const context = this.ctx.table.newRecordContext(RecordKind.SPRINT, String(input.name), owner);
      const sprint = createSprint(input, context);
      this.ctx.table.insert(sprint);
      logger.debug(`Created sprint ${sprint.id} for ${owner}`);
      return sprint;
    });
  }

  get(caller: string, id: string): Sprint {
    const owner = requireAuthenticated(caller);
    return requireOwned(this.ctx.table.get(RecordKind.SPRINT, id), 'sprint', id, owner);
  }

  list(caller: string, options: PageOptions = {}): Page<Sprint> {
    return this.ctx.query.listOwned(RecordKind.SPRINT, requireAuthenticated(caller), options);
  }

  /**
   * Current load against capacity
   */
  getLoad(caller: string, id: string): SprintLoad {
    const sprint = this.get(caller, id);
    return describeLoad(sprint, this.ctx.table.getSprintLoad(sprint.id));
  }

  /**
   * Partial update; lowering capacity below the current load is rejected
   */
  update(caller: string, id: string, input: UpdateSprintInput): Sprint {
    const owner = requireAuthenticated(caller);
    return this.ctx.backend.transaction(() => {
      const { table } = this.ctx;
      const existing = requireOwned(table.get(RecordKind.SPRINT, id), 'sprint', id, owner);
      const next: Sprint = { ...existing, captureIds: [...existing.captureIds] };

      if (input.name !== undefined) {
        next.name = validateName(input.name);
      }
      if (input.goal === null) {
        delete next.goal;
      } else if (input.goal !== undefined) {
        next.goal = validateOptionalText(input.goal, 'goal', MAX_DESCRIPTION_LENGTH);
      }
      if (input.status !== undefined) {
        next.status = validateSprintStatus(input.status);
      }
      if (input.startDate === null) {
        delete next.startDate;
      } else if (input.startDate !== undefined) {
        next.startDate = validateDateValue(input.startDate, 'startDate');
      }
      if (input.endDate === null) {
        delete next.endDate;
      } else if (input.endDate !== undefined) {
        next.endDate = validateDateValue(input.endDate, 'endDate');
      }
      validateSprintDates(next.startDate, next.endDate);

      if (input.capacity === null) {
        delete next.capacity;
      } else if (input.capacity !== undefined) {
        const capacity = validateCapacity(input.capacity);
        const load = table.getSprintLoad(existing.id);
        if (load > capacity) {
          throw capacityExceeded(existing.id, { capacity, currentLoad: load, estimate: 0, projectedLoad: load });
        }
        next.capacity = capacity;
      }

      next.updatedAt = table.now();
      table.update(next);
      logger.debug(`Updated sprint ${next.id}`);
      return next;
    });
  }

  /**
   * Deletes a sprint and its membership set; member captures survive
   */
  delete(caller: string, id: string): SprintDeleteResult {
    const owner = requireAuthenticated(caller);
    return this.ctx.backend.transaction(() => {
      const sprint = requireOwned(this.ctx.table.get(RecordKind.SPRINT, id), 'sprint', id, owner);
      this.ctx.backend.run('DELETE FROM sprint_captures WHERE sprint_id = ?', [sprint.id]);
      this.ctx.table.delete(sprint.id);
      logger.info(`Deleted sprint ${sprint.id}, released ${sprint.captureIds.length} capture(s)`);
      return { id: sprint.id, releasedCaptures: sprint.captureIds };
    });
  }

  /**
   * Adds a capture to the end of the sprint
   *
   * @throws ConflictError ALREADY_ASSIGNED when the capture is already a member
   * @throws ConstraintError CAPACITY_EXCEEDED when the projected load exceeds capacity
   */
  addCapture(caller: string, sprintId: string, captureId: string): SprintLoad {
    const owner = requireAuthenticated(caller);
    return this.ctx.backend.transaction(() => {
      const { table } = this.ctx;
      const sprint = requireOwned(table.get(RecordKind.SPRINT, sprintId), 'sprint', sprintId, owner);
      const capture = resolveOwnedReference(table, 'captureId', RecordKind.CAPTURE, captureId, owner);

      if (table.isSprintMember(sprint.id, capture.id)) {
        throw alreadyAssigned(sprint.id, capture.id);
      }

      const currentLoad = table.getSprintLoad(sprint.id);
      const estimate = getEstimate(capture.fields);
      const projectedLoad = currentLoad + estimate;
      if (sprint.capacity !== undefined && projectedLoad > sprint.capacity) {
        throw capacityExceeded(sprint.id, { capacity: sprint.capacity, currentLoad, estimate, projectedLoad });
      }

      const now = table.now();
      table.addSprintMember(sprint.id, capture.id, now);
      table.touch(sprint.id, now);
      logger.debug(`Added capture ${capture.id} to sprint ${sprint.id} (load ${projectedLoad})`);

      return describeLoad(
        { ...sprint, updatedAt: now, captureIds: [...sprint.captureIds, capture.id] },
        projectedLoad
      );
    });
  }

  /**
   * Removes a member capture
   *
   * @throws ConflictError NOT_ASSIGNED when the capture is not a member; nothing changes
   */
  removeCapture(caller: string, sprintId: string, captureId: string): SprintLoad {
    const owner = requireAuthenticated(caller);
    return this.ctx.backend.transaction(() => {
      const { table } = this.ctx;
      const sprint = requireOwned(table.get(RecordKind.SPRINT, sprintId), 'sprint', sprintId, owner);
      if (!table.removeSprintMember(sprint.id, captureId)) {
        throw notAssigned(sprint.id, captureId);
      }

      const now = table.now();
      table.touch(sprint.id, now);
      logger.debug(`Removed capture ${captureId} from sprint ${sprint.id}`);

      return describeLoad(
        { ...sprint, updatedAt: now, captureIds: sprint.captureIds.filter((id) => id !== captureId) },
        table.getSprintLoad(sprint.id)
      );
    });
  }
}
