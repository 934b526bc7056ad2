/**
 * Template Store - capture and document blueprints
 *
 * Public templates are readable by every authenticated principal and
 * mutable only by their owner.
 */

import {
  MAX_CONTENT_LENGTH,
  MAX_DESCRIPTION_LENGTH,
  RecordKind,
  Visibility,
  cloneFields,
  createTemplate,
  validateName,
  validateOptionalText,
  validateTemplateShape,
  validateTitle,
  validateVisibility,
  type CreateTemplateInput,
  type RecordId,
  type Template,
  type UpdateTemplateInput,
} from '@trellis/core';
import { requireAuthenticated, requireOwned, requireReadable } from '../systems/identity.js';
import type { Page, PageOptions } from '../query/query-engine.js';
import type { StoreContext } from './context.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('template-store');

export class TemplateStore {
  constructor(private readonly ctx: StoreContext) {}

  create(caller: string, input: CreateTemplateInput): Template {
    const owner = requireAuthenticated(caller);
    return this.ctx.backend.transaction(() => {
      const context = this.ctx.table.newRecordContext(RecordKind.TEMPLATE, String(input.name), owner);
      const template = createTemplate(input, context);
      this.ctx.table.insert(template);
      logger.debug(`Created ${template.visibility.toLowerCase()} template ${template.id} for ${owner}`);
      return template;
    });
  }

  /**
   * Own templates, or any public template
   */
  get(caller: string, id: string): Template {
    const owner = requireAuthenticated(caller);
    return requireReadable(this.ctx.table.get(RecordKind.TEMPLATE, id), 'template', id, owner);
  }

  /**
   * The caller's templates, public and private
   */
  listMine(caller: string, options: PageOptions = {}): Page<Template> {
    return this.ctx.query.listOwned(RecordKind.TEMPLATE, requireAuthenticated(caller), options);
  }

  /**
   * Every public template, whoever owns it
   */
  listPublic(caller: string, options: PageOptions = {}): Page<Template> {
    requireAuthenticated(caller);
    return this.ctx.query.listVisible(
      RecordKind.TEMPLATE,
      { conditions: ["json_extract(r.data, '$.visibility') = ?"], params: [Visibility.PUBLIC] },
      options
    );
  }

  /**
   * Partial update by the owner. The template kind never changes; the
   * capture type and default fields are re-validated together.
   */
  update(caller: string, id: string, input: UpdateTemplateInput): Template {
    const owner = requireAuthenticated(caller);
    return this.ctx.backend.transaction(() => {
      const { table } = this.ctx;
      const existing = requireOwned(table.get(RecordKind.TEMPLATE, id), 'template', id, owner);
      const next: Template = { ...existing, defaultFields: cloneFields(existing.defaultFields) };

      if (input.name !== undefined) {
        next.name = validateName(input.name);
      }
      if (input.description === null) {
        delete next.description;
      } else if (input.description !== undefined) {
        next.description = validateOptionalText(input.description, 'description', MAX_DESCRIPTION_LENGTH);
      }
      if (input.visibility !== undefined) {
        next.visibility = validateVisibility(input.visibility);
      }
      if (input.defaultTitle === null) {
        delete next.defaultTitle;
      } else if (input.defaultTitle !== undefined) {
        next.defaultTitle = validateTitle(input.defaultTitle, 'defaultTitle');
      }
      if (input.defaultContent !== undefined) {
        next.defaultContent = validateOptionalText(input.defaultContent, 'defaultContent', MAX_CONTENT_LENGTH) ?? '';
      }

      if (input.captureType !== undefined || input.defaultFields !== undefined) {
        const shape = validateTemplateShape(
          existing.templateKind,
          input.captureType ?? existing.captureType,
          input.defaultFields ?? existing.defaultFields
        );
        next.defaultFields = shape.defaultFields;
        if (shape.captureType !== undefined) {
          next.captureType = shape.captureType;
        }
      }

      next.updatedAt = table.now();
      table.update(next);
      logger.debug(`Updated template ${next.id}`);
      return next;
    });
  }

  /**
   * Deletes a template. Records created from it keep their templateId as
   * provenance.
   */
  delete(caller: string, id: string): { id: RecordId } {
    const owner = requireAuthenticated(caller);
    return this.ctx.backend.transaction(() => {
      const template = requireOwned(this.ctx.table.get(RecordKind.TEMPLATE, id), 'template', id, owner);
      this.ctx.table.delete(template.id);
      logger.debug(`Deleted template ${template.id}`);
      return { id: template.id };
    });
  }
}
