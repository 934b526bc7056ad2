/**
 * Template Type - reusable blueprints for new captures and documents
 *
 * Instantiation deep-copies the defaults; a created record keeps only the
 * template id as provenance and never sees later template edits.
 */

import { ValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';
import type { CaptureType } from './capture-type.js';
import { validateCaptureType, type NewRecordContext } from './capture.js';
import { validateFields, type CaptureFields } from './field-schema.js';
import {
  MAX_CONTENT_LENGTH,
  MAX_DESCRIPTION_LENGTH,
  RecordKind,
  isValidTitle,
  validateEnumValue,
  validateName,
  validateOptionalText,
  validateTitle,
  type BaseRecord,
} from './record.js';

// ============================================================================
// Enums
// ============================================================================

export const TemplateKind = {
  CAPTURE: 'Capture',
  DOCUMENT: 'Document',
} as const;

export type TemplateKind = (typeof TemplateKind)[keyof typeof TemplateKind];

export const Visibility = {
  PRIVATE: 'Private',
  PUBLIC: 'Public',
} as const;

export type Visibility = (typeof Visibility)[keyof typeof Visibility];

export const DEFAULT_VISIBILITY: Visibility = Visibility.PRIVATE;

// ============================================================================
// Template Interface
// ============================================================================

export interface Template extends BaseRecord {
  readonly kind: typeof RecordKind.TEMPLATE;
  templateKind: TemplateKind;
  visibility: Visibility;
  name: string;
  description?: string;
  /** Capture type produced by a capture template */
  captureType?: CaptureType;
  defaultTitle?: string;
  defaultFields: CaptureFields;
  defaultContent: string;
}

// ============================================================================
// Validation Functions
// ============================================================================

export function validateTemplateKind(value: unknown): TemplateKind {
  return validateEnumValue(value, Object.values(TemplateKind), 'templateKind');
}

export function validateVisibility(value: unknown): Visibility {
  return validateEnumValue(value, Object.values(Visibility), 'visibility');
}

export function isPublicTemplate(template: Template): boolean {
  return template.visibility === Visibility.PUBLIC;
}

/**
 * Validates the kind-dependent parts of a template: capture templates need a
 * captureType and their defaultFields must fit its schema; document templates
 * carry no fields.
 */
export function validateTemplateShape(
  templateKind: TemplateKind,
  captureType: unknown,
  defaultFields: unknown
): { captureType?: CaptureType; defaultFields: CaptureFields } {
  if (templateKind === TemplateKind.CAPTURE) {
    if (captureType === undefined || captureType === null) {
      throw new ValidationError(
        'Capture templates require a captureType',
        ErrorCode.MISSING_REQUIRED_FIELD,
        { field: 'captureType' }
      );
    }
    const type = validateCaptureType(captureType);
    return { captureType: type, defaultFields: validateFields(type, defaultFields) };
  }

  if (captureType !== undefined && captureType !== null) {
    throw new ValidationError(
      'Document templates cannot set a captureType',
      ErrorCode.INVALID_INPUT,
      { field: 'captureType', value: captureType }
    );
  }
  const hasFields =
    defaultFields !== undefined &&
    defaultFields !== null &&
    (typeof defaultFields !== 'object' || Object.keys(defaultFields).length > 0);
  if (hasFields) {
    throw new ValidationError(
      'Document templates cannot carry defaultFields',
      ErrorCode.INVALID_INPUT,
      { field: 'defaultFields', value: defaultFields }
    );
  }
  return { defaultFields: {} };
}

// ============================================================================
// Factory Functions
// ============================================================================

export interface CreateTemplateInput {
  templateKind: TemplateKind;
  name: string;
  description?: string;
  /** Default: Private */
  visibility?: Visibility;
  captureType?: CaptureType;
  defaultTitle?: string;
  defaultFields?: Record<string, unknown>;
  defaultContent?: string;
}

export function createTemplate(input: CreateTemplateInput, context: NewRecordContext): Template {
  const templateKind = validateTemplateKind(input.templateKind);
  const name = validateName(input.name);
  const description = validateOptionalText(input.description, 'description', MAX_DESCRIPTION_LENGTH);
  const visibility = input.visibility !== undefined ? validateVisibility(input.visibility) : DEFAULT_VISIBILITY;
  const shape = validateTemplateShape(templateKind, input.captureType, input.defaultFields);
  const defaultTitle = input.defaultTitle !== undefined ? validateTitle(input.defaultTitle, 'defaultTitle') : undefined;
  const defaultContent = validateOptionalText(input.defaultContent, 'defaultContent', MAX_CONTENT_LENGTH) ?? '';

  return {
    id: context.id,
    kind: RecordKind.TEMPLATE,
    owner: context.owner,
    createdAt: context.now,
    updatedAt: context.now,
    templateKind,
    visibility,
    name,
    defaultFields: shape.defaultFields,
    defaultContent,
    ...(description !== undefined && { description }),
    ...(shape.captureType !== undefined && { captureType: shape.captureType }),
    ...(defaultTitle !== undefined && { defaultTitle }),
  };
}

/**
 * Partial template update. The template kind never changes.
 */
export interface UpdateTemplateInput {
  name?: string;
  description?: string | null;
  visibility?: Visibility;
  captureType?: CaptureType;
  defaultTitle?: string | null;
  defaultFields?: Record<string, unknown>;
  defaultContent?: string;
}

/**
 * Picks the title for an instantiated record: explicit title, else the template default
 */
export function resolveInstanceTitle(template: Template, title: unknown): string {
  if (title !== undefined && title !== null) {
    return validateTitle(title);
  }
  if (template.defaultTitle !== undefined && isValidTitle(template.defaultTitle)) {
    return template.defaultTitle;
  }
  return validateTitle(template.name);
}
