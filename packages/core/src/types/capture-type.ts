/**
 * Capture types and their subtype taxonomies
 */

/**
 * The six kinds of user-authored capture
 */
export const CaptureType = {
  IDEA: 'Idea',
  TASK: 'Task',
  PROJECT: 'Project',
  REFLECTION: 'Reflection',
  OUTLINE: 'Outline',
  CALENDAR: 'Calendar',
} as const;

export type CaptureType = (typeof CaptureType)[keyof typeof CaptureType];

export const IdeaSubtype = {
  FEATURE_REQUEST: 'FeatureRequest',
  INNOVATION: 'Innovation',
  IMPROVEMENT: 'Improvement',
  RESEARCH: 'Research',
  EXPERIMENT: 'Experiment',
  CONCEPT: 'Concept',
  VISION: 'Vision',
} as const;

export type IdeaSubtype = (typeof IdeaSubtype)[keyof typeof IdeaSubtype];

export const TaskSubtype = {
  DEVELOPMENT: 'Development',
  DESIGN: 'Design',
  DOCUMENTATION: 'Documentation',
  REVIEW: 'Review',
  TESTING: 'Testing',
  DEPLOYMENT: 'Deployment',
  MAINTENANCE: 'Maintenance',
  BUG_FIX: 'BugFix',
  REFACTOR: 'Refactor',
} as const;

export type TaskSubtype = (typeof TaskSubtype)[keyof typeof TaskSubtype];

export const ProjectSubtype = {
  FEATURE: 'Feature',
  INITIATIVE: 'Initiative',
  EPIC: 'Epic',
  MILESTONE: 'Milestone',
  RELEASE: 'Release',
  CAMPAIGN: 'Campaign',
} as const;

export type ProjectSubtype = (typeof ProjectSubtype)[keyof typeof ProjectSubtype];

/** Allowed `subtype` values per capture type; types without an entry take no subtype */
export const SUBTYPES_BY_CAPTURE_TYPE: Partial<Record<CaptureType, readonly string[]>> = {
  [CaptureType.IDEA]: Object.values(IdeaSubtype),
  [CaptureType.TASK]: Object.values(TaskSubtype),
  [CaptureType.PROJECT]: Object.values(ProjectSubtype),
};

/**
 * Validates a capture type value
 */
export function isValidCaptureType(value: unknown): value is CaptureType {
  return Object.values(CaptureType).some((type) => type === value);
}
