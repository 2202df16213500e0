import { z } from 'zod';

export enum EventType {
  TaskCreated = 'task_created',
  TaskUpdated = 'task_updated',
  LifecycleChanged = 'lifecycle_changed',
  QueueAdded = 'queue_added',
  QueueRemoved = 'queue_removed',
  TimerStarted = 'timer_started',
  TimerStopped = 'timer_stopped',
  SessionRecorded = 'session_recorded',
  SessionMerged = 'session_merged',
  SessionPurged = 'session_purged',
  SessionAmended = 'session_amended',
  SessionDeleted = 'session_deleted',
  ExternalSent = 'external_sent',
  ExternalRecalled = 'external_recalled',
  AnnotationAdded = 'annotation_added',
  ProjectCreated = 'project_created',
  ProjectRenamed = 'project_renamed',
  ProjectArchived = 'project_archived',
}

/** Project events belong to no task; they are logged under this id. */
export const PROJECT_EVENT_TASK_ID = 0;

export enum Lifecycle {
  Open = 'open',
  Closed = 'closed',
  Cancelled = 'cancelled',
}

export interface EventEnvelope {
  event_id: string;
  task_id: number;
  type: EventType;
  data: Record<string, unknown>;
  timestamp: number;
}

// =============================================================================
// Field Size Limits (exported for client-side validation and documentation)
// =============================================================================
export const FIELD_LIMITS = {
  DESCRIPTION: 1024,
  PROJECT_NAME: 255,
  TAG: 64,
  RECIPIENT: 255,
  NOTE: 4096,
  ARRAY_MAX_ITEMS: 100,
} as const;

// =============================================================================
// Base Validators
// =============================================================================

const taskId = z.number().int().positive();
const sessionId = z.number().int().positive();
const epochSeconds = z.number().int().nonnegative();

export const descriptionString = z.string().min(1).max(FIELD_LIMITS.DESCRIPTION);

// Project name validation: alphanumeric start, followed by alphanumeric/dots/hyphens/underscores
export const projectName = z
  .string()
  .min(1, 'Project name cannot be empty')
  .max(FIELD_LIMITS.PROJECT_NAME, `Project name cannot exceed ${FIELD_LIMITS.PROJECT_NAME} characters`)
  .regex(
    /^[a-zA-Z0-9][a-zA-Z0-9._-]*$/,
    'Project name must start with alphanumeric and contain only alphanumeric, dots, hyphens, and underscores'
  );

export const tagString = z
  .string()
  .min(1)
  .max(FIELD_LIMITS.TAG)
  .regex(/^\S+$/, 'Tags cannot contain whitespace');
export const tagsArray = z.array(tagString).max(FIELD_LIMITS.ARRAY_MAX_ITEMS);
export const recipientString = z.string().min(1).max(FIELD_LIMITS.RECIPIENT);
export const noteString = z.string().min(1).max(FIELD_LIMITS.NOTE);

// =============================================================================
// Event Data Schemas
// =============================================================================

const TaskCreatedSchema = z.object({
  description: descriptionString,
  project: projectName.optional(),
  tags: tagsArray.optional(),
});

// Explicit list of updatable fields - MUST match tasks table columns
export const UPDATABLE_TASK_FIELDS = [
  'description',
  'project',
  'tags',
  'due_ts',
  'scheduled_ts',
  'wait_ts',
  'alloc_secs',
] as const;

export type UpdatableTaskField = (typeof UPDATABLE_TASK_FIELDS)[number];

const updatableFieldValidators: Record<UpdatableTaskField, z.ZodSchema<unknown>> = {
  description: descriptionString,
  project: projectName.nullable(),
  tags: tagsArray,
  due_ts: epochSeconds.nullable(),
  scheduled_ts: epochSeconds.nullable(),
  wait_ts: epochSeconds.nullable(),
  alloc_secs: epochSeconds.nullable(),
};

const TaskUpdatedSchema = z
  .object({
    field: z.enum(UPDATABLE_TASK_FIELDS),
    old_value: z.unknown().optional(),
    new_value: z.unknown(),
  })
  .superRefine((data, ctx) => {
    const validator = updatableFieldValidators[data.field];
    const result = validator.safeParse(data.new_value);
    if (!result.success) {
      for (const issue of result.error.issues) {
        ctx.addIssue({
          ...issue,
          path: ['new_value', ...issue.path],
        });
      }
    }
  });

export function validateFieldValue(field: UpdatableTaskField, value: unknown): void {
  updatableFieldValidators[field].parse(value);
}

const LifecycleChangedSchema = z.object({
  from: z.nativeEnum(Lifecycle),
  to: z.nativeEnum(Lifecycle),
});

const QueueAddedSchema = z.object({
  position: z.number().int().nonnegative(),
});

const QueueRemovedSchema = z.object({
  position: z.number().int().nonnegative(),
});

const TimerStartedSchema = z.object({
  session_id: sessionId,
  start_ts: epochSeconds,
  merged: z.boolean(),
});

const TimerStoppedSchema = z.object({
  session_id: sessionId,
  end_ts: epochSeconds,
  duration_secs: z.number().int().positive(),
});

const SessionRecordedSchema = z.object({
  session_id: sessionId,
  start_ts: epochSeconds,
  end_ts: epochSeconds,
  split_from: sessionId.optional(),
});

const SessionMergedSchema = z.object({
  session_id: sessionId,
  gap_secs: z.number().int().nonnegative(),
});

const SessionPurgedSchema = z.object({
  session_id: sessionId,
  start_ts: epochSeconds,
  end_ts: epochSeconds,
  next_task_id: taskId.optional(),
});

const SessionAmendedSchema = z.object({
  session_id: sessionId,
  from: z.object({ start_ts: epochSeconds, end_ts: epochSeconds.nullable() }),
  to: z.object({ start_ts: epochSeconds, end_ts: epochSeconds.nullable() }),
});

const SessionDeletedSchema = z.object({
  session_id: sessionId,
  start_ts: epochSeconds,
  end_ts: epochSeconds,
});

const ExternalSentSchema = z.object({
  recipient: recipientString,
  note: noteString.optional(),
});

// position is absent when the record is collected by completing or cancelling
const ExternalRecalledSchema = z.object({
  recipient: recipientString,
  position: z.number().int().nonnegative().optional(),
});

const AnnotationAddedSchema = z.object({
  note: noteString,
  session_id: sessionId.optional(),
});

const ProjectCreatedSchema = z.object({
  name: projectName,
});

const ProjectRenamedSchema = z.object({
  old_name: projectName,
  new_name: projectName,
  merged: z.boolean(),
  tasks_moved: z.number().int().nonnegative(),
});

const ProjectArchivedSchema = z.object({
  name: projectName,
  archived: z.boolean(),
});

// =============================================================================
// Schema Registry and Validation
// =============================================================================

export const EventSchemas: Record<EventType, z.ZodSchema<unknown>> = {
  [EventType.TaskCreated]: TaskCreatedSchema,
  [EventType.TaskUpdated]: TaskUpdatedSchema,
  [EventType.LifecycleChanged]: LifecycleChangedSchema,
  [EventType.QueueAdded]: QueueAddedSchema,
  [EventType.QueueRemoved]: QueueRemovedSchema,
  [EventType.TimerStarted]: TimerStartedSchema,
  [EventType.TimerStopped]: TimerStoppedSchema,
  [EventType.SessionRecorded]: SessionRecordedSchema,
  [EventType.SessionMerged]: SessionMergedSchema,
  [EventType.SessionPurged]: SessionPurgedSchema,
  [EventType.SessionAmended]: SessionAmendedSchema,
  [EventType.SessionDeleted]: SessionDeletedSchema,
  [EventType.ExternalSent]: ExternalSentSchema,
  [EventType.ExternalRecalled]: ExternalRecalledSchema,
  [EventType.AnnotationAdded]: AnnotationAddedSchema,
  [EventType.ProjectCreated]: ProjectCreatedSchema,
  [EventType.ProjectRenamed]: ProjectRenamedSchema,
  [EventType.ProjectArchived]: ProjectArchivedSchema,
};

export function validateEventData(type: EventType, data: unknown): void {
  EventSchemas[type].parse(data);
}

// =============================================================================
// Inferred Types
// =============================================================================

export type TaskCreatedData = z.infer<typeof TaskCreatedSchema>;
export type TaskUpdatedData = z.infer<typeof TaskUpdatedSchema>;
export type LifecycleChangedData = z.infer<typeof LifecycleChangedSchema>;
export type TimerStartedData = z.infer<typeof TimerStartedSchema>;
export type TimerStoppedData = z.infer<typeof TimerStoppedSchema>;
export type SessionPurgedData = z.infer<typeof SessionPurgedSchema>;
export type ExternalSentData = z.infer<typeof ExternalSentSchema>;
