/**
 * MovieLabs OMC v2.6 Task entity as emitted by the converter.
 */

export const OMC_SCHEMA_VERSION = 'https://movielabs.com/omc/json/schema/v2.6';
export const OMC_TASK_ENTITY_TYPE = 'Task';
export const DEFAULT_IDENTIFIER_SCOPE = 'shotgrid';

export const LIFECYCLE_STATES = ['waiting', 'assigned', 'in process', 'complete'] as const;
export type LifecycleState = (typeof LIFECYCLE_STATES)[number];

export const FUNCTIONAL_CATEGORIES = ['Create Visual Effects', 'Edit'] as const;
export type FunctionalCategory = (typeof FUNCTIONAL_CATEGORIES)[number];

export const ORIGINAL_RECORD_POLICIES = ['verbatim', 'encoded'] as const;
export type OriginalRecordPolicy = (typeof ORIGINAL_RECORD_POLICIES)[number];

export function isOriginalRecordPolicy(value: unknown): value is OriginalRecordPolicy {
  return ORIGINAL_RECORD_POLICIES.some(policy => policy === value);
}

export type OmcIdentifier = {
  identifierScope: string;
  identifierValue: string;
};

/**
 * Lightweight pointer to a related concept, referenced by slug.
 */
export type ContextReference = {
  identifier: [OmcIdentifier];
};

export type StateDetails = {
  originalShotGridStatus?: string;
  shotGridId: number;
  note: string;
};

export type SchedulingBlock = {
  scheduledStart?: string;
  scheduledEnd?: string;
};

export type AssignmentBlock = {
  assignedTo?: string;
  reviewer?: string;
};

export type AssetBlock = {
  inputAsset?: string;
};

/**
 * Copy of the normalized source row under the `verbatim` policy.
 * Absent fields are `null` so every key is always present.
 */
export type VerbatimOriginalRecord = {
  Id: number;
  TaskName: string | null;
  Link: string | null;
  PipelineStep: string | null;
  Status: string | null;
  AssignedTo: string | null;
  Reviewer: string | null;
  StartDate: string | null;
  DueDate: string | null;
  ShotStatus: string | null;
  Project: string | null;
  Thumbnail: string | null;
};

export type TaskCustomData = {
  name: string;
  state: LifecycleState;
  stateDetails: StateDetails;
  pipelineStep?: string;
  thumbnailUrl?: string;
  shotStatus?: string;
  scheduling?: SchedulingBlock;
  assignments?: AssignmentBlock;
  assets?: AssetBlock;
  /** Object under `verbatim`, JSON text under `encoded`. */
  originalShotGridData: VerbatimOriginalRecord | string;
};

export type TaskFunctionalClass = {
  functionalType?: FunctionalCategory;
  customData: TaskCustomData;
};

export type TaskEntity = {
  readonly schemaVersion: typeof OMC_SCHEMA_VERSION;
  readonly entityType: typeof OMC_TASK_ENTITY_TYPE;
  readonly identifier: readonly [OmcIdentifier];
  readonly taskFC: TaskFunctionalClass;
  readonly Context?: readonly ContextReference[];
};

/**
 * Top-level output: the entities of one conversion run, in input order.
 */
export type OmcDocument = readonly TaskEntity[];
