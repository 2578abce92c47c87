import {
  OMC_SCHEMA_VERSION,
  OMC_TASK_ENTITY_TYPE,
  DEFAULT_IDENTIFIER_SCOPE,
} from '../entity_types';
import type {
  AssetBlock,
  AssignmentBlock,
  ContextReference,
  OriginalRecordPolicy,
  RawRow,
  SchedulingBlock,
  SourceRow,
  TaskCustomData,
  TaskEntity,
  VerbatimOriginalRecord,
} from '../entity_types';
import { resolveFunctionalCategory, resolveLifecycleState } from '../mapping_tables';
import { normalizeSourceRow } from '../row_normalizer';
import { compactBlock } from '../utils/object_utils';
import { toLinkSlug, toSlug } from '../utils/slug';

export type TaskEntityOptions = {
  /** Scope written in every identifier (default: 'shotgrid'). */
  identifierScope?: string;
  /** Shape of `originalShotGridData` (default: 'verbatim'). */
  originalRecordPolicy?: OriginalRecordPolicy;
};

export type TransformProgress = {
  entitiesProduced: number;
  /** 1-based count of rows consumed so far, skipped rows included. */
  rowsProcessed: number;
  rowsRead: number;
};

/**
 * Per-row callbacks of `transformRows`. `rowNumber` is 1-based.
 */
export type TransformObserver = {
  onEntity?: (entity: TaskEntity, progress: TransformProgress) => void;
  onSkip?: (rowNumber: number) => void;
};

export type TransformOutcome = {
  entities: TaskEntity[];
  rowsRead: number;
  rowsSkipped: number;
};

export function buildScheduling(row: SourceRow): SchedulingBlock | undefined {
  return compactBlock({
    scheduledStart: row.startDate,
    scheduledEnd: row.dueDate,
  });
}

export function buildAssignments(row: SourceRow): AssignmentBlock | undefined {
  return compactBlock({
    assignedTo: row.assignedTo,
    reviewer: row.reviewer,
  });
}

export function buildAssets(row: SourceRow): AssetBlock | undefined {
  return compactBlock({
    inputAsset: row.link === undefined ? undefined : toLinkSlug(row.link),
  });
}

/**
 * Builds the Context pointers. Each group is independent; their order is
 * scheduling, artist, reviewer, asset. Returns undefined when no group has data.
 */
export function buildContext(row: SourceRow, identifierScope: string): ContextReference[] | undefined {
  const values: string[] = [];

  if (row.startDate !== undefined || row.dueDate !== undefined) {
    values.push(`scheduling/${row.id}`);
  }
  if (row.assignedTo !== undefined) {
    values.push(`workunit/${toSlug(row.assignedTo)}-artist`);
  }
  if (row.reviewer !== undefined) {
    values.push(`workunit/${toSlug(row.reviewer)}-reviewer`);
  }
  if (row.link !== undefined) {
    values.push(`asset/${toLinkSlug(row.link)}`);
  }

  if (values.length === 0) {
    return undefined;
  }

  return values.map((identifierValue): ContextReference => ({
    identifier: [{ identifierScope, identifierValue }],
  }));
}

function toVerbatimRecord(row: SourceRow): VerbatimOriginalRecord {
  return {
    Id: row.id,
    TaskName: row.taskName ?? null,
    Link: row.link ?? null,
    PipelineStep: row.pipelineStep ?? null,
    Status: row.status ?? null,
    AssignedTo: row.assignedTo ?? null,
    Reviewer: row.reviewer ?? null,
    StartDate: row.startDate ?? null,
    DueDate: row.dueDate ?? null,
    ShotStatus: row.shotStatus ?? null,
    Project: row.project ?? null,
    Thumbnail: row.thumbnail ?? null,
  };
}

/**
 * Copies the normalized row into the payload.
 * `verbatim` keeps every key (absent -> null); `encoded` is the JSON text of the present keys only.
 */
export function buildOriginalRecord(
  row: SourceRow,
  policy: OriginalRecordPolicy
): VerbatimOriginalRecord | string {
  const verbatim = toVerbatimRecord(row);
  if (policy === 'verbatim') {
    return verbatim;
  }

  const present = Object.fromEntries(
    Object.entries(verbatim).filter(([, value]) => value !== null)
  );
  return JSON.stringify(present);
}

/**
 * Creates the OMC Task entity for one normalized row.
 *
 * Pure: the same row and options always give a structurally identical entity.
 * Fields that are absent in the row are omitted, never emitted as empty blocks.
 *
 * @example
 * const entity = createTaskEntity({ id: 7, status: 'fin', pipelineStep: 'Comp', assignedTo: 'Jane Doe' });
 * // entity.identifier[0].identifierValue === 'task/7'
 * // entity.taskFC.customData.state === 'complete'
 */
export function createTaskEntity(row: SourceRow, options: TaskEntityOptions = {}): TaskEntity {
  const identifierScope = options.identifierScope ?? DEFAULT_IDENTIFIER_SCOPE;
  const policy = options.originalRecordPolicy ?? 'verbatim';

  const scheduling = buildScheduling(row);
  const assignments = buildAssignments(row);
  const assets = buildAssets(row);

  const customData: TaskCustomData = {
    name: row.taskName ?? `Task ${row.id}`,
    state: resolveLifecycleState(row.status),
    stateDetails: {
      ...(row.status !== undefined && { originalShotGridStatus: row.status }),
      shotGridId: row.id,
      note: `Converted from ShotGrid task ${row.id}`,
    },
    ...(row.pipelineStep !== undefined && { pipelineStep: row.pipelineStep }),
    ...(row.thumbnail !== undefined && { thumbnailUrl: row.thumbnail }),
    ...(row.shotStatus !== undefined && { shotStatus: row.shotStatus }),
    ...(scheduling !== undefined && { scheduling }),
    ...(assignments !== undefined && { assignments }),
    ...(assets !== undefined && { assets }),
    originalShotGridData: buildOriginalRecord(row, policy),
  };

  const functionalType = resolveFunctionalCategory(row.pipelineStep);
  const context = buildContext(row, identifierScope);

  return {
    schemaVersion: OMC_SCHEMA_VERSION,
    entityType: OMC_TASK_ENTITY_TYPE,
    identifier: [{ identifierScope, identifierValue: `task/${row.id}` }],
    taskFC: {
      ...(functionalType !== undefined && { functionalType }),
      customData,
    },
    ...(context !== undefined && { Context: context }),
  };
}

/**
 * Transforms raw rows in input order. Rows without a usable id are skipped
 * and only show up in `rowsSkipped`.
 */
export function transformRows(
  rows: readonly RawRow[],
  options: TaskEntityOptions = {},
  observer: TransformObserver = {}
): TransformOutcome {
  const entities: TaskEntity[] = [];
  rows.forEach((raw, index) => {
    const row = normalizeSourceRow(raw);
    if (row === null) {
      observer.onSkip?.(index + 1);
      return;
    }

    const entity = createTaskEntity(row, options);
    entities.push(entity);
    observer.onEntity?.(entity, {
      entitiesProduced: entities.length,
      rowsProcessed: index + 1,
      rowsRead: rows.length,
    });
  });
  return {
    entities,
    rowsRead: rows.length,
    rowsSkipped: rows.length - entities.length,
  };
}
