export {
  createTaskEntity,
  transformRows,
  buildScheduling,
  buildAssignments,
  buildAssets,
  buildContext,
  buildOriginalRecord,
} from './task_entity_factory';
export type { TaskEntityOptions, TransformObserver, TransformOutcome, TransformProgress } from './task_entity_factory';
