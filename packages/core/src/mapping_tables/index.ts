export {
  STATUS_TO_STATE,
  DEFAULT_LIFECYCLE_STATE,
  PIPELINE_STEP_TO_CATEGORY,
  resolveLifecycleState,
  resolveFunctionalCategory,
} from './mapping_tables';
