import type { FunctionalCategory, LifecycleState } from '../entity_types';

/**
 * ShotGrid status code to OMC lifecycle state.
 * Unmapped codes resolve to {@link DEFAULT_LIFECYCLE_STATE}.
 */
export const STATUS_TO_STATE: ReadonlyMap<string, LifecycleState> = new Map<string, LifecycleState>([
  ['ip', 'in process'],
  ['omt', 'complete'],
  ['r4e', 'assigned'],
  ['wtg', 'waiting'],
  ['rev', 'assigned'],
  ['fin', 'complete'],
]);

export const DEFAULT_LIFECYCLE_STATE: LifecycleState = 'waiting';

/**
 * ShotGrid pipeline step to official OMC functional class.
 * There is no default: an unmapped step has no functional type.
 */
export const PIPELINE_STEP_TO_CATEGORY: ReadonlyMap<string, FunctionalCategory> = new Map<string, FunctionalCategory>([
  ['Text to Image', 'Create Visual Effects'],
  ['Image to Video', 'Create Visual Effects'],
  ['Comp', 'Create Visual Effects'],
  ['Upscale', 'Create Visual Effects'],
  ['Model', 'Create Visual Effects'],
  ['Texture', 'Create Visual Effects'],
  ['Editorial', 'Edit'],
  ['Edit', 'Edit'],
  ['VFX', 'Create Visual Effects'],
  ['Animation', 'Create Visual Effects'],
  ['Lighting', 'Create Visual Effects'],
  ['Rendering', 'Create Visual Effects'],
]);

/**
 * Total: every code, including none at all, has a state.
 */
export function resolveLifecycleState(statusCode: string | undefined): LifecycleState {
  if (statusCode === undefined) {
    return DEFAULT_LIFECYCLE_STATE;
  }
  return STATUS_TO_STATE.get(statusCode) ?? DEFAULT_LIFECYCLE_STATE;
}

/**
 * Partial: `undefined` means "no category", not an empty category.
 */
export function resolveFunctionalCategory(pipelineStep: string | undefined): FunctionalCategory | undefined {
  if (pipelineStep === undefined) {
    return undefined;
  }
  return PIPELINE_STEP_TO_CATEGORY.get(pipelineStep);
}
