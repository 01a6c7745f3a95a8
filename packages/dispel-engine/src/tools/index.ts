export { DispelTool, type DispelToolOptions } from './DispelTool';
export {
  DISPEL_PIPELINE,
  runDispelPipeline,
  toggleMode,
  samplePath,
  closeAndDispel,
  cancelOnSecondary,
  type DispelStep,
  type DispelStepContext,
} from './pipeline';
export { samplePointer, shouldRecordPoint } from './sampler';
export { detectClosure } from './closure';
export { findEnclosedTargets, type WorldToScreen } from './enclosure';
export {
  buildDispelFeedback,
  START_MARKER_RADIUS_FACTOR,
  CURSOR_MARKER_RADIUS_FACTOR,
  type ScreenToWorld,
} from './feedback';
