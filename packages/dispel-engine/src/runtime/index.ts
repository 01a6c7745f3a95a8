export { createFrameLoop, type FrameLoop, type FrameLoopOptions } from './frame-loop';
