/**
 * Store Slices
 */

export { createDispelSlice, getDispelSessionSnapshot, isDispelActive } from './dispelSlice';
export type { DispelSlice, DispelSliceState, DispelSliceActions } from './dispelSlice';
