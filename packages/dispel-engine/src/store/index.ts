export { createDispelSessionStore, type DispelSessionStore } from './dispelStore';
export {
    createDispelSlice,
    getDispelSessionSnapshot,
    isDispelActive,
    type DispelSlice,
    type DispelSliceState,
    type DispelSliceActions,
} from './slices';
