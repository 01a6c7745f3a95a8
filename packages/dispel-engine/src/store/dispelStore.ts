import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import type { StoreApi } from 'zustand/vanilla';

import { createDispelSlice, type DispelSlice } from './slices/dispelSlice';

export type DispelSessionStore = StoreApi<DispelSlice>;

/** One store per scene; the owner passes it to whatever needs the session. */
export function createDispelSessionStore(): DispelSessionStore {
  return createStore<DispelSlice>()(
    immer<DispelSlice>((...args) => ({
      ...createDispelSlice(...args),
    }))
  );
}
