import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { OwnerId, SyncErrorKind, SyncPhase } from '@/types';

/**
 * Synchronization state of one controller
 */
export interface SyncState {
  phase: SyncPhase;
  /** Token of the latest sync cycle; older cycles are stale */
  requestId: number;

  // Actions
  /** Start a new cycle and return its token */
  beginRequest: () => number;
  isCurrent: (requestId: number) => boolean;

  setIdle: () => void;
  setLoading: (ownerId: OwnerId) => void;
  setSynced: (ownerId: OwnerId, checkedCount: number, allowedCount: number) => void;
  setError: (
    ownerId: OwnerId,
    kind: SyncErrorKind,
    message: string,
    detail?: string
  ) => void;
}

export type SyncStore = StoreApi<SyncState>;

/**
 * Create a store for one controller; nothing is shared between widgets
 */
export function createSyncStore(): SyncStore {
  return createStore<SyncState>()((set, get) => ({
    phase: { status: 'idle' },
    requestId: 0,

    beginRequest: () => {
      const requestId = get().requestId + 1;
      set({ requestId });
      return requestId;
    },

    isCurrent: (requestId) => get().requestId === requestId,

    setIdle: () => set({ phase: { status: 'idle' } }),

    setLoading: (ownerId) => set({ phase: { status: 'loading', ownerId } }),

    setSynced: (ownerId, checkedCount, allowedCount) =>
      set({ phase: { status: 'synced', ownerId, checkedCount, allowedCount } }),

    setError: (ownerId, kind, message, detail) =>
      set({
        phase:
          detail === undefined
            ? { status: 'error', ownerId, kind, message }
            : { status: 'error', ownerId, kind, message, detail },
      }),
  }));
}
