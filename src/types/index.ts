import type { SyncError } from '@/lib/errors/SyncErrors';

/**
 * Identifier of the owner entity (e.g. a user primary key)
 */
export type OwnerId = string;

/**
 * Allowed dependent option as returned by the lookup endpoint
 */
export interface AllowedOption {
  /** Option identifier, compared after normalization */
  uuid: string;
  [key: string]: unknown;
}

/**
 * Single-value control that drives the sync
 */
export type OwnerControl = HTMLSelectElement | HTMLInputElement;

/**
 * DOM handles resolved once at attach time
 */
export interface WidgetHandles {
  /** Owner selector */
  owner: OwnerControl;
  /** Container of the dependent option list (hosts the status node) */
  dependentField: HTMLElement;
  /** Secondary checkbox list, pre-checked from the assigned set */
  secondaryList: HTMLElement | null;
}

/**
 * Polling policy for late-rendered elements
 */
export interface PollOptions {
  /** Total number of attempts, first one included */
  maxAttempts: number;
  /** Delay between two attempts (ms) */
  intervalMs: number;
  /** Node the selectors are queried against (defaults to document) */
  root?: ParentNode;
  /** Called once attempts are exhausted without a match */
  onFail?: (attempts: number) => void;
}

export interface PollHandle {
  cancel(): void;
}

export interface ReconcileResult {
  checkedCount: number;
  /** Set when options were expected but no control was rendered */
  error?: SyncError;
}

/**
 * Lookup outcome: failures travel as values, never as rejections
 */
export type LookupResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: SyncError };

export type SyncErrorKind = 'transport' | 'not_found';

/**
 * Synchronization state machine phase
 */
export type SyncPhase =
  | { status: 'idle' }
  | { status: 'loading'; ownerId: OwnerId }
  | {
      status: 'synced';
      ownerId: OwnerId;
      checkedCount: number;
      allowedCount: number;
    }
  | {
      status: 'error';
      ownerId: OwnerId;
      kind: SyncErrorKind;
      message: string;
      detail?: string;
    };

