import { Logger } from '@/lib/logger/Logger';
import { MESSAGES, POLLING, SELECTORS, TIMING } from '@/config/constants';
import { TransportError } from '@/lib/errors/SyncErrors';
import type { SyncError } from '@/lib/errors/SyncErrors';
import { waitForElements } from '@/lib/dom/DomPoller';
import { createSyncStore } from '@/lib/store/syncStore';
import type { SyncStore } from '@/lib/store/syncStore';
import { findCheckboxes } from '@/lib/utils/utils';
import { applyAssigned, disableAll, reconcile } from './reconciler/OptionReconciler';
import { FeedbackMessage } from './ui/FeedbackMessage';
import { LayoutStyler } from './ui/LayoutStyler';
import type { LookupClient } from '@/lookup/LookupClient';
import type { OwnerId, SyncPhase, WidgetHandles } from '@/types';

const logger = new Logger('SyncController');

export interface SyncControllerOptions {
  handles: WidgetHandles;
  client: LookupClient;
  /** Link target of the "no options" message */
  assignmentScreenUrl: string;
  /** Lists the layout pass is applied to after every sync */
  styledLists: readonly string[];
  /** Polling policy for the dependent checkboxes */
  optionPolling?: { maxAttempts: number; intervalMs: number };
  changeDelayMs?: number;
  initialLoadDelayMs?: number;
}

/**
 * Keeps the dependent option list in sync with the owner control.
 *
 * Phases: idle (no owner) -> loading -> synced | error. Each sync cycle takes
 * a token from the store; results of a cycle that is no longer the latest
 * are dropped, so a slow response for an earlier owner never overwrites a
 * newer one.
 */
export class SyncController {
  readonly store: SyncStore;
  private handles: WidgetHandles;
  private client: LookupClient;
  private feedback: FeedbackMessage;
  private styledLists: readonly string[];
  private optionPolling: { maxAttempts: number; intervalMs: number };
  private changeDelayMs: number;
  private initialLoadDelayMs: number;

  private timers = new Set<ReturnType<typeof setTimeout>>();
  private unsubscribe: (() => void) | null = null;
  private started = false;

  // Event handler reference for cleanup
  private changeHandler: (e: Event) => void;

  constructor(options: SyncControllerOptions) {
    this.handles = options.handles;
    this.client = options.client;
    this.styledLists = options.styledLists;
    this.optionPolling = options.optionPolling ?? {
      maxAttempts: POLLING.OPTIONS_MAX_ATTEMPTS,
      intervalMs: POLLING.OPTIONS_INTERVAL_MS,
    };
    this.changeDelayMs = options.changeDelayMs ?? TIMING.OWNER_CHANGE_DELAY_MS;
    this.initialLoadDelayMs = options.initialLoadDelayMs ?? TIMING.INITIAL_LOAD_DELAY_MS;

    this.store = createSyncStore();
    this.feedback = new FeedbackMessage(this.handles.dependentField, options.assignmentScreenUrl);
    this.changeHandler = this.handleOwnerChange.bind(this);
    this.subscribe();
  }

  /**
   * Listen to owner changes and load the owner already selected, if any
   */
  start(): void {
    if (this.started) {
      logger.debug('Already started');
      return;
    }

    this.subscribe();
    this.handles.owner.addEventListener('change', this.changeHandler, false);
    this.started = true;

    const ownerId = this.currentOwner();
    if (ownerId) {
      logger.debug('Owner already selected on page load:', ownerId);
      this.schedule(() => this.runSync(ownerId), this.initialLoadDelayMs);
    } else {
      this.enterIdle();
    }

    logger.info('Sync controller started');
  }

  /**
   * Stop listening; in-flight lookups finish but their results are dropped
   */
  stop(): void {
    this.handles.owner.removeEventListener('change', this.changeHandler, false);
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.store.getState().beginRequest();
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.started = false;
    logger.debug('Sync controller stopped');
  }

  /**
   * Owner currently selected in the control, null when none
   */
  currentOwner(): OwnerId | null {
    const value = this.handles.owner.value.trim();
    return value === '' ? null : value;
  }

  hasOwner(): boolean {
    return this.currentOwner() !== null;
  }

  getPhase(): SyncPhase {
    return this.store.getState().phase;
  }

  /**
   * Re-run the sync for the owner currently selected
   */
  reload(): Promise<void> {
    return this.sync(this.currentOwner());
  }

  /**
   * Run one sync cycle for an owner; never rejects on lookup failures
   */
  async sync(ownerId: OwnerId | null): Promise<void> {
    const requestId = this.store.getState().beginRequest();
    const owner = ownerId?.trim() ?? '';

    if (owner === '') {
      this.enterIdle();
      return;
    }

    this.enterLoading(owner);

    const result = await this.client.fetchAllowedOptions(owner);
    if (!this.isCurrent(requestId, owner)) return;

    if (!result.ok) {
      this.enterError(owner, result.error);
      return;
    }

    const allowed = result.data.map((option) => option.uuid);
    if (allowed.length === 0) {
      logger.info('No options available for owner:', owner);
      disableAll(this.dependentControls(), { uncheck: true, hide: true });
      this.store.getState().setSynced(owner, 0, 0);
      this.applyLayout();
      return;
    }

    const controls = await this.waitForControls();
    if (!this.isCurrent(requestId, owner)) return;

    const outcome = reconcile(controls, allowed);
    if (outcome.error) {
      this.store.getState().setError(owner, 'not_found', MESSAGES.NOT_FOUND);
      this.applyLayout();
      return;
    }

    logger.debug(`Synced owner ${owner}: ${outcome.checkedCount} option(s) checked`);
    this.store.getState().setSynced(owner, outcome.checkedCount, allowed.length);
    this.applyLayout();

    this.loadAssigned(owner, requestId).catch((error: unknown) => {
      logger.warn('Assigned secondary pre-check failed:', error);
    });
  }

  private handleOwnerChange(): void {
    const ownerId = this.currentOwner();
    logger.debug('Owner changed:', ownerId);
    this.schedule(() => this.runSync(ownerId), this.changeDelayMs);
  }

  private runSync(ownerId: OwnerId | null): void {
    this.sync(ownerId).catch((error: unknown) => {
      logger.error('Sync failed:', error);
    });
  }

  private schedule(callback: () => void, delayMs: number): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      callback();
    }, delayMs);
    this.timers.add(timer);
  }

  private subscribe(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.store.subscribe((state, previous) => {
      if (state.phase !== previous.phase) {
        this.feedback.render(state.phase);
      }
    });
  }

  private isCurrent(requestId: number, ownerId: OwnerId): boolean {
    if (this.store.getState().isCurrent(requestId)) {
      return true;
    }
    logger.debug('Discarding stale result for owner:', ownerId);
    return false;
  }

  private dependentControls(): HTMLInputElement[] {
    return findCheckboxes(this.handles.dependentField);
  }

  private async waitForControls(): Promise<HTMLInputElement[]> {
    const elements = await waitForElements(SELECTORS.CHECKBOX, {
      ...this.optionPolling,
      root: this.handles.dependentField,
    });
    return elements.filter((element): element is HTMLInputElement => element instanceof HTMLInputElement);
  }

  private enterIdle(): void {
    disableAll(this.dependentControls());
    this.handles.dependentField.style.display = 'none';
    this.store.getState().setIdle();
    this.applyLayout();
  }

  private enterLoading(ownerId: OwnerId): void {
    this.handles.dependentField.style.display = '';
    disableAll(this.dependentControls());
    this.store.getState().setLoading(ownerId);
  }

  private enterError(ownerId: OwnerId, error: SyncError): void {
    disableAll(this.dependentControls(), { uncheck: true });
    const detail = error instanceof TransportError ? error.detail : undefined;
    this.store.getState().setError(ownerId, 'transport', MESSAGES.TRANSPORT_ERROR, detail);
    this.applyLayout();
  }

  /**
   * Best-effort pre-check of the secondary list
   */
  private async loadAssigned(ownerId: OwnerId, requestId: number): Promise<void> {
    const list = this.handles.secondaryList;
    if (!list) return;

    const assigned = await this.client.fetchAssignedSecondary(ownerId);
    if (!this.isCurrent(requestId, ownerId) || assigned.length === 0) return;

    const checked = applyAssigned(findCheckboxes(list), assigned);
    logger.debug(`Pre-checked ${checked} assigned secondary control(s)`);
  }

  private applyLayout(): void {
    LayoutStyler.apply(this.handles.dependentField.ownerDocument, this.styledLists);
  }
}
