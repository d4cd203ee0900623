import { Logger } from '@/lib/logger/Logger';
import { TIMING } from '@/config/constants';
import { containsCheckbox, debounce } from '@/lib/utils/utils';
import type { Debounced } from '@/lib/utils/utils';

const logger = new Logger('MutationWatcher');

export interface MutationWatcherHandlers {
  /** A checkbox was added or removed somewhere below the target */
  onOptionsChanged: () => void;
  /** Any structural change below the target */
  onMutations: () => void;
}

/**
 * Check whether a mutation record adds or removes checkbox controls
 */
export function mutationTouchesCheckboxes(record: MutationRecord): boolean {
  return (
    Array.from(record.addedNodes).some(containsCheckbox) ||
    Array.from(record.removedNodes).some(containsCheckbox)
  );
}

/**
 * Watches host-driven DOM re-renders below a target node
 */
export class MutationWatcher {
  private observer: MutationObserver | null = null;
  private handlers: MutationWatcherHandlers;
  private optionsChanged: Debounced<[]>;

  constructor(
    private target: Node,
    handlers: MutationWatcherHandlers,
    reloadDelayMs: number = TIMING.MUTATION_RELOAD_DELAY_MS
  ) {
    this.handlers = handlers;
    this.optionsChanged = debounce(() => this.handlers.onOptionsChanged(), reloadDelayMs);
  }

  /**
   * Start observing
   */
  install(): void {
    if (this.observer) {
      logger.debug('Already observing');
      return;
    }

    this.observer = new MutationObserver((records) => this.handleMutations(records));
    this.observer.observe(this.target, {
      childList: true,
      subtree: true,
      attributes: false,
    });

    logger.debug('Mutation watcher installed');
  }

  /**
   * Stop observing and drop any pending reload
   */
  cleanup(): void {
    this.observer?.disconnect();
    this.observer = null;
    this.optionsChanged.cancel();
    logger.debug('Mutation watcher cleaned up');
  }

  isInstalled(): boolean {
    return this.observer !== null;
  }

  private handleMutations(records: MutationRecord[]): void {
    // Status text updates carry no checkbox and never reach onOptionsChanged
    if (records.some(mutationTouchesCheckboxes)) {
      logger.debug('Checkbox controls re-rendered');
      this.optionsChanged();
    }

    this.handlers.onMutations();
  }
}
