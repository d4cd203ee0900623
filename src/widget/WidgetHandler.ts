import { Logger } from '@/lib/logger/Logger';
import { NotFoundError } from '@/lib/errors/SyncErrors';
import { POLLING, TIMING } from '@/config/constants';
import { waitForElements } from '@/lib/dom/DomPoller';
import { findCheckboxes } from '@/lib/utils/utils';
import { LookupClient } from '@/lookup/LookupClient';
import { LookupRequest } from '@/lookup/LookupRequest';
import type { FetchLike } from '@/lookup/LookupRequest';
import type { WidgetConfig } from '@/lib/validation/schemas';
import type { OwnerControl, WidgetHandles } from '@/types';
import { MutationWatcher } from './handlers/MutationWatcher';
import { LayoutStyler } from './ui/LayoutStyler';
import { SyncController } from './SyncController';

const logger = new Logger('WidgetHandler');

export interface WidgetHandlerOptions {
  /** Document the widget attaches to */
  document?: Document;
  /** Transport override, used by tests and non-browser hosts */
  customFetch?: FetchLike;
  /** Polling policy for the dependent field container */
  fieldPolling?: { maxAttempts: number; intervalMs: number };
}

function isOwnerControl(element: Element): element is OwnerControl {
  return element instanceof HTMLSelectElement || element instanceof HTMLInputElement;
}

/**
 * Host integration: resolves the form handles once, then wires the
 * controller, the mutation watcher and the layout passes together
 */
export class WidgetHandler {
  private doc: Document;
  private controller: SyncController | null = null;
  private watcher: MutationWatcher | null = null;
  private styleTimers: ReturnType<typeof setTimeout>[] = [];
  private isInitialized = false;

  constructor(
    private config: WidgetConfig,
    private options: WidgetHandlerOptions = {}
  ) {
    this.doc = options.document ?? document;
  }

  /**
   * Attach to the form. Resolves false when the form is not on this page.
   */
  async attach(): Promise<boolean> {
    if (this.isInitialized) {
      logger.debug('Already attached');
      return true;
    }

    const handles = await this.resolveHandles();
    if (!handles) {
      return false;
    }

    const request = new LookupRequest({
      baseUrl: this.doc.location?.origin,
      timeoutMs: this.config.requestTimeoutMs,
      customFetch: this.options.customFetch,
    });
    const client = new LookupClient(request, {
      allowedOptions: this.config.endpoints.allowedOptions,
      assignedSecondary: this.config.endpoints.assignedSecondary,
      ownerParam: this.config.ownerParam,
    });

    this.controller = new SyncController({
      handles,
      client,
      assignmentScreenUrl: this.config.endpoints.assignmentScreen,
      styledLists: this.config.selectors.styledLists,
    });
    this.controller.start();

    this.installWatcher(handles);
    this.scheduleStylePasses();

    this.isInitialized = true;
    logger.info('Widget attached');
    return true;
  }

  getController(): SyncController | null {
    return this.controller;
  }

  /**
   * Detach every listener, observer and timer
   */
  cleanup(): void {
    logger.debug('Cleaning up widget');

    this.watcher?.cleanup();
    this.watcher = null;

    this.controller?.stop();
    this.controller = null;

    this.styleTimers.forEach((timer) => clearTimeout(timer));
    this.styleTimers = [];

    this.isInitialized = false;
    logger.info('Cleanup complete');
  }

  /**
   * Resolve owner control, dependent field and secondary list
   */
  private async resolveHandles(): Promise<WidgetHandles | null> {
    const { selectors } = this.config;

    const [owner] = await waitForElements(selectors.owner, {
      root: this.doc,
      maxAttempts: POLLING.ATTACH_MAX_ATTEMPTS,
      intervalMs: POLLING.ATTACH_INTERVAL_MS,
    });
    if (!owner || !isOwnerControl(owner)) {
      logger.info('Owner control not found, widget not attached:', selectors.owner);
      return null;
    }

    const fieldPolling = this.options.fieldPolling ?? {
      maxAttempts: POLLING.FIELD_MAX_ATTEMPTS,
      intervalMs: POLLING.FIELD_INTERVAL_MS,
    };
    const [field] = await waitForElements(selectors.dependentField, {
      root: this.doc,
      ...fieldPolling,
    });
    if (!(field instanceof HTMLElement)) {
      logger.error(
        'Dependent field not found',
        new NotFoundError(`No element matches ${selectors.dependentField}`)
      );
      return null;
    }

    const secondaryList = this.doc.querySelector<HTMLElement>(selectors.secondaryList);
    logger.debug('Handles resolved:', {
      owner: selectors.owner,
      dependentField: selectors.dependentField,
      secondaryList: secondaryList !== null,
    });

    return { owner, dependentField: field, secondaryList };
  }

  /**
   * Re-sync and re-style when the host re-renders the option lists
   */
  private installWatcher(handles: WidgetHandles): void {
    const body = this.doc.body;
    if (!body) {
      logger.warn('No document body to observe');
      return;
    }

    this.watcher = new MutationWatcher(body, {
      onOptionsChanged: () => {
        const controller = this.controller;
        if (!controller || !controller.hasOwner()) return;
        if (findCheckboxes(handles.dependentField).length === 0) return;

        logger.debug('Dependent options re-rendered, reloading');
        controller.reload().catch((error: unknown) => {
          logger.error('Reload after re-render failed:', error);
        });
      },
      onMutations: () => {
        LayoutStyler.apply(this.doc, this.config.selectors.styledLists);
      },
    });
    this.watcher.install();
  }

  /**
   * The admin may finish rendering its widgets after attach
   */
  private scheduleStylePasses(): void {
    this.styleTimers = TIMING.STYLE_PASS_DELAYS_MS.map((delay) =>
      setTimeout(() => {
        LayoutStyler.apply(this.doc, this.config.selectors.styledLists);
      }, delay)
    );
  }
}
