/**
 * Widget Modules
 *
 * This module exports all widget components:
 * - SyncController: owner-driven synchronization state machine
 * - WidgetHandler: host integration that resolves handles and wires everything
 * - MutationWatcher: re-sync on host re-renders
 * - FeedbackMessage / LayoutStyler: status line and list presentation
 */

export { SyncController } from './SyncController';
export type { SyncControllerOptions } from './SyncController';
export { WidgetHandler } from './WidgetHandler';
export type { WidgetHandlerOptions } from './WidgetHandler';
export { MutationWatcher, mutationTouchesCheckboxes } from './handlers/MutationWatcher';
export type { MutationWatcherHandlers } from './handlers/MutationWatcher';
export { FeedbackMessage } from './ui/FeedbackMessage';
export { LayoutStyler } from './ui/LayoutStyler';
export {
  reconcile,
  disableAll,
  applyAssigned,
  isOptionVisible,
  setOptionVisible,
} from './reconciler/OptionReconciler';
