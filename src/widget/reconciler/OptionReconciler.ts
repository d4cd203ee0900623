import { Logger } from '@/lib/logger/Logger';
import { NotFoundError } from '@/lib/errors/SyncErrors';
import { toNormalizedSet, normalizeIdentifier } from '@/lib/utils/utils';
import type { ReconcileResult } from '@/types';

const logger = new Logger('OptionReconciler');

/**
 * Element whose display carries an option's visibility: its list item, or
 * the control itself when it is not rendered inside a list
 */
function visibilityTarget(control: HTMLInputElement): HTMLElement {
  return control.closest('li') ?? control;
}

export function setOptionVisible(control: HTMLInputElement, visible: boolean): void {
  visibilityTarget(control).style.display = visible ? '' : 'none';
}

export function isOptionVisible(control: HTMLInputElement): boolean {
  return visibilityTarget(control).style.display !== 'none';
}

/**
 * Apply the allowed set onto the rendered dependent options.
 *
 * Every allowed option is enabled, shown and checked; every other one is
 * disabled, unchecked and hidden. Options are never created or removed.
 */
export function reconcile(
  controls: readonly HTMLInputElement[],
  allowed: Iterable<string>
): ReconcileResult {
  const allowedSet = toNormalizedSet(allowed);

  if (controls.length === 0 && allowedSet.size > 0) {
    logger.error(`No option controls rendered for ${allowedSet.size} allowed option(s)`);
    return {
      checkedCount: 0,
      error: new NotFoundError('Dependent option checkboxes not found'),
    };
  }

  let checkedCount = 0;
  for (const control of controls) {
    const isAllowed = allowedSet.has(normalizeIdentifier(control.value));

    control.disabled = !isAllowed;
    control.checked = isAllowed;
    setOptionVisible(control, isAllowed);

    if (isAllowed) {
      checkedCount++;
    }
  }

  logger.debug(`Reconciled ${controls.length} option(s), ${checkedCount} checked`);
  return { checkedCount };
}

/**
 * Safe state for loading, idle and error phases
 */
export function disableAll(
  controls: readonly HTMLInputElement[],
  options: { uncheck?: boolean; hide?: boolean } = {}
): void {
  for (const control of controls) {
    control.disabled = true;
    if (options.uncheck) {
      control.checked = false;
    }
    if (options.hide) {
      setOptionVisible(control, false);
    }
  }
}

/**
 * Pre-check the secondary controls listed in the assigned set.
 * Exact identifier match; never unchecks anything.
 */
export function applyAssigned(
  controls: readonly HTMLInputElement[],
  assigned: readonly string[]
): number {
  const assignedSet = new Set(assigned);
  let checked = 0;

  for (const control of controls) {
    if (assignedSet.has(control.value)) {
      control.checked = true;
      checked++;
    }
  }

  return checked;
}
