/**
 * Utility functions for OptionSync
 */

/**
 * Normalize an option identifier for comparison (trimmed, lowercase)
 */
export function normalizeIdentifier(value: unknown): string {
  return String(value).toLowerCase().trim();
}

/**
 * Build a normalized membership set
 */
export function toNormalizedSet(values: Iterable<unknown>): Set<string> {
  const set = new Set<string>();
  for (const value of values) {
    set.add(normalizeIdentifier(value));
  }
  return set;
}

/**
 * Collect the checkbox inputs below a node
 */
export function findCheckboxes(root: ParentNode): HTMLInputElement[] {
  return Array.from(root.querySelectorAll<HTMLInputElement>('input[type="checkbox"]'));
}

/**
 * Check whether a node is, or contains, a checkbox input
 */
export function containsCheckbox(node: Node): boolean {
  if (!(node instanceof Element)) return false;
  if (node.matches('input[type="checkbox"]')) return true;
  return node.querySelector('input[type="checkbox"]') !== null;
}

export interface Debounced<A extends unknown[]> {
  (...args: A): void;
  cancel(): void;
}

/**
 * Debounce a function
 */
export function debounce<A extends unknown[]>(
  func: (...args: A) => void,
  wait: number
): Debounced<A> {
  let timeout: ReturnType<typeof setTimeout> | undefined;

  const debounced = (...args: A) => {
    clearTimeout(timeout);
    timeout = setTimeout(() => func(...args), wait);
  };

  return Object.assign(debounced, {
    cancel: () => {
      clearTimeout(timeout);
      timeout = undefined;
    },
  });
}

