import { Logger } from '@/lib/logger/Logger';
import type { PollHandle, PollOptions } from '@/types';

const logger = new Logger('DomPoller');

/**
 * Query every selector and merge the matches in document order, without duplicates
 */
function queryAll(root: ParentNode, selectors: readonly string[]): Element[] {
  if (selectors.length === 0) return [];
  return Array.from(root.querySelectorAll(selectors.join(', ')));
}

/**
 * Poll for elements that the host page may render late.
 *
 * Every attempt is deferred; the first one runs on the next tick and the
 * following ones `intervalMs` apart. `onFound` receives the matches of the
 * first successful attempt. Once `maxAttempts` attempts found nothing,
 * `onFail` runs instead.
 */
export function awaitElements(
  selectors: string | readonly string[],
  onFound: (elements: Element[]) => void,
  options: PollOptions
): PollHandle {
  const { maxAttempts, intervalMs, onFail } = options;
  const selectorList = typeof selectors === 'string' ? [selectors] : selectors;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }

  let attempts = 0;
  let timer: ReturnType<typeof setTimeout> | undefined;

  const attempt = (): void => {
    timer = undefined;
    attempts++;

    const root = options.root ?? document;
    const matches = queryAll(root, selectorList);
    if (matches.length > 0) {
      logger.debug(`Found ${matches.length} element(s) after ${attempts} attempt(s):`, selectorList);
      onFound(matches);
      return;
    }

    if (attempts >= maxAttempts) {
      logger.warn(`Nothing matched after ${attempts} attempt(s):`, selectorList);
      onFail?.(attempts);
      return;
    }

    timer = setTimeout(attempt, intervalMs);
  };

  timer = setTimeout(attempt, 0);

  return {
    cancel: () => {
      if (timer !== undefined) {
        clearTimeout(timer);
        timer = undefined;
      }
    },
  };
}

/**
 * Promise form of {@link awaitElements}: resolves with the matches, or with
 * an empty array when every attempt came back empty
 */
export function waitForElements(
  selectors: string | readonly string[],
  options: Omit<PollOptions, 'onFail'>
): Promise<Element[]> {
  return new Promise((resolve) => {
    awaitElements(selectors, resolve, {
      ...options,
      onFail: () => resolve([]),
    });
  });
}
