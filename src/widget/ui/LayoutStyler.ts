import { LAYOUT, SELECTORS } from '@/config/constants';
import { Logger } from '@/lib/logger/Logger';

const logger = new Logger('LayoutStyler');

type Declarations = Readonly<Record<string, string>>;

const IMPORTANT: ReadonlySet<string> = new Set<string>(LAYOUT.IMPORTANT);

/**
 * Applies the grid presentation to rendered checkbox lists.
 * Only inline styles are touched, so repeated passes leave the same result.
 */
export class LayoutStyler {
  /**
   * Style every list matching the selectors
   * @returns Number of lists styled
   */
  static apply(root: ParentNode, selectors: readonly string[]): number {
    if (selectors.length === 0) return 0;

    const lists = Array.from(root.querySelectorAll<HTMLElement>(selectors.join(', ')));
    if (lists.length === 0) {
      logger.debug('Checkbox lists not found');
      return 0;
    }

    for (const list of lists) {
      this.styleList(list);
    }

    logger.debug(`Applied styles to ${lists.length} checkbox list(s)`);
    return lists.length;
  }

  /**
   * Style one list and its items, labels and checkboxes
   */
  static styleList(list: HTMLElement): void {
    this.setDeclarations(list, LAYOUT.LIST);
    list.querySelectorAll<HTMLElement>('li').forEach((item) => this.setDeclarations(item, LAYOUT.ITEM));
    list.querySelectorAll<HTMLElement>('label').forEach((label) => this.setDeclarations(label, LAYOUT.LABEL));
    list
      .querySelectorAll<HTMLElement>(SELECTORS.CHECKBOX)
      .forEach((checkbox) => this.setDeclarations(checkbox, LAYOUT.CHECKBOX));
  }

  private static setDeclarations(element: HTMLElement, declarations: Declarations): void {
    for (const [property, value] of Object.entries(declarations)) {
      element.style.setProperty(property, value, IMPORTANT.has(property) ? 'important' : '');
    }
  }
}
