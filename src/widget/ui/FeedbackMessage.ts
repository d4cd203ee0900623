import { MESSAGES, SELECTORS } from '@/config/constants';
import type { SyncPhase } from '@/types';

/**
 * Status line attached to the dependent option container
 */
export class FeedbackMessage {
  constructor(
    private container: HTMLElement,
    private assignmentScreenUrl: string
  ) {}

  /**
   * Existing help node of the container, or a new one appended to it
   */
  ensureNode(): HTMLElement {
    const existing = this.container.querySelector<HTMLElement>(SELECTORS.HELP);
    if (existing) {
      return existing;
    }

    const node = document.createElement('p');
    node.className = 'help';
    this.container.appendChild(node);
    return node;
  }

  /**
   * Render the message matching a sync phase
   */
  render(phase: SyncPhase): void {
    switch (phase.status) {
      case 'idle':
        break;
      case 'loading':
        this.showText(MESSAGES.LOADING);
        break;
      case 'synced':
        if (phase.allowedCount === 0) {
          this.showEmpty();
        } else {
          this.showText(MESSAGES.SYNCED(phase.checkedCount));
        }
        break;
      case 'error':
        this.showError(phase.message, phase.detail);
        break;
    }
  }

  showText(message: string): void {
    this.ensureNode().replaceChildren(document.createTextNode(message));
  }

  /**
   * "No options" message linking to the assignment screen
   */
  showEmpty(): void {
    const link = document.createElement('a');
    link.href = this.assignmentScreenUrl;
    link.target = '_blank';
    link.textContent = MESSAGES.EMPTY_LINK;

    this.ensureNode().replaceChildren(
      document.createTextNode(MESSAGES.EMPTY_PREFIX),
      link,
      document.createTextNode(MESSAGES.EMPTY_SUFFIX)
    );
  }

  showError(message: string, detail?: string): void {
    const span = document.createElement('span');
    span.style.color = 'red';
    span.textContent = message;

    if (detail) {
      const small = document.createElement('small');
      small.textContent = `${MESSAGES.DETAIL_PREFIX}${detail}`;
      span.append(document.createElement('br'), small);
    }

    this.ensureNode().replaceChildren(span);
  }

  /**
   * Current message as plain text
   */
  text(): string {
    return this.container.querySelector(SELECTORS.HELP)?.textContent ?? '';
  }
}
