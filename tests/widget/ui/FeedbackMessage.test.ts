import { describe, it, expect, beforeEach } from 'vitest';
import { FeedbackMessage } from '@/widget';
import { renderAdminForm } from '../../helpers/adminForm';

describe('FeedbackMessage', () => {
  let container: HTMLElement;
  let feedback: FeedbackMessage;

  beforeEach(() => {
    container = renderAdminForm({ options: ['a'] }).dependentField;
    feedback = new FeedbackMessage(container, '/admin/assignments/add/');
  });

  it('creates a single help node on demand', () => {
    expect(container.querySelector('.help')).toBeNull();

    feedback.showText('one');
    feedback.showText('two');

    const nodes = container.querySelectorAll('p.help');
    expect(nodes).toHaveLength(1);
    expect(nodes[0].textContent).toBe('two');
  });

  it('reuses a help node rendered by the host', () => {
    const hostHelp = document.createElement('div');
    hostHelp.className = 'help';
    container.appendChild(hostHelp);

    feedback.showText('loading');

    expect(hostHelp.textContent).toBe('loading');
    expect(container.querySelectorAll('.help')).toHaveLength(1);
  });

  it('renders the loading and synced phases', () => {
    feedback.render({ status: 'loading', ownerId: '7' });
    expect(feedback.text()).toBe('Loading options...');

    feedback.render({ status: 'synced', ownerId: '7', checkedCount: 3, allowedCount: 3 });
    expect(feedback.text()).toBe(
      'Options already assigned are checked automatically (3). You can select others.'
    );
  });

  it('links to the assignment screen when no option is allowed', () => {
    feedback.render({ status: 'synced', ownerId: '7', checkedCount: 0, allowedCount: 0 });

    expect(feedback.text()).toBe(
      'No options are assigned to this owner. Please assign options first in Option assignments.'
    );
    const link = container.querySelector<HTMLAnchorElement>('.help a');
    expect(link?.getAttribute('href')).toBe('/admin/assignments/add/');
    expect(link?.target).toBe('_blank');
  });

  it('renders errors in red with an optional detail', () => {
    feedback.render({
      status: 'error',
      ownerId: '7',
      kind: 'transport',
      message: 'Error while loading options. Please try again.',
      detail: 'database unavailable',
    });

    const span = container.querySelector<HTMLSpanElement>('.help span');
    expect(span?.style.color).toBe('red');
    expect(container.querySelector('.help small')?.textContent).toBe('Details: database unavailable');
    expect(feedback.text()).toBe(
      'Error while loading options. Please try again.Details: database unavailable'
    );
  });

  it('shows error details as text, never as markup', () => {
    feedback.showError('Failed', '<img src=x onerror=alert(1)>');

    expect(container.querySelector('.help img')).toBeNull();
    expect(container.querySelector('.help small')?.textContent).toBe('Details: <img src=x onerror=alert(1)>');
  });

  it('leaves the message untouched when idle', () => {
    feedback.showText('previous');
    feedback.render({ status: 'idle' });
    expect(feedback.text()).toBe('previous');
  });
});
