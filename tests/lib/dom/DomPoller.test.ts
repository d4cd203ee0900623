import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { awaitElements, waitForElements } from '../../../src/lib/dom/DomPoller';

describe('awaitElements', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    document.body.innerHTML = '<div id="form"></div>';
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('defers even the first attempt', () => {
    document.body.innerHTML = '<ul id="list"></ul>';
    const onFound = vi.fn();

    awaitElements('#list', onFound, { maxAttempts: 1, intervalMs: 0 });
    expect(onFound).not.toHaveBeenCalled();

    vi.advanceTimersByTime(0);
    expect(onFound).toHaveBeenCalledTimes(1);
    expect(onFound.mock.calls[0][0]).toHaveLength(1);
  });

  it('finds elements rendered between attempts', () => {
    const onFound = vi.fn();
    const onFail = vi.fn();

    awaitElements('input[type="checkbox"]', onFound, { maxAttempts: 10, intervalMs: 200, onFail });
    vi.advanceTimersByTime(0);
    vi.advanceTimersByTime(200);
    expect(onFound).not.toHaveBeenCalled();

    document.body.innerHTML = '<input type="checkbox" value="a"><input type="checkbox" value="b">';
    vi.advanceTimersByTime(200);

    expect(onFound).toHaveBeenCalledTimes(1);
    expect(onFound.mock.calls[0][0]).toHaveLength(2);
    expect(onFail).not.toHaveBeenCalled();
  });

  it('calls onFail once the attempts are exhausted', () => {
    const onFound = vi.fn();
    const onFail = vi.fn();

    awaitElements('.missing', onFound, { maxAttempts: 10, intervalMs: 200, onFail });
    // first attempt at 0ms, the tenth at 9 * 200ms
    vi.advanceTimersByTime(9 * 200 - 1);
    expect(onFail).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(onFail).toHaveBeenCalledWith(10);
    expect(onFound).not.toHaveBeenCalled();

    vi.advanceTimersByTime(10_000);
    expect(onFail).toHaveBeenCalledTimes(1);
  });

  it('merges several selectors', () => {
    document.body.innerHTML = '<ul id="id_roles"></ul><ul class="compact-checkboxes"></ul>';
    const onFound = vi.fn();

    awaitElements(['#id_roles', 'ul.compact-checkboxes', '.absent'], onFound, {
      maxAttempts: 1,
      intervalMs: 0,
    });
    vi.advanceTimersByTime(0);

    expect(onFound.mock.calls[0][0]).toHaveLength(2);
  });

  it('only queries below the given root', () => {
    document.body.innerHTML = '<input type="checkbox">';
    const scope = document.createElement('div');
    document.body.appendChild(scope);
    const onFound = vi.fn();
    const onFail = vi.fn();

    awaitElements('input[type="checkbox"]', onFound, { maxAttempts: 2, intervalMs: 50, root: scope, onFail });
    vi.advanceTimersByTime(50);

    expect(onFound).not.toHaveBeenCalled();
    expect(onFail).toHaveBeenCalledWith(2);
  });

  it('stops polling when cancelled', () => {
    const onFound = vi.fn();
    const onFail = vi.fn();

    const handle = awaitElements('.late', onFound, { maxAttempts: 5, intervalMs: 100, onFail });
    vi.advanceTimersByTime(0);
    handle.cancel();

    document.body.innerHTML = '<div class="late"></div>';
    vi.advanceTimersByTime(1000);

    expect(onFound).not.toHaveBeenCalled();
    expect(onFail).not.toHaveBeenCalled();
  });

  it('rejects unbounded policies', () => {
    expect(() => awaitElements('#x', vi.fn(), { maxAttempts: Infinity, intervalMs: 500 })).toThrow(RangeError);
    expect(() => awaitElements('#x', vi.fn(), { maxAttempts: 0, intervalMs: 500 })).toThrow(RangeError);
  });
});

describe('waitForElements', () => {
  it('resolves with the matches', async () => {
    document.body.innerHTML = '<p class="help"></p>';
    const elements = await waitForElements('.help', { maxAttempts: 1, intervalMs: 0 });
    expect(elements).toHaveLength(1);
  });

  it('resolves with an empty array when nothing appears', async () => {
    document.body.innerHTML = '';
    const elements = await waitForElements('.help', { maxAttempts: 3, intervalMs: 1 });
    expect(elements).toEqual([]);
  });
});
