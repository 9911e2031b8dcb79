import { describe, it, expect, vi } from 'vitest';
import { onInterrupt } from '../../src/utils/interrupt.js';

describe('onInterrupt', () => {
  it('should abort the run on the first signal without exiting', () => {
    const controller = new AbortController();
    const exit = vi.fn();

    onInterrupt(controller, exit)('SIGINT');

    expect(controller.signal.aborted).toBe(true);
    expect(exit).not.toHaveBeenCalled();
  });

  it('should exit with 130 on a second signal', () => {
    const controller = new AbortController();
    const exit = vi.fn();
    const interrupt = onInterrupt(controller, exit);

    interrupt('SIGINT');
    interrupt('SIGINT');

    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(130);
  });

  it('should exit at once when the run was already stopped', () => {
    const controller = new AbortController();
    controller.abort();
    const exit = vi.fn();

    onInterrupt(controller, exit)('SIGTERM');

    expect(exit).toHaveBeenCalledWith(130);
  });
});
