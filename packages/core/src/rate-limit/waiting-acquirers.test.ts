import { describe, it, expect } from 'vitest';
import { WaitingAcquirers } from './waiting-acquirers.js';

describe('WaitingAcquirers', () => {
  it('counts waiters per key', () => {
    const waiting = new WaitingAcquirers();

    const leaveFirst = waiting.enter('analyze');
    const leaveSecond = waiting.enter('analyze');

    expect(waiting.has('analyze')).toBe(true);
    expect(waiting.has('list')).toBe(false);

    leaveFirst();
    expect(waiting.has('analyze')).toBe(true);
    leaveSecond();
    expect(waiting.has('analyze')).toBe(false);
  });

  it('ignores a second leave from the same waiter', () => {
    const waiting = new WaitingAcquirers();
    const leaveFirst = waiting.enter('analyze');
    waiting.enter('analyze');

    leaveFirst();
    leaveFirst();

    expect(waiting.has('analyze')).toBe(true);
  });
});
