import { AggregateLock, lockKeys } from './aggregate_lock';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('AggregateLock', () => {
  let lock: AggregateLock;

  beforeEach(() => {
    lock = new AggregateLock();
  });

  it('should run work on the same key one at a time in arrival order', async () => {
    const events: string[] = [];

    const first = lock.run('report:1', async () => {
      events.push('first:start');
      await delay(20);
      events.push('first:end');
      return 1;
    });
    const second = lock.run('report:1', async () => {
      events.push('second:start');
      events.push('second:end');
      return 2;
    });

    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('should let different keys run concurrently', async () => {
    const events: string[] = [];

    const slow = lock.run('report:1', async () => {
      await delay(20);
      events.push('slow');
    });
    const fast = lock.run('report:2', async () => {
      events.push('fast');
    });

    await Promise.all([slow, fast]);
    expect(events).toEqual(['fast', 'slow']);
  });

  it('should release the key after a failure', async () => {
    await expect(lock.run('k', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(lock.run('k', async () => 'after')).resolves.toBe('after');
  });

  it('should forget idle keys', async () => {
    await lock.run('k', async () => undefined);
    await delay(0);

    expect(lock.isLocked('k')).toBe(false);
  });

  it('should build namespaced keys', () => {
    expect(lockKeys.report('r1')).toBe('report:r1');
    expect(lockKeys.problem('p1')).toBe('problem:p1');
    expect(lockKeys.list('l1')).toBe('list:l1');
    expect(lockKeys.acts('42')).toBe('acts:42');
  });
});
