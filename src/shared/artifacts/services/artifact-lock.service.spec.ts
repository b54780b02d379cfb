import { ArtifactLockService } from './artifact-lock.service';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('ArtifactLockService', () => {
  let locks: ArtifactLockService;

  beforeEach(() => {
    locks = new ArtifactLockService();
  });

  it('runs tasks for the same key one after another', async () => {
    const events: string[] = [];
    const gate = deferred();

    const first = locks.runExclusive('ABC', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = locks.runExclusive('ABC', async () => {
      events.push('second');
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not make different keys wait for each other', async () => {
    const gate = deferred();
    const slow = locks.runExclusive('A', () => gate.promise);

    await expect(locks.runExclusive('B', async () => 'done')).resolves.toBe(
      'done',
    );
    expect(locks.isLocked('A')).toBe(true);

    gate.resolve();
    await slow;
    expect(locks.isLocked('A')).toBe(false);
  });

  it('keeps the key locked until the last queued task finishes', async () => {
    const first = deferred();
    const second = deferred();

    const running = [
      locks.runExclusive('ABC', () => first.promise),
      locks.runExclusive('ABC', () => second.promise),
    ];

    first.resolve();
    await running[0];
    expect(locks.isLocked('ABC')).toBe(true);

    second.resolve();
    await running[1];
    expect(locks.isLocked('ABC')).toBe(false);
  });

  it('releases the lock when a task fails', async () => {
    await expect(
      locks.runExclusive('ABC', async () => {
        throw new Error('disk full');
      }),
    ).rejects.toThrow('disk full');

    await expect(locks.runExclusive('ABC', async () => 42)).resolves.toBe(42);
    expect(locks.isLocked('ABC')).toBe(false);
  });
});
