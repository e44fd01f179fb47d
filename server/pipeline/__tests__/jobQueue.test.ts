import { describe, expect, it, vi } from 'vitest';
import type { Logger } from '../../obs/logger';
import { JobQueue } from '../jobQueue';

const recordingLogger = () => {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
};

const deferred = () => {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

describe('JobQueue', () => {
  it('runs a job id once while it is active', async () => {
    const gate = deferred();
    const worker = vi.fn(async () => gate.promise);
    const queue = new JobQueue(2, worker, recordingLogger());

    const first = queue.dispatch('job-1');
    const second = queue.dispatch('job-1');

    expect(second).toBe(first);
    expect(queue.size).toBe(1);
    expect(queue.isActive('job-1')).toBe(true);

    gate.resolve();
    await first;

    expect(worker).toHaveBeenCalledTimes(1);
    expect(queue.isActive('job-1')).toBe(false);
    expect(queue.size).toBe(0);
  });

  it('never runs more jobs than its concurrency', async () => {
    let running = 0;
    let peak = 0;
    const gates = new Map<string, ReturnType<typeof deferred>>();
    const worker = async (jobId: string) => {
      running += 1;
      peak = Math.max(peak, running);
      const gate = deferred();
      gates.set(jobId, gate);
      await gate.promise;
      running -= 1;
    };
    const queue = new JobQueue(2, worker, recordingLogger());

    const runs = ['a', 'b', 'c', 'd'].map((id) => queue.dispatch(id));
    await vi.waitFor(() => expect(gates.size).toBe(2));
    expect([...gates.keys()]).toEqual(['a', 'b']);

    gates.get('a')?.resolve();
    await vi.waitFor(() => expect(gates.size).toBe(3));
    gates.get('b')?.resolve();
    gates.get('c')?.resolve();
    await vi.waitFor(() => expect(gates.size).toBe(4));
    gates.get('d')?.resolve();
    await Promise.all(runs);

    expect(peak).toBe(2);
    expect(queue.size).toBe(0);
  });

  it('logs a crashed worker and resolves', async () => {
    const logger = recordingLogger();
    const queue = new JobQueue(
      1,
      async () => {
        throw new Error('boom');
      },
      logger,
    );

    await expect(queue.dispatch('job-1')).resolves.toBeUndefined();

    expect(logger.error).toHaveBeenCalledWith('Job worker crashed', { jobId: 'job-1', error: 'boom' });
    expect(queue.isActive('job-1')).toBe(false);
  });

  it('drains every dispatched job', async () => {
    const finished: string[] = [];
    const queue = new JobQueue(
      1,
      async (jobId) => {
        await new Promise((resolve) => setTimeout(resolve, 1));
        finished.push(jobId);
      },
      recordingLogger(),
    );

    void queue.dispatch('a');
    void queue.dispatch('b');
    await queue.drain();

    expect(finished).toEqual(['a', 'b']);
    expect(queue.size).toBe(0);
  });
});
