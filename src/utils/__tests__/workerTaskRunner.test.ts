import { describe, expect, it, beforeEach, afterEach, jest } from '@jest/globals';
import WorkerTaskRunner from '../workerTaskRunner';
import { computeHeavyTask } from '../heavyComputation';
import { DisposedError, InvalidArgumentError, TaskError } from '../../errors';
import { createMockLogger } from '../../__tests__/helpers';

jest.setTimeout(20_000);

describe('WorkerTaskRunner', () => {
    let runner: WorkerTaskRunner;

    beforeEach(() => {
        runner = new WorkerTaskRunner(createMockLogger(), 2);
    });

    afterEach(async () => {
        await runner.dispose();
    });

    it('should resolve with the result computed on a worker', async () => {
        const result = await runner.run((n: number) => n * 2, 21);
        expect(result).toBe(42);
    });

    it('should return before the task has run', async () => {
        let returned = false;
        const pending = runner.run((n: number) => n + 1, 1).then(value => {
            expect(returned).toBe(true);
            return value;
        });
        returned = true;
        await expect(pending).resolves.toBe(2);
    });

    it('should await tasks that return a promise', async () => {
        const result = await runner.run(async (words: string[]) => words.join(' '), ['off', 'the', 'main', 'thread']);
        expect(result).toBe('off the main thread');
    });

    it('should copy input and output instead of sharing them', async () => {
        const input = { values: [1, 2, 3] };
        const output = await runner.run((data: { values: number[] }) => {
            data.values.push(4);
            return data;
        }, input);

        expect(input.values).toEqual([1, 2, 3]);
        expect(output.values).toEqual([1, 2, 3, 4]);
    });

    it('should run more tasks than workers and keep every result', async () => {
        const results = await Promise.all(
            [1, 2, 3, 4, 5].map(n => runner.run((x: number) => x * x, n))
        );
        expect(results).toEqual([1, 4, 9, 16, 25]);
        expect(runner.activeCount).toBe(0);
        expect(runner.queueLength).toBe(0);
    });

    it('should queue submissions beyond the pool size', async () => {
        const tasks = [1, 2, 3].map(n => runner.run((x: number) => x, n));
        expect(runner.activeCount).toBe(2);
        expect(runner.queueLength).toBe(1);
        await Promise.all(tasks);
    });

    it('should reject with a TaskError when the task throws, and keep working', async () => {
        await expect(runner.run((_: number) => { throw new Error('bad input'); }, 1))
            .rejects.toThrow('Task failed in worker: bad input');
        await expect(runner.run((n: number) => n - 1, 1)).resolves.toBe(0);
    });

    it('should reject with a TaskError when the input cannot be cloned', async () => {
        await expect(runner.run((f: () => number) => typeof f, () => 1)).rejects.toBeInstanceOf(TaskError);
    });

    it('should run the heavy computation off the calling thread', async () => {
        const offloaded = await runner.run(computeHeavyTask, 2);
        expect(offloaded).toEqual(computeHeavyTask(2));
        expect(offloaded).toHaveLength(2);
    });

    it('should reject queued and new tasks after dispose', async () => {
        const tasks = [1, 2, 3].map(n => runner.run((x: number) => x, n));
        await runner.dispose();

        const outcomes = await Promise.allSettled(tasks);
        for (const outcome of outcomes) {
            expect(outcome.status).toBe('rejected');
            if (outcome.status === 'rejected') {
                expect(outcome.reason).toBeInstanceOf(DisposedError);
            }
        }
        await expect(runner.run((x: number) => x, 1)).rejects.toBeInstanceOf(DisposedError);
        await expect(runner.dispose()).resolves.toBeUndefined();
    });

    it('should fail the running task when its worker exits and replace the worker', async () => {
        const single = new WorkerTaskRunner(createMockLogger(), 1);
        try {
            const crashing = single.run((_: number) => { process.exit(3); }, 1);
            const queued = single.run((n: number) => n * 2, 1);

            await expect(crashing).rejects.toBeInstanceOf(TaskError);
            await expect(queued).resolves.toBe(2);
        } finally {
            await single.dispose();
        }
    });

    it('should reject an invalid pool size', () => {
        expect(() => new WorkerTaskRunner(createMockLogger(), 0)).toThrow(InvalidArgumentError);
    });
});
