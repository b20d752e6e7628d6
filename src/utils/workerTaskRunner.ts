import { Worker } from 'node:worker_threads';
import { DisposedError, InvalidArgumentError, TaskError, describeError } from '../errors';
import Logger from '../interfaces/logger';
import TaskRunner, { PureTask } from '../interfaces/taskRunner';
import { defaultSettings } from '../types';
import PrefixLogger from './prefixLogger';

// Runs inside each worker. Tasks arrive as source text and are compiled once per source.
const WORKER_SOURCE = `
const { parentPort } = require('node:worker_threads');
const compiled = new Map();
const describe = (error) => (error instanceof Error ? error.message : String(error));
const reply = (message) => {
    try {
        parentPort.postMessage(message);
    } catch (error) {
        parentPort.postMessage({ id: message.id, ok: false, message: 'Result could not be cloned: ' + describe(error) });
    }
};
parentPort.on('message', ({ id, source, input }) => {
    try {
        let task = compiled.get(source);
        if (!task) {
            task = (0, eval)('(' + source + ')');
            compiled.set(source, task);
        }
        Promise.resolve()
            .then(() => task(input))
            .then(
                (value) => reply({ id, ok: true, value }),
                (error) => reply({ id, ok: false, message: describe(error) }),
            );
    } catch (error) {
        reply({ id, ok: false, message: describe(error) });
    }
});
`;

type TaskReply<O> =
    | { id: number; ok: true; value: O }
    | { id: number; ok: false; message: string };

interface QueuedJob {
    id: number;
    start(slot: WorkerSlot): void;
    fail(error: Error): void;
}

interface WorkerSlot {
    worker: Worker;
    current: QueuedJob | undefined;
    lastError?: Error;
}

/**
 * Fixed-size pool of worker threads executing pure functions. Submissions never
 * block the caller: they queue in FIFO order and settle through the returned promise.
 */
export default class WorkerTaskRunner implements TaskRunner {
    private slots: WorkerSlot[] = [];
    private queue: QueuedJob[] = [];
    private nextId = 1;
    private disposed = false;
    private logger: Logger;

    constructor(logger: Logger, private poolSize: number = defaultSettings.workerPoolSize) {
        if (!Number.isInteger(poolSize) || poolSize < 1) {
            throw new InvalidArgumentError(`Worker pool size must be a positive integer (got ${poolSize})`);
        }
        this.logger = new PrefixLogger('WorkerTaskRunner', logger);
    }

    /** Number of tasks currently executing on a worker */
    get activeCount(): number {
        return this.slots.filter(s => s.current !== undefined).length;
    }

    get queueLength(): number {
        return this.queue.length;
    }

    run<I, O>(task: PureTask<I, O>, input: I): Promise<O> {
        if (this.disposed) {
            return Promise.reject(new DisposedError('WorkerTaskRunner'));
        }
        const source = task.toString();
        const id = this.nextId++;

        return new Promise<O>((resolve, reject) => {
            let detach = (): void => {};

            const job: QueuedJob = {
                id,
                start: slot => {
                    const onMessage = (reply: TaskReply<O>): void => {
                        if (reply.id !== id) return;
                        detach();
                        this.release(slot, job);
                        if (reply.ok) {
                            resolve(reply.value);
                        } else {
                            this.logger.warn(`Task #${id} failed: ${reply.message}`);
                            reject(new TaskError(`Task failed in worker: ${reply.message}`));
                        }
                        this.drain();
                    };
                    detach = () => slot.worker.off('message', onMessage);
                    slot.worker.on('message', onMessage);
                    try {
                        slot.worker.postMessage({ id, source, input });
                    } catch (error) {
                        detach();
                        this.release(slot, job);
                        reject(new TaskError(`Task input could not be sent to a worker: ${describeError(error)}`, { cause: error }));
                        this.drain();
                    }
                },
                fail: error => {
                    detach();
                    reject(error);
                },
            };

            this.queue.push(job);
            this.logger.debug(`Queued task #${id} (queue length ${this.queue.length})`);
            this.drain();
        });
    }

    async dispose(): Promise<void> {
        if (this.disposed) return;
        this.disposed = true;

        const queued = this.queue.splice(0);
        for (const job of queued) {
            job.fail(new DisposedError('WorkerTaskRunner'));
        }

        const slots = this.slots.splice(0);
        for (const slot of slots) {
            const job = slot.current;
            slot.current = undefined;
            job?.fail(new DisposedError('WorkerTaskRunner'));
        }
        await Promise.all(slots.map(slot => slot.worker.terminate()));
        this.logger.info(`Terminated ${slots.length} worker(s), cancelled ${queued.length} queued task(s)`);
    }

    private drain(): void {
        while (!this.disposed && this.queue.length > 0) {
            const slot = this.idleSlot();
            if (!slot) return;
            const job = this.queue.shift();
            if (!job) return;
            slot.current = job;
            job.start(slot);
        }
    }

    private idleSlot(): WorkerSlot | undefined {
        const idle = this.slots.find(s => s.current === undefined);
        if (idle) return idle;
        if (this.slots.length >= this.poolSize) return undefined;
        return this.spawn();
    }

    private spawn(): WorkerSlot {
        const worker = new Worker(WORKER_SOURCE, { eval: true });
        const slot: WorkerSlot = { worker, current: undefined };

        worker.on('error', error => {
            slot.lastError = error;
            this.logger.error('Worker crashed', error);
        });
        worker.on('exit', code => {
            this.slots = this.slots.filter(s => s !== slot);
            const job = slot.current;
            slot.current = undefined;
            if (job) {
                const reason = slot.lastError ? `: ${slot.lastError.message}` : '';
                job.fail(new TaskError(`Worker exited with code ${code} while running task #${job.id}${reason}`, { cause: slot.lastError }));
            }
            this.drain();
        });

        this.slots.push(slot);
        this.logger.debug(`Spawned worker ${this.slots.length}/${this.poolSize}`);
        return slot;
    }

    private release(slot: WorkerSlot, job: QueuedJob): void {
        if (slot.current === job) {
            slot.current = undefined;
        }
    }
}
