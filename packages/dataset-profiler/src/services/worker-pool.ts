/**
 * Process pool for profiling datasets in parallel
 *
 * better-sqlite3 blocks the thread it runs on, so datasets are spread over
 * forked Node processes, one dataset per process at a time. Tasks queue
 * until a process is idle; a process that dies fails its current task and
 * is replaced on the next dispatch.
 */

import { fork, type ChildProcess } from 'node:child_process';
import { createRequire } from 'node:module';
import { extname } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { describeCause } from '../core/errors.js';
import { ProfileTaskResultSchema, type ProfileTask, type ProfileTaskResult } from './profile-task.js';

const MODULE_EXTENSION = extname(fileURLToPath(import.meta.url));
const WORKER_ENTRY = fileURLToPath(new URL(`./profile-worker${MODULE_EXTENSION}`, import.meta.url));

function workerExecArgv(): string[] {
  // Sources run under the tsx loader; a compiled build runs as is
  if (MODULE_EXTENSION !== '.ts') {
    return [];
  }
  const loader = createRequire(import.meta.url).resolve('tsx');
  return ['--import', pathToFileURL(loader).href];
}

interface PendingTask {
  readonly task: ProfileTask;
  readonly resolve: (result: ProfileTaskResult) => void;
  readonly reject: (error: Error) => void;
}

export class ProfileWorkerPool {
  private readonly workers = new Set<ChildProcess>();
  private readonly idle: ChildProcess[] = [];
  private readonly busy = new Map<ChildProcess, PendingTask>();
  private readonly queue: PendingTask[] = [];
  private closed = false;

  constructor(private readonly maxWorkers: number) {
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new RangeError(`Worker count must be a positive integer, got ${maxWorkers}`);
    }
  }

  get size(): number {
    return this.workers.size;
  }

  run(task: ProfileTask): Promise<ProfileTaskResult> {
    if (this.closed) {
      return Promise.reject(new Error('Worker pool is closed'));
    }
    return new Promise<ProfileTaskResult>((resolve, reject) => {
      this.queue.push({ task, resolve, reject });
      this.dispatch();
    });
  }

  /**
   * Fail queued tasks and wait for every process to exit
   */
  async close(): Promise<void> {
    this.closed = true;
    const closing = new Error('Worker pool closed');
    for (const pending of this.queue.splice(0)) {
      pending.reject(closing);
    }
    for (const pending of this.busy.values()) {
      pending.reject(closing);
    }
    this.busy.clear();
    this.idle.length = 0;

    const workers = [...this.workers];
    this.workers.clear();
    await Promise.all(workers.map(stopWorker));
  }

  private dispatch(): void {
    while (this.queue.length > 0) {
      const worker = this.idle.pop() ?? (this.workers.size < this.maxWorkers ? this.spawn() : undefined);
      if (!worker) {
        return;
      }
      const pending = this.queue.shift();
      if (!pending) {
        this.idle.push(worker);
        return;
      }
      this.busy.set(worker, pending);
      worker.send(pending.task, (error) => {
        if (error) {
          this.retire(worker, error);
        }
      });
    }
  }

  private spawn(): ChildProcess {
    const worker = fork(WORKER_ENTRY, [], { execArgv: workerExecArgv(), serialization: 'advanced' });
    this.workers.add(worker);
    worker.on('message', (message) => this.settle(worker, message));
    worker.once('error', (error) => this.retire(worker, error));
    worker.once('exit', (code, signal) =>
      this.retire(worker, new Error(`Profile worker exited with ${signal ?? `code ${code ?? 'unknown'}`}`))
    );
    return worker;
  }

  private settle(worker: ChildProcess, message: unknown): void {
    const pending = this.busy.get(worker);
    if (!pending) {
      return;
    }
    this.busy.delete(worker);

    const parsed = ProfileTaskResultSchema.safeParse(message);
    if (parsed.success) {
      pending.resolve(parsed.data);
    } else {
      pending.reject(new Error(`Malformed reply from profile worker: ${describeCause(parsed.error)}`));
    }

    this.idle.push(worker);
    this.dispatch();
  }

  private retire(worker: ChildProcess, error: Error): void {
    if (!this.workers.delete(worker)) {
      return;
    }
    const index = this.idle.indexOf(worker);
    if (index !== -1) {
      this.idle.splice(index, 1);
    }
    const pending = this.busy.get(worker);
    this.busy.delete(worker);
    pending?.reject(error);

    if (worker.exitCode === null && worker.signalCode === null) {
      worker.kill();
    }
    if (!this.closed) {
      this.dispatch();
    }
  }
}

function stopWorker(worker: ChildProcess): Promise<void> {
  if (worker.exitCode !== null || worker.signalCode !== null) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve) => {
    worker.once('exit', () => resolve());
    // The worker exits on its own once the IPC channel is gone
    if (worker.connected) {
      worker.disconnect();
    } else {
      worker.kill();
    }
  });
}
