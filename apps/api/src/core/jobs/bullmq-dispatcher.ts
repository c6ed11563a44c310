import { Queue, Worker, type Job } from 'bullmq';
import type { Redis } from 'ioredis';
import type { ZodType } from 'zod';

import { componentLogger } from '../logger/index.js';
import { JobHandlerTable, type JobDispatcher, type JobHandler, type JobMap } from './job-dispatcher.js';

const log = componentLogger('jobs');

export interface BullMqDispatcherOptions {
  queueName?: string;
  concurrency?: number;
}

/**
 * Redis-backed delivery through BullMQ. Owns the connection it is given. Jobs get a single attempt: a failed
 * provisioning is surfaced as account state, and re-enqueueing is an operator action.
 */
export class BullMqJobDispatcher<TJobs extends JobMap> implements JobDispatcher<TJobs> {
  private readonly table = new JobHandlerTable<TJobs>();
  private readonly queue: Queue;
  private worker: Worker | null = null;

  constructor(
    private readonly connection: Redis,
    private readonly options: BullMqDispatcherOptions = {},
  ) {
    this.queue = new Queue(this.queueName, {
      connection,
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: { age: 24 * 60 * 60, count: 1000 },
        removeOnFail: false,
      },
    });

    this.queue.on('error', (error: Error) => {
      log.error({ err: error, queue: this.queueName }, 'Queue error');
    });
  }

  private get queueName(): string {
    return this.options.queueName ?? 'email-accounts';
  }

  register<N extends keyof TJobs & string>(name: N, schema: ZodType<TJobs[N]>, handler: JobHandler<TJobs[N]>): void {
    this.table.add(name, schema, handler);
    this.startWorker();
  }

  async enqueue<N extends keyof TJobs & string>(name: N, payload: TJobs[N]): Promise<void> {
    const job = await this.queue.add(name, payload);
    log.debug({ job: name, jobId: job.id }, 'Job enqueued');
  }

  private startWorker(): void {
    if (this.worker) {
      return;
    }

    this.worker = new Worker(
      this.queueName,
      async (job: Job<unknown>) => {
        await this.table.run(job.name, job.data);
      },
      {
        connection: this.connection,
        concurrency: this.options.concurrency ?? 5,
        lockDuration: 60_000,
      },
    );

    this.worker.on('failed', (job: Job | undefined, error: Error) => {
      log.error({ err: error, job: job?.name, jobId: job?.id }, 'Job failed');
    });
    this.worker.on('error', (error: Error) => {
      log.error({ err: error }, 'Worker error');
    });
  }

  async close(): Promise<void> {
    await this.worker?.close();
    await this.queue.close();
    await this.connection.quit();
  }
}
