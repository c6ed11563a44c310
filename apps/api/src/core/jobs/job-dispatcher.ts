import type { ZodType } from 'zod';

import { componentLogger } from '../logger/index.js';

export type JobMap = Record<string, object>;

export type JobHandler<TPayload> = (payload: TPayload) => Promise<void>;

/**
 * Fire-and-forget job delivery. Each enqueued job reaches its registered handler
 * outside the caller's request; retries and persistence belong to the implementation.
 */
export interface JobDispatcher<TJobs extends JobMap> {
  register<N extends keyof TJobs & string>(name: N, schema: ZodType<TJobs[N]>, handler: JobHandler<TJobs[N]>): void;
  enqueue<N extends keyof TJobs & string>(name: N, payload: TJobs[N]): Promise<void>;
  close(): Promise<void>;
}

type RawHandler = (payload: unknown) => Promise<void>;

/**
 * Handler table shared by the dispatchers. Payloads are parsed on the way in since
 * a queue hands back whatever was serialized.
 */
export class JobHandlerTable<TJobs extends JobMap> {
  private readonly handlers = new Map<string, RawHandler>();

  add<N extends keyof TJobs & string>(name: N, schema: ZodType<TJobs[N]>, handler: JobHandler<TJobs[N]>): void {
    if (this.handlers.has(name)) {
      throw new Error(`Job handler already registered: ${name}`);
    }
    this.handlers.set(name, (payload) => handler(schema.parse(payload)));
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  async run(name: string, payload: unknown): Promise<void> {
    const handler = this.handlers.get(name);
    if (!handler) {
      throw new Error(`No handler registered for job ${name}`);
    }
    await handler(payload);
  }
}

const log = componentLogger('jobs');

/**
 * Runs jobs on the next turn of the event loop in this process. Suitable for
 * single-instance deployments and tests; `drain()` waits for all queued work.
 */
export class InProcessJobDispatcher<TJobs extends JobMap> implements JobDispatcher<TJobs> {
  private readonly table = new JobHandlerTable<TJobs>();
  private readonly inFlight = new Set<Promise<void>>();
  private closed = false;

  register<N extends keyof TJobs & string>(name: N, schema: ZodType<TJobs[N]>, handler: JobHandler<TJobs[N]>): void {
    this.table.add(name, schema, handler);
  }

  async enqueue<N extends keyof TJobs & string>(name: N, payload: TJobs[N]): Promise<void> {
    if (this.closed) {
      throw new Error('Job dispatcher is closed');
    }
    if (!this.table.has(name)) {
      throw new Error(`No handler registered for job ${name}`);
    }

    const job: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.table.run(name, payload))
      .catch((error: unknown) => {
        log.error({ err: error, job: name }, 'Job failed');
      })
      .finally(() => {
        this.inFlight.delete(job);
      });

    this.inFlight.add(job);
    log.debug({ job: name }, 'Job enqueued');
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.drain();
  }
}
