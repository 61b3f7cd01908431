import { AsyncLocalStorage } from "node:async_hooks";
import type { Logger } from "@switchyard/schemas";
import { errorMessage, silentLogger } from "@switchyard/journal";

const executorScope = new AsyncLocalStorage<string>();

/** Id of the executor whose task is currently running, if any. */
export function currentExecutorId(): string | undefined {
  return executorScope.getStore();
}

export type ExecutorTask = () => void | Promise<void>;

/**
 * A single-consumer task loop with a known identity. Work posted from other
 * executors lands in the mailbox and runs on this executor's own turn, one
 * task at a time, in posting order.
 */
export class Executor {
  readonly id: string;
  private mailbox: ExecutorTask[] = [];
  private draining = false;
  private idleWaiters: Array<() => void> = [];
  private logger: Logger;

  constructor(id: string, logger: Logger = silentLogger) {
    this.id = id;
    this.logger = logger;
  }

  /** Runs `fn` as this executor's task; `currentExecutorId()` reports this id inside it. */
  run<T>(fn: () => T): T {
    return executorScope.run(this.id, fn);
  }

  post(task: ExecutorTask): void {
    this.mailbox.push(task);
    if (this.draining) return;
    this.draining = true;
    setImmediate(() => {
      this.run(() => this.drain()).catch((err: unknown) => {
        this.logger.error("executor mailbox drain failed", { executor: this.id, error: errorMessage(err) });
      });
    });
  }

  pending(): number {
    return this.mailbox.length;
  }

  /** Resolves once the mailbox is empty. */
  idle(): Promise<void> {
    if (!this.draining && this.mailbox.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private async drain(): Promise<void> {
    for (let task = this.mailbox.shift(); task !== undefined; task = this.mailbox.shift()) {
      try {
        await task();
      } catch (err) {
        this.logger.error("executor task failed", { executor: this.id, error: errorMessage(err) });
      }
    }
    this.draining = false;
    const waiters = this.idleWaiters.splice(0);
    for (const resolve of waiters) resolve();
  }
}

export interface RoutableEvent {
  /** Executor the event must be handled on. */
  target: string;
}

export type RoutedHandler<E> = (event: E) => void | Promise<void>;

/**
 * Delivers events on their target executor. A producer that already is the
 * target calls the handler in place; any other producer goes through the
 * target's mailbox. The mailbox is never used from the target itself.
 */
export class EventRouter<E extends RoutableEvent> {
  private targets = new Map<string, { executor: Executor; handler: RoutedHandler<E> }>();
  private counts = { direct: 0, posted: 0 };

  register(executor: Executor, handler: RoutedHandler<E>): () => void {
    if (this.targets.has(executor.id)) {
      throw new Error(`Executor "${executor.id}" is already registered`);
    }
    this.targets.set(executor.id, { executor, handler });
    return () => {
      this.targets.delete(executor.id);
    };
  }

  async route(event: E, producer: string | undefined = currentExecutorId()): Promise<void> {
    const target = this.targets.get(event.target);
    if (!target) throw new Error(`No executor registered for "${event.target}"`);
    if (producer === target.executor.id) {
      this.counts.direct++;
      await target.handler(event);
      return;
    }
    this.counts.posted++;
    target.executor.post(() => target.handler(event));
  }

  stats(): { direct: number; posted: number } {
    return { ...this.counts };
  }
}
