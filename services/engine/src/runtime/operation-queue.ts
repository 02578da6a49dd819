/**
 * Operation Queue
 *
 * Serialises every mutating engine operation so each one commits or rolls back
 * before the next starts. A call made from inside a running operation (for
 * example from a collaborator callback) is reentrant and is rejected before it
 * runs.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import PQueue from "p-queue";
import { engineLogger as logger, StateError } from "@curvefund/shared";

const queueLogger = logger.child({ component: "operation-queue" });

export class OperationQueue {
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly context = new AsyncLocalStorage<string>();

  async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const outer = this.context.getStore();
    if (outer !== undefined) {
      queueLogger.warn({ operation, outer }, "Reentrant operation rejected");
      throw new StateError(`${operation} cannot run inside ${outer}`, "reentrant");
    }

    return this.queue.add(() => this.context.run(operation, fn), { throwOnTimeout: true });
  }

  /**
   * Name of the operation running in the current async context, if any
   */
  current(): string | undefined {
    return this.context.getStore();
  }

  get pending(): number {
    return this.queue.size + this.queue.pending;
  }

  async onIdle(): Promise<void> {
    await this.queue.onIdle();
  }
}
