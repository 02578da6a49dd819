/**
 * Unit of Work
 *
 * Journal of compensations for one engine operation. Every state mutation and
 * every collaborator effect registers its inverse; a failed operation replays
 * the journal in reverse so no partial effect stays observable.
 */

import { engineLogger as logger, logError } from "@curvefund/shared";

const uowLogger = logger.child({ component: "unit-of-work" });

type Compensation = () => void | Promise<void>;

export interface RollbackReport {
  operation: string;
  compensated: number;
  failures: Array<{ label: string; error: string }>;
}

export class UnitOfWork {
  readonly operation: string;
  private readonly journal: Array<{ label: string; undo: Compensation }> = [];
  private closed = false;

  constructor(operation: string) {
    this.operation = operation;
  }

  /**
   * Register the inverse of an effect that already happened
   */
  onRollback(label: string, undo: Compensation): void {
    if (this.closed) {
      throw new Error(`Unit of work ${this.operation} is already closed`);
    }
    this.journal.push({ label, undo });
  }

  /**
   * Assign a field and journal its previous value
   */
  set<T extends object, K extends keyof T>(target: T, key: K, value: T[K]): void {
    const previous = target[key];
    target[key] = value;
    this.onRollback(`restore ${String(key)}`, () => {
      target[key] = previous;
    });
  }

  get size(): number {
    return this.journal.length;
  }

  commit(): void {
    this.closed = true;
    this.journal.length = 0;
  }

  async rollback(): Promise<RollbackReport> {
    this.closed = true;
    const report: RollbackReport = {
      operation: this.operation,
      compensated: 0,
      failures: [],
    };

    while (this.journal.length > 0) {
      const entry = this.journal.pop();
      if (!entry) break;
      try {
        await entry.undo();
        report.compensated++;
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        report.failures.push({ label: entry.label, error: err.message });
        logError(err, { operation: this.operation, step: entry.label }, "Compensation failed");
      }
    }

    uowLogger.warn({
      operation: this.operation,
      compensated: report.compensated,
      failed: report.failures.length,
    }, "Operation rolled back");

    return report;
  }
}

/**
 * Run `fn` and roll every journaled effect back if it throws.
 * The original error is rethrown after compensation.
 */
export async function runAtomically<T>(
  operation: string,
  fn: (uow: UnitOfWork) => Promise<T>
): Promise<T> {
  const uow = new UnitOfWork(operation);
  try {
    const result = await fn(uow);
    uow.commit();
    return result;
  } catch (error) {
    await uow.rollback();
    throw error;
  }
}
