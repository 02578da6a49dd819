/**
 * Failure injection for in-memory collaborators
 */

export class FailureInjector<Op extends string> {
  private readonly scheduled: Map<Op, string[]> = new Map();
  private readonly sticky: Map<Op, string> = new Map();

  /**
   * Fail the next call of `op`
   */
  failNext(op: Op, message = `${op} failed`): void {
    const queue = this.scheduled.get(op) ?? [];
    queue.push(message);
    this.scheduled.set(op, queue);
  }

  /**
   * Fail every call of `op` until cleared
   */
  failAlways(op: Op, message = `${op} failed`): void {
    this.sticky.set(op, message);
  }

  clear(op?: Op): void {
    if (op) {
      this.scheduled.delete(op);
      this.sticky.delete(op);
      return;
    }
    this.scheduled.clear();
    this.sticky.clear();
  }

  check(op: Op): void {
    const sticky = this.sticky.get(op);
    if (sticky !== undefined) {
      throw new Error(sticky);
    }
    const queue = this.scheduled.get(op);
    const message = queue?.shift();
    if (message !== undefined) {
      throw new Error(message);
    }
  }
}
