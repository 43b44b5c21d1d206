import { AsyncLocalStorage } from 'node:async_hooks';
import { domainError, ErrorCode } from '../errors/taxonomy.js';

/**
 * Non-reentrant section around a ledger's mutating entry points.
 *
 * Calls from unrelated callers are not affected (they queue on the state
 * store); only a call made from inside a running guarded call, e.g. from a
 * token hook or a swap router callback, is rejected.
 */
export class ReentrancyGuard {
  private readonly context = new AsyncLocalStorage<string>();

  constructor(private readonly name: string) {}

  async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    const active = this.context.getStore();
    if (active !== undefined) {
      throw domainError(
        ErrorCode.ReentrantCall,
        `${this.name}.${operation} called while ${this.name}.${active} is in progress.`,
        { operation, active },
      );
    }
    return this.context.run(operation, work);
  }
}
