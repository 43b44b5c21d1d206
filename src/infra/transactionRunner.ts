import { LedgerTx, openLedgerTx } from '../domain/ledger/ledgerTx.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { Address } from '../types.js';
import { ChainClock } from './clock.js';
import { eventBus, PendingEvent } from './eventBus.js';
import { EventLogger } from './logger.js';
import { ReentrancyGuard } from './reentrancyGuard.js';
import { StateStore } from './storage/stateStore.js';

/**
 * Runs guarded, all-or-nothing calls against the state store. Events queued
 * during a call are published and logged only once its draft has committed;
 * a failed call is logged at warn and rethrown.
 */
export class TransactionRunner {
  constructor(
    private readonly store: StateStore,
    private readonly logger: EventLogger,
    private readonly clock: ChainClock,
    private readonly guard: ReentrancyGuard,
  ) {}

  async run<T>(operation: string, actor: Address, work: (tx: LedgerTx) => Promise<T> | T): Promise<T> {
    return this.guard.run(operation, async () => {
      let outcome: { value: T; events: PendingEvent[] };
      try {
        outcome = await this.store.transaction(async (state) => {
          const tx = openLedgerTx(state, this.clock.currentBlock(), this.clock.now());
          const value = await work(tx);
          return { value, events: tx.events };
        });
      } catch (error) {
        await this.logger.log('warn', `${operation}.rejected`, {
          actor,
          code: error instanceof DomainError ? error.code : ErrorCode.InternalError,
          message: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }

      eventBus.emitAll(outcome.events);
      for (const event of outcome.events) {
        if (event.type === 'token.transfer') continue;
        await this.logger.log('info', event.type, { actor, ...event.data });
      }
      // results may point into the committed state
      return structuredClone(outcome.value);
    });
  }

  /** A throwaway transaction over a snapshot, for reads. */
  readTx(): LedgerTx {
    return openLedgerTx(this.store.snapshot(), this.clock.currentBlock(), this.clock.now());
  }
}
