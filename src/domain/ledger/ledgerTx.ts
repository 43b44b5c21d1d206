import { v4 as uuid } from 'uuid';
import { PendingEvent } from '../../infra/eventBus.js';
import { Address, AppState } from '../../types.js';
import { isoNow } from '../../utils/time.js';
import { TokenBank } from '../token/tokenBank.js';

/**
 * Everything a single ledger call works on: the state draft, the token bank
 * bound to it, the events to publish once the draft commits, and the block
 * and time the call executes at.
 */
export interface LedgerTx {
  state: AppState;
  bank: TokenBank;
  events: PendingEvent[];
  block: number;
  /** Unix seconds. */
  now: number;
}

export const openLedgerTx = (state: AppState, block: number, now: number): LedgerTx => {
  const events: PendingEvent[] = [];
  return {
    state,
    bank: new TokenBank(state, events),
    events,
    block,
    now,
  };
};

/** Appends an audit entry and queues the matching admin.updated event. */
export const recordAdminChange = (
  tx: LedgerTx,
  actor: Address,
  setting: string,
  oldValue: unknown,
  newValue: unknown,
): void => {
  tx.state.audit.push({
    id: uuid(),
    actor,
    setting,
    oldValue,
    newValue,
    block: tx.block,
    createdAt: isoNow(),
  });
  tx.events.push({ type: 'admin.updated', data: { actor, setting, oldValue, newValue } });
};
