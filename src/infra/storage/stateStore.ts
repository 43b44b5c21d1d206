import fs from 'node:fs/promises';
import path from 'node:path';
import { AppState } from '../../types.js';
import { parseState, stringifyState } from '../../utils/json.js';
import { ReentrancyGuard } from '../reentrancyGuard.js';

const isObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
);

/**
 * Merges a persisted state over the genesis state so files written by older
 * builds pick up sections they did not have yet.
 */
const normalizeState = (raw: unknown, genesis: AppState): AppState => {
  if (!isObject(raw)) return genesis;

  const merge = <T>(fallback: T, value: unknown): T => {
    if (!isObject(fallback) || !isObject(value)) {
      return value === undefined ? fallback : value as T;
    }
    const merged: Record<string, unknown> = { ...fallback };
    for (const [key, entry] of Object.entries(value)) {
      merged[key] = merge(fallback[key], entry);
    }
    return merged as T;
  };

  return merge(genesis, raw);
};

export class StateStore {
  private state: AppState;
  private lock: Promise<void> = Promise.resolve();
  private readonly guard = new ReentrancyGuard('state');

  constructor(
    private readonly stateFilePath: string,
    private readonly genesis: () => AppState,
  ) {
    this.state = genesis();
  }

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    let raw: string | undefined;
    try {
      raw = await fs.readFile(this.stateFilePath, 'utf-8');
    } catch {
      raw = undefined;
    }

    if (raw === undefined) {
      this.state = this.genesis();
      await this.persist(this.state);
      return;
    }

    this.state = normalizeState(parseState(raw), this.genesis());
  }

  snapshot(): AppState {
    return structuredClone(this.state);
  }

  /**
   * Runs `work` against a draft copy of the state. The draft replaces the
   * live state only once `work` resolves and the draft is on disk; a throw
   * from either discards every change it made.
   * Calls are serialized: the next transaction starts after this one settles.
   * Opening a transaction from inside another one is rejected.
   */
  async transaction<T>(work: (state: AppState) => Promise<T> | T): Promise<T> {
    return this.guard.run('transaction', () => this.serialized(work));
  }

  private async serialized<T>(work: (state: AppState) => Promise<T> | T): Promise<T> {
    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const draft = structuredClone(this.state);
      let result: T;
      try {
        result = await work(draft);
        draft.metrics.transactionsCommitted += 1;
        await this.persist(draft);
      } catch (error) {
        this.state.metrics.transactionsReverted += 1;
        throw error;
      }
      this.state = draft;
      return result;
    } finally {
      release();
    }
  }

  async flush(): Promise<void> {
    await this.lock;
    await this.persist(this.state);
  }

  private async persist(state: AppState): Promise<void> {
    await fs.writeFile(this.stateFilePath, stringifyState(state));
  }
}
