import { unixNow } from '../utils/time.js';

/** Block height and wall time as seen by the ledger. */
export interface ChainClock {
  currentBlock(): number;
  /** Unix seconds. */
  now(): number;
}

/**
 * Derives block height from wall time: one block every `blockTimeSeconds`
 * since `genesisUnix` (process start when 0).
 */
export class SystemClock implements ChainClock {
  private readonly genesisUnix: number;

  constructor(private readonly blockTimeSeconds: number, genesisUnix = 0) {
    this.genesisUnix = genesisUnix > 0 ? genesisUnix : unixNow();
  }

  currentBlock(): number {
    return Math.max(1, Math.floor((unixNow() - this.genesisUnix) / this.blockTimeSeconds) + 1);
  }

  now(): number {
    return unixNow();
  }
}

/** Clock advanced by hand; used by tests and simulations. */
export class ManualClock implements ChainClock {
  constructor(
    private block = 1,
    private timestamp = 1_700_000_000,
    private readonly secondsPerBlock = 12,
  ) {}

  currentBlock(): number {
    return this.block;
  }

  now(): number {
    return this.timestamp;
  }

  advanceBlocks(blocks: number): void {
    this.block += blocks;
    this.timestamp += blocks * this.secondsPerBlock;
  }

  advanceSeconds(seconds: number): void {
    this.timestamp += seconds;
  }
}
