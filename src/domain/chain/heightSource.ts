import { isoNow } from '../../utils/time.js';

/** Height and wall time a command is processed at. */
export interface BlockContext {
  height: number;
  now: string;
}

export interface HeightSource {
  current(): number;
}

/**
 * Derives block height from elapsed time since genesis. Used by the server;
 * the domain itself only ever compares heights.
 */
export class ClockHeightSource implements HeightSource {
  private readonly genesisMs: number;

  constructor(genesisTime: string, private readonly blockTimeMs: number) {
    const parsed = Date.parse(genesisTime);
    this.genesisMs = Number.isFinite(parsed) ? parsed : Date.now();
  }

  current(): number {
    const elapsed = Date.now() - this.genesisMs;
    if (elapsed <= 0 || this.blockTimeMs <= 0) return 0;
    return Math.floor(elapsed / this.blockTimeMs);
  }
}

/** Height source advanced by hand. */
export class ManualHeightSource implements HeightSource {
  constructor(private height = 0) {}

  current(): number {
    return this.height;
  }

  advance(blocks = 1): number {
    this.height += blocks;
    return this.height;
  }

  set(height: number): void {
    this.height = height;
  }
}

export interface CommandContext extends BlockContext {
  sequence: number;
}

/**
 * Stamp a command with its position in the total order. Height never goes
 * backwards even if the source does.
 */
export const enterBlock = (chain: { sequence: number; lastHeight: number }, source: HeightSource): CommandContext => {
  const height = Math.max(source.current(), chain.lastHeight);
  chain.lastHeight = height;
  chain.sequence += 1;
  return { height, now: isoNow(), sequence: chain.sequence };
};
