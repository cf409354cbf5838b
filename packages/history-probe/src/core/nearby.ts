import type { ChainSource } from '../api/chain-source.js';
import type { Evidence } from '../types.js';
import type { ProbeContext } from './context.js';

export interface ScanBounds {
  readonly lower: number;
  readonly upper: number;
}

async function evidenceAt(source: ChainSource, ctx: ProbeContext, block: number): Promise<Evidence | null> {
  const probed = await source.getBlockHandle(ctx, block);
  if (probed.kind !== 'available') return null;

  const tx = probed.value.transactions[0];
  if (tx === undefined) return null;

  return {
    block: probed.value.number,
    blockHash: probed.value.hash,
    txHash: tx.hash,
    sender: tx.from,
  };
}

/**
 * Find the block nearest to `center` that holds at least one transaction.
 * Walks back from `center` to `center - radius` first, then forward to
 * `center + radius`, all clipped to `bounds`. A backward hit always wins.
 */
export async function findQualifyingBlock(
  source: ChainSource,
  ctx: ProbeContext,
  center: number,
  radius: number,
  bounds: ScanBounds,
): Promise<Evidence | null> {
  if (center < 1) return null;

  const lower = Math.max(1, bounds.lower);
  const start = Math.min(center, bounds.upper);

  for (let block = start; block >= Math.max(lower, center - radius); block--) {
    const found = await evidenceAt(source, ctx, block);
    if (found !== null) return found;
  }

  for (let block = Math.max(center + 1, lower); block <= Math.min(bounds.upper, center + radius); block++) {
    const found = await evidenceAt(source, ctx, block);
    if (found !== null) return found;
  }

  return null;
}
