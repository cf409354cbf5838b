import type { Bracket } from '../types.js';
import type { ProbeContext } from './context.js';
import { resolveAt } from './resolve.js';
import type { ProbeDeps } from './resolve.js';

export const REFINE_RADIUS = 20;

export interface SearchResult {
  readonly boundary: number;
  readonly probes: number;
}

/**
 * Binary search for the lowest working block inside `bracket`, assuming the
 * capability only ever degrades with age. An indeterminate probe is counted
 * as a failure here, which can only move the reported boundary up.
 */
export async function findBoundary(
  deps: ProbeDeps,
  ctx: ProbeContext,
  bracket: Bracket,
  chainHead: number,
): Promise<SearchResult> {
  if (bracket.failing >= bracket.working) {
    return { boundary: bracket.working, probes: 0 };
  }

  let low = bracket.failing;
  let high = Math.min(bracket.working, chainHead);
  let probes = 0;

  ctx.logger.debug({ failing: low, working: high }, 'Binary search for boundary');

  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    probes++;

    const resolution = await resolveAt(deps, ctx, mid, REFINE_RADIUS, { lower: low, upper: high });
    if (resolution.kind === 'no-evidence') {
      // Nothing to test near mid; treat the gap as unusable history
      low = mid + 1;
      continue;
    }

    const { block, verdict } = resolution;
    if (verdict.kind === 'indeterminate') {
      ctx.logger.warn({ block, detail: verdict.detail }, 'Indeterminate probe during search, counting as unavailable');
    }

    if (verdict.kind === 'available') {
      // Evidence at or past `high` says nothing new about [mid, high)
      if (block < high) {
        high = Math.max(block, low);
      } else {
        low = mid + 1;
      }
    } else {
      low = block >= mid ? Math.min(block + 1, high) : mid + 1;
    }
  }

  return { boundary: low, probes };
}
