import type { BlockRange, CapabilityOutcome, Verdict } from '../types.js';
import type { ProbeContext } from './context.js';
import { findBoundary } from './boundary-search.js';
import { resolveAt } from './resolve.js';
import type { ProbeDeps } from './resolve.js';
import { deriveBracket, sampleAll } from './sampler.js';
import { generateSeeds } from './seeds.js';

/** Evidence search radius for the head check, wide enough to get past empty blocks. */
export const HEAD_RADIUS = 500;

/**
 * Heuristic: with block 1 retained and the lowest working sample this close
 * to genesis, report full history instead of searching. A narrow pruning
 * window inside the first blocks would be misreported as full.
 */
export const FULL_HISTORY_THRESHOLD = 1000;

export interface PipelineOptions {
  readonly concurrency: number;
  readonly seeds?: readonly number[];
}

export function seedsFor(range: BlockRange): number[] {
  const seeds = generateSeeds(range.chainHead);
  if (range.floor > 1 && range.floor <= range.chainHead && !seeds.includes(range.floor)) {
    seeds.push(range.floor);
    seeds.sort((a, b) => a - b);
  }
  return seeds;
}

function headFailure(verdict: Exclude<Verdict, { kind: 'available' }>): CapabilityOutcome {
  if (verdict.kind === 'indeterminate') {
    return { status: 'unknown', reason: 'indeterminate' };
  }
  return {
    status: 'unknown',
    reason: verdict.cause === 'remote-error' ? 'unsupported' : 'unavailable-at-head',
  };
}

/**
 * Locate one capability's boundary: check the head, sample the seeds in
 * parallel, then binary-search the bracket they leave.
 */
export async function runCapability(
  deps: ProbeDeps,
  ctx: ProbeContext,
  range: BlockRange,
  options: PipelineOptions,
): Promise<CapabilityOutcome> {
  const approximate = deps.probe.kind === 'evidence';

  const head = await resolveAt(deps, ctx, range.chainHead, HEAD_RADIUS, {
    lower: range.floor,
    upper: range.chainHead,
  });

  if (head.kind === 'no-evidence') {
    ctx.logger.warn({ scannedFrom: head.scannedFrom, scannedTo: head.scannedTo }, 'Could not find block with transactions to test');
    return { status: 'unknown', reason: 'no-evidence' };
  }

  if (head.verdict.kind !== 'available') {
    const outcome = headFailure(head.verdict);
    ctx.logger.warn({ block: head.block, verdict: head.verdict }, 'Capability fails at chain head, skipping search');
    return outcome;
  }

  ctx.logger.debug({ block: head.block, handle: head.handle }, 'Capability works at chain head');

  const seeds = options.seeds ?? seedsFor(range);
  const results = await sampleAll(deps, ctx, seeds, range, { concurrency: options.concurrency });
  const derivation = deriveBracket(results, head.block);

  switch (derivation.kind) {
    case 'no-working':
      return { status: 'unknown', reason: 'indeterminate' };

    case 'all-available': {
      const { lowestWorking } = derivation;
      if (lowestWorking === 1 || (range.floor === 1 && lowestWorking <= FULL_HISTORY_THRESHOLD)) {
        return { status: 'full' };
      }
      return { status: 'boundary', boundary: lowestWorking, approximate: true };
    }

    case 'bracket': {
      const { boundary, probes } = await findBoundary(deps, ctx, derivation.bracket, range.chainHead);
      ctx.logger.debug({ bracket: derivation.bracket, boundary, probes }, 'Boundary located');
      return boundary <= 1 ? { status: 'full' } : { status: 'boundary', boundary, approximate };
    }
  }
}
