import pLimit from 'p-limit';
import type { BlockRange, BracketDerivation, SampleOutcome, SampleResult } from '../types.js';
import type { ProbeContext } from './context.js';
import { resolveAt } from './resolve.js';
import type { ProbeDeps } from './resolve.js';

export const SAMPLE_RADIUS = 50;

export interface SampleOptions {
  readonly concurrency: number;
}

async function sampleOne(
  deps: ProbeDeps,
  ctx: ProbeContext,
  sample: number,
  range: BlockRange,
): Promise<SampleOutcome> {
  if (sample > range.chainHead || sample < range.floor) {
    return { kind: 'skipped' };
  }

  const resolution = await resolveAt(deps, ctx, sample, SAMPLE_RADIUS, {
    lower: range.floor,
    upper: range.chainHead,
  });

  if (resolution.kind === 'no-evidence') {
    return { kind: 'no-qualifying-data', scannedFrom: resolution.scannedFrom, scannedTo: resolution.scannedTo };
  }
  return { kind: 'found', block: resolution.block, handle: resolution.handle, verdict: resolution.verdict };
}

/**
 * Probe every seed with at most `options.concurrency` in flight. Waits for the
 * whole batch; a failing task becomes an `error` outcome and never cancels its
 * siblings. Results come back sorted by sample height.
 */
export async function sampleAll(
  deps: ProbeDeps,
  ctx: ProbeContext,
  seeds: readonly number[],
  range: BlockRange,
  options: SampleOptions,
): Promise<SampleResult[]> {
  const limit = pLimit(Math.max(1, options.concurrency));

  const settled = await Promise.allSettled(
    seeds.map((sample) => limit(() => sampleOne(deps, ctx, sample, range))),
  );

  const results = settled.map((r, i): SampleResult => ({
    sample: seeds[i] ?? 0,
    outcome: r.status === 'fulfilled'
      ? r.value
      : { kind: 'error', message: r.reason instanceof Error ? r.reason.message : String(r.reason) },
  }));

  results.sort((a, b) => a.sample - b.sample);

  for (const result of results) {
    logSample(ctx, result);
  }

  return results;
}

function logSample(ctx: ProbeContext, { sample, outcome }: SampleResult): void {
  switch (outcome.kind) {
    case 'skipped':
      ctx.logger.debug({ sample }, 'Sample skipped (out of block range)');
      break;
    case 'no-qualifying-data':
      ctx.logger.debug(
        { sample, scannedFrom: outcome.scannedFrom, scannedTo: outcome.scannedTo },
        'No block with transactions in range',
      );
      break;
    case 'found':
      ctx.logger.debug(
        { sample, block: outcome.block, handle: outcome.handle, verdict: outcome.verdict.kind },
        'Sample probed',
      );
      break;
    case 'error':
      ctx.logger.warn({ sample, err: outcome.message }, 'Sample failed');
      break;
  }
}

/**
 * Derive a bracket from samples sorted ascending. Walking down from the
 * newest sample, the first confirmed failure is `failing` and the lowest
 * confirmed success above it is `working`; older samples are ignored.
 * Only `found` samples with a definite verdict count.
 *
 * `knownWorking` is a block already confirmed available above every sample
 * (typically the head check).
 */
export function deriveBracket(
  results: readonly SampleResult[],
  knownWorking: number | null = null,
): BracketDerivation {
  let working = knownWorking;

  for (let i = results.length - 1; i >= 0; i--) {
    const outcome = results[i]?.outcome;
    if (outcome === undefined || outcome.kind !== 'found') continue;

    if (outcome.verdict.kind === 'available') {
      working = working === null ? outcome.block : Math.min(working, outcome.block);
      continue;
    }

    if (outcome.verdict.kind === 'unavailable') {
      if (working === null) return { kind: 'no-working' };
      // An evidence block can land at or above the lowest success; ignore it
      if (outcome.block >= working) continue;
      return { kind: 'bracket', bracket: { failing: outcome.block, working } };
    }
  }

  return working === null ? { kind: 'no-working' } : { kind: 'all-available', lowestWorking: working };
}
