import type { ChainSource } from '../api/chain-source.js';
import type { Verdict } from '../types.js';
import type { CapabilityProbe } from './capabilities.js';
import type { ProbeContext } from './context.js';
import { findQualifyingBlock } from './nearby.js';
import type { ScanBounds } from './nearby.js';

export type Resolution =
  | { readonly kind: 'tested'; readonly block: number; readonly handle: string | null; readonly verdict: Verdict }
  | { readonly kind: 'no-evidence'; readonly scannedFrom: number; readonly scannedTo: number };

export interface ProbeDeps {
  readonly source: ChainSource;
  readonly probe: CapabilityProbe;
}

/**
 * Run a capability probe at `block`. Evidence probes first look for a
 * qualifying block within `radius`, so the tested block may differ from the
 * requested one.
 */
export async function resolveAt(
  deps: ProbeDeps,
  ctx: ProbeContext,
  block: number,
  radius: number,
  bounds: ScanBounds,
): Promise<Resolution> {
  const { source, probe } = deps;

  if (probe.kind === 'direct') {
    return { kind: 'tested', block, handle: null, verdict: await probe.test(ctx, block) };
  }

  const evidence = await findQualifyingBlock(source, ctx, block, radius, bounds);
  if (evidence === null) {
    return {
      kind: 'no-evidence',
      scannedFrom: Math.max(1, bounds.lower, block - radius),
      scannedTo: Math.min(bounds.upper, block + radius),
    };
  }

  return {
    kind: 'tested',
    block: evidence.block,
    handle: probe.handleOf(evidence),
    verdict: await probe.test(ctx, evidence),
  };
}
