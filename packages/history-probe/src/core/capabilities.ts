import { Capability } from '../types.js';
import type { Evidence, Verdict } from '../types.js';
import type { ChainSource } from '../api/chain-source.js';
import type { ProbeContext } from './context.js';

export interface DirectProbe {
  readonly kind: 'direct';
  readonly capability: Capability;
  readonly test: (ctx: ProbeContext, block: number) => Promise<Verdict>;
}

/** A probe that can only be run against concrete data mined at the target height. */
export interface EvidenceProbe {
  readonly kind: 'evidence';
  readonly capability: Capability;
  readonly handleOf: (evidence: Evidence) => string | null;
  readonly test: (ctx: ProbeContext, evidence: Evidence) => Promise<Verdict>;
}

export type CapabilityProbe = DirectProbe | EvidenceProbe;

function toVerdict(probed: Verdict): Verdict {
  return probed.kind === 'available' ? { kind: 'available' } : probed;
}

export function createCapabilityProbe(capability: Capability, source: ChainSource): CapabilityProbe {
  switch (capability) {
    case Capability.BLOCK_RETENTION:
      return {
        kind: 'direct',
        capability,
        test: (ctx, block) => source.blockExists(ctx, block),
      };

    case Capability.RECEIPT_INDEX:
      return {
        kind: 'direct',
        capability,
        test: async (ctx, block) => toVerdict(await source.getReceiptsForBlock(ctx, block)),
      };

    case Capability.TX_INDEX:
      return {
        kind: 'evidence',
        capability,
        handleOf: (evidence) => evidence.txHash,
        test: async (ctx, evidence) => toVerdict(await source.getTransactionByHash(ctx, evidence.txHash)),
      };

    case Capability.ARCHIVAL_STATE:
      return {
        kind: 'evidence',
        capability,
        handleOf: (evidence) => evidence.sender,
        test: async (ctx, evidence) => {
          if (evidence.sender === null) {
            return { kind: 'indeterminate', detail: `No sender address for tx ${evidence.txHash}` };
          }
          return toVerdict(await source.getHistoricalState(ctx, evidence.sender, evidence.block));
        },
      };

    case Capability.LOG_INDEX:
      return {
        kind: 'evidence',
        capability,
        handleOf: (evidence) => evidence.blockHash,
        test: async (ctx, evidence) => toVerdict(await source.getLogsForBlockHash(ctx, evidence.blockHash)),
      };
  }
}
