import type {
  Capability,
  CapabilityOutcome,
  CapabilityReport,
  HistoryReport,
  NodeInfo,
} from '../types.js';

export interface CapabilityRun {
  readonly capability: Capability;
  readonly outcome: CapabilityOutcome;
  readonly roundTrips: number;
}

export interface ReportInput {
  readonly chainHead: number;
  readonly node: NodeInfo;
  readonly runs: readonly CapabilityRun[];
  /** Calls made outside any capability pipeline (head, node info). */
  readonly baseRoundTrips: number;
  readonly durationMs: number;
}

export function buildReport(input: ReportInput): HistoryReport {
  const capabilities: Partial<Record<Capability, CapabilityReport>> = {};
  let totalRoundTrips = input.baseRoundTrips;

  for (const run of input.runs) {
    capabilities[run.capability] = { outcome: run.outcome, roundTrips: run.roundTrips };
    totalRoundTrips += run.roundTrips;
  }

  return {
    chainHead: input.chainHead,
    node: input.node,
    capabilities,
    totalRoundTrips,
    durationMs: input.durationMs,
  };
}

const LABELS: Readonly<Record<Capability, string>> = {
  blockRetention: 'Block history',
  txIndex: 'Tx indexer',
  archivalState: 'Archival state',
  logIndex: 'Log index',
  receiptIndex: 'Block receipts',
};

const UNKNOWN_TEXT: Readonly<Record<Extract<CapabilityOutcome, { status: 'unknown' }>['reason'], string>> = {
  'unsupported': 'N/A (method not supported)',
  'unavailable-at-head': 'N/A (fails even at chain head)',
  'no-evidence': 'N/A (no block with transactions near head)',
  'indeterminate': 'N/A (could not verify)',
};

export function describeOutcome(capability: Capability, outcome: CapabilityOutcome, chainHead: number): string {
  const label = LABELS[capability];
  switch (outcome.status) {
    case 'full':
      return `${label}: FULL (from block 1)`;
    case 'unknown':
      return `${label}: ${UNKNOWN_TEXT[outcome.reason]}`;
    case 'boundary': {
      const marker = outcome.approximate ? '~' : '';
      const retained = (chainHead - outcome.boundary + 1).toLocaleString('en-US');
      return `${label}: partial, from block ${marker}${outcome.boundary} (${retained} blocks)`;
    }
  }
}
