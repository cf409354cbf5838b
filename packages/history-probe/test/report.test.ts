import { describe, it, expect } from 'vitest';
import { buildReport, describeOutcome } from '../src/core/report.js';
import { Capability } from '../src/types.js';

describe('buildReport', () => {
  it('keys outcomes by capability and totals round trips', () => {
    const report = buildReport({
      chainHead: 1000,
      node: { chainId: 1, sync: null },
      runs: [
        { capability: Capability.BLOCK_RETENTION, outcome: { status: 'full' }, roundTrips: 40 },
        { capability: Capability.RECEIPT_INDEX, outcome: { status: 'unknown', reason: 'unsupported' }, roundTrips: 1 },
      ],
      baseRoundTrips: 3,
      durationMs: 12,
    });

    expect(report).toEqual({
      chainHead: 1000,
      node: { chainId: 1, sync: null },
      capabilities: {
        blockRetention: { outcome: { status: 'full' }, roundTrips: 40 },
        receiptIndex: { outcome: { status: 'unknown', reason: 'unsupported' }, roundTrips: 1 },
      },
      totalRoundTrips: 44,
      durationMs: 12,
    });
  });
});

describe('describeOutcome', () => {
  it('describes full history', () => {
    expect(describeOutcome(Capability.BLOCK_RETENTION, { status: 'full' }, 500)).toBe(
      'Block history: FULL (from block 1)',
    );
  });

  it('describes an exact boundary with the retained block count', () => {
    expect(
      describeOutcome(Capability.RECEIPT_INDEX, { status: 'boundary', boundary: 180_000, approximate: false }, 300_000),
    ).toBe('Block receipts: partial, from block 180000 (120,001 blocks)');
  });

  it('marks approximate boundaries', () => {
    expect(
      describeOutcome(Capability.TX_INDEX, { status: 'boundary', boundary: 200_000, approximate: true }, 300_000),
    ).toBe('Tx indexer: partial, from block ~200000 (100,001 blocks)');
  });

  it.each([
    ['unsupported', 'Log index: N/A (method not supported)'],
    ['unavailable-at-head', 'Log index: N/A (fails even at chain head)'],
    ['no-evidence', 'Log index: N/A (no block with transactions near head)'],
    ['indeterminate', 'Log index: N/A (could not verify)'],
  ] as const)('describes %s', (reason, text) => {
    expect(describeOutcome(Capability.LOG_INDEX, { status: 'unknown', reason }, 100)).toBe(text);
  });

  it('labels archival state', () => {
    expect(describeOutcome(Capability.ARCHIVAL_STATE, { status: 'full' }, 100)).toBe(
      'Archival state: FULL (from block 1)',
    );
  });
});
