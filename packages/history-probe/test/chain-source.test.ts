import { describe, it, expect, vi } from 'vitest';
import { createChainSource, isProtocolMismatch } from '../src/api/chain-source.js';
import type { RpcClient } from '../src/api/rpc-client.js';
import type { RpcOutcome } from '../src/types.js';
import { blockHash, createTestContext, createTestSource } from './helpers/fake-node.js';

function sourceAnswering(...outcomes: RpcOutcome[]) {
  const call = vi.fn<RpcClient['call']>();
  for (const outcome of outcomes) {
    call.mockResolvedValueOnce(outcome);
  }
  return { call, source: createChainSource({ call }) };
}

describe('createChainSource', () => {
  it('reads the chain head and counts the round trip', async () => {
    const { source } = createTestSource({ head: 4660 });
    const ctx = createTestContext();

    expect(await source.getChainHead(ctx)).toEqual({ kind: 'available', value: 4660 });
    expect(ctx.roundTrips.count()).toBe(1);
  });

  it('classifies a transport failure as indeterminate', async () => {
    const { source } = sourceAnswering({ kind: 'transport-failure', message: 'Request timeout after 10ms' });

    expect(await source.blockExists(createTestContext(), 5)).toEqual({
      kind: 'indeterminate',
      detail: 'Request timeout after 10ms',
    });
  });

  it('classifies a JSON-RPC error as unavailable with a remote-error cause', async () => {
    const { source } = sourceAnswering({ kind: 'remote-error', code: -32000, message: 'header not found' });

    expect(await source.getReceiptsForBlock(createTestContext(), 5)).toEqual({
      kind: 'unavailable',
      cause: 'remote-error',
      detail: 'eth_getBlockReceipts: header not found',
    });
  });

  it('classifies a null result as missing', async () => {
    const { source } = sourceAnswering({ kind: 'result', value: null });

    expect(await source.getTransactionByHash(createTestContext(), '0x7a1')).toEqual({
      kind: 'unavailable',
      cause: 'missing',
    });
  });

  it('classifies a result of the wrong shape as indeterminate', async () => {
    const { source } = sourceAnswering({ kind: 'result', value: 'pruned' });

    const probed = await source.getReceiptsForBlock(createTestContext(), 5);

    expect(probed.kind).toBe('indeterminate');
  });

  it('fetches blocks with hydrated transactions', async () => {
    const { call, source } = sourceAnswering({
      kind: 'result',
      value: { number: '0x10', hash: '0xabc', transactions: [{ hash: '0xt1', from: '0xf1' }] },
    });

    const probed = await source.getBlockHandle(createTestContext(), 16);

    expect(call).toHaveBeenCalledWith(expect.anything(), 'eth_getBlockByNumber', ['0x10', true]);
    expect(probed).toEqual({
      kind: 'available',
      value: { number: 16, hash: '0xabc', transactions: [{ hash: '0xt1', from: '0xf1' }] },
    });
  });

  it('asks for the balance at the given height', async () => {
    const { call, source } = sourceAnswering({ kind: 'result', value: '0x0' });

    const probed = await source.getHistoricalState(createTestContext(), '0xf1', 255);

    expect(call).toHaveBeenCalledWith(expect.anything(), 'eth_getBalance', ['0xf1', '0xff']);
    expect(probed).toEqual({ kind: 'available', value: '0x0' });
  });

  it('maps eth_syncing answers', async () => {
    const { source } = sourceAnswering(
      { kind: 'result', value: false },
      { kind: 'result', value: { currentBlock: '0x10', highestBlock: '0x20' } },
    );
    const ctx = createTestContext();

    expect(await source.getSyncStatus(ctx)).toEqual({ syncing: false, currentBlock: null, highestBlock: null });
    expect(await source.getSyncStatus(ctx)).toEqual({ syncing: true, currentBlock: 16, highestBlock: 32 });
  });

  it('returns null chain id when the node errors', async () => {
    const { source } = sourceAnswering({ kind: 'remote-error', code: -32601, message: 'not found' });

    expect(await source.getChainId(createTestContext())).toBeNull();
  });
});

describe('getLogsForBlockHash', () => {
  it('uses the standard array shape when the node accepts it', async () => {
    const { node, source } = createTestSource({ head: 100, logsShape: 'array' });
    const ctx = createTestContext();

    expect(await source.getLogsForBlockHash(ctx, blockHash(50))).toEqual({ kind: 'available', value: [] });
    expect(node.callsTo('eth_getLogs')).toEqual([{ method: 'eth_getLogs', params: [{ blockHash: blockHash(50) }] }]);
    expect(ctx.memo.logFilterShape).toBe('array');
  });

  it('falls back to named params and remembers the accepted shape', async () => {
    const { node, source } = createTestSource({ head: 100, logsShape: 'object' });
    const ctx = createTestContext();

    expect((await source.getLogsForBlockHash(ctx, blockHash(50))).kind).toBe('available');
    expect(node.callsTo('eth_getLogs')).toHaveLength(2);
    expect(ctx.memo.logFilterShape).toBe('object');

    expect((await source.getLogsForBlockHash(ctx, blockHash(60))).kind).toBe('available');
    expect(node.callsTo('eth_getLogs')).toHaveLength(3);
    expect(node.callsTo('eth_getLogs')[2]?.params).toEqual({ blockHash: blockHash(60) });
    expect(ctx.roundTrips.count()).toBe(3);
  });

  it('reports unavailable when every shape is rejected', async () => {
    const { source } = sourceAnswering(
      { kind: 'remote-error', code: -32602, message: 'invalid params' },
      { kind: 'remote-error', code: -32602, message: 'invalid params' },
    );
    const ctx = createTestContext();

    expect(await source.getLogsForBlockHash(ctx, '0xabc')).toEqual({
      kind: 'unavailable',
      cause: 'remote-error',
      detail: 'eth_getLogs: invalid params',
    });
    expect(ctx.memo.logFilterShape).toBeNull();
  });

  it('does not retry another shape for errors unrelated to the request shape', async () => {
    const { call, source } = sourceAnswering({ kind: 'remote-error', code: -32000, message: 'logs pruned' });

    const probed = await source.getLogsForBlockHash(createTestContext(), '0xabc');

    expect(probed.kind).toBe('unavailable');
    expect(call).toHaveBeenCalledTimes(1);
  });
});

describe('isProtocolMismatch', () => {
  it('matches invalid-params codes and messages', () => {
    expect(isProtocolMismatch({ kind: 'remote-error', code: -32602, message: 'x' })).toBe(true);
    expect(isProtocolMismatch({ kind: 'remote-error', code: -32000, message: 'invalid argument 0: json: cannot unmarshal object' })).toBe(true);
    expect(isProtocolMismatch({ kind: 'remote-error', code: -32000, message: 'Invalid params' })).toBe(true);
  });

  it('ignores other outcomes', () => {
    expect(isProtocolMismatch({ kind: 'remote-error', code: -32000, message: 'header not found' })).toBe(false);
    expect(isProtocolMismatch({ kind: 'transport-failure', message: 'invalid params' })).toBe(false);
    expect(isProtocolMismatch({ kind: 'result', value: [] })).toBe(false);
  });
});
