import type {
  BlockHandle,
  Probed,
  RpcOutcome,
  RpcParams,
  SyncStatus,
  Verdict,
} from '../types.js';
import type { ProbeContext } from '../core/context.js';
import type { RpcClient } from './rpc-client.js';
import { isRecord, parseQuantity, toBlockHandle, toQuantity, toSyncStatus } from '../mappers.js';

export interface ChainSource {
  readonly getChainHead: (ctx: ProbeContext) => Promise<Probed<number>>;
  readonly getChainId: (ctx: ProbeContext) => Promise<number | null>;
  readonly getSyncStatus: (ctx: ProbeContext) => Promise<SyncStatus | null>;
  readonly blockExists: (ctx: ProbeContext, block: number) => Promise<Verdict>;
  readonly getBlockHandle: (ctx: ProbeContext, block: number) => Promise<Probed<BlockHandle>>;
  readonly getTransactionByHash: (ctx: ProbeContext, hash: string) => Promise<Probed<Record<string, unknown>>>;
  readonly getHistoricalState: (ctx: ProbeContext, address: string, block: number) => Promise<Probed<string>>;
  readonly getLogsForBlockHash: (ctx: ProbeContext, blockHash: string) => Promise<Probed<readonly unknown[]>>;
  readonly getReceiptsForBlock: (ctx: ProbeContext, block: number) => Promise<Probed<readonly unknown[]>>;
}

/**
 * Request shapes for eth_getLogs, tried in order. Standard nodes take the
 * filter wrapped in a params array; a few non-standard ones only take it as
 * named params.
 */
export interface LogFilterShape {
  readonly name: string;
  readonly params: (blockHash: string) => RpcParams;
}

export const LOG_FILTER_SHAPES: readonly LogFilterShape[] = [
  { name: 'array', params: (blockHash) => [{ blockHash }] },
  { name: 'object', params: (blockHash) => ({ blockHash }) },
];

/**
 * Best-effort heuristic: error text differs across node implementations, so
 * this is not a contract and only decides whether another shape is worth a try.
 */
export function isProtocolMismatch(outcome: RpcOutcome): boolean {
  if (outcome.kind !== 'remote-error') return false;
  if (outcome.code === -32602) return true;
  return /invalid (argument|param)|cannot unmarshal|non-array args/i.test(outcome.message);
}

function indeterminate(detail: string): Probed<never> {
  return { kind: 'indeterminate', detail };
}

function classify<T>(outcome: RpcOutcome, parse: (value: unknown) => T | null, method: string): Probed<T> {
  switch (outcome.kind) {
    case 'transport-failure':
      return indeterminate(outcome.message);
    case 'remote-error':
      return { kind: 'unavailable', cause: 'remote-error', detail: `${method}: ${outcome.message}` };
    case 'result': {
      if (outcome.value === null || outcome.value === undefined) {
        return { kind: 'unavailable', cause: 'missing' };
      }
      const value = parse(outcome.value);
      return value === null
        ? indeterminate(`Unexpected ${method} result: ${JSON.stringify(outcome.value).slice(0, 120)}`)
        : { kind: 'available', value };
    }
  }
}

function asArray(value: unknown): readonly unknown[] | null {
  return Array.isArray(value) ? value : null;
}

export function createChainSource(rpc: RpcClient): ChainSource {
  function call(ctx: ProbeContext, method: string, params: RpcParams): Promise<RpcOutcome> {
    ctx.roundTrips.record();
    return rpc.call(ctx, method, params);
  }

  async function getChainHead(ctx: ProbeContext): Promise<Probed<number>> {
    return classify(await call(ctx, 'eth_blockNumber', []), parseQuantity, 'eth_blockNumber');
  }

  async function getChainId(ctx: ProbeContext): Promise<number | null> {
    const probed = classify(await call(ctx, 'eth_chainId', []), parseQuantity, 'eth_chainId');
    return probed.kind === 'available' ? probed.value : null;
  }

  async function getSyncStatus(ctx: ProbeContext): Promise<SyncStatus | null> {
    const outcome = await call(ctx, 'eth_syncing', []);
    return outcome.kind === 'result' ? toSyncStatus(outcome.value) : null;
  }

  async function blockExists(ctx: ProbeContext, block: number): Promise<Verdict> {
    const outcome = await call(ctx, 'eth_getBlockByNumber', [toQuantity(block), false]);
    const probed = classify(outcome, (v) => (isRecord(v) ? v : null), 'eth_getBlockByNumber');
    return probed.kind === 'available' ? { kind: 'available' } : probed;
  }

  async function getBlockHandle(ctx: ProbeContext, block: number): Promise<Probed<BlockHandle>> {
    const outcome = await call(ctx, 'eth_getBlockByNumber', [toQuantity(block), true]);
    return classify(outcome, toBlockHandle, 'eth_getBlockByNumber');
  }

  async function getTransactionByHash(
    ctx: ProbeContext,
    hash: string,
  ): Promise<Probed<Record<string, unknown>>> {
    const outcome = await call(ctx, 'eth_getTransactionByHash', [hash]);
    return classify(outcome, (v) => (isRecord(v) ? v : null), 'eth_getTransactionByHash');
  }

  async function getHistoricalState(
    ctx: ProbeContext,
    address: string,
    block: number,
  ): Promise<Probed<string>> {
    const outcome = await call(ctx, 'eth_getBalance', [address, toQuantity(block)]);
    return classify(outcome, (v) => (typeof v === 'string' ? v : null), 'eth_getBalance');
  }

  async function getLogsForBlockHash(
    ctx: ProbeContext,
    blockHash: string,
  ): Promise<Probed<readonly unknown[]>> {
    const remembered = LOG_FILTER_SHAPES.find((s) => s.name === ctx.memo.logFilterShape);
    const shapes = remembered !== undefined ? [remembered] : LOG_FILTER_SHAPES;

    let last: RpcOutcome = { kind: 'transport-failure', message: 'No eth_getLogs request shape tried' };
    for (const shape of shapes) {
      last = await call(ctx, 'eth_getLogs', shape.params(blockHash));
      if (isProtocolMismatch(last)) {
        ctx.logger.debug({ shape: shape.name }, 'eth_getLogs rejected request shape');
        continue;
      }
      if (last.kind === 'result' && ctx.memo.logFilterShape === null) {
        ctx.memo.logFilterShape = shape.name;
        ctx.logger.debug({ shape: shape.name }, 'eth_getLogs request shape accepted');
      }
      break;
    }
    return classify(last, asArray, 'eth_getLogs');
  }

  async function getReceiptsForBlock(
    ctx: ProbeContext,
    block: number,
  ): Promise<Probed<readonly unknown[]>> {
    const outcome = await call(ctx, 'eth_getBlockReceipts', [toQuantity(block)]);
    return classify(outcome, asArray, 'eth_getBlockReceipts');
  }

  return {
    getChainHead,
    getChainId,
    getSyncStatus,
    blockExists,
    getBlockHandle,
    getTransactionByHash,
    getHistoricalState,
    getLogsForBlockHash,
    getReceiptsForBlock,
  };
}
