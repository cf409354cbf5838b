import { HttpError } from '../types.js';
import type { RetryPolicy, RpcOutcome, RpcParams } from '../types.js';
import type { ProbeContext } from '../core/context.js';
import type { HttpClient } from './http-client.js';
import { isRetryable, withRetry } from './middleware/retry.js';
import { isRecord, truncateForLog } from '../mappers.js';

export interface RpcClient {
  readonly call: (ctx: ProbeContext, method: string, params: RpcParams) => Promise<RpcOutcome>;
}

type Envelope =
  | { readonly kind: 'result'; readonly value: unknown }
  | { readonly kind: 'remote-error'; readonly code: number; readonly message: string };

function readEnvelope(body: unknown): Envelope | null {
  if (!isRecord(body)) return null;

  const error = body['error'];
  if (isRecord(error)) {
    return {
      kind: 'remote-error',
      code: typeof error['code'] === 'number' ? error['code'] : 0,
      message: typeof error['message'] === 'string' ? error['message'] : JSON.stringify(error),
    };
  }

  if ('result' in body) {
    return { kind: 'result', value: body['result'] };
  }

  return null;
}

/**
 * JSON-RPC 2.0 over the shared HTTP client. Resolves every call to an
 * RpcOutcome; transient failures are retried first, then reported as
 * `transport-failure`.
 */
export function createRpcClient(
  httpClient: HttpClient,
  rpcUrl: string,
  policy: RetryPolicy,
): RpcClient {
  async function sendOnce(ctx: ProbeContext, method: string, payload: unknown): Promise<Envelope> {
    let body: unknown;
    try {
      body = (await httpClient.post(rpcUrl, payload, ctx.timeoutMs)).body;
    } catch (err) {
      // Some gateways wrap JSON-RPC errors in a non-2xx response; 429 and 5xx stay transient
      if (err instanceof HttpError && !isRetryable(err.status)) {
        const wrapped = readEnvelope(err.body);
        if (wrapped !== null && wrapped.kind === 'remote-error') return wrapped;
      }
      throw err;
    }

    const envelope = readEnvelope(body);
    if (envelope === null) {
      throw new HttpError(`Malformed JSON-RPC response to ${method}`, 0, 'POST', rpcUrl, body);
    }
    return envelope;
  }

  async function call(ctx: ProbeContext, method: string, params: RpcParams): Promise<RpcOutcome> {
    const payload = { jsonrpc: '2.0', method, params, id: 1 };
    if (ctx.verbose) {
      ctx.logger.debug({ method, params: truncateForLog(params) }, 'RPC request');
    }

    try {
      const envelope = await withRetry(() => sendOnce(ctx, method, payload), policy, ctx.logger, method)();
      if (ctx.verbose) {
        ctx.logger.debug(
          envelope.kind === 'result'
            ? { method, result: truncateForLog(envelope.value) }
            : { method, code: envelope.code, error: envelope.message },
          'RPC response',
        );
      }
      return envelope;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (ctx.verbose) {
        ctx.logger.debug({ method, err: message }, 'RPC failed');
      }
      return { kind: 'transport-failure', message };
    }
  }

  return { call };
}
