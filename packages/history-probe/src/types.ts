// ── Capabilities ──

export const Capability = {
  BLOCK_RETENTION: 'blockRetention',
  TX_INDEX: 'txIndex',
  ARCHIVAL_STATE: 'archivalState',
  LOG_INDEX: 'logIndex',
  RECEIPT_INDEX: 'receiptIndex',
} as const;

export type Capability = (typeof Capability)[keyof typeof Capability];

export const ALL_CAPABILITIES: readonly Capability[] = Object.values(Capability);

export function isCapability(value: string): value is Capability {
  return ALL_CAPABILITIES.some((c) => c === value);
}

// ── Verdicts ──

export type UnavailableCause = 'missing' | 'remote-error';

export interface Unavailable {
  readonly kind: 'unavailable';
  readonly cause: UnavailableCause;
  readonly detail?: string;
}

export interface Indeterminate {
  readonly kind: 'indeterminate';
  readonly detail: string;
}

export type Verdict = { readonly kind: 'available' } | Unavailable | Indeterminate;

/** A verdict that carries the value the node returned when the call worked. */
export type Probed<T> = { readonly kind: 'available'; readonly value: T } | Unavailable | Indeterminate;

// ── JSON-RPC ──

export type RpcParams = readonly unknown[] | Readonly<Record<string, unknown>>;

export type RpcOutcome =
  | { readonly kind: 'result'; readonly value: unknown }
  | { readonly kind: 'remote-error'; readonly code: number; readonly message: string }
  | { readonly kind: 'transport-failure'; readonly message: string };

// ── Chain data ──

export interface TxSummary {
  readonly hash: string;
  readonly from: string | null;
}

export interface BlockHandle {
  readonly number: number;
  readonly hash: string;
  readonly transactions: readonly TxSummary[];
}

/** Concrete data found at (or near) a target height, used to test capabilities that need it. */
export interface Evidence {
  readonly block: number;
  readonly blockHash: string;
  readonly txHash: string;
  readonly sender: string | null;
}

export interface SyncStatus {
  readonly syncing: boolean;
  readonly currentBlock: number | null;
  readonly highestBlock: number | null;
}

// ── Sampling ──

export type SampleOutcome =
  | { readonly kind: 'skipped' }
  | { readonly kind: 'no-qualifying-data'; readonly scannedFrom: number; readonly scannedTo: number }
  | { readonly kind: 'found'; readonly block: number; readonly handle: string | null; readonly verdict: Verdict }
  | { readonly kind: 'error'; readonly message: string };

export interface SampleResult {
  readonly sample: number;
  readonly outcome: SampleOutcome;
}

export interface Bracket {
  readonly failing: number;
  readonly working: number;
}

export type BracketDerivation =
  | { readonly kind: 'bracket'; readonly bracket: Bracket }
  | { readonly kind: 'all-available'; readonly lowestWorking: number }
  | { readonly kind: 'no-working' };

export interface BlockRange {
  readonly floor: number;
  readonly chainHead: number;
}

// ── Outcomes and report ──

export type UnknownReason = 'unsupported' | 'unavailable-at-head' | 'no-evidence' | 'indeterminate';

export type CapabilityOutcome =
  | { readonly status: 'boundary'; readonly boundary: number; readonly approximate: boolean }
  | { readonly status: 'full' }
  | { readonly status: 'unknown'; readonly reason: UnknownReason };

export interface CapabilityReport {
  readonly outcome: CapabilityOutcome;
  readonly roundTrips: number;
}

export interface NodeInfo {
  readonly chainId: number | null;
  readonly sync: SyncStatus | null;
}

export interface HistoryReport {
  readonly chainHead: number;
  readonly node: NodeInfo;
  readonly capabilities: Readonly<Partial<Record<Capability, CapabilityReport>>>;
  readonly totalRoundTrips: number;
  readonly durationMs: number;
}

// ── Error types ──

export class HttpError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly method: string,
    readonly url: string,
    readonly body: unknown = undefined,
    readonly retryAfterMs: number | null = null,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class ChainHeadUnavailableError extends Error {
  constructor(readonly detail: string) {
    super(`Cannot connect to RPC or get block number: ${detail}`);
    this.name = 'ChainHeadUnavailableError';
  }
}

// ── Config type ──

export interface RetryPolicy {
  readonly maxRetries: number;
  readonly retryBaseMs: number;
  readonly retryMaxMs: number;
}

export interface AppConfig extends RetryPolicy {
  readonly rpcUrl: string;
  readonly requestTimeoutMs: number;
  readonly sampleConcurrency: number;
  readonly capabilities: readonly Capability[];
  readonly verbose: boolean;
}
