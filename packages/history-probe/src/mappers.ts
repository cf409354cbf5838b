import type { BlockHandle, SyncStatus, TxSummary } from './types.js';

export function isRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null && !Array.isArray(val);
}

// ── Quantities ──

export function toQuantity(n: number): string {
  return `0x${n.toString(16)}`;
}

export function parseQuantity(value: unknown): number | null {
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return value;
  }
  if (typeof value !== 'string' || !/^0x[0-9a-fA-F]+$/.test(value)) {
    return null;
  }
  const n = Number.parseInt(value.slice(2), 16);
  return Number.isSafeInteger(n) ? n : null;
}

// ── Blocks and transactions ──

function toTxSummary(raw: unknown): TxSummary | null {
  // Blocks fetched without hydration list bare hashes
  if (typeof raw === 'string') {
    return raw.length > 0 ? { hash: raw, from: null } : null;
  }
  if (!isRecord(raw) || typeof raw['hash'] !== 'string') return null;
  return {
    hash: raw['hash'],
    from: typeof raw['from'] === 'string' ? raw['from'] : null,
  };
}

export function toBlockHandle(raw: unknown): BlockHandle | null {
  if (!isRecord(raw)) return null;

  const number = parseQuantity(raw['number']);
  const hash = raw['hash'];
  if (number === null || typeof hash !== 'string') return null;

  const transactions: TxSummary[] = [];
  const rawTxs = raw['transactions'];
  if (Array.isArray(rawTxs)) {
    for (const item of rawTxs) {
      const tx = toTxSummary(item);
      if (tx !== null) transactions.push(tx);
    }
  }

  return { number, hash, transactions };
}

// ── Node status ──

export function toSyncStatus(raw: unknown): SyncStatus | null {
  // eth_syncing answers false when synced, an object while syncing
  if (raw === false) {
    return { syncing: false, currentBlock: null, highestBlock: null };
  }
  if (!isRecord(raw)) return null;
  return {
    syncing: true,
    currentBlock: parseQuantity(raw['currentBlock']),
    highestBlock: parseQuantity(raw['highestBlock']),
  };
}

export function truncateForLog(value: unknown, maxLength = 500): string {
  const text = JSON.stringify(value) ?? 'undefined';
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
