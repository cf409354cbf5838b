import type { AppConfig, Capability } from './types.js';
import { ALL_CAPABILITIES, isCapability } from './types.js';

function mustGetEnv(key: string): string {
  const value = process.env[key];
  if (value === undefined || value === '') {
    throw new Error(`Required environment variable ${key} is not set`);
  }
  return value;
}

function getIntEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${key} must be a valid integer, got: ${raw}`);
  }
  return parsed;
}

function getBoolEnv(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return fallback;
  return raw === 'true' || raw === '1';
}

function getCapabilitiesEnv(key: string): readonly Capability[] {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === '' || raw.trim() === 'all') return ALL_CAPABILITIES;

  const selected: Capability[] = [];
  for (const part of raw.split(',')) {
    const name = part.trim();
    if (name === '') continue;
    if (!isCapability(name)) {
      throw new Error(`${key} contains unknown capability "${name}" (expected one of: ${ALL_CAPABILITIES.join(', ')})`);
    }
    if (!selected.includes(name)) selected.push(name);
  }
  if (selected.length === 0) {
    throw new Error(`${key} must name at least one capability`);
  }
  // Keep canonical order so block retention always runs first
  return ALL_CAPABILITIES.filter((c) => selected.includes(c));
}

export function loadConfig(): AppConfig {
  const rpcUrl = mustGetEnv('RPC_URL');
  try {
    new URL(rpcUrl);
  } catch {
    throw new Error(`RPC_URL must be an absolute URL, got: ${rpcUrl}`);
  }

  const retryBaseMs = Math.max(0, getIntEnv('RETRY_BASE_MS', 250));
  const retryMaxMs = Math.max(retryBaseMs, getIntEnv('RETRY_MAX_MS', 5000));

  return {
    rpcUrl,
    requestTimeoutMs: Math.max(1, getIntEnv('REQUEST_TIMEOUT_MS', 10_000)),
    maxRetries: Math.max(1, getIntEnv('MAX_RETRIES', 3)),
    retryBaseMs,
    retryMaxMs,
    sampleConcurrency: Math.min(32, Math.max(1, getIntEnv('SAMPLE_CONCURRENCY', 8))),
    capabilities: getCapabilitiesEnv('CAPABILITIES'),
    verbose: getBoolEnv('VERBOSE', false),
  };
}

/** Origin-only form of the endpoint, safe to log when the path carries credentials. */
export function describeEndpoint(rpcUrl: string): string {
  let url: URL;
  try {
    url = new URL(rpcUrl);
  } catch {
    return '<invalid url>';
  }
  return url.pathname === '/' || url.pathname === '' ? url.origin : `${url.origin}/…`;
}
