import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { describeEndpoint, loadConfig } from '../src/config.js';
import { ALL_CAPABILITIES } from '../src/types.js';

describe('loadConfig', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    process.env = {
      ...originalEnv,
      RPC_URL: 'http://localhost:8545',
    };
    for (const key of [
      'REQUEST_TIMEOUT_MS',
      'MAX_RETRIES',
      'RETRY_BASE_MS',
      'RETRY_MAX_MS',
      'SAMPLE_CONCURRENCY',
      'CAPABILITIES',
      'VERBOSE',
    ]) {
      delete process.env[key];
    }
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('loads the endpoint from the environment', () => {
    expect(loadConfig().rpcUrl).toBe('http://localhost:8545');
  });

  it('uses default values for optional config', () => {
    const config = loadConfig();
    expect(config.requestTimeoutMs).toBe(10_000);
    expect(config.maxRetries).toBe(3);
    expect(config.retryBaseMs).toBe(250);
    expect(config.retryMaxMs).toBe(5000);
    expect(config.sampleConcurrency).toBe(8);
    expect(config.capabilities).toEqual(ALL_CAPABILITIES);
    expect(config.verbose).toBe(false);
  });

  it('throws if RPC_URL is missing', () => {
    delete process.env['RPC_URL'];
    expect(() => loadConfig()).toThrow('RPC_URL');
  });

  it('throws if RPC_URL is not an absolute URL', () => {
    process.env['RPC_URL'] = 'rpc node';
    expect(() => loadConfig()).toThrow('RPC_URL must be an absolute URL');
  });

  it('clamps sample concurrency to [1, 32]', () => {
    process.env['SAMPLE_CONCURRENCY'] = '100';
    expect(loadConfig().sampleConcurrency).toBe(32);
    process.env['SAMPLE_CONCURRENCY'] = '0';
    expect(loadConfig().sampleConcurrency).toBe(1);
  });

  it('keeps the retry ceiling at or above the base delay', () => {
    process.env['RETRY_BASE_MS'] = '800';
    process.env['RETRY_MAX_MS'] = '100';
    const config = loadConfig();
    expect(config.retryBaseMs).toBe(800);
    expect(config.retryMaxMs).toBe(800);
  });

  it('throws for non-numeric integers', () => {
    process.env['REQUEST_TIMEOUT_MS'] = 'soon';
    expect(() => loadConfig()).toThrow('REQUEST_TIMEOUT_MS must be a valid integer');
  });

  it('reads verbose flags', () => {
    process.env['VERBOSE'] = '1';
    expect(loadConfig().verbose).toBe(true);
    process.env['VERBOSE'] = 'true';
    expect(loadConfig().verbose).toBe(true);
    process.env['VERBOSE'] = 'no';
    expect(loadConfig().verbose).toBe(false);
  });

  it('parses a capability subset in canonical order without duplicates', () => {
    process.env['CAPABILITIES'] = 'receiptIndex, blockRetention,receiptIndex';
    expect(loadConfig().capabilities).toEqual(['blockRetention', 'receiptIndex']);
  });

  it('accepts "all"', () => {
    process.env['CAPABILITIES'] = 'all';
    expect(loadConfig().capabilities).toEqual(ALL_CAPABILITIES);
  });

  it('throws for unknown capabilities', () => {
    process.env['CAPABILITIES'] = 'txIndex,traces';
    expect(() => loadConfig()).toThrow('CAPABILITIES contains unknown capability "traces"');
  });

  it('throws when the list names nothing', () => {
    process.env['CAPABILITIES'] = ' , ,';
    expect(() => loadConfig()).toThrow('CAPABILITIES must name at least one capability');
  });
});

describe('describeEndpoint', () => {
  it('keeps an origin-only URL as is', () => {
    expect(describeEndpoint('https://rpc.example.com')).toBe('https://rpc.example.com');
  });

  it('hides the path, which may carry an API key', () => {
    expect(describeEndpoint('https://rpc.example.com/v2/test-key')).toBe('https://rpc.example.com/…');
  });

  it('does not echo a value that is not a URL', () => {
    expect(describeEndpoint('test-key')).toBe('<invalid url>');
  });
});
