#!/usr/bin/env node
import { describeEndpoint, loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createHttpClient } from './api/http-client.js';
import { createRpcClient } from './api/rpc-client.js';
import { createChainSource } from './api/chain-source.js';
import { runHistoryCheck } from './core/run.js';
import { ChainHeadUnavailableError } from './types.js';

let logger = createLogger();

function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutdown signal received, aborting check');
  process.exit(130);
}

process.on('SIGTERM', () => { shutdown('SIGTERM'); });
process.on('SIGINT', () => { shutdown('SIGINT'); });

async function main(): Promise<void> {
  const config = loadConfig();
  logger = createLogger(config.verbose);

  logger.info({
    endpoint: describeEndpoint(config.rpcUrl),
    capabilities: config.capabilities,
    sampleConcurrency: config.sampleConcurrency,
    requestTimeoutMs: config.requestTimeoutMs,
  }, 'Starting block history check');

  const httpClient = createHttpClient(config);
  const rpc = createRpcClient(httpClient, config.rpcUrl, config);
  const source = createChainSource(rpc);

  try {
    const report = await runHistoryCheck({ source, config, logger });
    logger.info({ report }, 'Summary');
  } finally {
    await httpClient.close();
  }
}

main().catch((err) => {
  if (err instanceof ChainHeadUnavailableError) {
    logger.fatal({ detail: err.detail }, err.message);
  } else {
    logger.fatal({ err }, 'Fatal error');
  }
  process.exit(1);
});
