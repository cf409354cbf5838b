export * from './types.js';
export { loadConfig, describeEndpoint } from './config.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
export { createHttpClient } from './api/http-client.js';
export type { HttpClient, HttpResponse } from './api/http-client.js';
export { createRpcClient } from './api/rpc-client.js';
export type { RpcClient } from './api/rpc-client.js';
export { createChainSource, LOG_FILTER_SHAPES, isProtocolMismatch } from './api/chain-source.js';
export type { ChainSource, LogFilterShape } from './api/chain-source.js';
export { createProbeContext, forCapability } from './core/context.js';
export type { ProbeContext, RoundTripCounter } from './core/context.js';
export { createCapabilityProbe } from './core/capabilities.js';
export type { CapabilityProbe } from './core/capabilities.js';
export { findQualifyingBlock } from './core/nearby.js';
export { generateSeeds } from './core/seeds.js';
export { sampleAll, deriveBracket } from './core/sampler.js';
export { findBoundary } from './core/boundary-search.js';
export { runCapability } from './core/pipeline.js';
export { buildReport, describeOutcome } from './core/report.js';
export { runHistoryCheck } from './core/run.js';
