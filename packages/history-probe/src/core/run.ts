import type { ChainSource } from '../api/chain-source.js';
import type { Logger } from '../logger.js';
import { Capability, ChainHeadUnavailableError } from '../types.js';
import type { AppConfig, BlockRange, CapabilityOutcome, HistoryReport, NodeInfo } from '../types.js';
import { createCapabilityProbe } from './capabilities.js';
import { createProbeContext, forCapability } from './context.js';
import type { ProbeContext } from './context.js';
import { runCapability } from './pipeline.js';
import { buildReport, describeOutcome } from './report.js';
import type { CapabilityRun } from './report.js';

export interface RunDeps {
  readonly source: ChainSource;
  readonly config: Pick<AppConfig, 'capabilities' | 'sampleConcurrency' | 'requestTimeoutMs' | 'verbose'>;
  readonly logger: Logger;
}

function floorFrom(outcome: CapabilityOutcome): number {
  return outcome.status === 'boundary' ? outcome.boundary : 1;
}

/**
 * One full check against a node. The head is read once and every range in the
 * run is bounded by it. Block retention runs first because its boundary is the
 * lowest block the other capabilities can be tested at; the rest run
 * concurrently.
 */
export async function runHistoryCheck(deps: RunDeps): Promise<HistoryReport> {
  const { source, config, logger } = deps;
  const startedAt = Date.now();

  const ctx = createProbeContext({
    logger,
    verbose: config.verbose,
    timeoutMs: config.requestTimeoutMs,
  });

  const head = await source.getChainHead(ctx);
  if (head.kind !== 'available') {
    throw new ChainHeadUnavailableError(head.detail ?? 'no result');
  }
  const chainHead = head.value;
  if (chainHead < 1) {
    throw new ChainHeadUnavailableError(`chain head ${chainHead} leaves no block range to probe`);
  }

  const [chainId, sync] = await Promise.all([source.getChainId(ctx), source.getSyncStatus(ctx)]);
  const node: NodeInfo = { chainId, sync };
  logger.info({ chainHead, chainId, syncing: sync?.syncing ?? null }, 'Latest block fetched');
  if (sync?.syncing === true) {
    logger.warn({ currentBlock: sync.currentBlock, highestBlock: sync.highestBlock }, 'Node is still syncing, results may shift');
  }

  async function run(capability: Capability, floor: number): Promise<CapabilityRun> {
    const capCtx: ProbeContext = forCapability(ctx, capability);
    const range: BlockRange = { floor, chainHead };
    const probe = createCapabilityProbe(capability, source);

    const outcome = await runCapability({ source, probe }, capCtx, range, {
      concurrency: config.sampleConcurrency,
    });
    const roundTrips = capCtx.roundTrips.count();

    capCtx.logger.info({ outcome, roundTrips }, describeOutcome(capability, outcome, chainHead));
    return { capability, outcome, roundTrips };
  }

  const runs: CapabilityRun[] = [];
  let floor = 1;

  if (config.capabilities.includes(Capability.BLOCK_RETENTION)) {
    const retention = await run(Capability.BLOCK_RETENTION, 1);
    runs.push(retention);
    floor = floorFrom(retention.outcome);
  }

  const rest = config.capabilities.filter((c) => c !== Capability.BLOCK_RETENTION);
  runs.push(...(await Promise.all(rest.map((capability) => run(capability, floor)))));

  const report = buildReport({
    chainHead,
    node,
    runs,
    baseRoundTrips: ctx.roundTrips.count(),
    durationMs: Date.now() - startedAt,
  });

  logger.info({ totalRoundTrips: report.totalRoundTrips, durationMs: report.durationMs }, 'History check complete');
  return report;
}
