import type { Logger } from '../logger.js';
import type { Capability } from '../types.js';

export interface RoundTripCounter {
  readonly record: () => void;
  readonly count: () => number;
}

/** Request shapes accepted by the node, learned once per run. */
export interface RunMemo {
  logFilterShape: string | null;
}

/**
 * Everything a probe needs besides its arguments: where to log, how long a
 * call may take, and where to count round trips. Passed explicitly through
 * every component instead of living in module state.
 */
export interface ProbeContext {
  readonly logger: Logger;
  readonly verbose: boolean;
  readonly timeoutMs: number;
  readonly roundTrips: RoundTripCounter;
  readonly memo: RunMemo;
}

export function createRoundTripCounter(): RoundTripCounter {
  let total = 0;
  return {
    record: () => {
      total++;
    },
    count: () => total,
  };
}

export function createProbeContext(options: {
  readonly logger: Logger;
  readonly verbose: boolean;
  readonly timeoutMs: number;
}): ProbeContext {
  return {
    ...options,
    roundTrips: createRoundTripCounter(),
    memo: { logFilterShape: null },
  };
}

/** Child context with its own counter and logger bindings; the run memo is shared. */
export function forCapability(ctx: ProbeContext, capability: Capability): ProbeContext {
  return {
    logger: ctx.logger.child({ capability }),
    verbose: ctx.verbose,
    timeoutMs: ctx.timeoutMs,
    roundTrips: createRoundTripCounter(),
    memo: ctx.memo,
  };
}
