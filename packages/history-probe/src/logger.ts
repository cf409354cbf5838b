import pino from 'pino';

export type Logger = pino.Logger;

const VERBOSE_LEVELS: readonly string[] = ['trace', 'debug'];

function resolveLevel(verbose: boolean): string {
  const configured = process.env['LOG_LEVEL'];
  if (!verbose) return configured ?? 'info';
  // Request and response dumps are logged at debug
  return configured !== undefined && VERBOSE_LEVELS.includes(configured) ? configured : 'debug';
}

export function createLogger(verbose = false, destination?: pino.DestinationStream): Logger {
  return pino(
    {
      level: resolveLevel(verbose),
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: {
        paths: [
          'rpcUrl',
          '*.rpcUrl',
          'RPC_URL',
          '*.RPC_URL',
          'url',
          '*.url',
          'authorization',
          '*.authorization',
        ],
        remove: true,
      },
    },
    destination,
  );
}
