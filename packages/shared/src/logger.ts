import pino, { type DestinationStream, type LevelWithSilent, type Logger, type LoggerOptions } from 'pino';

export type AppLogger = Logger;

export interface LoggerConfig {
  environment: string;
  level?: LevelWithSilent;
  /** Alternate sink; ignored in development, where output goes through pino-pretty. */
  destination?: DestinationStream;
}

function defaultLevel(environment: string): LevelWithSilent {
  if (environment === 'production') return 'info';
  if (environment === 'test') return 'silent';
  return 'debug';
}

export function createLogger(config: LoggerConfig): AppLogger {
  const baseOptions: LoggerOptions = {
    level: config.level ?? defaultLevel(config.environment),
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.environment !== 'development') {
    // JSON output for log aggregation
    const options: LoggerOptions = {
      ...baseOptions,
      base: {
        service: 'pegfee',
        env: config.environment,
      },
    };
    return config.destination ? pino(options, config.destination) : pino(options);
  }

  return pino({
    ...baseOptions,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  });
}

let logger: AppLogger | null = null;

export function getLogger(): AppLogger {
  if (!logger) {
    logger = pino({ level: 'info' });
  }
  return logger;
}

export function initLogger(config: LoggerConfig): AppLogger {
  logger = createLogger(config);
  return logger;
}

// bigint fields are passed as decimal strings; JSON has no bigint.
export function logFeeQuote(log: AppLogger, data: {
  poolPrice: string;
  pegPrice: string;
  direction: string;
  fee: number;
  unclampedFee: number;
  deviationBps: string;
  pctUnits: string;
  toward: boolean;
  zone: string;
}) {
  log.debug({
    event: 'fee_quote',
    ...data,
  }, 'Swap fee computed');
}

export function logError(log: AppLogger, error: Error, context?: Record<string, unknown>) {
  log.error({
    event: 'error',
    error: {
      name: error.name,
      message: error.message,
      stack: error.stack,
    },
    ...context,
  }, error.message);
}
