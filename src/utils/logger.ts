// src/utils/logger.ts
import pino from 'pino';
import { DEFAULT_CONFIG, LogLevel, isLogLevel } from '../config/config';

// Detect environment
const isDevelopment = process.env.NODE_ENV === 'development';
const isTest = process.env.NODE_ENV === 'test' ||
               process.env.JEST_WORKER_ID !== undefined;
const isProduction = process.env.NODE_ENV === 'production';

// Default log levels per environment
const getDefaultLogLevel = (): LogLevel => {
  const fromEnv = process.env.LOG_LEVEL;
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  if (isTest) return 'warn'; // Default to warn in tests
  return DEFAULT_CONFIG.logLevel;
};

// Configure transport based on environment
const transportConfig = isDevelopment ? pino.transport({
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname,service,component',
    messageFormat: '{msg}',
    errorLikeObjectKeys: ['err', 'error'],
  }
}) : undefined;

interface TransactionSummary {
  id: number;
  state: string;
  pending: number;
}

// Custom serializers for transaction objects
const serializers = {
  tx: (tx: TransactionSummary | undefined) => {
    if (!tx) return tx;
    return {
      id: tx.id,
      state: tx.state,
      pending: tx.pending
    };
  },
  err: pino.stdSerializers.err,
  error: pino.stdSerializers.err,
  keys: (keys: string[] | undefined) => {
    if (!keys) return keys;
    // Key lists can be large; only a sample goes out in production
    if (isProduction && keys.length > 10) {
      return { count: keys.length, sample: keys.slice(0, 10) };
    }
    return keys;
  }
};

// Create the base logger configuration
const loggerOptions: pino.LoggerOptions = {
  level: getDefaultLogLevel(),
  base: {
    pid: process.pid,
    service: process.env.SERVICE_NAME || DEFAULT_CONFIG.serviceName,
    environment: process.env.NODE_ENV || DEFAULT_CONFIG.environment
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers,
  formatters: {
    level: (label) => ({ level: label.toUpperCase() })
  }
};

// Create logger with or without transport
const baseLogger = transportConfig
  ? pino(loggerOptions, transportConfig)
  : pino(loggerOptions);

let loggingEnabled = !isTest || process.env.LOG_TESTS === 'true';

// Create child loggers for different components
export const logger = baseLogger.child({ component: 'app' });
export const storeLogger = baseLogger.child({ component: 'store' });
export const bufferLogger = baseLogger.child({ component: 'buffer' });
export const transactionLogger = baseLogger.child({ component: 'transaction' });

// Helper function to create transaction-specific loggers
export const createTransactionLogger = (txId: number): pino.Logger => {
  return transactionLogger.child({ txId });
};

// Export a function to set log level at runtime
export const setLogLevel = (level: LogLevel): void => {
  baseLogger.level = level;
  for (const child of [logger, storeLogger, bufferLogger, transactionLogger]) {
    child.level = level;
  }
};

// Test utilities
export const enableTestLogging = (level: LogLevel = 'info'): void => {
  setLogLevel(level);
  loggingEnabled = true;
};

export const disableTestLogging = (): void => {
  setLogLevel('silent');
  loggingEnabled = false;
};

export const isLoggingEnabled = (): boolean => loggingEnabled;

// Performance monitoring helpers
interface TimerResult {
  end: (context?: Record<string, unknown>) => number;
  log: (log: pino.Logger, level: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>) => number;
}

export const createTimer = (operation: string): TimerResult => {
  const start = process.hrtime.bigint();
  const elapsed = (): number => Number(process.hrtime.bigint() - start) / 1_000_000;

  return {
    end: (context: Record<string, unknown> = {}): number => {
      const durationMs = elapsed();

      if (loggingEnabled) {
        baseLogger.debug({
          ...context,
          operation,
          durationMs,
          action: 'performance'
        }, `${operation} took ${durationMs.toFixed(2)}ms`);
      }

      return durationMs;
    },

    log: (log, level, message, context = {}): number => {
      const durationMs = elapsed();

      if (loggingEnabled) {
        log[level]({
          ...context,
          operation,
          durationMs,
          action: 'performance'
        }, message);
      }

      return durationMs;
    }
  };
};

export default logger;
