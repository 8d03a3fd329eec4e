export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface AppConfig {
  logLevel: LogLevel;
  metricsPort: number;
  environment: string;
  serviceName: string;
  /** Entry limit for the demo backend store; 0 means unbounded. */
  storeLimit: number;
}

export const DEFAULT_CONFIG: AppConfig = {
  logLevel: 'info',
  metricsPort: 9090,
  environment: 'development',
  serviceName: 'cache-txn',
  storeLimit: 0,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function parseInteger(name: string, raw: string, min: number, max: number): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name} must be an integer between ${min} and ${max}, got '${raw}'`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const config: AppConfig = { ...DEFAULT_CONFIG };

  if (env.LOG_LEVEL) {
    if (!isLogLevel(env.LOG_LEVEL)) {
      throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${env.LOG_LEVEL}'`);
    }
    config.logLevel = env.LOG_LEVEL;
  }
  if (env.METRICS_PORT) {
    config.metricsPort = parseInteger('METRICS_PORT', env.METRICS_PORT, 0, 65535);
  }
  if (env.NODE_ENV) {
    config.environment = env.NODE_ENV;
  }
  if (env.SERVICE_NAME) {
    config.serviceName = env.SERVICE_NAME;
  }
  if (env.STORE_LIMIT) {
    config.storeLimit = parseInteger('STORE_LIMIT', env.STORE_LIMIT, 0, Number.MAX_SAFE_INTEGER);
  }

  return config;
}
