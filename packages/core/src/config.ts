import { createLogger, LOG_LEVELS, type Logger, type LogLevel } from './logger';
import { metrics as defaultMetrics, type Metrics } from './metrics';

export type StoreOptions = {
  /** Used in log lines and error messages. Defaults to `store-<n>`. */
  name?: string;
  logger?: Logger;
  /** Ignored when `logger` is given. Defaults to `STORE_LOG_LEVEL`, then `warn`. */
  logLevel?: LogLevel;
  metrics?: Metrics;
};

export type ResolvedStoreOptions = {
  name: string;
  logger: Logger;
  metrics: Metrics;
};

let counter = 0;

const isLogLevel = (s: string): s is LogLevel => LOG_LEVELS.some(l => l === s);

export function envLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = (env.STORE_LOG_LEVEL ?? '').trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'warn';
}

export function resolveOptions(opts?: StoreOptions): ResolvedStoreOptions {
  const name = opts?.name ?? `store-${++counter}`;
  return {
    name,
    logger: opts?.logger ?? createLogger(name, opts?.logLevel ?? envLogLevel()),
    metrics: opts?.metrics ?? defaultMetrics,
  };
}
