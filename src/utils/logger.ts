import { pino, type Logger } from 'pino';

import { loadAdapterConfig, type LogLevel } from '../config/AdapterConfig.js';

export type { Logger } from 'pino';

export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({
    name: 'deaura-vault-amm',
    level,
    base: null
  });
}

let root: Logger | undefined;

export function rootLogger(): Logger {
  if (!root) {
    root = createLogger(loadAdapterConfig().logLevel);
  }
  return root;
}
