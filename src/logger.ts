/**
 * scantab — Logger
 *
 * pino の JSON ログを stderr に出す。
 * stdout は MCP の stdio トランスポートが使うため書き込まない。
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { loadEnvConfig } from './config.js';

export type { Logger };

const env = loadEnvConfig();

export const logger: Logger = pino(
  {
    level: env.logLevel,
    base: { service: 'scantab' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  },
  pino.destination(2),
);

/** モジュールごとの子ロガー */
export function createModuleLogger(module: string): Logger {
  return logger.child({ module });
}
