// packages/core/src/logger.ts
import pino, { type Logger } from 'pino';

export type { Logger };

let root: Logger | undefined;

function rootLogger(): Logger {
  root ??= pino({ level: process.env.LOG_LEVEL ?? 'info', base: { app: 'weighted-log-odds' } });
  return root;
}

/** Child logger tagged with a component name, e.g. createLogger('source-mysql'). */
export function createLogger(component: string, parent?: Logger): Logger {
  return (parent ?? rootLogger()).child({ component });
}
