// src/services/logger.ts
// Console logger. debug/info are dev-only; warn/error always print.

const IS_DEV = import.meta.env.DEV;

export type Logger = {
  debug: (msg: string, ...args: unknown[]) => void;
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
};

export function createLogger(scope: string): Logger {
  const prefix = `[atlas:${scope}]`;
  return {
    debug: (msg, ...args) => {
      if (IS_DEV) console.debug(prefix, msg, ...args);
    },
    info: (msg, ...args) => {
      if (IS_DEV) console.info(prefix, msg, ...args);
    },
    warn: (msg, ...args) => console.warn(prefix, msg, ...args),
    error: (msg, ...args) => console.error(prefix, msg, ...args),
  };
}
