export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export function createConsoleLogger(scope: string): Logger {
  return {
    debug(message, data) {
      if (process.env.NODE_ENV !== 'production' && process.env.POS_SYNC_DEBUG === '1') {
        // eslint-disable-next-line no-console
        console.debug(`[${scope}] ${message}`, data ?? '');
      }
    },
    info(message, data) {
      // eslint-disable-next-line no-console
      console.info(`[${scope}] ${message}`, data ?? '');
    },
    warn(message, data) {
      // eslint-disable-next-line no-console
      console.warn(`[${scope}] ${message}`, data ?? '');
    },
    error(message, data) {
      // eslint-disable-next-line no-console
      console.error(`[${scope}] ${message}`, data ?? '');
    },
  };
}
