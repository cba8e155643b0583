export interface Logger {
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    info: (...args) => console.log(prefix, ...args),
    // eslint-disable-next-line no-console
    warn: (...args) => console.warn(prefix, ...args),
    // eslint-disable-next-line no-console
    error: (...args) => console.error(prefix, ...args),
  };
}

const noop = () => {};

export const silentLogger: Logger = { info: noop, warn: noop, error: noop };

export const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, Math.max(0, ms)));
