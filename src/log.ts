import pc from "picocolors";

export interface Logger {
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Console logger tagged with `[scope]`, e.g. `[Server] listening on ...`.
 */
export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    info: console.log.bind(console, pc.dim(tag)),
    warn: console.warn.bind(console, pc.yellow(tag)),
    error: console.error.bind(console, pc.red(tag)),
  };
}
