/**
 * Minimal logger contract. Astro's integration logger satisfies it, so the
 * integration can hand its own logger to the runtime.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(label = "indiehub"): Logger {
  const prefix = `[${label}]`;
  return {
    debug: (message) => console.debug(prefix, message),
    info: (message) => console.info(prefix, message),
    warn: (message) => console.warn(prefix, message),
    error: (message) => console.error(prefix, message),
  };
}

/**
 * Render an unknown thrown value for a log line
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
