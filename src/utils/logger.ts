/**
 * Minimal logging contract used by the client. `console` satisfies it, and so do
 * most structured loggers.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
}

/** Logger used when none is configured; drops everything. */
export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
};

/**
 * Flattens an error and its `cause` chain into `Name: message` entries, outermost first.
 */
export function describeErrorChain(error: unknown): string[] {
  const chain: string[] = [];
  const visited = new Set<unknown>();
  let current = error;

  while (current !== undefined && current !== null && !visited.has(current)) {
    visited.add(current);
    if (!(current instanceof Error)) {
      chain.push(String(current));
      break;
    }

    const name = current.constructor.name || current.name;
    chain.push(`${name}: ${current.message}`);
    current = current.cause;
  }

  return chain;
}
