// Minimal logging surface: console by default, swappable so tests can capture output.
export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export const consoleLogger: Logger = console;

export const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
  error: () => {},
};

// Debug output gated by CHIP8_DEBUG=1 (or "true")
export function isDebugEnabled(env: Record<string, string | undefined> = process.env): boolean {
  const v = (env.CHIP8_DEBUG ?? '').toLowerCase();
  return v === '1' || v === 'true';
}

export function createDebug(tag: string, logger: Logger = consoleLogger, enabled = isDebugEnabled()): (...args: unknown[]) => void {
  if (!enabled) return () => {};
  return (...args: unknown[]) => logger.log(`[${tag}]`, ...args);
}
