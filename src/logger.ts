// Swing Coach - Console logging
// Lines read `[LEVEL] [Component] message`, matching the start-up `[INIT]` lines.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function createConsoleLogger(component?: string): Logger {
  const tag = component ? ` [${component}]` : "";
  return {
    info: (msg, ...args) => console.log(`[INFO]${tag} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN]${tag} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR]${tag} ${msg}`, ...args),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
