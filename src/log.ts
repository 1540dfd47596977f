import { config } from "./config.js";

export function timestamp(): string {
  return new Date().toLocaleTimeString();
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export const log = {
  info(...args: unknown[]): void {
    console.log(`[${timestamp()}]`, ...args);
  },
  warn(...args: unknown[]): void {
    console.warn(`[${timestamp()}]`, ...args);
  },
  error(...args: unknown[]): void {
    console.error(`[${timestamp()}]`, ...args);
  },
  debug(...args: unknown[]): void {
    if (config.logLevel === "debug") console.log(`[${timestamp()}]`, ...args);
  },
};
