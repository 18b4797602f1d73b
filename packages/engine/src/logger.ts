import type { Logger } from "@wayfarer/schemas";

export class ConsoleLogger implements Logger {
  private prefix: string;
  private verbose: boolean;

  constructor(scope: string, options?: { verbose?: boolean }) {
    // biome-ignore lint/suspicious/noControlCharactersInRegex: intentional sanitization of control chars
    const safeScope = scope.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 128);
    this.prefix = `[${safeScope}]`;
    this.verbose = options?.verbose ?? process.env.WAYFARER_DEBUG === "1";
  }

  info(message: string, data?: Record<string, unknown>): void {
    console.log(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    console.warn(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.verbose) return;
    console.debug(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }
}

export function createLogger(scope: string, options?: { verbose?: boolean }): Logger {
  return new ConsoleLogger(scope, options);
}
