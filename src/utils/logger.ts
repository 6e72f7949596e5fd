/**
 * Logger Utility
 * Leveled console output, optionally scoped to a stage
 */

import type { LogLevel } from "../types";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export class Logger {
  constructor(
    private readonly level: LogLevel = "info",
    private readonly scope?: string,
  ) {}

  /**
   * Same level, every message prefixed with `scope`
   */
  scoped(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope}/${scope}` : scope);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private format(tag: string, message: string): string {
    return this.scope ? `[${tag}] ${this.scope}: ${message}` : `[${tag}] ${message}`;
  }

  debug(message: string): void {
    if (this.isEnabled("debug")) {
      console.log(this.format("DEBUG", message));
    }
  }

  info(message: string): void {
    if (this.isEnabled("info")) {
      console.log(this.format("INFO", message));
    }
  }

  warn(message: string): void {
    if (this.isEnabled("warn")) {
      console.warn(this.format("WARN", message));
    }
  }

  error(message: string, error?: Error): void {
    console.error(this.format("ERROR", message));
    if (error) {
      console.error(error);
    }
  }
}
