/**
 * Logger Utility
 * Handles console output with different log levels
 */

import chalk from "chalk";
import type { LogLevel } from "../types/config";

const OFFSET = "    ";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private secrets: string[] = [];

  constructor(private readonly level: LogLevel = "info") {}

  /**
   * Register a value that must never reach the console
   */
  redact(secret: string): void {
    if (secret) this.secrets.push(secret);
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      console.log(`${OFFSET}${chalk.dim("DEBUG:")}  ${this.scrub(message)}`);
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      console.log(`${OFFSET}${chalk.cyan("INFO:")}  ${this.scrub(message)}`);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      console.warn(`${OFFSET}${chalk.yellow("WARNING:")}  ${this.scrub(message)}`);
    }
  }

  error(message: string, error?: unknown): void {
    console.error(`${OFFSET}${chalk.red("ERROR:")}  ${this.scrub(message)}`);
    if (error !== undefined && this.enabled("debug")) {
      const detail = error instanceof Error ? (error.stack ?? error.message) : String(error);
      console.error(this.scrub(detail));
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private scrub(message: string): string {
    let out = message;
    for (const secret of this.secrets) {
      out = out.split(secret).join("****");
    }
    return out;
  }
}
