/**
 * Logger Utility
 * Leveled diagnostics on stderr, kept apart from the per-item report on stdout
 */

import chalk from "chalk";
import type { LoggingConfig } from "../types";

type LogLevel = LoggingConfig["level"];

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  constructor(private level: LogLevel = "info") {}

  isEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level];
  }

  debug(message: string): void {
    if (this.isEnabled("debug")) {
      console.error(chalk.dim(`[DEBUG] ${message}`));
    }
  }

  info(message: string): void {
    if (this.isEnabled("info")) {
      console.error(`[INFO] ${message}`);
    }
  }

  warn(message: string): void {
    if (this.isEnabled("warn")) {
      console.error(chalk.yellow(`[WARN] ${message}`));
    }
  }

  error(message: string, error?: unknown): void {
    console.error(chalk.red(`[ERROR] ${message}`));
    if (error !== undefined && this.isEnabled("debug")) {
      console.error(error);
    }
  }
}
