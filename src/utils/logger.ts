/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logger.ts: Logging utilities with color-coded output for camstream.
 */
import { initDebugFilter, isAnyDebugEnabled, isCategoryEnabled } from "./debugFilter.js";
import type { DebugCategory } from "./debugFilter.js";
import { format } from "node:util";
import { writeLogEntry } from "./fileLogger.js";

/* Terminal color codes for log output formatting. Warnings appear in yellow and errors in red, making it easy to spot issues when scanning log output. The reset
 * code restores the default color after each colored message to prevent color bleeding into subsequent output.
 */

const ANSI_COLORS = {

  cyan: "\x1b[36m",
  red: "\x1b[31m",
  reset: "\x1b[0m",
  yellow: "\x1b[33m"
};

// Log levels, in the order they appear in the file log prefix.
export type LogLevel = "debug" | "error" | "info" | "warn";

/* Console output can be silenced so that tests exercising logging code paths stay quiet. The file mirror, when initialized, still receives every entry.
 */

let consoleEnabled = true;

/**
 * Enables or disables console output.
 * @param enabled - True to write log entries to the console.
 */
export function setConsoleLogging(enabled: boolean): void {

  consoleEnabled = enabled;
}

/* Debug logging is controlled by the category-based filter system in debugFilter.ts. The --debug CLI flag enables all categories (equivalent to
 * CAMSTREAM_DEBUG=*), while the CAMSTREAM_DEBUG environment variable allows fine-grained category selection.
 */

/**
 * Enables or disables debug logging. When called with true, initializes the debug filter with wildcard (*) to enable all categories.
 * @param enabled - True to enable all debug logging, false to disable.
 */
export function setDebugLogging(enabled: boolean): void {

  initDebugFilter(enabled ? "*" : "");
}

/**
 * Core logging implementation shared by all log levels. Formats the message, mirrors it to the log file, and writes it to the console.
 * @param level - The log level.
 * @param color - ANSI color code for console output (empty string for no color).
 * @param message - The format string.
 * @param args - Format arguments.
 * @param categoryTag - Optional debug category tag for category-filtered debug messages.
 */
function logWithLevel(level: LogLevel, color: string, message: string, args: unknown[], categoryTag?: string): void {

  const formatted = args.length > 0 ? format(message, ...args) : message;

  writeLogEntry(level, formatted, categoryTag);

  if(!consoleEnabled) {

    return;
  }

  /* eslint-disable no-console */
  let consoleMethod;

  switch(level) {

    case "error": {

      consoleMethod = console.error;

      break;
    }

    case "warn": {

      consoleMethod = console.warn;

      break;
    }

    default: {

      consoleMethod = console.log;

      break;
    }
  }
  /* eslint-enable no-console */

  if(color) {

    consoleMethod("%s%s%s", color, formatted, ANSI_COLORS.reset);
  } else {

    consoleMethod(formatted);
  }
}

/* The LOG object provides a centralized logging interface with color-coded output and printf-style format strings. All methods accept a format string followed by
 * optional arguments, using Node's util.format() for interpolation. Supported format specifiers include %s (string), %d (number), %j (JSON), and %o (object).
 */

export const LOG = {

  /**
   * Logs a debug message in cyan, filtered by category. Debug messages are only output when the specified category is enabled via the CAMSTREAM_DEBUG environment
   * variable or the --debug CLI flag (which enables all categories).
   * @param category - The debug category (e.g., "probe", "relay").
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  debug: function(category: DebugCategory, message: string, ...args: unknown[]): void {

    if(!isAnyDebugEnabled() || !isCategoryEnabled(category)) {

      return;
    }

    logWithLevel("debug", ANSI_COLORS.cyan, message, args, category);
  },

  /**
   * Logs an error message in red. Use this for failures that abort the run.
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  error: function(message: string, ...args: unknown[]): void {

    logWithLevel("error", ANSI_COLORS.red, message, args);
  },

  /**
   * Logs an informational message in the default terminal color.
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  info: function(message: string, ...args: unknown[]): void {

    logWithLevel("info", "", message, args);
  },

  /**
   * Logs a warning message in yellow. Use this for conditions that do not stop the run but that the operator should look at, such as an overwritten file or a
   * missing camera.
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  warn: function(message: string, ...args: unknown[]): void {

    logWithLevel("warn", ANSI_COLORS.yellow, message, args);
  }
};
