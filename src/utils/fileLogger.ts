/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.ts: File-based log mirroring for camstream.
 */
import type { Nullable } from "../types/index.js";
import df from "dateformat";
import fs from "node:fs";
import path from "node:path";

/* When the operator passes --log-file, every log entry is mirrored to that file in addition to the console. A setup run is short and strictly sequential, so
 * entries are buffered and appended in small batches with synchronous writes; the buffer is flushed once more when the process exits. Timestamps use the same
 * format as console-stamp for consistency: yyyy/mm/dd HH:MM:ss.l
 */

// Path to the log file, set during initialization.
let logFilePath: Nullable<string> = null;

// Buffer for collecting log entries before flushing to disk.
let writeBuffer: string[] = [];

// Flag indicating whether the file logger is initialized and operational.
let isInitialized = false;

// Number of buffered entries that triggers a flush.
const FLUSH_THRESHOLD = 20;

/**
 * Initializes the file logger, creating the log file and its parent directory if needed.
 * @param logPath - Absolute path to the log file.
 */
export function initializeFileLogger(logPath: string): void {

  try {

    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    fs.appendFileSync(logPath, "", "utf-8");

    logFilePath = logPath;
    isInitialized = true;
  } catch(error) {

    // File logging is a best-effort mirror. The console still carries every message.
    // eslint-disable-next-line no-console
    console.error("Failed to initialize file logger: %s. File logging disabled.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Adds a log entry to the buffer, flushing when the buffer is full.
 * @param level - Log level ("info", "warn", "error", "debug").
 * @param message - The formatted log message.
 * @param categoryTag - Optional debug category tag (e.g., "relay"). Appended to the level prefix as [DEBUG:category].
 */
export function writeLogEntry(level: string, message: string, categoryTag?: string): void {

  if(!isInitialized) {

    return;
  }

  const timestamp = df(new Date(), "yyyy/mm/dd HH:MM:ss.l");
  const levelTag = categoryTag ? [ level.toUpperCase(), ":", categoryTag ].join("") : level.toUpperCase();
  const levelPrefix = (level === "info") ? "" : [ "[", levelTag, "] " ].join("");

  writeBuffer.push([ "[", timestamp, "] ", levelPrefix, message, "\n" ].join(""));

  if(writeBuffer.length >= FLUSH_THRESHOLD) {

    flushLogBufferSync();
  }
}

/**
 * Flushes the write buffer to disk synchronously. Safe to call from a process 'exit' handler.
 */
export function flushLogBufferSync(): void {

  if(!isInitialized || !logFilePath || (writeBuffer.length === 0)) {

    return;
  }

  const content = writeBuffer.join("");

  writeBuffer = [];

  try {

    fs.appendFileSync(logFilePath, content, "utf-8");
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to write log entries: %s.", (error instanceof Error) ? error.message : String(error));
  }
}
