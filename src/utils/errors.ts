/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * errors.ts: Error types and formatting utilities for camstream.
 */

/* These utilities provide consistent error handling and formatting throughout the application. The formatError function extracts meaningful messages from various
 * error types. The error classes cover the failures that abort a run: they carry enough context (the command, the architecture, the available release assets) for
 * an operator to diagnose the problem from the log alone.
 */

/**
 * Formats an error for logging by extracting the message if available, falling back to string conversion for non-Error objects. Trailing punctuation is stripped
 * to allow callers to add consistent punctuation in their log format strings.
 * @param error - The error to format.
 * @returns A string representation suitable for logging, without trailing punctuation.
 */
export function formatError(error: unknown): string {

  let message: string;

  if(error instanceof Error) {

    message = error.message;
  } else if(error && (typeof error === "object") && ("message" in error) && (typeof error.message === "string")) {

    message = error.message;
  } else {

    message = String(error);
  }

  // Strip trailing punctuation to prevent double punctuation when callers add their own.
  return message.replace(/[.!?]+$/, "");
}

/**
 * Raised by the command runner when a shell command exits with a non-zero status. The combined output is kept so the caller can log what the tool said.
 */
export class CommandError extends Error {

  public readonly command: string;
  public readonly output: string;
  public readonly status: number;

  constructor(command: string, status: number, output: string) {

    super("Command '" + command + "' exited with status " + String(status));

    this.name = "CommandError";
    this.command = command;
    this.output = output;
    this.status = status;
  }
}

/**
 * Raised when the configuration layers produce invalid values. All problems are collected so the operator can fix them in one pass.
 */
export class ConfigError extends Error {

  public readonly problems: string[];

  constructor(problems: string[]) {

    super("Invalid configuration: " + problems.join("; "));

    this.name = "ConfigError";
    this.problems = problems;
  }
}

/**
 * Raised when the command synthesizer is handed a delivery protocol it does not know. This is a programming or configuration error, never a runtime condition.
 */
export class InvalidSynthesisTargetError extends Error {

  constructor(protocol: string) {

    super("Cannot build an output clause for unknown protocol '" + protocol + "'");

    this.name = "InvalidSynthesisTargetError";
  }
}

/**
 * Raised when the local CPU architecture has no entry in any architecture mapping table.
 */
export class UnsupportedArchitectureError extends Error {

  public readonly architecture: string;
  public readonly availableAssets: string[];

  constructor(architecture: string, availableAssets: string[]) {

    super("Unsupported architecture '" + architecture + "'. Available release assets: " + (availableAssets.join(", ") || "(none)"));

    this.name = "UnsupportedArchitectureError";
    this.architecture = architecture;
    this.availableAssets = availableAssets;
  }
}

/**
 * Raised when no release asset matches the local OS and architecture after every fallback has been tried.
 */
export class NoMatchingReleaseAssetError extends Error {

  public readonly architectureToken: string;
  public readonly availableAssets: string[];

  constructor(os: string, architectureToken: string, availableAssets: string[]) {

    super("No release asset matches " + os + "_" + architectureToken + ". Available release assets: " + (availableAssets.join(", ") || "(none)"));

    this.name = "NoMatchingReleaseAssetError";
    this.architectureToken = architectureToken;
    this.availableAssets = availableAssets;
  }
}
