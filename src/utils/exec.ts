/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * exec.ts: Shell command execution port for camstream.
 */
import { CommandError } from "./errors.js";
import { LOG } from "./logger.js";
import { spawnSync } from "node:child_process";

/*
 * COMMAND RUNNER
 *
 * Every external tool camstream touches (ffmpeg for probing, uname, systemctl, apt, tar, the relay binary itself) goes through this narrow interface. Components
 * receive a CommandRunner as a parameter instead of calling child_process directly, which lets the parsing and policy logic be tested with an in-memory fake.
 *
 * Two flavors are offered:
 * - run(): executes a command, returns its combined output, and throws CommandError on a non-zero exit. This is the default for anything that changes the system.
 * - capture(): executes a command and returns stdout, stderr, and the exit status without throwing. Probing needs this because ffmpeg -list_formats always exits
 *   non-zero after printing the format table to stderr.
 */

/**
 * Output of a command executed with capture().
 */
export interface CaptureResult {

  status: number;
  stderr: string;
  stdout: string;
}

/**
 * Options for a single command execution.
 */
export interface RunOptions {

  // Working directory for the command.
  cwd?: string;
}

/**
 * The execution port handed to every component that needs to run an external tool.
 */
export interface CommandRunner {

  // Run a command and return stdout and stderr separately, regardless of the exit status.
  capture(command: string, options?: RunOptions): CaptureResult;

  // Run a command and return its combined output. Throws CommandError when the command exits non-zero.
  run(command: string, options?: RunOptions): string;
}

// Large enough for a full apt or tar listing.
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/**
 * Executes a command through the shell and collects its output.
 * @param command - The shell command line.
 * @param options - Execution options.
 * @returns The captured output and exit status.
 */
function execute(command: string, options: RunOptions = {}): CaptureResult {

  LOG.debug("exec", "Executing%s: %s", options.cwd ? " in " + options.cwd : "", command);

  const result = spawnSync(command, {

    cwd: options.cwd,
    encoding: "utf8",
    maxBuffer: MAX_OUTPUT_BYTES,
    shell: true,
    stdio: [ "ignore", "pipe", "pipe" ]
  });

  // The shell itself could not be started. There is no exit status to report.
  if(result.error) {

    throw result.error;
  }

  return {

    // A command killed by a signal has no exit status. Treat it as a failure.
    status: result.status ?? 1,
    stderr: result.stderr,
    stdout: result.stdout
  };
}

/**
 * Creates the CommandRunner that executes commands on the local machine.
 * @returns A CommandRunner backed by the system shell.
 */
export function createShellRunner(): CommandRunner {

  return {

    capture(command: string, options?: RunOptions): CaptureResult {

      return execute(command, options);
    },

    run(command: string, options?: RunOptions): string {

      const result = execute(command, options);
      const output = result.stdout + result.stderr;

      for(const line of output.split("\n")) {

        if(line.trim().length > 0) {

          LOG.debug("exec", "%s", line.trimEnd());
        }
      }

      if(result.status !== 0) {

        throw new CommandError(command, result.status, output);
      }

      return output;
    }
  };
}

/**
 * Quotes a value for safe use as a single shell word.
 * @param value - The value to quote.
 * @returns The value wrapped in single quotes, with embedded single quotes escaped.
 */
export function shellQuote(value: string): string {

  if(/^[A-Za-z0-9_./:=@%+-]+$/.test(value)) {

    return value;
  }

  return "'" + value.replace(/'/g, "'\\''") + "'";
}
