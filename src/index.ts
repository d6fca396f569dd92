#!/usr/bin/env node
/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Entry point for camstream.
 */
import type { DeviceSelection, SetupConfig } from "./types/index.js";
import { DEBUG_CATEGORIES, getDebugCategories, initDebugFilter } from "./utils/debugFilter.js";
import { LOG, setDebugLogging } from "./utils/logger.js";
import { flushLogBufferSync, initializeFileLogger } from "./utils/fileLogger.js";
import { getEncodeCommand, resolveDevice, runSetup } from "./setup/index.js";
import { detectCandidates, selectBestDevice } from "./capture/selector.js";
import type { ConfigLayer } from "./config/userConfig.js";
import type { SetupSummary } from "./setup/index.js";
import { buildConfiguration } from "./config/index.js";
import consoleStamp from "console-stamp";
import { createShellRunner } from "./utils/exec.js";
import { formatCommandLine } from "./streaming/command.js";
import { formatEnvironmentHelp } from "./config/userConfig.js";
import { formatError } from "./utils/errors.js";
import { getPackageVersion } from "./utils/version.js";
import path from "node:path";

/* A failure anywhere in a setup run must stop it: a half-configured endpoint is worse than none, and the operator needs to see why. These handlers catch anything
 * that escapes the command handlers, log it, and exit non-zero.
 */

process.on("unhandledRejection", (reason: unknown): void => {

  LOG.error("Unhandled promise rejection: %s.", formatError(reason));

  process.exit(1);
});

process.on("uncaughtException", (error: Error): void => {

  LOG.error("Uncaught exception: %s.", formatError(error));

  process.exit(1);
});

/**
 * Prints a message to stdout.
 * @param message - The message to print.
 */
function print(message: string): void {

  // eslint-disable-next-line no-console
  console.log(message);
}

/**
 * Prints an error message to stderr.
 * @param message - The error message to print.
 */
function printError(message: string): void {

  // eslint-disable-next-line no-console
  console.error(message);
}

/**
 * Prints usage information to the console.
 */
function printUsage(): void {

  print([
    "Usage: camstream [command] [options]",
    "",
    "Commands:",
    "  detect                          List capture devices, their formats, and the device that would be used",
    "  command                         Print the FFmpeg command that would be installed, without changing anything",
    "",
    "If no command is specified, sets this machine up as a streaming endpoint (requires root).",
    "",
    "Capture options:",
    "  -d, -i, --device <path>         Capture device (default: detected)",
    "  -s, --video-size <WxH>          Capture resolution (default: detected)",
    "  -f, --input-format <format>     Capture format (default: detected)",
    "",
    "Encoding options:",
    "  -c, --codec <codec>             Video codec, or \"copy\" to relay the camera's stream (default: copy)",
    "  -b, --bitrate <rate>            Bitrate when encoding: \"dynamic\" or a number with k, m, or g (default: dynamic)",
    "  --ffmpeg-params <params>        Additional FFmpeg parameters, inserted after the codec",
    "  --ffmpeg <path>                 FFmpeg binary (default: ffmpeg)",
    "",
    "Output options:",
    "  --rtsp                          Publish over RTSP through a relay server instead of DASH",
    "  --rtsp-url <url>                RTSP URL to publish to (default: rtsp://localhost:8554/webcam)",
    "  --no-hls                        Do not publish an HLS playlist alongside the DASH manifest",
    "",
    "Installation options:",
    "  --index-file <path>             HTML viewer page (default: /var/www/html/index.html)",
    "  --on-reboot-file <path>         Boot script (default: /opt/setup_streaming.sh)",
    "  --systemd-file <path>           Encoder systemd unit (default: /etc/systemd/system/encode_webcam.service)",
    "  --safe                          Never overwrite existing files",
    "  --skip-packages                 Do not install OS packages",
    "  --no-start                      Do not start or enable the services",
    "",
    "General options:",
    "  --config <path>                 JSON configuration file",
    "  --debug                         Enable debug logging",
    "  --list-env                      List all environment variables",
    "  --log-file <path>               Mirror log output to a file",
    "  -h, --help                      Show this help message",
    "  -v, --version                   Show version number",
    "",
    "Debug output can be narrowed with CAMSTREAM_DEBUG (e.g., 'probe', 'relay', '*,-exec'). Categories:",
    ...getDebugCategories().map((category) => "  " + category.padEnd(32) + DEBUG_CATEGORIES[category])
  ].join("\n"));
}

/**
 * Prints every environment variable that configures camstream.
 */
function printEnvironmentVariables(): void {

  print([
    "camstream Environment Variables",
    "",
    "Priority: CLI flags > environment variables > config file > defaults.",
    "",
    ...formatEnvironmentHelp(),
    "Special:",
    "  " + "CAMSTREAM_CONFIG".padEnd(30) + "JSON configuration file.",
    "  " + "CAMSTREAM_DEBUG".padEnd(30) + "Debug category filter (e.g., 'probe', 'relay', '*,-exec')."
  ].join("\n"));
}

// The commands camstream understands.
type CliCommand = "command" | "detect" | "setup";

/**
 * Result of parsing command-line arguments. CLI flags have the highest priority in the configuration merge order.
 */
export interface ParsedArgs {

  command: CliCommand;
  configFile?: string;
  debugLogging: boolean;
  listEnv: boolean;
  logFile?: string;
  overrides: ConfigLayer;
}

/**
 * Returns the value following a flag. Prints an error and exits if it is missing.
 * @param flag - The CLI flag name for the error message.
 * @param value - The value following the flag, if any.
 * @returns The value.
 */
function requireValue(flag: string, value: string | undefined): string {

  if(value === undefined) {

    printError("Error: " + flag + " requires a value.");

    process.exit(1);
  }

  return value;
}

/**
 * Returns the path following a flag. Prints an error and exits if it is missing or relative.
 * @param flag - The CLI flag name for the error message.
 * @param value - The value following the flag, if any.
 * @returns The path.
 */
function requireAbsolutePath(flag: string, value: string | undefined): string {

  const filePath = requireValue(flag, value);

  if(!path.isAbsolute(filePath)) {

    printError("Error: " + flag + " requires an absolute path, got: " + filePath);

    process.exit(1);
  }

  return filePath;
}

/**
 * Parses command-line arguments into a structured result. Settings are collected into a configuration layer rather than applied directly, so that the
 * configuration merge can apply them at the correct priority level.
 * @param args - The arguments, without the node binary and script.
 * @returns Parsed arguments.
 */
function parseArgs(args: string[]): ParsedArgs {

  const parsed: ParsedArgs = { command: "setup", debugLogging: false, listEnv: false, overrides: {} };
  const { overrides } = parsed;
  const first = args.at(0);
  let index = 0;

  if((first === "detect") || (first === "command")) {

    parsed.command = first;
    index = 1;
  }

  for(let i = index; i < args.length; i++) {

    const arg = args[i];

    if((arg === "-h") || (arg === "--help")) {

      printUsage();

      process.exit(0);
    }

    if((arg === "-v") || (arg === "--version")) {

      print(getPackageVersion());

      process.exit(0);
    }

    if((arg === "-d") || (arg === "-i") || (arg === "--device")) {

      overrides.device = requireAbsolutePath(arg, args[++i]);
    } else if((arg === "-s") || (arg === "--video-size")) {

      overrides.videoSize = requireValue(arg, args[++i]);
    } else if((arg === "-f") || (arg === "--input-format")) {

      overrides.inputFormat = requireValue(arg, args[++i]);
    } else if((arg === "-c") || (arg === "--codec")) {

      overrides.codec = requireValue(arg, args[++i]);
    } else if((arg === "-b") || (arg === "--bitrate")) {

      overrides.bitrate = requireValue(arg, args[++i]);
    } else if(arg === "--ffmpeg-params") {

      overrides.ffmpegParams = requireValue(arg, args[++i]);
    } else if(arg === "--ffmpeg") {

      overrides.ffmpegPath = requireValue(arg, args[++i]);
    } else if(arg === "--rtsp") {

      overrides.protocol = "rtsp";
    } else if(arg === "--rtsp-url") {

      overrides.rtspUrl = requireValue(arg, args[++i]);
    } else if(arg === "--no-hls") {

      overrides.hls = false;
    } else if(arg === "--index-file") {

      overrides.indexFile = requireAbsolutePath(arg, args[++i]);
    } else if(arg === "--on-reboot-file") {

      overrides.onRebootFile = requireAbsolutePath(arg, args[++i]);
    } else if(arg === "--systemd-file") {

      overrides.systemdFile = requireAbsolutePath(arg, args[++i]);
    } else if(arg === "--safe") {

      overrides.safe = true;
    } else if(arg === "--skip-packages") {

      overrides.skipPackages = true;
    } else if(arg === "--no-start") {

      overrides.startServices = false;
    } else if(arg === "--config") {

      parsed.configFile = requireAbsolutePath(arg, args[++i]);
    } else if(arg === "--debug") {

      parsed.debugLogging = true;
    } else if(arg === "--list-env") {

      parsed.listEnv = true;
    } else if(arg === "--log-file") {

      parsed.logFile = requireAbsolutePath(arg, args[++i]);
    } else {

      printError("Error: unknown option " + arg + ". Run 'camstream --help' for usage.");

      process.exit(1);
    }
  }

  return parsed;
}

/**
 * Describes a device selection for the detect command.
 * @param selection - The selection to describe.
 * @returns The lines to print.
 */
function describeSelection(selection: DeviceSelection): string[] {

  const lines: string[] = [];

  for(const candidate of selection.candidates) {

    lines.push(candidate.path + ":");

    for(const [ format, resolution ] of Object.entries(candidate.formats)) {

      lines.push("  " + format.padEnd(12) + resolution);
    }
  }

  if(selection.candidates.length === 0) {

    lines.push("No capture devices found.");
  }

  lines.push("", "Selected: " + selection.selected.path + " using " + selection.selected.format + " at " + selection.selected.resolution);

  return lines;
}

/**
 * Logs the summary of a setup run, ending with the advisories.
 * @param config - The run configuration.
 * @param summary - The summary to log.
 */
function logSummary(config: Readonly<SetupConfig>, summary: SetupSummary): void {

  for(const artifact of summary.artifacts) {

    LOG.info("%s: %s.", artifact.path, artifact.status);
  }

  if(summary.relay) {

    LOG.info("%s %s: %s.", config.relay.name, summary.relay.versionTag, summary.relay.outcome);
  }

  if(!summary.servicesStarted) {

    LOG.info("Services were not started. Start them with: systemctl start %s", path.basename(config.systemdFile, ".service"));
  }

  for(const url of summary.viewingUrls) {

    LOG.info("Try viewing the stream at %s", url);
  }

  for(const advisory of summary.advisories) {

    LOG.warn(advisory);
  }
}

/**
 * Runs the requested command.
 * @param parsed - Parsed arguments.
 * @returns The process exit code.
 */
async function main(parsed: ParsedArgs): Promise<number> {

  const config = await buildConfiguration({ cliOverrides: parsed.overrides, configFile: parsed.configFile });
  const runner = createShellRunner();

  switch(parsed.command) {

    case "detect": {

      const selection = selectBestDevice(detectCandidates(runner, { ffmpegPath: config.ffmpegPath }));

      print(describeSelection(selection).join("\n"));

      for(const advisory of selection.advisories) {

        LOG.warn(advisory);
      }

      return 0;
    }

    case "command": {

      const selection = resolveDevice(config, runner);

      print(formatCommandLine(getEncodeCommand(config, selection.selected)));

      for(const advisory of selection.advisories) {

        LOG.warn(advisory);
      }

      return 0;
    }

    case "setup": {

      if(process.getuid && (process.getuid() !== 0)) {

        LOG.error("Setting up a streaming endpoint requires root privileges. Run camstream with sudo.");

        return 1;
      }

      LOG.info("camstream v%s starting setup.", getPackageVersion());

      logSummary(config, await runSetup(config, { runner }));

      return 0;
    }
  }
}

/* The entry point parses command-line arguments, configures logging, runs the requested command, and exits with its status. Errors are logged with their message
 * and turn into a non-zero exit code.
 */

const parsedArgs = parseArgs(process.argv.slice(2));

if(parsedArgs.listEnv) {

  printEnvironmentVariables();

  process.exit(0);
}

// The CAMSTREAM_DEBUG environment variable takes precedence over the --debug CLI flag, allowing fine-grained category selection.
const debugEnv = process.env.CAMSTREAM_DEBUG;

if(debugEnv) {

  for(const name of initDebugFilter(debugEnv)) {

    LOG.warn("CAMSTREAM_DEBUG names an unknown debug category '%s'. Run 'camstream --help' for the list.", name);
  }
} else if(parsedArgs.debugLogging) {

  setDebugLogging(true);
}

// A setup run is a log of what was changed, so it gets timestamps. The informational commands print plain output.
if(parsedArgs.command === "setup") {

  consoleStamp.default(console, { format: ":date(yyyy/mm/dd HH:MM:ss.l)" });
}

if(parsedArgs.logFile) {

  initializeFileLogger(parsedArgs.logFile);
}

// Buffered log entries must reach the log file however the process ends.
process.on("exit", (): void => {

  flushLogBufferSync();
});

main(parsedArgs).then((exitCode) => {

  process.exit(exitCode);
}).catch((error: unknown): void => {

  LOG.error("camstream %s failed: %s.", parsedArgs.command, formatError(error));

  process.exit(1);
});
