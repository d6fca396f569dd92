/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Configuration management for camstream.
 */
import type { ConfigLayer } from "./userConfig.js";
import { getEnvOverrides, loadConfigFile, mergeConfiguration } from "./userConfig.js";
import type { Nullable, SetupConfig } from "../types/index.js";
import { ConfigError, formatError } from "../utils/errors.js";
import { LOG } from "../utils/logger.js";
import path from "node:path";
import { splitParams } from "../streaming/command.js";

/*
 * CONFIGURATION
 *
 * A run is driven by a single SetupConfig record, assembled from four layers with the following priority (highest to lowest):
 *
 * 1. Command line flags
 * 2. Environment variables (CAMSTREAM_*)
 * 3. A JSON config file, named by --config or CAMSTREAM_CONFIG
 * 4. Hard-coded defaults (defined in userConfig.ts)
 *
 * The merged record is validated as a whole, with every problem reported at once, and then frozen. Components receive it as a parameter; nothing reads flags or
 * the environment on its own.
 */

// Environment variable naming the config file.
export const CONFIG_FILE_ENV = "CAMSTREAM_CONFIG";

// Accepted bitrate specifiers: "dynamic", or a number (possibly fractional) with an optional unit.
const BITRATE_PATTERN = /^(dynamic|\d+(\.\d+)?[kmg]?)$/i;

// Accepted video sizes.
const VIDEO_SIZE_PATTERN = /^\d+x\d+$/;

/**
 * Options for building the configuration.
 */
export interface BuildConfigOptions {

  // Settings from the command line.
  cliOverrides?: ConfigLayer;

  // Config file from the command line. Takes precedence over CAMSTREAM_CONFIG.
  configFile?: Nullable<string>;

  // The environment to read. Defaults to process.env.
  env?: NodeJS.ProcessEnv;
}

/**
 * Validates a merged configuration.
 * @param config - The configuration to validate.
 * @returns A list of problems, empty when the configuration is valid.
 */
export function validateConfiguration(config: SetupConfig): string[] {

  const problems: string[] = [];

  if(!BITRATE_PATTERN.test(config.bitrate.trim())) {

    problems.push("bitrate must be \"dynamic\" or a number with an optional k, m, or g suffix, got \"" + config.bitrate + "\"");
  }

  if((config.videoSize !== null) && !VIDEO_SIZE_PATTERN.test(config.videoSize)) {

    problems.push("video size must look like 1920x1080, got \"" + config.videoSize + "\"");
  }

  try {

    splitParams(config.ffmpegParams);
  } catch(error) {

    problems.push("FFmpeg parameters: " + formatError(error));
  }

  if(config.codec.trim().length === 0) {

    problems.push("codec must not be empty");
  }

  if((config.protocol === "rtsp") && !config.rtspUrl.startsWith("rtsp://")) {

    problems.push("RTSP URL must start with rtsp://, got \"" + config.rtspUrl + "\"");
  }

  const paths: [string, Nullable<string>][] = [
    [ "device", config.device ],
    [ "DASH output", config.dashOutput ],
    [ "index file", config.indexFile ],
    [ "on-reboot file", config.onRebootFile ],
    [ "rc.local file", config.rcLocalFile ],
    [ "systemd file", config.systemdFile ],
    [ "relay install directory", config.relay.installDir ],
    [ "relay systemd file", config.relay.systemdFile ]
  ];

  for(const [ label, value ] of paths) {

    if((value !== null) && !path.isAbsolute(value)) {

      problems.push(label + " must be an absolute path, got \"" + value + "\"");
    }
  }

  return problems;
}

/**
 * Builds the configuration for a run from the config file, the environment, and the command line.
 * @param options - Where the layers come from.
 * @returns The validated, frozen configuration.
 * @throws ConfigError when any layer or the merged result is invalid.
 */
export async function buildConfiguration(options: BuildConfigOptions = {}): Promise<Readonly<SetupConfig>> {

  const env = options.env ?? process.env;
  const configFile = options.configFile ?? env[CONFIG_FILE_ENV] ?? null;
  const layers: ConfigLayer[] = [];

  if(configFile) {

    layers.push(await loadConfigFile(configFile));
  }

  layers.push(getEnvOverrides(env));

  if(options.cliOverrides) {

    layers.push(options.cliOverrides);
  }

  const config = mergeConfiguration(layers);
  const problems = validateConfiguration(config);

  if(problems.length > 0) {

    throw new ConfigError(problems);
  }

  LOG.debug("config", "Effective configuration: %s", JSON.stringify(config));

  return Object.freeze({ ...config, relay: Object.freeze({ ...config.relay }) });
}
