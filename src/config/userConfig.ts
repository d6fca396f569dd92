/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * userConfig.ts: Setting metadata, defaults, and configuration layers for camstream.
 */
import type { Nullable, SetupConfig } from "../types/index.js";
import { ConfigError } from "../utils/errors.js";
import { LOG } from "../utils/logger.js";
import { RELAY_RELEASE_URL } from "../relay/release.js";
import fs from "node:fs";
import { z } from "zod";

const { promises: fsPromises } = fs;

/*
 * SETTING METADATA
 *
 * Every setting that can come from the config file or the environment is described once here. The metadata drives environment variable parsing and the
 * --list-env listing, so adding a setting means adding an entry below, a default, and a schema field.
 */

/**
 * Metadata for a single setting.
 */
export interface SettingMetadata {

  // Human-readable description shown by --list-env.
  description: string;

  // Environment variable that can override this setting, or null if not overridable.
  envVar: Nullable<string>;

  // Dot-separated path to the setting (e.g., "relay.installDir").
  path: string;

  // Data type used when parsing the environment variable.
  type: "boolean" | "path" | "string";

  // Valid values for string type settings.
  validValues?: string[];
}

/**
 * Setting metadata, grouped by functional area.
 */
export const CONFIG_METADATA: Record<string, SettingMetadata[]> = {

  capture: [
    {

      description: "Capture device. Leave unset to pick the best camera automatically.",
      envVar: "CAMSTREAM_DEVICE",
      path: "device",
      type: "path"
    },
    {

      description: "Capture resolution as WxH (e.g., 1920x1080). Leave unset to use the best resolution the camera offers.",
      envVar: "CAMSTREAM_VIDEO_SIZE",
      path: "videoSize",
      type: "string"
    },
    {

      description: "Capture format (e.g., h264, mjpeg). Leave unset to use the best format the camera offers.",
      envVar: "CAMSTREAM_INPUT_FORMAT",
      path: "inputFormat",
      type: "string"
    }
  ],

  encoder: [
    {

      description: "Video codec. \"copy\" relays the camera's stream unchanged; h264_v4l2m2m uses the hardware encoder on a Raspberry Pi.",
      envVar: "CAMSTREAM_CODEC",
      path: "codec",
      type: "string"
    },
    {

      description: "Video bitrate when encoding: \"dynamic\" to derive it from the resolution, or a number with an optional k, m, or g suffix.",
      envVar: "CAMSTREAM_BITRATE",
      path: "bitrate",
      type: "string"
    },
    {

      description: "Additional FFmpeg parameters, inserted after the codec.",
      envVar: "CAMSTREAM_FFMPEG_PARAMS",
      path: "ffmpegParams",
      type: "string"
    },
    {

      description: "FFmpeg binary used for probing and streaming.",
      envVar: "CAMSTREAM_FFMPEG",
      path: "ffmpegPath",
      type: "string"
    }
  ],

  output: [
    {

      description: "Delivery protocol.",
      envVar: "CAMSTREAM_PROTOCOL",
      path: "protocol",
      type: "string",
      validValues: [ "dash", "rtsp" ]
    },
    {

      description: "Publish an HLS playlist alongside the DASH manifest.",
      envVar: "CAMSTREAM_HLS",
      path: "hls",
      type: "boolean"
    },
    {

      description: "DASH manifest FFmpeg writes to.",
      envVar: null,
      path: "dashOutput",
      type: "path"
    },
    {

      description: "RTSP URL FFmpeg publishes to.",
      envVar: "CAMSTREAM_RTSP_URL",
      path: "rtspUrl",
      type: "string"
    }
  ],

  install: [
    {

      description: "HTML viewer page.",
      envVar: "CAMSTREAM_INDEX_FILE",
      path: "indexFile",
      type: "path"
    },
    {

      description: "Script that recreates the streaming directory at boot.",
      envVar: "CAMSTREAM_ON_REBOOT_FILE",
      path: "onRebootFile",
      type: "path"
    },
    {

      description: "Encoder systemd unit.",
      envVar: "CAMSTREAM_SYSTEMD_FILE",
      path: "systemdFile",
      type: "path"
    },
    {

      description: "Boot script that runs the on-reboot script.",
      envVar: null,
      path: "rcLocalFile",
      type: "path"
    },
    {

      description: "Never overwrite existing files.",
      envVar: "CAMSTREAM_SAFE",
      path: "safe",
      type: "boolean"
    },
    {

      description: "Skip OS package installation.",
      envVar: null,
      path: "skipPackages",
      type: "boolean"
    },
    {

      description: "Start and enable the services after installing them.",
      envVar: null,
      path: "startServices",
      type: "boolean"
    }
  ],

  relay: [
    {

      description: "Directory the RTSP relay server is installed into.",
      envVar: "CAMSTREAM_RELAY_DIR",
      path: "relay.installDir",
      type: "path"
    },
    {

      description: "Release API endpoint describing the latest RTSP relay server release.",
      envVar: "CAMSTREAM_RELAY_RELEASE_URL",
      path: "relay.releaseUrl",
      type: "string"
    },
    {

      description: "RTSP relay server systemd unit.",
      envVar: null,
      path: "relay.systemdFile",
      type: "path"
    }
  ]
};

/*
 * DEFAULTS
 */

/**
 * Hard-coded default configuration values. These are the baseline values used when no other layer provides a value.
 */
export const DEFAULTS: Readonly<SetupConfig> = Object.freeze({

  bitrate: "dynamic",
  codec: "copy",
  dashOutput: "/dev/shm/streaming/manifest.mpd",
  device: null,
  ffmpegParams: "",
  ffmpegPath: "ffmpeg",
  hls: true,
  indexFile: "/var/www/html/index.html",
  inputFormat: null,
  onRebootFile: "/opt/setup_streaming.sh",
  protocol: "dash",
  rcLocalFile: "/etc/rc.local",
  relay: Object.freeze({

    installDir: "/opt/mediamtx",
    name: "mediamtx",
    os: "linux",
    releaseUrl: RELAY_RELEASE_URL,
    systemdFile: "/etc/systemd/system/mediamtx.service"
  }),
  rtspUrl: "rtsp://localhost:8554/webcam",
  safe: false,
  skipPackages: false,
  startServices: true,
  systemdFile: "/etc/systemd/system/encode_webcam.service",
  videoSize: null
});

/*
 * CONFIGURATION LAYERS
 *
 * A layer is a partial configuration. The config file and the environment are both decoded through the same schema, so a value means the same thing wherever it
 * comes from. The CLI builds its layer directly.
 */

const RelayLayerSchema = z.object({

  installDir: z.string().min(1),
  name: z.string().min(1),
  os: z.string().min(1),
  releaseUrl: z.string().url(),
  systemdFile: z.string().min(1)
}).partial().strict();

const ConfigLayerSchema = z.object({

  bitrate: z.string().min(1),
  codec: z.string().min(1),
  dashOutput: z.string().min(1),
  device: z.string().min(1).nullable(),
  ffmpegParams: z.string(),
  ffmpegPath: z.string().min(1),
  hls: z.boolean(),
  indexFile: z.string().min(1),
  inputFormat: z.string().min(1).nullable(),
  onRebootFile: z.string().min(1),
  protocol: z.enum([ "dash", "rtsp" ]),
  rcLocalFile: z.string().min(1),
  relay: RelayLayerSchema,
  rtspUrl: z.string().min(1),
  safe: z.boolean(),
  skipPackages: z.boolean(),
  startServices: z.boolean(),
  systemdFile: z.string().min(1),
  videoSize: z.string().min(1).nullable()
}).partial().strict();

// A partial configuration from a single source.
export type ConfigLayer = z.infer<typeof ConfigLayerSchema>;

/**
 * Describes zod issues as "path: message" strings.
 * @param issues - The issues reported by a failed parse.
 * @param describePath - Maps an issue path to the name the operator knows the setting by.
 * @returns One problem description per issue.
 */
function describeIssues(issues: z.ZodIssue[], describePath: (issuePath: string) => string): string[] {

  return issues.map((issue) => {

    const issuePath = issue.path.join(".");

    return (issuePath ? describePath(issuePath) + ": " : "") + issue.message;
  });
}

/**
 * Decodes and validates a configuration layer.
 * @param value - The raw layer.
 * @param describePath - Maps a setting path to the name the operator knows it by.
 * @returns The validated layer.
 * @throws ConfigError when the layer does not match the schema.
 */
function parseLayer(value: unknown, describePath: (issuePath: string) => string): ConfigLayer {

  const parsed = ConfigLayerSchema.safeParse(value);

  if(!parsed.success) {

    throw new ConfigError(describeIssues(parsed.error.issues, describePath));
  }

  return parsed.data;
}

/**
 * Loads a JSON configuration file.
 * @param filePath - The configuration file.
 * @returns The validated configuration layer.
 * @throws ConfigError when the file cannot be read, is not JSON, or holds unknown or mistyped settings.
 */
export async function loadConfigFile(filePath: string): Promise<ConfigLayer> {

  let content: string;

  try {

    content = await fsPromises.readFile(filePath, "utf-8");
  } catch(error) {

    throw new ConfigError([ "cannot read configuration file " + filePath + ": " + ((error instanceof Error) ? error.message : String(error)) ]);
  }

  let data: unknown;

  try {

    data = JSON.parse(content);
  } catch(error) {

    throw new ConfigError([ "invalid JSON in configuration file " + filePath + ": " + ((error instanceof Error) ? error.message : String(error)) ]);
  }

  const layer = parseLayer(data, (issuePath) => filePath + " " + issuePath);

  LOG.debug("config", "Loaded %s setting(s) from %s.", Object.keys(layer).length, filePath);

  return layer;
}

/**
 * Checks whether a value is a plain object.
 * @param value - The value to check.
 * @returns True for non-null, non-array objects.
 */
function isRecord(value: unknown): value is Record<string, unknown> {

  return (typeof value === "object") && (value !== null) && !Array.isArray(value);
}

/**
 * Sets a value in a nested object using a dot-separated path, creating intermediate objects as needed.
 * @param target - The object to modify.
 * @param keyPath - Dot-separated path (e.g., "relay.installDir").
 * @param value - The value to set.
 */
function setNestedValue(target: Record<string, unknown>, keyPath: string, value: unknown): void {

  const [ head, ...rest ] = keyPath.split(".");

  if(rest.length === 0) {

    target[head] = value;

    return;
  }

  const existing = target[head];
  const child: Record<string, unknown> = isRecord(existing) ? existing : {};

  target[head] = child;
  setNestedValue(child, rest.join("."), value);
}

/**
 * Parses an environment variable value according to the setting's type.
 * @param value - The raw value.
 * @param type - The setting type.
 * @returns The parsed value.
 */
function parseEnvValue(value: string, type: SettingMetadata["type"]): boolean | string {

  if(type === "boolean") {

    // Accept common truthy values for environment variables.
    const lower = value.trim().toLowerCase();

    return (lower === "true") || (lower === "1") || (lower === "yes");
  }

  return value;
}

/**
 * Returns every setting, across all groups.
 * @returns The flattened setting metadata.
 */
export function getAllSettings(): SettingMetadata[] {

  return Object.values(CONFIG_METADATA).flat();
}

/**
 * Builds the configuration layer from environment variables.
 * @param env - The environment to read.
 * @returns The validated layer. Only settings whose variable is set are present.
 * @throws ConfigError when a variable holds an invalid value.
 */
export function getEnvOverrides(env: NodeJS.ProcessEnv = process.env): ConfigLayer {

  const raw: Record<string, unknown> = {};
  const envVarByPath = new Map<string, string>();

  for(const setting of getAllSettings()) {

    const envValue = setting.envVar ? env[setting.envVar] : undefined;

    if(!setting.envVar || (envValue === undefined) || (envValue.length === 0)) {

      continue;
    }

    envVarByPath.set(setting.path, setting.envVar);
    setNestedValue(raw, setting.path, parseEnvValue(envValue, setting.type));

    LOG.debug("config", "%s overrides %s.", setting.envVar, setting.path);
  }

  return parseLayer(raw, (issuePath) => envVarByPath.get(issuePath) ?? issuePath);
}

/**
 * Merges configuration layers over the defaults. Later layers take precedence over earlier ones.
 * @param layers - The layers, lowest priority first.
 * @returns The merged configuration.
 */
export function mergeConfiguration(layers: ConfigLayer[]): SetupConfig {

  let config: SetupConfig = { ...DEFAULTS, relay: { ...DEFAULTS.relay } };

  for(const layer of layers) {

    const { relay, ...settings } = layer;

    config = { ...config, ...settings, relay: { ...config.relay, ...relay } };
  }

  return config;
}

/**
 * Lists the environment variables that configure camstream, one line per variable.
 * @returns The formatted lines.
 */
export function formatEnvironmentHelp(): string[] {

  const lines: string[] = [];

  for(const [ group, settings ] of Object.entries(CONFIG_METADATA)) {

    const documented = settings.filter((setting) => setting.envVar);

    if(documented.length === 0) {

      continue;
    }

    lines.push(group.charAt(0).toUpperCase() + group.slice(1) + ":");

    for(const setting of documented) {

      lines.push("  " + (setting.envVar ?? "").padEnd(30) + setting.description + (setting.validValues ? " (" + setting.validValues.join(", ") + ")" : ""));
    }

    lines.push("");
  }

  return lines;
}
