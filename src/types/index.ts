/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Type definitions for camstream.
 */

/**
 * A utility type that represents a value that can be null.
 * @typeParam T - The type that can be nullable.
 */
export type Nullable<T> = T | null;

/*
 * CAPTURE TYPES
 *
 * These describe what the V4L2 probe reports about a device and what the selector decides from it. Resolutions are carried as "WxH" strings because that is the
 * form FFmpeg takes on its command line (-s 1920x1080) and the form the operator types on ours.
 */

/**
 * One format line from the probe output, split into its format name and the raw resolution expression (literal, enumerated, or a brace range).
 */
export interface CaptureFormatEntry {

  formatName: string;
  resolution: string;
}

/**
 * A device node that answered the probe with at least one usable format. Formats map to the best resolution found for that format.
 */
export interface CandidateDevice {

  formats: Record<string, string>;
  path: string;
}

/**
 * The outcome of probing a single device node. A node that is not a capture device at all (metadata nodes, encoders) is distinct from a camera whose listing we
 * could not parse, which yields an empty format map.
 */
export type ProbeResult = { formats: Record<string, string>; kind: "capture" } | { kind: "not-capture" };

/**
 * The single device, format and resolution the stream will be captured with.
 */
export interface SelectedDevice {

  format: string;
  path: string;
  resolution: string;
}

/**
 * The selector's answer plus any advisories (for example, no camera found) that the caller should surface to the operator at the end of the run.
 */
export interface DeviceSelection {

  advisories: string[];
  candidates: CandidateDevice[];
  selected: SelectedDevice;
}

/*
 * STREAMING TYPES
 */

// The delivery protocols we can generate an FFmpeg output clause for.
export type StreamProtocol = "dash" | "rtsp";

/**
 * Where and how FFmpeg delivers the stream. The protocol tag alone decides the output clause of the generated command.
 */
export type EncodeTarget = { hlsEnabled: boolean; outputPath: string; protocol: "dash" } | { outputPath: string; protocol: "rtsp" };

/**
 * A fully resolved process invocation. Arguments are kept as an ordered list and never re-parsed from the joined command line.
 */
export interface CommandSpec {

  args: readonly string[];
  binaryPath: string;
}

/*
 * INSTALLATION TYPES
 */

/**
 * A whole file we generate and install.
 */
export interface FileArtifact {

  content: string;
  mode: number;
  overwriteAllowed: boolean;
  path: string;
}

// What the installer did with a whole-file artifact.
export type ArtifactStatus = "overwritten" | "skipped" | "written";

/**
 * A one-time insertion of a block of lines into a file that other subsystems also own, such as /etc/rc.local. The marker makes the patch idempotent and the anchor
 * tells us where the block belongs.
 */
export interface AnchoredPatch {

  anchor: string;
  lines: string[];
  marker: string;

  // Mode of the file when we have to create it.
  mode: number;

  // Content of the file when we have to create it, before the block is inserted. Must contain the anchor.
  skeleton: string[];

  targetFile: string;
}

// What the installer did with an anchored patch. "appended" and "refused" both mean the anchor was not found.
export type PatchStatus = "appended" | "applied" | "created" | "refused" | "unchanged";

/**
 * A release asset resolved for this machine.
 */
export interface BinaryRelease {

  architectureToken: string;
  assetName: string;
  downloadUrl: string;
  versionTag: string;
}

/**
 * The copy of a binary already on disk, with the version it reports about itself.
 */
export interface InstalledBinary {

  path: string;
  versionTag: string;
}

/*
 * CONFIGURATION TYPES
 *
 * SetupConfig is the single immutable record every component receives as a parameter. Nothing reads global flags: the overwrite policy, paths, and encoder options
 * all flow from here.
 */

/**
 * Settings for the RTSP relay server binary.
 */
export interface RelayConfig {

  // Directory the release archive is extracted into. The binary and its YAML configuration live directly inside it.
  installDir: string;

  // Name of the binary inside the release archive and of its systemd unit.
  name: string;

  // Operating system token used to pick the release asset (e.g., "linux").
  os: string;

  // URL of the "latest release" descriptor in the GitHub releases API.
  releaseUrl: string;

  // Where the relay's systemd unit is installed.
  systemdFile: string;
}

/**
 * The complete configuration for a run. Values left null for device, video size, and input format are filled in from device detection.
 */
export interface SetupConfig {

  bitrate: string;
  codec: string;
  dashOutput: string;
  device: Nullable<string>;
  ffmpegParams: string;
  ffmpegPath: string;
  hls: boolean;
  indexFile: string;
  inputFormat: Nullable<string>;
  onRebootFile: string;
  protocol: StreamProtocol;
  rcLocalFile: string;
  relay: RelayConfig;
  rtspUrl: string;
  safe: boolean;
  skipPackages: boolean;
  startServices: boolean;
  systemdFile: string;
  videoSize: Nullable<string>;
}
