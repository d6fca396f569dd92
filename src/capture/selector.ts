/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * selector.ts: Capture device enumeration and best-choice selection for camstream.
 */
import type { CandidateDevice, DeviceSelection, SelectedDevice } from "../types/index.js";
import type { CommandRunner } from "../utils/exec.js";
import { LOG } from "../utils/logger.js";
import fs from "node:fs";
import path from "node:path";
import { probeDevice } from "./probe.js";

/*
 * DEVICE SELECTION
 *
 * Every /dev/videoN node is probed. Nodes that are not capture devices (the Raspberry Pi's codec and ISP nodes, for example) and cameras whose listing yields no
 * usable format are dropped. The remaining candidates are ranked by a fixed policy:
 *
 * 1. A camera that can hand us H.264 directly wins over one that cannot, wherever it sits in the scan.
 * 2. On the winning camera, formats are tried in FORMAT_PRIORITY order; if none is offered, the first format it listed is used.
 *
 * When nothing is found we still return a usable answer (the Pi camera defaults) together with an advisory, since the operator may connect the camera later.
 */

// Formats in the order we prefer to capture them.
export const FORMAT_PRIORITY = [ "h264", "mjpeg", "yuyv422", "yuv420p" ] as const;

// The format that makes a candidate win over others.
const PREFERRED_FORMAT = "h264";

// Used when no capture device is found at all.
export const FALLBACK_DEVICE: Readonly<SelectedDevice> = Object.freeze({ format: "h264", path: "/dev/video0", resolution: "1920x1080" });

// Advisory surfaced to the operator when the fallback is used.
export const NO_CAMERA_ADVISORY = "No camera detected. Assuming " + FALLBACK_DEVICE.path + " with " + FALLBACK_DEVICE.format + " at " + FALLBACK_DEVICE.resolution +
  ". Connect a camera, or pass --device, --input-format and --video-size.";

// Device node names we probe.
const VIDEO_NODE_PATTERN = /^video(\d+)$/;

/**
 * Lists the V4L2 device nodes in a directory, ordered by device number.
 * @param devDir - The device directory to scan.
 * @returns Absolute paths of the video device nodes (e.g., ["/dev/video0", "/dev/video1"]).
 */
export function listVideoDevices(devDir = "/dev"): string[] {

  let entries: string[];

  try {

    entries = fs.readdirSync(devDir);
  } catch(error) {

    // No device directory means no devices. Anything else is a real problem.
    if((error instanceof Error) && ("code" in error) && (error.code === "ENOENT")) {

      return [];
    }

    throw error;
  }

  return entries
    .map((name) => ({ match: VIDEO_NODE_PATTERN.exec(name), name }))
    .filter((entry): entry is { match: RegExpExecArray; name: string } => entry.match !== null)
    .sort((a, b) => Number(a.match[1]) - Number(b.match[1]))
    .map((entry) => path.join(devDir, entry.name));
}

/**
 * Picks the format to capture with on a candidate.
 * @param candidate - A candidate with at least one format.
 * @returns The chosen format name.
 */
function pickFormat(candidate: CandidateDevice): string {

  for(const format of FORMAT_PRIORITY) {

    if(format in candidate.formats) {

      return format;
    }
  }

  return Object.keys(candidate.formats)[0];
}

/**
 * Applies the selection policy to a list of candidates, in discovery order.
 * @param candidates - Candidates that each offer at least one format. Candidates with no formats are ignored.
 * @returns The selection, with the no-camera advisory when nothing usable was offered.
 */
export function selectBestDevice(candidates: CandidateDevice[]): DeviceSelection {

  const usable = candidates.filter((candidate) => Object.keys(candidate.formats).length > 0);
  let best: CandidateDevice | undefined;

  for(const candidate of usable) {

    // A later candidate replaces the current best unless it would give up H.264.
    if((PREFERRED_FORMAT in candidate.formats) || !best || !(PREFERRED_FORMAT in best.formats)) {

      best = candidate;
    }
  }

  if(!best) {

    LOG.debug("select", "No usable capture device found, falling back to %s.", FALLBACK_DEVICE.path);

    return { advisories: [NO_CAMERA_ADVISORY], candidates: usable, selected: { ...FALLBACK_DEVICE } };
  }

  const format = pickFormat(best);
  const selected: SelectedDevice = { format, path: best.path, resolution: best.formats[format] };

  LOG.debug("select", "Selected %s using %s at %s.", selected.path, selected.format, selected.resolution);

  return { advisories: [], candidates: usable, selected };
}

/**
 * Options for device detection.
 */
export interface DetectOptions {

  // Directory to scan for device nodes.
  devDir?: string;

  // FFmpeg binary used for probing.
  ffmpegPath?: string;
}

/**
 * Probes every video device node and returns the ones that offer at least one format.
 * @param runner - The command runner used for probing.
 * @param options - Detection options.
 * @returns The candidates in discovery order.
 */
export function detectCandidates(runner: CommandRunner, options: DetectOptions = {}): CandidateDevice[] {

  const candidates: CandidateDevice[] = [];

  for(const device of listVideoDevices(options.devDir)) {

    const result = probeDevice(runner, device, options.ffmpegPath);

    if(result.kind === "not-capture") {

      continue;
    }

    if(Object.keys(result.formats).length === 0) {

      LOG.warn("%s looks like a camera but reported no usable formats.", device);

      continue;
    }

    candidates.push({ formats: result.formats, path: device });
  }

  return candidates;
}

/**
 * Scans all capture devices and selects the best device, format, and resolution.
 * @param runner - The command runner used for probing.
 * @param options - Detection options.
 * @returns The selection and any advisories.
 */
export function findBestDevice(runner: CommandRunner, options: DetectOptions = {}): DeviceSelection {

  return selectBestDevice(detectCandidates(runner, options));
}
