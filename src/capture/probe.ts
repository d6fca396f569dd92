/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * probe.ts: V4L2 capability probing and format listing parser for camstream.
 */
import type { CaptureFormatEntry, Nullable, ProbeResult } from "../types/index.js";
import type { CommandRunner } from "../utils/exec.js";
import { LOG } from "../utils/logger.js";
import { shellQuote } from "../utils/exec.js";

/*
 * FORMAT LISTING GRAMMAR
 *
 * `ffmpeg -hide_banner -f video4linux2 -list_formats all -i /dev/videoN` prints the formats a V4L2 device supports to stderr, one per line:
 *
 *   [video4linux2,v4l2 @ 0xf0cf70] Raw       :     yuyv422 :           YUYV 4:2:2 : {32-2592, 2}x{32-1944, 2}
 *   [video4linux2,v4l2 @ 0xf0cf70] Compressed:       mjpeg :          Motion-JPEG : 640x480 160x120 320x240 1280x720
 *
 * Parsing is split into three small steps, each tested on its own:
 *
 * 1. Line classifier. Only lines that start with the capture subsystem tag and carry more than two ": " separators are format lines. FFmpeg's other chatter is
 *    ignored.
 * 2. Field splitter. Everything after the first "]" is split on ": " into kind, format name, description, and resolution expression.
 * 3. Resolution dispatcher. Stepwise devices advertise a brace range and we take its upper bounds. Discrete devices list every frame size and we take the one with
 *    the largest area. Either way, anything 2000 pixels wide or more is clamped to 1080p: single-board encoders cannot keep up with it.
 */

// Prefix that marks a line from FFmpeg's V4L2 input device.
export const V4L2_LINE_PREFIX = "[video4linux2";

// Text FFmpeg prints when the device node exists but cannot capture video.
export const NOT_A_CAPTURE_DEVICE = "Not a video capture device";

// Format name FFmpeg reports for pixel formats it cannot handle.
export const UNSUPPORTED_FORMAT = "Unsupported";

// Field separator inside a format line.
const FIELD_SEPARATOR = ": ";

// Widths at or above this value are not trusted.
export const MAX_SAFE_WIDTH = 2000;

// The resolution used instead of an untrusted one.
export const SAFE_RESOLUTION = "1920x1080";

// Matches a stepwise range expression such as "{32-2592, 2}x{32-1944, 2}", capturing the width and height upper bounds.
const RANGE_PATTERN = /\{\s*\d+\s*-\s*(\d+)\s*,\s*\d+\s*\}\s*x\s*\{\s*\d+\s*-\s*(\d+)\s*,\s*\d+\s*\}/;

// Matches a single discrete frame size such as "1280x720".
const SIZE_PATTERN = /^(\d+)x(\d+)$/;

/**
 * Applies the width ceiling to a parsed resolution.
 * @param width - Parsed width in pixels.
 * @param height - Parsed height in pixels.
 * @returns The resolution as "WxH", or SAFE_RESOLUTION when the width is not trusted.
 */
function clampResolution(width: number, height: number): string {

  if(width >= MAX_SAFE_WIDTH) {

    return SAFE_RESOLUTION;
  }

  return String(width) + "x" + String(height);
}

/**
 * Line classifier: decides whether a line of probe output belongs to the format table.
 * @param line - A single line of probe output.
 * @returns True if the line should be split into fields.
 */
export function isFormatLine(line: string): boolean {

  return line.startsWith(V4L2_LINE_PREFIX) && (line.split(FIELD_SEPARATOR).length - 1 > 2);
}

/**
 * Field splitter: extracts the format name and resolution expression from a format line.
 * @param line - A line accepted by isFormatLine().
 * @returns The parsed entry, or null if the line does not have exactly four fields.
 */
export function splitFormatLine(line: string): Nullable<CaptureFormatEntry> {

  const bracket = line.indexOf("]");

  if(bracket === -1) {

    return null;
  }

  const fields = line.slice(bracket + 1).split(FIELD_SEPARATOR);

  if(fields.length !== 4) {

    return null;
  }

  return { formatName: fields[1].trim(), resolution: fields[3].trim() };
}

/**
 * Parses a stepwise range expression by taking the upper bound of each axis.
 * @param expression - A resolution expression such as "{32-2592, 2}x{32-1944, 2}".
 * @returns The clamped resolution, or null if the expression is malformed.
 */
export function parseRangeResolution(expression: string): Nullable<string> {

  const match = RANGE_PATTERN.exec(expression);

  if(!match) {

    LOG.warn("Could not figure out resolution from: %s", expression);

    return null;
  }

  return clampResolution(Number(match[1]), Number(match[2]));
}

/**
 * Parses a space-separated list of discrete frame sizes by picking the one with the largest area. Ties keep the earlier entry. Malformed tokens are logged and
 * skipped.
 * @param expression - A resolution expression such as "640x480 1280x720".
 * @returns The clamped resolution, or null if no token could be parsed.
 */
export function parseEnumeratedResolution(expression: string): Nullable<string> {

  let bestWidth = 0;
  let bestHeight = 0;

  for(const option of expression.split(/\s+/).filter((token) => token.length > 0)) {

    const match = SIZE_PATTERN.exec(option);

    if(!match) {

      LOG.warn("Could not figure out resolution from: %s", option);

      continue;
    }

    const width = Number(match[1]);
    const height = Number(match[2]);

    if((width * height) > (bestWidth * bestHeight)) {

      bestWidth = width;
      bestHeight = height;
    }
  }

  if((bestWidth === 0) || (bestHeight === 0)) {

    return null;
  }

  return clampResolution(bestWidth, bestHeight);
}

/**
 * Resolution dispatcher: routes an expression to the range or enumerated grammar.
 * @param expression - The raw resolution field of a format line.
 * @returns The best resolution the expression offers, or null if none could be parsed.
 */
export function parseResolution(expression: string): Nullable<string> {

  return expression.includes("{") ? parseRangeResolution(expression) : parseEnumeratedResolution(expression);
}

/**
 * Parses the format table out of the probe's stderr output. Lines that fail to parse are logged and skipped; they reduce the result instead of aborting it.
 * @param output - The probe's stderr.
 * @returns A map of format name to best resolution. Later lines for the same format replace earlier ones.
 */
export function parseFormatListing(output: string): Record<string, string> {

  const formats: Record<string, string> = {};

  for(const line of output.split(/\r?\n/)) {

    if(!isFormatLine(line)) {

      continue;
    }

    const entry = splitFormatLine(line);

    if(!entry) {

      LOG.warn("Could not parse format line '%s'.", line);

      continue;
    }

    if(entry.formatName === UNSUPPORTED_FORMAT) {

      LOG.debug("probe", "Skipping unsupported format line: %s", line);

      continue;
    }

    const resolution = parseResolution(entry.resolution);

    if(!resolution) {

      continue;
    }

    LOG.debug("probe", "Format %s offers %s.", entry.formatName, resolution);

    formats[entry.formatName] = resolution;
  }

  return formats;
}

/**
 * Probes a device node for its supported formats.
 * @param runner - The command runner used to invoke FFmpeg.
 * @param device - The device node path (e.g., "/dev/video0").
 * @param ffmpegPath - The FFmpeg binary to probe with.
 * @returns "not-capture" when the node is not a capture device, otherwise the parsed format map (possibly empty).
 */
export function probeDevice(runner: CommandRunner, device: string, ffmpegPath = "ffmpeg"): ProbeResult {

  const result = runner.capture([ shellQuote(ffmpegPath), "-hide_banner -f video4linux2 -list_formats all -i", shellQuote(device) ].join(" "));

  if(result.stdout.includes(NOT_A_CAPTURE_DEVICE) || result.stderr.includes(NOT_A_CAPTURE_DEVICE)) {

    LOG.debug("probe", "%s is not a video capture device.", device);

    return { kind: "not-capture" };
  }

  return { formats: parseFormatListing(result.stderr), kind: "capture" };
}
