/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * command.ts: FFmpeg encode command synthesis for camstream.
 */
import type { CommandSpec, EncodeTarget, Nullable, SelectedDevice } from "../types/index.js";
import { InvalidSynthesisTargetError } from "../utils/errors.js";
import { LOG } from "../utils/logger.js";
import { shellQuote } from "../utils/exec.js";

/*
 * ENCODE COMMAND
 *
 * The command that captures from the camera and hands the stream to its delivery protocol has a fixed shape:
 *
 *   <ffmpeg> -nostdin -hide_banner -loglevel error -f v4l2 -input_format <fmt> -s <WxH> -i <device> -c:v <codec> [extra] [bitrate] [pix_fmt] <output clause>
 *
 * Two policies apply when we are actually encoding (any codec other than "copy"):
 *
 * - Bitrate. Unless the operator's extra parameters already carry -b:v, we add one. "dynamic" scales with the frame size (two bits per pixel, in kilobits); an
 *   explicit number without a unit is taken as kilobits.
 * - Pixel format. Hardware encoders on single-board computers want planar 4:2:0, and players expect it, so -pix_fmt yuv420p is added unless already given.
 *
 * When copying, the camera's own encoded stream is relayed unchanged and neither flag makes sense.
 *
 * The output clause depends on the target protocol alone. Synthesis is a pure function: no file or process is touched here.
 */

// The codec value that relays the camera's stream without re-encoding.
export const PASSTHROUGH_CODEC = "copy";

// The bitrate specifier that asks for a bitrate derived from the frame size.
export const DYNAMIC_BITRATE = "dynamic";

// Bits per pixel used by the dynamic bitrate heuristic. The result is in kilobits: width * height * factor / 1024.
export const DYNAMIC_BITRATE_FACTOR = 2;

// The pixel format forced on encoded output.
export const CANONICAL_PIXEL_FORMAT = "yuv420p";

// DASH segment length in seconds and the number of segments kept in the manifest.
export const DASH_SEGMENT_DURATION = "0.2";
export const DASH_WINDOW_SIZE = "10";

// Flags the operator may already have supplied in the extra parameters.
const BITRATE_FLAG = "-b:v";
const PIXEL_FORMAT_FLAG = "-pix_fmt";

// Matches a resolution such as "1920x1080".
const VIDEO_SIZE_PATTERN = /^(\d+)x(\d+)$/;

/**
 * Everything the synthesizer needs to build an encode command.
 */
export interface EncodeOptions {

  // Bitrate specifier: "dynamic" or a number with an optional k, m, or g suffix.
  bitrate: string;

  // Video codec passed to -c:v.
  codec: string;

  // The capture device, format, and resolution.
  device: SelectedDevice;

  // Free-text FFmpeg parameters inserted after the codec.
  extraParams: string;

  // Path to the FFmpeg binary.
  ffmpegPath: string;

  // Where the stream goes.
  target: EncodeTarget;
}

/**
 * Parses a "WxH" resolution.
 * @param videoSize - The resolution string.
 * @returns The width and height in pixels.
 * @throws Error when the string is not a valid resolution.
 */
export function parseVideoSize(videoSize: string): { height: number; width: number } {

  const match = VIDEO_SIZE_PATTERN.exec(videoSize.trim());

  if(!match) {

    throw new Error("Video size must look like 1920x1080, got: " + videoSize);
  }

  return { height: Number(match[2]), width: Number(match[1]) };
}

/**
 * Splits free-text FFmpeg parameters into arguments the way a shell would: whitespace separates arguments, single quotes keep everything up to the closing
 * quote, and double quotes do the same while honoring backslash escapes. The quotes themselves are removed.
 * @param params - The free-text parameters.
 * @returns The individual arguments.
 * @throws Error when a quote is not closed.
 */
export function splitParams(params: string): string[] {

  const args: string[] = [];
  let current = "";
  let inArgument = false;
  let quote: Nullable<string> = null;

  for(let i = 0; i < params.length; i++) {

    const char = params[i];

    if(quote === "'") {

      if(char === "'") {

        quote = null;
      } else {

        current += char;
      }

      continue;
    }

    if((char === "\\") && (i + 1 < params.length) && ((quote === null) || ("\"\\$`".includes(params[i + 1])))) {

      current += params[++i];
      inArgument = true;

      continue;
    }

    if(quote === "\"") {

      if(char === "\"") {

        quote = null;
      } else {

        current += char;
      }

      continue;
    }

    if((char === "'") || (char === "\"")) {

      quote = char;
      inArgument = true;
    } else if(/\s/.test(char)) {

      if(inArgument) {

        args.push(current);
        current = "";
        inArgument = false;
      }
    } else {

      current += char;
      inArgument = true;
    }
  }

  if(quote !== null) {

    throw new Error("Unterminated " + quote + " in FFmpeg parameters: " + params);
  }

  if(inArgument) {

    args.push(current);
  }

  return args;
}

/**
 * Resolves a bitrate specifier into the value passed to -b:v.
 * @param bitrate - "dynamic" or an explicit value such as "4000", "4000k", or "4M".
 * @param videoSize - The capture resolution, used by the dynamic heuristic.
 * @returns The bitrate with a unit suffix (e.g., "4050k").
 */
export function resolveBitrate(bitrate: string, videoSize: string): string {

  const value = bitrate.trim();

  if(value.toLowerCase() === DYNAMIC_BITRATE) {

    const { height, width } = parseVideoSize(videoSize);

    return String(Math.floor((width * height * DYNAMIC_BITRATE_FACTOR) / 1024)) + "k";
  }

  return /[kmg]$/i.test(value) ? value : value + "k";
}

/**
 * Describes an unexpected target for an error message.
 * @param target - A value that should have been an EncodeTarget.
 * @returns The protocol tag, or the value itself.
 */
function describeTarget(target: unknown): string {

  if(target && (typeof target === "object") && ("protocol" in target)) {

    return String(target.protocol);
  }

  return String(target);
}

/**
 * Builds the protocol-specific output clause.
 * @param target - The delivery target.
 * @returns The output arguments, ending with the destination.
 * @throws InvalidSynthesisTargetError when the protocol tag is unknown.
 */
export function buildOutputClause(target: EncodeTarget): string[] {

  switch(target.protocol) {

    case "dash": {

      return [
        "-seg_duration", DASH_SEGMENT_DURATION,
        "-remove_at_exit", "1",
        "-window_size", DASH_WINDOW_SIZE,
        "-f", "dash",
        ...(target.hlsEnabled ? [ "-hls_playlist", "1" ] : []),
        target.outputPath
      ];
    }

    case "rtsp": {

      return [ "-f", "rtsp", target.outputPath ];
    }

    default: {

      const unknownTarget: never = target;

      throw new InvalidSynthesisTargetError(describeTarget(unknownTarget));
    }
  }
}

/**
 * Builds the encode command for a capture device and delivery target.
 * @param options - Encode options.
 * @returns The command, ready to be written into a service unit or executed.
 */
export function buildEncodeCommand(options: EncodeOptions): CommandSpec {

  const extra = splitParams(options.extraParams);
  const policyArgs: string[] = [];

  if(options.codec !== PASSTHROUGH_CODEC) {

    if(!extra.includes(BITRATE_FLAG)) {

      const bitrate = resolveBitrate(options.bitrate, options.device.resolution);

      LOG.debug("command", "Using video bitrate %s for %s.", bitrate, options.device.resolution);

      policyArgs.push(BITRATE_FLAG, bitrate);
    }

    if(!extra.includes(PIXEL_FORMAT_FLAG)) {

      policyArgs.push(PIXEL_FORMAT_FLAG, CANONICAL_PIXEL_FORMAT);
    }
  }

  return {

    args: [
      "-nostdin",
      "-hide_banner",
      "-loglevel", "error",
      "-f", "v4l2",
      "-input_format", options.device.format,
      "-s", options.device.resolution,
      "-i", options.device.path,
      "-c:v", options.codec,
      ...extra,
      ...policyArgs,
      ...buildOutputClause(options.target)
    ],
    binaryPath: options.ffmpegPath
  };
}

/**
 * Joins a command into a single line with single spaces between arguments. Arguments that contain whitespace or other special characters are single-quoted, which
 * both the shell and systemd's ExecStart= understand.
 * @param spec - The command.
 * @returns The command line.
 */
export function formatCommandLine(spec: CommandSpec): string {

  return [ spec.binaryPath, ...spec.args ].map(shellQuote).join(" ");
}
