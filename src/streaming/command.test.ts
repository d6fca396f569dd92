/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * command.test.ts: Tests for FFmpeg encode command synthesis for camstream.
 */
import type { EncodeOptions } from "./command.js";
import { buildEncodeCommand, buildOutputClause, formatCommandLine, parseVideoSize, resolveBitrate, splitParams } from "./command.js";
import { describe, it } from "node:test";
import type { EncodeTarget } from "../types/index.js";
import { InvalidSynthesisTargetError } from "../utils/errors.js";
import assert from "node:assert";
import { setConsoleLogging } from "../utils/logger.js";

setConsoleLogging(false);

const DASH_TARGET: EncodeTarget = { hlsEnabled: true, outputPath: "/dev/shm/streaming/manifest.mpd", protocol: "dash" };

/**
 * Builds encode options for a 1080p h264 camera on /dev/video0.
 * @param overrides - Options to change.
 * @returns The options.
 */
function options(overrides: Partial<EncodeOptions> = {}): EncodeOptions {

  return {

    bitrate: "dynamic",
    codec: "copy",
    device: { format: "h264", path: "/dev/video0", resolution: "1920x1080" },
    extraParams: "",
    ffmpegPath: "ffmpeg",
    target: DASH_TARGET,
    ...overrides
  };
}

describe("buildEncodeCommand", () => {

  it("relays the camera stream unchanged with the copy codec", () => {

    assert.strictEqual(formatCommandLine(buildEncodeCommand(options())), "ffmpeg -nostdin -hide_banner -loglevel error -f v4l2 -input_format h264 -s 1920x1080 " +
      "-i /dev/video0 -c:v copy -seg_duration 0.2 -remove_at_exit 1 -window_size 10 -f dash -hls_playlist 1 /dev/shm/streaming/manifest.mpd");
  });

  it("adds neither bitrate nor pixel format when copying, whatever the bitrate", () => {

    const { args } = buildEncodeCommand(options({ bitrate: "8000k" }));

    assert.strictEqual(args.includes("-b:v"), false);
    assert.strictEqual(args.includes("-pix_fmt"), false);
  });

  it("derives the bitrate from the frame size when encoding", () => {

    const command = buildEncodeCommand(options({ codec: "h264_v4l2m2m" }));

    assert.deepStrictEqual(command.args.slice(12, 18), [ "-c:v", "h264_v4l2m2m", "-b:v", "4050k", "-pix_fmt", "yuv420p" ]);
  });

  it("keeps operator supplied bitrate and pixel format", () => {

    const { args } = buildEncodeCommand(options({ codec: "libx264", extraParams: "  -g   30  -b:v 2M  -pix_fmt nv12 " }));

    assert.deepStrictEqual(args.slice(12, 20), [ "-c:v", "libx264", "-g", "30", "-b:v", "2M", "-pix_fmt", "nv12" ]);
    assert.strictEqual(args.filter((arg) => arg === "-b:v").length, 1);
    assert.strictEqual(args.filter((arg) => arg === "-pix_fmt").length, 1);
  });

  it("keeps quoted parameters together and quotes them again on the command line", () => {

    const command = buildEncodeCommand(options({ extraParams: "-vf \"scale=1280:720, fps=30\" -g 30" }));

    assert.deepStrictEqual(command.args.slice(14, 18), [ "-vf", "scale=1280:720, fps=30", "-g", "30" ]);
    assert.ok(formatCommandLine(command).includes(" -c:v copy -vf 'scale=1280:720, fps=30' -g 30 -seg_duration "));
  });

  it("passes a fractional bitrate through", () => {

    const { args } = buildEncodeCommand(options({ bitrate: "2.5M", codec: "h264_v4l2m2m" }));

    assert.deepStrictEqual(args.slice(14, 16), [ "-b:v", "2.5M" ]);
  });

  it("publishes to an RTSP URL", () => {

    const command = buildEncodeCommand(options({ target: { outputPath: "rtsp://localhost:8554/webcam", protocol: "rtsp" } }));

    assert.deepStrictEqual(command.args.slice(-3), [ "-f", "rtsp", "rtsp://localhost:8554/webcam" ]);
  });

  it("is deterministic", () => {

    assert.deepStrictEqual(buildEncodeCommand(options({ codec: "h264_v4l2m2m" })), buildEncodeCommand(options({ codec: "h264_v4l2m2m" })));
  });

  it("uses the configured binary", () => {

    assert.strictEqual(buildEncodeCommand(options({ ffmpegPath: "/usr/local/bin/ffmpeg" })).binaryPath, "/usr/local/bin/ffmpeg");
  });
});

describe("buildOutputClause", () => {

  it("omits the HLS playlist when disabled", () => {

    assert.deepStrictEqual(buildOutputClause({ hlsEnabled: false, outputPath: "/dev/shm/streaming/manifest.mpd", protocol: "dash" }),
      [ "-seg_duration", "0.2", "-remove_at_exit", "1", "-window_size", "10", "-f", "dash", "/dev/shm/streaming/manifest.mpd" ]);
  });

  it("rejects an unknown protocol", () => {

    const target: EncodeTarget = JSON.parse("{ \"outputPath\": \"srt://localhost:9000\", \"protocol\": \"srt\" }");

    assert.throws(() => buildOutputClause(target), InvalidSynthesisTargetError);
  });
});

describe("resolveBitrate", () => {

  it("scales dynamic bitrate with the frame size", () => {

    assert.strictEqual(resolveBitrate("dynamic", "1920x1080"), "4050k");
    assert.strictEqual(resolveBitrate("DYNAMIC", "640x480"), "600k");
  });

  it("treats a bare number as kilobits", () => {

    assert.strictEqual(resolveBitrate("3000", "1920x1080"), "3000k");
  });

  it("keeps an explicit unit", () => {

    assert.strictEqual(resolveBitrate("4M", "1920x1080"), "4M");
    assert.strictEqual(resolveBitrate("2500k", "1920x1080"), "2500k");
    assert.strictEqual(resolveBitrate("1500.5", "1920x1080"), "1500.5k");
  });
});

describe("helpers", () => {

  it("parses a video size", () => {

    assert.deepStrictEqual(parseVideoSize("1280x720"), { height: 720, width: 1280 });
    assert.throws(() => parseVideoSize("1280by720"), /Video size must look like 1920x1080, got: 1280by720/);
  });

  it("splits free-text parameters on any whitespace", () => {

    assert.deepStrictEqual(splitParams(" -g\t30   -bf 0 "), [ "-g", "30", "-bf", "0" ]);
    assert.deepStrictEqual(splitParams(""), []);
  });

  it("removes quotes and honors escapes like a shell", () => {

    assert.deepStrictEqual(splitParams("-metadata title='Front door' -vf \"drawtext=text=\\\"cam\\\"\""),
      [ "-metadata", "title=Front door", "-vf", "drawtext=text=\"cam\"" ]);
    assert.deepStrictEqual(splitParams("-x \"\" a\\ b"), [ "-x", "", "a b" ]);
  });

  it("rejects an unterminated quote", () => {

    assert.throws(() => splitParams("-vf 'scale=1280:720"), /Unterminated ' in FFmpeg parameters: -vf 'scale=1280:720/);
  });
});
