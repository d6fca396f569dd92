/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * probe.test.ts: Tests for the V4L2 format listing parser for camstream.
 */
import { describe, it } from "node:test";
import { isFormatLine, parseEnumeratedResolution, parseFormatListing, parseRangeResolution, parseResolution, probeDevice, splitFormatLine } from "./probe.js";
import assert from "node:assert";
import { createFakeRunner } from "../testing/fakeRunner.js";
import { setConsoleLogging } from "../utils/logger.js";

setConsoleLogging(false);

const PI_CAMERA_LISTING = [
  "[video4linux2,v4l2 @ 0x1c4e3d0] Raw       :     yuv420p :     Planar YUV 4:2:0 : {32-2592, 2}x{32-1944, 2}",
  "[video4linux2,v4l2 @ 0x1c4e3d0] Compressed:       mjpeg :            JFIF JPEG : {32-2592, 2}x{32-1944, 2}",
  "[video4linux2,v4l2 @ 0x1c4e3d0] Compressed:        h264 :                H.264 : {32-2592, 2}x{32-1944, 2}",
  "/dev/video0: Immediate exit requested"
].join("\n");

const USB_CAMERA_LISTING = [
  "[video4linux2,v4l2 @ 0x55d0c8a0] Raw       :     yuyv422 :           YUYV 4:2:2 : 640x480 160x120 320x240 800x600 1280x720",
  "[video4linux2,v4l2 @ 0x55d0c8a0] Compressed:       mjpeg :          Motion-JPEG : 640x480 1280x720 1024x768",
  "[video4linux2,v4l2 @ 0x55d0c8a0] Raw       : Unsupported :    YUV 4:2:0 (M420) : 640x480",
  "/dev/video2: Immediate exit requested"
].join("\n");

describe("line classifier", () => {

  it("accepts format lines", () => {

    assert.strictEqual(isFormatLine("[video4linux2,v4l2 @ 0x1] Compressed:       mjpeg :          Motion-JPEG : 640x480"), true);
  });

  it("rejects lines from other subsystems and lines with too few separators", () => {

    assert.strictEqual(isFormatLine("[dshow @ 0x1] Compressed: mjpeg : Motion-JPEG : 640x480"), false);
    assert.strictEqual(isFormatLine("[video4linux2,v4l2 @ 0x1] The V4L2 driver changed the video from 1920x1080 to 640x480"), false);
    assert.strictEqual(isFormatLine("[video4linux2,v4l2 @ 0x1] ioctl(VIDIOC_G_INPUT): Inappropriate ioctl for device"), false);
  });
});

describe("field splitter", () => {

  it("extracts the format name and resolution expression", () => {

    assert.deepStrictEqual(splitFormatLine("[video4linux2,v4l2 @ 0x1] Raw       :     yuyv422 :           YUYV 4:2:2 : 640x480 1280x720"),
      { formatName: "yuyv422", resolution: "640x480 1280x720" });
  });

  it("rejects lines without exactly four fields", () => {

    assert.strictEqual(splitFormatLine("[video4linux2,v4l2 @ 0x1] Raw : yuyv422 : YUYV : extra : 640x480"), null);
    assert.strictEqual(splitFormatLine("no bracket : a : b : c"), null);
  });
});

describe("resolution dispatcher", () => {

  it("takes the upper bounds of a range", () => {

    assert.strictEqual(parseRangeResolution("{32-1280, 2}x{32-720, 2}"), "1280x720");
  });

  it("clamps a range whose width reaches the ceiling", () => {

    assert.strictEqual(parseRangeResolution("{32-2592, 2}x{32-1944, 2}"), "1920x1080");
    assert.strictEqual(parseRangeResolution("{32-2000, 2}x{32-1500, 2}"), "1920x1080");
    assert.strictEqual(parseRangeResolution("{32-1999, 1}x{32-1500, 1}"), "1999x1500");
  });

  it("returns null for a malformed range", () => {

    assert.strictEqual(parseRangeResolution("{32-abc, 2}x{32-720, 2}"), null);
  });

  it("picks the largest enumerated size", () => {

    assert.strictEqual(parseEnumeratedResolution("640x480 160x120 1280x720 320x240"), "1280x720");
  });

  it("keeps the first of equal-area sizes", () => {

    assert.strictEqual(parseEnumeratedResolution("1280x720 720x1280"), "1280x720");
  });

  it("clamps the largest enumerated size when it is too wide", () => {

    assert.strictEqual(parseEnumeratedResolution("640x480 2560x1440"), "1920x1080");
  });

  it("skips malformed tokens", () => {

    assert.strictEqual(parseEnumeratedResolution("abc 640x480 800xq"), "640x480");
    assert.strictEqual(parseEnumeratedResolution("abc def"), null);
  });

  it("routes by expression form", () => {

    assert.strictEqual(parseResolution("{32-1280, 2}x{32-720, 2}"), "1280x720");
    assert.strictEqual(parseResolution("1280x720"), "1280x720");
  });
});

describe("parseFormatListing", () => {

  it("parses a stepwise camera", () => {

    assert.deepStrictEqual(parseFormatListing(PI_CAMERA_LISTING), { h264: "1920x1080", mjpeg: "1920x1080", yuv420p: "1920x1080" });
  });

  it("parses a discrete camera and skips unsupported formats", () => {

    assert.deepStrictEqual(parseFormatListing(USB_CAMERA_LISTING), { mjpeg: "1280x720", yuyv422: "1280x720" });
  });

  it("lets a later line for the same format replace an earlier one", () => {

    const listing = [
      "[video4linux2,v4l2 @ 0x1] Compressed:       mjpeg :          Motion-JPEG : 640x480",
      "[video4linux2,v4l2 @ 0x1] Compressed:       mjpeg :          Motion-JPEG : 800x600"
    ].join("\r\n");

    assert.deepStrictEqual(parseFormatListing(listing), { mjpeg: "800x600" });
  });

  it("drops formats whose resolution cannot be parsed", () => {

    assert.deepStrictEqual(parseFormatListing("[video4linux2,v4l2 @ 0x1] Compressed:       mjpeg :          Motion-JPEG : bogus"), {});
  });
});

describe("probeDevice", () => {

  it("reports a node that is not a capture device", () => {

    const runner = createFakeRunner(() => ({ status: 1, stderr: "[video4linux2,v4l2 @ 0x1] Not a video capture device.\n/dev/video10: No such device\n" }));

    assert.deepStrictEqual(probeDevice(runner, "/dev/video10"), { kind: "not-capture" });
  });

  it("parses the format table from stderr, whatever the exit status", () => {

    const runner = createFakeRunner(() => ({ status: 1, stderr: USB_CAMERA_LISTING }));

    assert.deepStrictEqual(probeDevice(runner, "/dev/video2"), { formats: { mjpeg: "1280x720", yuyv422: "1280x720" }, kind: "capture" });
    assert.deepStrictEqual(runner.commands, ["ffmpeg -hide_banner -f video4linux2 -list_formats all -i /dev/video2"]);
  });

  it("uses the configured FFmpeg binary", () => {

    const runner = createFakeRunner();

    probeDevice(runner, "/dev/video0", "/usr/local/bin/ffmpeg");

    assert.deepStrictEqual(runner.commands, ["/usr/local/bin/ffmpeg -hide_banner -f video4linux2 -list_formats all -i /dev/video0"]);
  });
});
