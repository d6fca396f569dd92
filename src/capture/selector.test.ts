/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * selector.test.ts: Tests for capture device selection for camstream.
 */
import { FALLBACK_DEVICE, NO_CAMERA_ADVISORY, detectCandidates, findBestDevice, listVideoDevices, selectBestDevice } from "./selector.js";
import { after, before, describe, it } from "node:test";
import assert from "node:assert";
import { createFakeRunner } from "../testing/fakeRunner.js";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { setConsoleLogging } from "../utils/logger.js";

setConsoleLogging(false);

describe("listVideoDevices", () => {

  let devDir: string;

  before(() => {

    devDir = fs.mkdtempSync(path.join(os.tmpdir(), "camstream-dev-"));

    for(const name of [ "video10", "video2", "video0", "videoX", "media0", "video1a" ]) {

      fs.writeFileSync(path.join(devDir, name), "");
    }
  });

  after(() => {

    fs.rmSync(devDir, { force: true, recursive: true });
  });

  it("lists video nodes in device number order", () => {

    assert.deepStrictEqual(listVideoDevices(devDir), [ path.join(devDir, "video0"), path.join(devDir, "video2"), path.join(devDir, "video10") ]);
  });

  it("returns nothing for a missing directory", () => {

    assert.deepStrictEqual(listVideoDevices(path.join(devDir, "missing")), []);
  });
});

describe("selectBestDevice", () => {

  it("prefers the camera that offers h264, wherever it was found", () => {

    const cameraA = { formats: { mjpeg: "1280x720" }, path: "/dev/video0" };
    const cameraB = { formats: { h264: "1920x1080", mjpeg: "1280x720" }, path: "/dev/video2" };

    assert.deepStrictEqual(selectBestDevice([ cameraA, cameraB ]).selected, { format: "h264", path: "/dev/video2", resolution: "1920x1080" });
    assert.deepStrictEqual(selectBestDevice([ cameraB, cameraA ]).selected, { format: "h264", path: "/dev/video2", resolution: "1920x1080" });
  });

  it("takes the later camera when both offer h264", () => {

    const selection = selectBestDevice([ { formats: { h264: "1280x720" }, path: "/dev/video0" }, { formats: { h264: "1920x1080" }, path: "/dev/video4" } ]);

    assert.strictEqual(selection.selected.path, "/dev/video4");
  });

  it("takes the later camera when neither offers h264", () => {

    const selection = selectBestDevice([ { formats: { mjpeg: "1280x720" }, path: "/dev/video0" }, { formats: { yuyv422: "640x480" }, path: "/dev/video2" } ]);

    assert.deepStrictEqual(selection.selected, { format: "yuyv422", path: "/dev/video2", resolution: "640x480" });
  });

  it("picks formats in priority order", () => {

    const selection = selectBestDevice([{ formats: { yuv420p: "640x480", yuyv422: "800x600", mjpeg: "1280x720" }, path: "/dev/video0" }]);

    assert.deepStrictEqual(selection.selected, { format: "mjpeg", path: "/dev/video0", resolution: "1280x720" });
  });

  it("falls back to the first listed format when none is in the priority list", () => {

    const selection = selectBestDevice([{ formats: { nv12: "640x480", rgb24: "320x240" }, path: "/dev/video0" }]);

    assert.deepStrictEqual(selection.selected, { format: "nv12", path: "/dev/video0", resolution: "640x480" });
  });

  it("falls back to the default camera with an advisory when nothing is offered", () => {

    for(const candidates of [ [], [{ formats: {}, path: "/dev/video0" }] ]) {

      const selection = selectBestDevice(candidates);

      assert.deepStrictEqual(selection.selected, { format: "h264", path: "/dev/video0", resolution: "1920x1080" });
      assert.deepStrictEqual(selection.advisories, [NO_CAMERA_ADVISORY]);
      assert.deepStrictEqual(selection.candidates, []);
    }
  });

  it("never hands out the shared fallback record", () => {

    const selection = selectBestDevice([]);

    assert.notStrictEqual(selection.selected, FALLBACK_DEVICE);
  });
});

describe("detectCandidates", () => {

  let devDir: string;

  before(() => {

    devDir = fs.mkdtempSync(path.join(os.tmpdir(), "camstream-dev-"));

    for(const name of [ "video0", "video1", "video2" ]) {

      fs.writeFileSync(path.join(devDir, name), "");
    }
  });

  after(() => {

    fs.rmSync(devDir, { force: true, recursive: true });
  });

  const runner = createFakeRunner((command) => {

    // video0 is a codec node, video1 a camera, video2 a camera whose listing cannot be parsed.
    if(command.endsWith("video0")) {

      return { status: 1, stderr: "[video4linux2,v4l2 @ 0x1] Not a video capture device.\n" };
    }

    if(command.endsWith("video1")) {

      return { status: 1, stderr: "[video4linux2,v4l2 @ 0x1] Compressed:        h264 :                H.264 : {32-1280, 2}x{32-720, 2}\n" };
    }

    return { status: 1, stderr: "[video4linux2,v4l2 @ 0x1] Compressed:        h264 :                H.264 : bogus\n" };
  });

  it("keeps only capture devices with usable formats", () => {

    assert.deepStrictEqual(detectCandidates(runner, { devDir }), [{ formats: { h264: "1280x720" }, path: path.join(devDir, "video1") }]);
  });

  it("selects among the detected devices", () => {

    const selection = findBestDevice(runner, { devDir });

    assert.deepStrictEqual(selection.selected, { format: "h264", path: path.join(devDir, "video1"), resolution: "1280x720" });
    assert.deepStrictEqual(selection.advisories, []);
  });
});
