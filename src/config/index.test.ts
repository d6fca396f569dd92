/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.test.ts: Tests for configuration layering and validation for camstream.
 */
import { DEFAULTS, formatEnvironmentHelp, getEnvOverrides, loadConfigFile, mergeConfiguration } from "./userConfig.js";
import { after, before, describe, it } from "node:test";
import { buildConfiguration, validateConfiguration } from "./index.js";
import { ConfigError } from "../utils/errors.js";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { setConsoleLogging } from "../utils/logger.js";

setConsoleLogging(false);

let workDir: string;

before(() => {

  workDir = fs.mkdtempSync(path.join(os.tmpdir(), "camstream-config-"));
});

after(() => {

  fs.rmSync(workDir, { force: true, recursive: true });
});

/**
 * Writes a config file into the work directory.
 * @param name - The file name.
 * @param content - The file content.
 * @returns The file path.
 */
function writeConfig(name: string, content: string): string {

  const file = path.join(workDir, name);

  fs.writeFileSync(file, content);

  return file;
}

/**
 * Returns the problems carried by a ConfigError.
 * @param error - The thrown value.
 * @returns The problems.
 */
function problemsOf(error: unknown): string[] {

  assert.ok(error instanceof ConfigError);

  return error.problems;
}

describe("buildConfiguration", () => {

  it("starts from the defaults", async () => {

    const config = await buildConfiguration({ env: {} });

    assert.deepStrictEqual(config, DEFAULTS);
    assert.strictEqual(config.protocol, "dash");
    assert.strictEqual(config.relay.installDir, "/opt/mediamtx");
  });

  it("applies the config file, then the environment, then the command line", async () => {

    const configFile = writeConfig("layers.json", JSON.stringify({ bitrate: "2000k", codec: "libx264", relay: { installDir: "/srv/relay" }, safe: true }));
    const config = await buildConfiguration({

      cliOverrides: { bitrate: "6M" },
      configFile,
      env: { CAMSTREAM_CODEC: "h264_v4l2m2m", CAMSTREAM_RELAY_RELEASE_URL: "https://example.com/releases/latest" }
    });

    assert.strictEqual(config.bitrate, "6M");
    assert.strictEqual(config.codec, "h264_v4l2m2m");
    assert.strictEqual(config.safe, true);
    assert.deepStrictEqual(config.relay, { ...DEFAULTS.relay, installDir: "/srv/relay", releaseUrl: "https://example.com/releases/latest" });
  });

  it("finds the config file through the environment", async () => {

    const configFile = writeConfig("from-env.json", JSON.stringify({ protocol: "rtsp" }));
    const config = await buildConfiguration({ env: { CAMSTREAM_CONFIG: configFile } });

    assert.strictEqual(config.protocol, "rtsp");
  });

  it("returns a frozen configuration", async () => {

    const config = await buildConfiguration({ env: {} });

    assert.ok(Object.isFrozen(config));
    assert.ok(Object.isFrozen(config.relay));
  });

  it("reports every problem in the merged configuration at once", async () => {

    await assert.rejects(buildConfiguration({ cliOverrides: { bitrate: "fast", indexFile: "index.html" }, env: {} }), (error: unknown) => {

      assert.deepStrictEqual(problemsOf(error), [
        "bitrate must be \"dynamic\" or a number with an optional k, m, or g suffix, got \"fast\"",
        "index file must be an absolute path, got \"index.html\""
      ]);

      return true;
    });
  });
});

describe("environment overrides", () => {

  it("reads only the variables that are set", () => {

    assert.deepStrictEqual(getEnvOverrides({ CAMSTREAM_DEVICE: "/dev/video2", CAMSTREAM_VIDEO_SIZE: "" }), { device: "/dev/video2" });
  });

  it("parses booleans", () => {

    assert.deepStrictEqual(getEnvOverrides({ CAMSTREAM_HLS: "0", CAMSTREAM_SAFE: "yes" }), { hls: false, safe: true });
  });

  it("nests relay settings", () => {

    assert.deepStrictEqual(getEnvOverrides({ CAMSTREAM_RELAY_DIR: "/srv/relay" }), { relay: { installDir: "/srv/relay" } });
  });

  it("names the variable holding an invalid value", () => {

    assert.throws(() => getEnvOverrides({ CAMSTREAM_PROTOCOL: "srt" }), (error: unknown) => {

      const problems = problemsOf(error);

      assert.strictEqual(problems.length, 1);
      assert.ok(problems[0].startsWith("CAMSTREAM_PROTOCOL: "));

      return true;
    });
  });

  it("lists every variable in the help", () => {

    const lines = formatEnvironmentHelp();

    assert.strictEqual(lines[0], "Capture:");
    assert.strictEqual(lines[1], "  " + "CAMSTREAM_DEVICE".padEnd(30) + "Capture device. Leave unset to pick the best camera automatically.");
    assert.ok(lines.includes("  " + "CAMSTREAM_PROTOCOL".padEnd(30) + "Delivery protocol. (dash, rtsp)"));
  });
});

describe("config files", () => {

  it("rejects unknown settings", async () => {

    const configFile = writeConfig("unknown.json", JSON.stringify({ colour: "blue" }));

    await assert.rejects(loadConfigFile(configFile), (error: unknown) => {

      assert.deepStrictEqual(problemsOf(error), ["Unrecognized key(s) in object: 'colour'"]);

      return true;
    });
  });

  it("names the file and setting holding a mistyped value", async () => {

    const configFile = writeConfig("mistyped.json", JSON.stringify({ safe: "yes" }));

    await assert.rejects(loadConfigFile(configFile), (error: unknown) => {

      assert.deepStrictEqual(problemsOf(error), [configFile + " safe: Expected boolean, received string"]);

      return true;
    });
  });

  it("rejects invalid JSON", async () => {

    const configFile = writeConfig("broken.json", "{ \"codec\": ");

    await assert.rejects(loadConfigFile(configFile), (error: unknown) => {

      assert.ok(problemsOf(error)[0].startsWith("invalid JSON in configuration file " + configFile + ": "));

      return true;
    });
  });

  it("reports a missing file", async () => {

    const configFile = path.join(workDir, "absent.json");

    await assert.rejects(loadConfigFile(configFile), (error: unknown) => {

      assert.ok(problemsOf(error)[0].startsWith("cannot read configuration file " + configFile + ": "));

      return true;
    });
  });
});

describe("validateConfiguration", () => {

  it("accepts the defaults", () => {

    assert.deepStrictEqual(validateConfiguration(mergeConfiguration([])), []);
  });

  it("checks the RTSP URL only when publishing over RTSP", () => {

    assert.deepStrictEqual(validateConfiguration(mergeConfiguration([{ rtspUrl: "http://localhost/webcam" }])), []);
    assert.deepStrictEqual(validateConfiguration(mergeConfiguration([{ protocol: "rtsp", rtspUrl: "http://localhost/webcam" }])),
      ["RTSP URL must start with rtsp://, got \"http://localhost/webcam\""]);
  });

  it("accepts fractional bitrates", () => {

    assert.deepStrictEqual(validateConfiguration(mergeConfiguration([{ bitrate: "2.5M", codec: "h264_v4l2m2m" }])), []);
    assert.deepStrictEqual(validateConfiguration(mergeConfiguration([{ bitrate: "1500.5" }])), []);
    assert.deepStrictEqual(validateConfiguration(mergeConfiguration([{ bitrate: "2.M" }])),
      ["bitrate must be \"dynamic\" or a number with an optional k, m, or g suffix, got \"2.M\""]);
  });

  it("rejects FFmpeg parameters with an unterminated quote", () => {

    assert.deepStrictEqual(validateConfiguration(mergeConfiguration([{ ffmpegParams: "-vf \"scale=1280:720" }])),
      ["FFmpeg parameters: Unterminated \" in FFmpeg parameters: -vf \"scale=1280:720"]);
  });

  it("checks the video size and relay paths", () => {

    assert.deepStrictEqual(validateConfiguration(mergeConfiguration([{ relay: { installDir: "opt/mediamtx" }, videoSize: "1080p" }])), [
      "video size must look like 1920x1080, got \"1080p\"",
      "relay install directory must be an absolute path, got \"opt/mediamtx\""
    ]);
  });
});
