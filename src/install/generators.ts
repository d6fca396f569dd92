/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * generators.ts: Service unit, boot script, and viewer page generators for camstream.
 */
import type { AnchoredPatch, RelayConfig } from "../types/index.js";
import path from "node:path";

/*
 * ARTIFACT GENERATORS
 *
 * Pure functions that produce the text of everything we install. Nothing here touches the filesystem; installation policy lives in artifacts.ts.
 *
 * Generated systemd units share a restart policy:
 * - Restart=always: FFmpeg exits when the camera goes away or the relay restarts, and should come back on its own
 * - RestartSec=20s: give a reconnected camera time to settle before the next attempt
 * - WantedBy=multi-user.target: start at boot without a login session
 */

// Restart delay shared by the generated units.
const RESTART_DELAY = "20s";

// Marker line of the boot script block. Its presence in the target file means the block is already installed.
export const RC_LOCAL_MARKER = "# Streaming Shared Memory Setup";

// The block is inserted before the line that ends the boot script.
export const RC_LOCAL_ANCHOR = "exit 0";

// A boot script that does nothing, used when the system has no rc.local yet.
const RC_LOCAL_SKELETON = [ "#!/bin/sh -e", "", RC_LOCAL_ANCHOR ];

// rc-local.service only runs an executable rc.local.
const RC_LOCAL_MODE = 0o755;

// Widest player size the viewer page asks the browser for.
const MAX_VIEWER_WIDTH = 1920;

// dash.js player, loaded by the viewer page.
const DASH_PLAYER_SCRIPT = "https://cdn.dashjs.org/latest/dash.all.min.js";

/**
 * Derives the systemd unit name from the path of its unit file.
 * @param unitFile - The unit file path (e.g., "/etc/systemd/system/encode_webcam.service").
 * @returns The unit name without its ".service" suffix (e.g., "encode_webcam").
 */
export function getUnitName(unitFile: string): string {

  return path.basename(unitFile, ".service");
}

/**
 * Options for the encoder unit.
 */
export interface EncoderUnitOptions {

  // The full FFmpeg command line.
  commandLine: string;

  // Unit file of the relay server the encoder publishes to, when streaming over RTSP.
  relayUnitFile?: string;

  // Where the unit file is installed. Written into the header comment and used to name the unit.
  unitFile: string;
}

/**
 * Generates the systemd unit that runs the encoder.
 * @param options - Encoder unit options.
 * @returns The unit file content.
 */
export function generateEncoderUnit(options: EncoderUnitOptions): string {

  const after = [ "network.target", "rc-local.service" ];
  const wants: string[] = [];

  // Over RTSP, FFmpeg needs the relay to accept its connection.
  if(options.relayUnitFile) {

    const relayUnit = getUnitName(options.relayUnitFile) + ".service";

    after.push(relayUnit);
    wants.push("Wants=" + relayUnit);
  }

  return [
    "# " + options.unitFile,
    "[Unit]",
    "Description=" + getUnitName(options.unitFile),
    "After=" + after.join(" "),
    ...wants,
    "",
    "[Service]",
    "Restart=always",
    "RestartSec=" + RESTART_DELAY,
    "ExecStart=" + options.commandLine,
    "",
    "[Install]",
    "WantedBy=multi-user.target",
    ""
  ].join("\n");
}

/**
 * Generates the systemd unit that runs the RTSP relay server from its install directory.
 * @param relay - Relay settings.
 * @returns The unit file content.
 */
export function generateRelayUnit(relay: RelayConfig): string {

  const binary = path.join(relay.installDir, relay.name);
  const configFile = path.join(relay.installDir, relay.name + ".yml");

  return [
    "# " + relay.systemdFile,
    "[Unit]",
    "Description=" + relay.name + " RTSP server",
    "After=network.target",
    "",
    "[Service]",
    "WorkingDirectory=" + relay.installDir,
    "Restart=always",
    "RestartSec=" + RESTART_DELAY,
    "ExecStart=" + binary + " " + configFile,
    "",
    "[Install]",
    "WantedBy=multi-user.target",
    ""
  ].join("\n");
}

/**
 * Generates the script that rebuilds the shared-memory streaming directory at boot. /dev/shm is emptied on every restart, so the directory FFmpeg writes its
 * segments into, and the links that publish it through the web server, are recreated each time.
 * @param dashOutput - The DASH manifest path. Its directory is the one recreated.
 * @param indexFile - The viewer page. Its directory is the web root the stream is published under.
 * @returns The script content.
 */
export function generateOnRebootScript(dashOutput: string, indexFile: string): string {

  const streamDir = path.dirname(dashOutput);
  const webLink = path.join(path.dirname(indexFile), path.basename(streamDir));
  const indexLink = path.join(webLink, path.basename(indexFile));

  return [
    "#!/bin/bash",
    "mkdir -p " + streamDir,
    "if [ ! -e " + webLink + " ]; then",
    "    ln -s " + streamDir + " " + webLink,
    "fi",
    "if [ ! -e " + indexLink + " ]; then",
    "    ln -s " + indexFile + " " + indexLink,
    "fi",
    ""
  ].join("\n");
}

/**
 * Scales a video size down to the widest size the viewer page uses, keeping its aspect ratio.
 * @param width - The video width.
 * @param height - The video height.
 * @returns The player size.
 */
export function getViewerSize(width: number, height: number): { height: number; width: number } {

  if(width <= MAX_VIEWER_WIDTH) {

    return { height, width };
  }

  return { height: Math.round((height * MAX_VIEWER_WIDTH) / width), width: MAX_VIEWER_WIDTH };
}

/**
 * Generates the HTML page that plays the DASH stream with dash.js.
 * @param width - The video width.
 * @param height - The video height.
 * @param manifestName - The manifest file name, relative to the page.
 * @returns The page content.
 */
export function generateIndexHtml(width: number, height: number, manifestName = "manifest.mpd"): string {

  const size = getViewerSize(width, height);

  return [
    "<!DOCTYPE html>",
    "<html>",
    "<head>",
    "    <meta charset=\"UTF-8\">",
    "    <style>",
    "        video {",
    "            max-width: " + String(size.width) + "px;",
    "            max-height: " + String(size.height) + "px;",
    "        }",
    "    </style>",
    "</head>",
    "<body>",
    "    <div id=\"main\">",
    "        <video data-dashjs-player autoplay controls src=\"" + manifestName + "\" type=\"application/dash+xml\"></video>",
    "    </div>",
    "    <script src=\"" + DASH_PLAYER_SCRIPT + "\"></script>",
    "</body>",
    "</html>",
    ""
  ].join("\n");
}

/**
 * Builds the boot script patch that runs the on-reboot script from rc.local.
 * @param rcLocalFile - The boot script to patch.
 * @param onRebootFile - The script to run at boot.
 * @returns The anchored patch.
 */
export function buildRcLocalPatch(rcLocalFile: string, onRebootFile: string): AnchoredPatch {

  return {

    anchor: RC_LOCAL_ANCHOR,
    lines: [
      RC_LOCAL_MARKER,
      "if [ -f " + onRebootFile + " ]; then",
      "    /bin/bash " + onRebootFile + " || true",
      "fi"
    ],
    marker: RC_LOCAL_MARKER,
    mode: RC_LOCAL_MODE,
    skeleton: RC_LOCAL_SKELETON,
    targetFile: rcLocalFile
  };
}
