/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Streaming endpoint setup orchestration for camstream.
 */
import type { ArtifactStatus, CommandSpec, DeviceSelection, EncodeTarget, FileArtifact, Nullable, PatchStatus, SelectedDevice, SetupConfig } from "../types/index.js";
import { applyAnchoredPatch, installArtifact } from "../install/artifacts.js";
import { buildEncodeCommand, formatCommandLine, parseVideoSize } from "../streaming/command.js";
import { buildRcLocalPatch, generateEncoderUnit, generateIndexHtml, generateOnRebootScript, generateRelayUnit, getUnitName } from "../install/generators.js";
import { detectCandidates, selectBestDevice } from "../capture/selector.js";
import type { CommandRunner } from "../utils/exec.js";
import type { FetchFunction } from "../relay/release.js";
import { LOG } from "../utils/logger.js";
import type { RelayInstallResult } from "../relay/install.js";
import { installRelay } from "../relay/install.js";
import { probeDevice } from "../capture/probe.js";
import { shellQuote } from "../utils/exec.js";

/*
 * SETUP
 *
 * A setup run is one sequential pipeline. Each step finishes before the next starts, and any failure aborts the run before later steps:
 *
 * 1. Resolve the capture device, format, and resolution (operator overrides first, detection for whatever is left).
 * 2. Synthesize the FFmpeg command for the configured protocol.
 * 3. Install OS packages (the web server for DASH).
 * 4. Install or upgrade the RTSP relay server (RTSP only).
 * 5. Install the generated files: boot script patch, viewer page, on-reboot script (DASH), relay unit (RTSP), and the encoder unit.
 * 6. Start and enable the services.
 *
 * Advisories collected along the way (for example, that no camera was found) are returned with the summary so the operator sees them last.
 */

// Mode of generated files that are only read.
const FILE_MODE = 0o644;

// Mode of generated scripts.
const SCRIPT_MODE = 0o755;

// Packages the DASH endpoint needs.
const DASH_PACKAGES = [ "nginx" ];

/**
 * Dependencies of a setup run, injected so the pipeline can run against stand-ins.
 */
export interface SetupDependencies {

  // Directory scanned for capture devices.
  devDir?: string;

  // HTTP client used for the relay release lookup and download.
  fetchFn?: FetchFunction;

  // Executes external tools.
  runner: CommandRunner;
}

/**
 * What happened to one installed file.
 */
export interface ArtifactReport {

  path: string;
  status: ArtifactStatus | PatchStatus;
}

/**
 * The outcome of a setup run.
 */
export interface SetupSummary {

  advisories: string[];
  artifacts: ArtifactReport[];
  command: CommandSpec;
  device: SelectedDevice;
  relay: Nullable<RelayInstallResult>;
  servicesStarted: boolean;
  viewingUrls: string[];
}

/**
 * Resolves the capture device, format, and resolution. Values the operator supplied always win. When all three are supplied nothing is probed; when only the
 * device is supplied, only that device is probed.
 * @param config - The run configuration.
 * @param runner - The command runner used for probing.
 * @param devDir - Directory scanned for capture devices.
 * @returns The selection and any advisories.
 */
export function resolveDevice(config: Readonly<SetupConfig>, runner: CommandRunner, devDir?: string): DeviceSelection {

  const { device, inputFormat, videoSize } = config;

  if((device !== null) && (inputFormat !== null) && (videoSize !== null)) {

    return { advisories: [], candidates: [], selected: { format: inputFormat, path: device, resolution: videoSize } };
  }

  let selection: DeviceSelection;

  if(device !== null) {

    const probe = probeDevice(runner, device, config.ffmpegPath);

    selection = selectBestDevice((probe.kind === "capture") ? [{ formats: probe.formats, path: device }] : []);

    if(probe.kind === "not-capture") {

      LOG.warn("%s is not a video capture device.", device);
    }
  } else {

    selection = selectBestDevice(detectCandidates(runner, { devDir, ffmpegPath: config.ffmpegPath }));
  }

  const selected: SelectedDevice = {

    format: inputFormat ?? selection.selected.format,
    path: device ?? selection.selected.path,
    resolution: videoSize ?? selection.selected.resolution
  };

  // The generic no-camera advisory assumes the fallback device. When the operator named the device, say what we could not learn about it instead.
  if((device !== null) && (selection.candidates.length === 0)) {

    return { ...selection, advisories: [getUnprobedDeviceAdvisory(selected)], selected };
  }

  return { ...selection, selected };
}

/**
 * Describes a device the operator named that reported no usable capture formats.
 * @param selected - The device as it will be used.
 * @returns The advisory.
 */
export function getUnprobedDeviceAdvisory(selected: SelectedDevice): string {

  return selected.path + " reported no usable capture formats. Assuming " + selected.format + " at " + selected.resolution +
    ". Pass --input-format and --video-size if that is wrong.";
}

/**
 * Builds the delivery target for the configured protocol.
 * @param config - The run configuration.
 * @returns The encode target.
 */
export function getEncodeTarget(config: Readonly<SetupConfig>): EncodeTarget {

  if(config.protocol === "rtsp") {

    return { outputPath: config.rtspUrl, protocol: "rtsp" };
  }

  return { hlsEnabled: config.hls, outputPath: config.dashOutput, protocol: "dash" };
}

/**
 * Builds the encode command for a device under a configuration.
 * @param config - The run configuration.
 * @param device - The capture device.
 * @returns The encode command.
 */
export function getEncodeCommand(config: Readonly<SetupConfig>, device: SelectedDevice): CommandSpec {

  return buildEncodeCommand({

    bitrate: config.bitrate,
    codec: config.codec,
    device,
    extraParams: config.ffmpegParams,
    ffmpegPath: config.ffmpegPath,
    target: getEncodeTarget(config)
  });
}

/**
 * Installs OS packages with apt. A failed install is retried once after refreshing the package lists.
 * @param runner - The command runner.
 * @param packages - The packages to install.
 */
export function installPackages(runner: CommandRunner, packages: string[]): void {

  const command = "apt install -y " + packages.map(shellQuote).join(" ");

  LOG.info("Installing %s.", packages.join(", "));

  try {

    runner.run(command);
  } catch(error) {

    LOG.warn("Package installation failed, refreshing package lists and trying again.");
    LOG.debug("exec", "First attempt failed: %s", (error instanceof Error) ? error.message : String(error));

    runner.run("apt update --fix-missing");
    runner.run(command);
  }
}

/**
 * Builds the whole-file artifacts for a run, in installation order.
 * @param config - The run configuration.
 * @param device - The capture device.
 * @param commandLine - The encode command line.
 * @returns The artifacts.
 */
export function buildArtifacts(config: Readonly<SetupConfig>, device: SelectedDevice, commandLine: string): FileArtifact[] {

  const overwriteAllowed = !config.safe;
  const artifacts: FileArtifact[] = [];

  if(config.protocol === "dash") {

    const { height, width } = parseVideoSize(device.resolution);

    artifacts.push(
      { content: generateIndexHtml(width, height), mode: FILE_MODE, overwriteAllowed, path: config.indexFile },
      { content: generateOnRebootScript(config.dashOutput, config.indexFile), mode: SCRIPT_MODE, overwriteAllowed, path: config.onRebootFile }
    );
  } else {

    artifacts.push({ content: generateRelayUnit(config.relay), mode: FILE_MODE, overwriteAllowed, path: config.relay.systemdFile });
  }

  artifacts.push({

    content: generateEncoderUnit({

      commandLine,
      relayUnitFile: (config.protocol === "rtsp") ? config.relay.systemdFile : undefined,
      unitFile: config.systemdFile
    }),
    mode: FILE_MODE,
    overwriteAllowed,
    path: config.systemdFile
  });

  return artifacts;
}

/**
 * Starts and enables the installed services. Units are restarted so that a re-run picks up a changed command.
 * @param config - The run configuration.
 * @param runner - The command runner.
 */
export function startServices(config: Readonly<SetupConfig>, runner: CommandRunner): void {

  if(config.protocol === "dash") {

    runner.run("/bin/bash " + shellQuote(config.onRebootFile));
  }

  runner.run("systemctl daemon-reload");

  const units = (config.protocol === "rtsp") ? [ getUnitName(config.relay.systemdFile), getUnitName(config.systemdFile) ] : [getUnitName(config.systemdFile)];

  for(const unit of units) {

    LOG.info("Starting %s.", unit);

    runner.run("systemctl restart " + shellQuote(unit));
    runner.run("systemctl enable " + shellQuote(unit));
  }
}

/**
 * Formats a host for use in a URL.
 * @param host - A host name or address.
 * @returns The host, bracketed when it is an IPv6 address.
 */
function formatHost(host: string): string {

  return host.includes(":") ? "[" + host + "]" : host;
}

/**
 * Lists the URLs the stream can be viewed at, using every address and the name of this machine.
 * @param config - The run configuration.
 * @param runner - The command runner.
 * @returns The viewing URLs.
 */
export function getViewingUrls(config: Readonly<SetupConfig>, runner: CommandRunner): string[] {

  const addresses = runner.capture("hostname -I").stdout.split(/\s+/).filter((address) => address.length > 0);
  const hostname = runner.capture("hostname").stdout.trim();
  const hosts = [ ...addresses, ...(hostname ? [hostname] : []) ];

  if(config.protocol === "rtsp") {

    const url = new URL(config.rtspUrl);
    const port = url.port ? ":" + url.port : "";

    return hosts.map((host) => "rtsp://" + formatHost(host) + port + url.pathname);
  }

  return hosts.map((host) => "http://" + formatHost(host) + "/streaming");
}

/**
 * Runs a complete setup.
 * @param config - The run configuration.
 * @param deps - Injected dependencies.
 * @returns The summary of what was done.
 */
export async function runSetup(config: Readonly<SetupConfig>, deps: SetupDependencies): Promise<SetupSummary> {

  const { runner } = deps;
  const selection = resolveDevice(config, runner, deps.devDir);
  const device = selection.selected;
  const command = getEncodeCommand(config, device);
  const commandLine = formatCommandLine(command);

  LOG.info("Streaming from %s using %s at %s over %s.", device.path, device.format, device.resolution, config.protocol.toUpperCase());

  if((config.protocol === "dash") && !config.skipPackages) {

    installPackages(runner, DASH_PACKAGES);
  }

  let relay: Nullable<RelayInstallResult> = null;

  if(config.protocol === "rtsp") {

    relay = await installRelay(config.relay, runner, deps.fetchFn);
  }

  const artifacts: ArtifactReport[] = [];

  if(config.protocol === "dash") {

    artifacts.push({ path: config.rcLocalFile, status: await applyAnchoredPatch(buildRcLocalPatch(config.rcLocalFile, config.onRebootFile), !config.safe) });
  }

  LOG.info("FFmpeg command: %s", commandLine);

  for(const artifact of buildArtifacts(config, device, commandLine)) {

    // eslint-disable-next-line no-await-in-loop
    artifacts.push({ path: artifact.path, status: await installArtifact(artifact) });
  }

  if(config.startServices) {

    startServices(config, runner);
  }

  const viewingUrls = getViewingUrls(config, runner);

  LOG.info("Setup complete.");

  return { advisories: selection.advisories, artifacts, command, device, relay, servicesStarted: config.startServices, viewingUrls };
}
