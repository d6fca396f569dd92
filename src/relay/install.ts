/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * install.ts: Versioned installation and upgrade of the RTSP relay server for camstream.
 */
import type { BinaryRelease, InstalledBinary, Nullable, RelayConfig } from "../types/index.js";
import type { FetchFunction } from "./release.js";
import { fetchLatestRelease, resolveBinaryRelease } from "./release.js";
import type { CommandRunner } from "../utils/exec.js";
import { LOG } from "../utils/logger.js";
import fs from "node:fs";
import { getUnitName } from "../install/generators.js";
import { normalizeVersion } from "../utils/version.js";
import os from "node:os";
import path from "node:path";
import { shellQuote } from "../utils/exec.js";

const { promises: fsPromises } = fs;

/*
 * RELAY INSTALLATION
 *
 * The relay is installed from the upstream release archives and upgraded in place:
 *
 * 1. Ask the installed binary for its version. No binary means no version.
 * 2. Look up the latest release. If its tag matches the installed version we are done.
 * 3. Resolve the asset for this machine (see release.ts), download it to a temporary directory, stop the running service if there is one, and unpack the archive
 *    into the install directory. An existing relay configuration file is kept: the operator may have edited it.
 *
 * Enabling and restarting the service is left to the caller, after its unit file has been installed.
 */

// What installRelay() did.
export type RelayInstallOutcome = "installed" | "up-to-date" | "upgraded";

/**
 * The result of a relay installation.
 */
export interface RelayInstallResult {

  // The binary that was on disk before we started, if any.
  previous: Nullable<InstalledBinary>;

  // The release that was installed, or null when the installed binary was already current.
  release: Nullable<BinaryRelease>;

  outcome: RelayInstallOutcome;
  versionTag: string;
}

/**
 * Returns the path of the relay binary inside its install directory.
 * @param relay - Relay settings.
 * @returns The binary path.
 */
export function getRelayBinaryPath(relay: RelayConfig): string {

  return path.join(relay.installDir, relay.name);
}

/**
 * Queries an installed binary for its version.
 * @param runner - The command runner.
 * @param binaryPath - The binary to query.
 * @returns The installed binary, or null when it is not present.
 */
export function getInstalledVersion(runner: CommandRunner, binaryPath: string): Nullable<InstalledBinary> {

  if(!fs.existsSync(binaryPath)) {

    return null;
  }

  const versionTag = runner.run(shellQuote(binaryPath) + " --version").trim();

  LOG.debug("relay", "Installed %s reports version %s.", binaryPath, versionTag);

  return { path: binaryPath, versionTag };
}

/**
 * Downloads a file.
 * @param url - The download URL.
 * @param destination - Where to write the file.
 * @param fetchFn - The HTTP client.
 */
export async function downloadFile(url: string, destination: string, fetchFn: FetchFunction = fetch): Promise<void> {

  LOG.debug("relay", "Downloading %s to %s.", url, destination);

  const response = await fetchFn(url);

  if(!response.ok) {

    throw new Error("Download of " + url + " failed with HTTP status " + String(response.status));
  }

  const data = Buffer.from(await response.arrayBuffer());

  await fsPromises.writeFile(destination, data);

  LOG.debug("relay", "Downloaded %s bytes.", data.length);
}

/**
 * Stops a systemd service if it is running.
 * @param runner - The command runner.
 * @param unit - The unit name.
 * @returns True if the service was running and has been stopped.
 */
export function stopServiceIfActive(runner: CommandRunner, unit: string): boolean {

  if(runner.capture("systemctl is-active --quiet " + shellQuote(unit)).status !== 0) {

    return false;
  }

  LOG.info("Stopping %s before upgrading it.", unit);
  runner.run("systemctl stop " + shellQuote(unit));

  return true;
}

/**
 * Installs the latest relay server release, or upgrades an older one in place.
 * @param relay - Relay settings.
 * @param runner - The command runner.
 * @param fetchFn - The HTTP client.
 * @returns What was done and which version is now installed.
 */
export async function installRelay(relay: RelayConfig, runner: CommandRunner, fetchFn: FetchFunction = fetch): Promise<RelayInstallResult> {

  const previous = getInstalledVersion(runner, getRelayBinaryPath(relay));
  const latest = await fetchLatestRelease(relay.releaseUrl, fetchFn);

  if(previous && (normalizeVersion(previous.versionTag) === normalizeVersion(latest.tagName))) {

    LOG.info("%s %s is already the latest release.", relay.name, previous.versionTag);

    return { outcome: "up-to-date", previous, release: null, versionTag: previous.versionTag };
  }

  const architecture = runner.run("uname -m").trim();
  const release = resolveBinaryRelease(latest, relay.os, architecture);
  const tempDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "camstream-"));

  LOG.info("%s %s %s using %s.", previous ? "Upgrading" : "Installing", relay.name, release.versionTag, release.assetName);

  try {

    const archive = path.join(tempDir, release.assetName);

    await downloadFile(release.downloadUrl, archive, fetchFn);

    stopServiceIfActive(runner, getUnitName(relay.systemdFile));

    await fsPromises.mkdir(relay.installDir, { recursive: true });

    const configName = relay.name + ".yml";
    const keepConfig = fs.existsSync(path.join(relay.installDir, configName));

    runner.run([ "tar -xzf", shellQuote(archive), "-C", shellQuote(relay.installDir), ...(keepConfig ? [ "--exclude=" + shellQuote(configName) ] : []) ].join(" "));

    if(keepConfig) {

      LOG.info("Kept the existing %s.", path.join(relay.installDir, configName));
    }
  } finally {

    await fsPromises.rm(tempDir, { force: true, recursive: true });
  }

  return { outcome: previous ? "upgraded" : "installed", previous, release, versionTag: release.versionTag };
}
