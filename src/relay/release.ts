/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * release.ts: Release lookup and asset selection for the RTSP relay server for camstream.
 */
import type { BinaryRelease } from "../types/index.js";
import { NoMatchingReleaseAssetError, UnsupportedArchitectureError } from "../utils/errors.js";
import { LOG } from "../utils/logger.js";
import { z } from "zod";

/*
 * RELEASE ASSET SELECTION
 *
 * The relay server is published as one archive per platform, named along the lines of mediamtx_v1.9.0_linux_arm64v8.tar.gz. Picking the right one is a two step
 * affair:
 *
 * 1. The machine's architecture (uname -m) is translated into the token release names use. The primary table covers the names current kernels report. Older
 *    32-bit ARM userlands report variants (armv7l, armhf) that only the legacy table knows. An architecture in neither table is an error: guessing here would
 *    install a binary that cannot run.
 *
 * 2. The token is matched against the asset names, checksum files aside, in three stages:
 *    - "{os}_{token}" appears in the name.
 *    - For armv7, "{os}_armv6" appears in the name. ARMv6 binaries run on ARMv7 cores, and some releases only ship the older build.
 *    - Loose: the OS token and either the architecture token or the ARMv6 fallback appear anywhere in the name.
 */

// Where the latest relay server release is described.
export const RELAY_RELEASE_URL = "https://api.github.com/repos/bluenviron/mediamtx/releases/latest";

// Architecture names reported by current kernels.
export const PRIMARY_ARCHITECTURES: Readonly<Record<string, string>> = Object.freeze({

  aarch64: "arm64",
  amd64: "amd64",
  arm64: "arm64",
  armv6: "armv6",
  armv7: "armv7",
  x86_64: "amd64"
});

// Architecture names reported by older 32-bit ARM userlands.
export const LEGACY_ARCHITECTURES: Readonly<Record<string, string>> = Object.freeze({

  armel: "armv6",
  armhf: "armv7",
  armv6l: "armv6",
  armv7l: "armv7"
});

// The token that ARM builds fall back to.
export const ARM_FALLBACK_TOKEN = "armv6";

// Tokens that may fall back to the ARMv6 build.
const ARM_FALLBACK_SOURCES = [ "armv7" ];

// Assets that carry checksums or signatures instead of the server itself.
const CHECKSUM_PATTERN = /(checksums|\.sha256sum|\.sha256|\.sha512|\.md5|\.sig|\.asc)$/i;

// The subset of the GitHub release descriptor we rely on.
const ReleaseSchema = z.object({

  assets: z.array(z.object({

    browser_download_url: z.string().url(),
    name: z.string().min(1)
  })),
  tag_name: z.string().min(1)
});

/**
 * A downloadable file attached to a release.
 */
export interface ReleaseAsset {

  downloadUrl: string;
  name: string;
}

/**
 * The latest published release.
 */
export interface LatestRelease {

  assets: ReleaseAsset[];
  tagName: string;
}

// The HTTP client used to reach the release API. The global fetch in production, a stand-in in tests.
export type FetchFunction = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Validates a release descriptor returned by the release API.
 * @param payload - The decoded JSON body.
 * @returns The release tag and its assets.
 * @throws Error when the descriptor does not have the expected shape.
 */
export function parseRelease(payload: unknown): LatestRelease {

  const parsed = ReleaseSchema.safeParse(payload);

  if(!parsed.success) {

    throw new Error("Unexpected release descriptor: " + parsed.error.issues.map((issue) => issue.path.join(".") + " " + issue.message).join("; "));
  }

  return {

    assets: parsed.data.assets.map((asset) => ({ downloadUrl: asset.browser_download_url, name: asset.name })),
    tagName: parsed.data.tag_name
  };
}

/**
 * Fetches the latest release descriptor.
 * @param url - The "latest release" API endpoint.
 * @param fetchFn - The HTTP client.
 * @returns The latest release.
 */
export async function fetchLatestRelease(url: string, fetchFn: FetchFunction = fetch): Promise<LatestRelease> {

  LOG.debug("relay", "Looking up the latest release at %s.", url);

  const response = await fetchFn(url, { headers: { "Accept": "application/vnd.github+json" } });

  if(!response.ok) {

    throw new Error("Release lookup at " + url + " failed with HTTP status " + String(response.status));
  }

  const release = parseRelease(await response.json());

  LOG.debug("relay", "Latest release is %s with %s assets.", release.tagName, release.assets.length);

  return release;
}

/**
 * Maps a machine architecture to the token used in release asset names.
 * @param architecture - The architecture reported by uname -m (e.g., "aarch64").
 * @param assetNames - The release's asset names, reported when the architecture is unknown.
 * @returns The asset name token (e.g., "arm64").
 * @throws UnsupportedArchitectureError when neither table knows the architecture.
 */
export function resolveArchitectureToken(architecture: string, assetNames: string[]): string {

  const machine = architecture.trim();

  if(Object.hasOwn(PRIMARY_ARCHITECTURES, machine)) {

    return PRIMARY_ARCHITECTURES[machine];
  }

  if(Object.hasOwn(LEGACY_ARCHITECTURES, machine)) {

    LOG.debug("relay", "Architecture %s found in the legacy table.", machine);

    return LEGACY_ARCHITECTURES[machine];
  }

  throw new UnsupportedArchitectureError(machine, assetNames);
}

/**
 * Picks the release asset for an OS and architecture token.
 * @param assets - The release's assets.
 * @param os - The OS token (e.g., "linux").
 * @param token - The architecture token from resolveArchitectureToken().
 * @returns The matching asset.
 * @throws NoMatchingReleaseAssetError when no stage finds a match.
 */
export function selectReleaseAsset(assets: ReleaseAsset[], os: string, token: string): ReleaseAsset {

  const archives = assets.filter((asset) => !CHECKSUM_PATTERN.test(asset.name));
  const canFallBack = ARM_FALLBACK_SOURCES.includes(token);

  let match = archives.find((asset) => asset.name.includes(os + "_" + token));

  if(!match && canFallBack) {

    match = archives.find((asset) => asset.name.includes(os + "_" + ARM_FALLBACK_TOKEN));

    if(match) {

      LOG.debug("relay", "No %s_%s asset, using the %s build instead.", os, token, ARM_FALLBACK_TOKEN);
    }
  }

  if(!match) {

    match = archives.find((asset) => asset.name.includes(os) && (asset.name.includes(token) || (canFallBack && asset.name.includes(ARM_FALLBACK_TOKEN))));
  }

  if(!match) {

    throw new NoMatchingReleaseAssetError(os, token, assets.map((asset) => asset.name));
  }

  LOG.debug("relay", "Selected release asset %s.", match.name);

  return match;
}

/**
 * Resolves the asset of a release that fits this machine.
 * @param release - The latest release.
 * @param os - The OS token.
 * @param architecture - The architecture reported by uname -m.
 * @returns The resolved binary release.
 */
export function resolveBinaryRelease(release: LatestRelease, os: string, architecture: string): BinaryRelease {

  const assetNames = release.assets.map((asset) => asset.name);
  const architectureToken = resolveArchitectureToken(architecture, assetNames);
  const asset = selectReleaseAsset(release.assets, os, architectureToken);

  return { architectureToken, assetName: asset.name, downloadUrl: asset.downloadUrl, versionTag: release.tagName };
}
