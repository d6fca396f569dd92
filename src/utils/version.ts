/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * version.ts: Package version lookup for camstream.
 */
import type { Nullable } from "../types/index.js";
import { fileURLToPath } from "node:url";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";

// Cached package version.
let cachedPackageVersion: Nullable<string> = null;

/**
 * Gets the current package version from package.json.
 * @returns The current version string (e.g., "1.0.0").
 */
export function getPackageVersion(): string {

  if(cachedPackageVersion) {

    return cachedPackageVersion;
  }

  try {

    // Resolve the path to package.json relative to this file. This file is in src/utils/ or dist/utils/, and package.json is in the project root.
    const currentDir = fileURLToPath(new URL(".", import.meta.url));
    const packagePath = resolve(currentDir, "../../package.json");
    const packageJson: unknown = JSON.parse(readFileSync(packagePath, "utf-8"));

    if(packageJson && (typeof packageJson === "object") && ("version" in packageJson) && (typeof packageJson.version === "string")) {

      cachedPackageVersion = packageJson.version;

      return cachedPackageVersion;
    }

    return "0.0.0";
  } catch {

    return "0.0.0";
  }
}

/**
 * Normalizes a version string by stripping the leading 'v' prefix if present.
 * @param version - Version string (e.g., "v1.9.0" or "1.9.0").
 * @returns Normalized version without 'v' prefix (e.g., "1.9.0").
 */
export function normalizeVersion(version: string): string {

  return version.trim().replace(/^v/, "");
}
