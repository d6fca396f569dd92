/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.ts: Debug log categories for camstream.
 */

/* Debug output is grouped into a small, fixed set of categories, one per stage of a setup run. CAMSTREAM_DEBUG takes a comma-separated list of them:
 *
 *   CAMSTREAM_DEBUG=probe             Only the capture probe.
 *   CAMSTREAM_DEBUG=probe,select      The probe and the device selection.
 *   CAMSTREAM_DEBUG=*,-exec           Everything except the command runner's output.
 *
 * The list is resolved once into the set of enabled categories, so checking a category at log time is a set lookup.
 */

/**
 * Every debug category with the description --help shows for it.
 */
export const DEBUG_CATEGORIES = {

  command: "FFmpeg command synthesis: bitrate and pixel format decisions.",
  config: "Configuration layers: config file, environment, CLI overrides.",
  exec: "Shell commands run and their combined output.",
  install: "Artifact writes, skips, and rc.local patching.",
  probe: "V4L2 format listing: accepted and rejected lines.",
  relay: "Relay server release lookup, asset matching, download, and version checks.",
  select: "Device selection: candidates and the chosen format."
} as const;

export type DebugCategory = keyof typeof DEBUG_CATEGORIES;

// The categories that produce output. Empty when debug logging is off.
const enabledCategories = new Set<DebugCategory>();

/**
 * Checks whether a name is a known debug category.
 * @param name - The name to check.
 * @returns True for a known category.
 */
function isDebugCategory(name: string): name is DebugCategory {

  return Object.hasOwn(DEBUG_CATEGORIES, name);
}

/**
 * Lists the debug categories in alphabetical order.
 * @returns The category names.
 */
export function getDebugCategories(): DebugCategory[] {

  return Object.keys(DEBUG_CATEGORIES).filter(isDebugCategory).sort();
}

/**
 * Enables the debug categories named in a comma-separated list, replacing any earlier configuration. "*" names every category and a leading "-" removes one.
 * @param pattern - The list, e.g. "probe,select" or "*,-exec".
 * @returns The names in the list that are not debug categories.
 */
export function initDebugFilter(pattern: string): string[] {

  const included = new Set<DebugCategory>();
  const excluded = new Set<DebugCategory>();
  const unknown: string[] = [];
  let everything = false;

  for(const entry of pattern.split(",").map((part) => part.trim()).filter((part) => part.length > 0)) {

    if(entry === "*") {

      everything = true;

      continue;
    }

    const name = entry.startsWith("-") ? entry.slice(1) : entry;

    if(!isDebugCategory(name)) {

      unknown.push(name);

      continue;
    }

    (entry.startsWith("-") ? excluded : included).add(name);
  }

  enabledCategories.clear();

  for(const category of everything ? getDebugCategories() : included) {

    if(!excluded.has(category)) {

      enabledCategories.add(category);
    }
  }

  return unknown;
}

/**
 * Checks whether a debug category produces output.
 * @param category - The category.
 * @returns True if it is enabled.
 */
export function isCategoryEnabled(category: DebugCategory): boolean {

  return enabledCategories.has(category);
}

/**
 * Checks whether any debug category is enabled.
 * @returns True if debug logging is on.
 */
export function isAnyDebugEnabled(): boolean {

  return enabledCategories.size > 0;
}
