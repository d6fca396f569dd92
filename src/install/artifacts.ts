/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * artifacts.ts: Idempotent installation of generated files for camstream.
 */
import type { AnchoredPatch, ArtifactStatus, FileArtifact, Nullable, PatchStatus } from "../types/index.js";
import { LOG } from "../utils/logger.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/*
 * FILE INSTALLATION
 *
 * Generated files are installed under one of two disciplines:
 *
 * - Whole files (service units, the HTML viewer, the on-reboot script) belong to us. An existing file is only replaced when the overwrite policy allows it, and
 *   is then replaced completely. With overwriting disabled (--safe), an existing file is left byte-for-byte untouched and the skip is logged.
 *
 * - Anchored patches go into files that other parts of the system also own, such as /etc/rc.local. A unique marker line makes the patch idempotent: if the marker
 *   is already there, nothing happens. Otherwise the block goes immediately before the anchor line (the script's closing "exit 0"). If the anchor cannot be found,
 *   the overwrite policy decides: append to the end with a warning, or refuse and leave the file alone. A missing file is created from the patch's skeleton with the
 *   block already in place, so that it is a complete, executable script from the start.
 */

/**
 * Installs a whole-file artifact according to its overwrite policy.
 * @param artifact - The file to install.
 * @returns "written" for a new file, "overwritten" when an existing file was replaced, or "skipped" when an existing file was kept.
 */
export async function installArtifact(artifact: FileArtifact): Promise<ArtifactStatus> {

  const exists = fs.existsSync(artifact.path);

  if(exists && !artifact.overwriteAllowed) {

    LOG.info("File %s already exists. Not overwriting.", artifact.path);
    LOG.debug("install", "Content that was not written to %s:\n%s", artifact.path, artifact.content);

    return "skipped";
  }

  if(exists) {

    LOG.warn("File %s already exists, overwriting.", artifact.path);
  }

  await fsPromises.mkdir(path.dirname(artifact.path), { recursive: true });
  await fsPromises.writeFile(artifact.path, artifact.content, "utf8");
  await fsPromises.chmod(artifact.path, artifact.mode);

  LOG.debug("install", "Wrote %s with mode %s.", artifact.path, artifact.mode.toString(8));

  return exists ? "overwritten" : "written";
}

/**
 * The file content split into lines, remembering whether it ended with a newline so it can be written back the same way.
 */
interface SplitContent {

  lines: string[];
  trailingNewline: boolean;
}

/**
 * Splits file content into lines.
 * @param content - The file content.
 * @returns The lines and whether the content ended with a newline.
 */
function splitContent(content: string): SplitContent {

  if(content.length === 0) {

    return { lines: [], trailingNewline: true };
  }

  const trailingNewline = content.endsWith("\n");
  const body = trailingNewline ? content.slice(0, -1) : content;

  return { lines: body.split("\n"), trailingNewline };
}

/**
 * Computes the result of applying an anchored patch to file content, without touching the filesystem.
 * @param content - The current file content.
 * @param patch - The patch to apply.
 * @param overwriteAllowed - Whether a best-effort append is allowed when the anchor is missing.
 * @returns The new content (null when the file must not change) and the patch status.
 */
export function patchContent(content: string, patch: AnchoredPatch, overwriteAllowed: boolean): { content: Nullable<string>; status: PatchStatus } {

  const { lines, trailingNewline } = splitContent(content);

  if(lines.some((line) => line.trim() === patch.marker)) {

    return { content: null, status: "unchanged" };
  }

  // The anchor must match at the start of the line. An indented "exit 0" belongs to some inner block and is not the end of the script.
  const anchorIndex = lines.findIndex((line) => line.trimEnd() === patch.anchor);
  let output: string[];
  let status: PatchStatus;

  if(anchorIndex !== -1) {

    output = [ ...lines.slice(0, anchorIndex), ...patch.lines, ...lines.slice(anchorIndex) ];
    status = "applied";
  } else if(overwriteAllowed) {

    output = [ ...lines, ...patch.lines ];
    status = "appended";
  } else {

    return { content: null, status: "refused" };
  }

  return { content: output.join("\n") + (trailingNewline ? "\n" : ""), status };
}

/**
 * Creates the target of an anchored patch from its skeleton, with the block inserted before the anchor.
 * @param patch - The patch to apply.
 * @returns "created".
 */
async function createPatchedFile(patch: AnchoredPatch): Promise<PatchStatus> {

  const { content } = patchContent(patch.skeleton.join("\n") + "\n", patch, false);

  if(content === null) {

    throw new Error("The skeleton for " + patch.targetFile + " does not contain the line '" + patch.anchor + "'");
  }

  await fsPromises.mkdir(path.dirname(patch.targetFile), { recursive: true });
  await fsPromises.writeFile(patch.targetFile, content, "utf8");
  await fsPromises.chmod(patch.targetFile, patch.mode);

  LOG.info("%s did not exist, created it with mode %s.", patch.targetFile, patch.mode.toString(8));

  return "created";
}

/**
 * Applies an anchored patch to a shared file. A missing file is created from the patch's skeleton, whatever the overwrite policy: there is nothing to overwrite.
 * @param patch - The patch to apply.
 * @param overwriteAllowed - Whether a best-effort append is allowed when the anchor is missing.
 * @returns What was done: "applied", "appended", "created", "unchanged" (already patched), or "refused".
 */
export async function applyAnchoredPatch(patch: AnchoredPatch, overwriteAllowed: boolean): Promise<PatchStatus> {

  let current: string;

  try {

    current = await fsPromises.readFile(patch.targetFile, "utf8");
  } catch(error) {

    if(!((error instanceof Error) && ("code" in error) && (error.code === "ENOENT"))) {

      throw error;
    }

    return createPatchedFile(patch);
  }

  const result = patchContent(current, patch, overwriteAllowed);

  switch(result.status) {

    case "unchanged": {

      LOG.info("%s already contains '%s', not updating.", patch.targetFile, patch.marker);

      break;
    }

    case "refused": {

      LOG.warn("Could not figure out a safe way to update %s. Add the following lines before '%s' yourself:\n%s", patch.targetFile, patch.anchor,
        patch.lines.join("\n"));

      break;
    }

    case "appended": {

      LOG.warn("Could not find the usual spot in %s, adding to the end of the file. Please make sure it is correct!", patch.targetFile);

      break;
    }

    default: {

      LOG.info("%s: found the proper location for the update.", patch.targetFile);

      break;
    }
  }

  if(result.content !== null) {

    await fsPromises.mkdir(path.dirname(patch.targetFile), { recursive: true });
    await fsPromises.writeFile(patch.targetFile, result.content, "utf8");
  }

  return result.status;
}
