import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import type { Logger } from "../logger.js";

export const UPLOAD_SCRATCH_PREFIX = "audio";

// <prefix>_<12 hex chars>; anything else under the temp root is left alone
const SCRATCH_DIR_NAME = /^(?:yt|bili|pod|audio)_[0-9a-f]{12}$/;

export interface ScratchArea {
  dir: string;
  token: string;
}

export function isScratchDirName(name: string): boolean {
  return SCRATCH_DIR_NAME.test(name);
}

/**
 * Creates a request-exclusive directory under `root`. The leaf is created
 * without `recursive`, so an existing directory is an error rather than a
 * silently shared one.
 */
export async function allocateScratch(root: string, prefix: string): Promise<ScratchArea> {
  await fs.mkdir(root, { recursive: true });
  const token = crypto.randomBytes(6).toString("hex");
  const dir = path.join(root, `${prefix}_${token}`);
  await fs.mkdir(dir);
  return { dir, token };
}

/** Removes a scratch area; failures are logged, never thrown. */
export async function removeScratch(area: ScratchArea, log: Logger): Promise<void> {
  try {
    await fs.rm(area.dir, { recursive: true, force: true });
    log.debug({ dir: area.dir }, "Scratch area removed");
  } catch (err) {
    log.warn({ err, dir: area.dir }, "Failed to remove scratch area");
  }
}

/**
 * Deletes scratch areas orphaned by a previous process. Only called at
 * startup, before any request can own one.
 */
export async function sweepScratchRoot(root: string, log: Logger): Promise<number> {
  let entries: string[];
  try {
    entries = await fs.readdir(root);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return 0;
    throw err;
  }

  let removed = 0;
  for (const name of entries.filter(isScratchDirName)) {
    try {
      await fs.rm(path.join(root, name), { recursive: true, force: true });
      removed++;
    } catch (err) {
      log.warn({ err, name }, "Failed to remove orphaned scratch area");
    }
  }
  if (removed > 0) {
    log.info({ removed, root }, "Removed orphaned scratch areas");
  }
  return removed;
}
