/**
 * Organize Service
 * Files a finished artifact under <outputRoot>/<publisher>/<title>.<ext>.
 * An existing file is never overwritten: later copies get " (2)", " (3)", ...
 */

import { constants } from "fs";
import { copyFile, link, mkdir, rm, unlink } from "fs/promises";
import path from "path";
import { OrganizeError, errnoCode } from "../../utils/errors.js";
import { KeyedLock } from "../../utils/keyedLock.js";
import { StoragePaths } from "../../utils/storagePaths.js";

export interface PlacementRequest {
  /** Sanitized publisher directory name */
  publisher: string;
  /** Sanitized file name without extension */
  fileName: string;
  ext: string;
  sourcePath: string;
}

export interface Organizer {
  place(request: PlacementRequest): Promise<string>;
}

export interface OrganizerOptions {
  outputRoot: string;
  maxAttempts?: number;
}

/** Errors meaning a hard link cannot be made here; fall back to copying */
const LINK_UNSUPPORTED = new Set(["EXDEV", "EPERM", "ENOTSUP", "EOPNOTSUPP", "ENOSYS"]);

export function createOrganizer(options: OrganizerOptions): Organizer {
  const { outputRoot } = options;
  const maxAttempts = options.maxAttempts ?? 999;
  const publisherLocks = new KeyedLock();

  async function place(request: PlacementRequest): Promise<string> {
    const { publisher, fileName, ext, sourcePath } = request;
    const publisherDir = StoragePaths.publisherDir(outputRoot, publisher);

    // Placements into one publisher dir are serialized
    return publisherLocks.run(publisher.toLowerCase(), async () => {
      try {
        await mkdir(publisherDir, { recursive: true });
      } catch (error) {
        throw new OrganizeError("IOError", `Cannot create directory ${publisherDir}: ${describe(error)}`);
      }

      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        const target = path.join(publisherDir, StoragePaths.fileName(fileName, ext, attempt));
        try {
          await moveExclusive(sourcePath, target);
          console.log(`[organize] ✓ Placed ${target}`);
          return target;
        } catch (error) {
          if (errnoCode(error) === "EEXIST") {
            continue;
          }
          throw new OrganizeError("IOError", `Cannot place ${target}: ${describe(error)}`);
        }
      }

      throw new OrganizeError(
        "PathConflict",
        `No free name for '${fileName}.${ext}' in ${publisherDir} after ${maxAttempts} attempts`
      );
    });
  }

  return { place };
}

/**
 * Moves source to target, failing with EEXIST instead of replacing a file.
 */
async function moveExclusive(source: string, target: string): Promise<void> {
  try {
    await link(source, target);
  } catch (error) {
    const code = errnoCode(error);
    if (!code || !LINK_UNSUPPORTED.has(code)) {
      throw error;
    }
    try {
      await copyFile(source, target, constants.COPYFILE_EXCL);
    } catch (copyError) {
      if (errnoCode(copyError) !== "EEXIST") {
        await rm(target, { force: true });
      }
      throw copyError;
    }
  }

  // The file is in place; the job's temp dir removal takes care of a leftover source
  try {
    await unlink(source);
  } catch (error) {
    console.warn(`[organize] Could not remove ${source}: ${describe(error)}`);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
