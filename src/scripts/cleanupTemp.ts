/**
 * Maintenance Script: Clear Job Temp Directories
 *
 * Removes every per-job directory under TEMP_ROOT regardless of age.
 * Run only while no pipeline process is using the same TEMP_ROOT.
 */

import "dotenv/config";
import { TEMP_ROOT } from "../config/env.js";
import { cleanupTempFiles, getTempDiskUsage } from "../utils/cleanupTemp.js";

async function clearTempDirs() {
  const before = await getTempDiskUsage(TEMP_ROOT);
  console.log(`📊 ${TEMP_ROOT}: ${before.usedMB.toFixed(1)}MB in ${before.files} files\n`);

  const result = await cleanupTempFiles(TEMP_ROOT, 0);

  const after = await getTempDiskUsage(TEMP_ROOT);
  console.log(`\n✅ Removed ${result.removedDirs} dirs, ${result.removedFiles} files (${result.freedMB.toFixed(1)}MB freed)`);
  console.log(`📊 Remaining: ${after.usedMB.toFixed(1)}MB in ${after.files} files`);
}

clearTempDirs()
  .then(() => process.exit(0))
  .catch((error) => {
    console.error("❌ Cleanup failed:", error);
    process.exit(1);
  });
