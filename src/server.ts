/**
 * HTTP Server Entry Point
 * Initializes the pipeline and serves the job API on PORT.
 * Handles graceful shutdown on SIGTERM / SIGINT.
 */
import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app.js";
import { initializeApp } from "./config/init.js";
import { startTempSweepJob } from "./jobs/crons/tempSweep.js";
import { PORT, TEMP_MAX_AGE_HOURS, TEMP_ROOT, TEMP_SWEEP_CRON } from "./config/env.js";

async function main(): Promise<void> {
  const { pipeline, toolStatus } = await initializeApp();
  const sweep = startTempSweepJob(pipeline, {
    schedule: TEMP_SWEEP_CRON,
    tempRoot: TEMP_ROOT,
    maxAgeHours: TEMP_MAX_AGE_HOURS,
  });

  const server = createServer(createApp(pipeline, toolStatus));
  server.listen(PORT, "0.0.0.0", () => {
    console.log(`Server running on 0.0.0.0:${PORT}`);
    console.log("✓ Server ready to accept requests\n");
  });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) {
      return;
    }
    stopping = true;
    console.log(`[server] ${signal} received, cancelling jobs...`);
    sweep.stop();
    server.close();
    pipeline
      .shutdown()
      .then(() => process.exit(0))
      .catch((error) => {
        console.error("[server] ✗ Shutdown failed:", error);
        process.exit(1);
      });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((error) => {
  console.error("✗ Initialization failed:", error);
  process.exit(1);
});
