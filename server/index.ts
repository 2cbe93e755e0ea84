import { createEngineRuntime } from "./runtime/kernel.js";

const runtime = createEngineRuntime({ keepProcessAlive: true });

function shutdown(signal: NodeJS.Signals): void {
  console.info(`[runtime] Received ${signal}; stopping engine.`);
  runtime
    .stop()
    .then(() => {
      process.exit(0);
    })
    .catch((error: unknown) => {
      console.error("[runtime-shutdown-error]", error);
      process.exit(1);
    });
}

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);

runtime
  .start()
  .then(() => {
    console.info("[runtime] Engine started.");
  })
  .catch((error: unknown) => {
    console.error("[runtime-startup-error]", error);
    process.exitCode = 1;
  });
