import "dotenv/config";
import { createRuntime, loadConfig } from "../../../packages/runtime/src";
import { startWorker } from "./worker";

async function main() {
  const config = loadConfig();
  const runtime = createRuntime(config);
  const worker = await startWorker(runtime);

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    runtime.logger.info({ signal }, "shutting down worker");
    worker.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        runtime.logger.error({ err }, "worker shutdown failed");
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
