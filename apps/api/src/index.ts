import "dotenv/config";
import { createRuntime, loadConfig } from "../../../packages/runtime/src";
import { registerSampleDomain } from "../../../packages/sample-domain/src";
import { buildServer } from "./server";

const main = async () => {
  const config = loadConfig();
  const runtime = createRuntime(config);
  const domain = registerSampleDomain(runtime);
  // With postgres the worker process owns the projections; file and memory logs live in this process only.
  const embedded = config.adapter !== "postgres";
  if (embedded) runtime.start();

  const server = buildServer({
    runtime,
    domain,
    allowedOrigins: process.env.STRATA_ALLOWED_ORIGINS,
    version: process.env.STRATA_VERSION,
  });

  const shutdown = async (signal: string) => {
    runtime.logger.info({ signal }, "shutting down api");
    await server.close();
    await runtime.stop();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          runtime.logger.error({ err }, "api shutdown failed");
          process.exit(1);
        }
      );
    });
  }

  await server.listen({ port: config.apiPort, host: "0.0.0.0" });
  runtime.logger.info({ port: config.apiPort, adapter: config.adapter, embeddedWorkers: embedded }, "api listening");
};

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
