import { RecoveryReport, Runtime } from "../../../packages/runtime/src";
import { SampleDomain, registerSampleDomain } from "../../../packages/sample-domain/src";

export type WorkerHandle = {
  domain: SampleDomain;
  recovery: RecoveryReport;
  stop: () => Promise<void>;
};

/**
 * Registers the sample domain, starts projections and the relay, then drives every saga a
 * previous process left unfinished.
 */
export const startWorker = async (runtime: Runtime): Promise<WorkerHandle> => {
  const logger = runtime.logger.child({ component: "worker" });
  const domain = registerSampleDomain(runtime);
  runtime.start();

  // A saga that moved within one step timeout may still be running in the api process.
  const quietForMs = runtime.config.sagaStepTimeoutMs;
  const recovery = await runtime.sagas.recoverPending({ quietForMs });
  logger.info(
    {
      resumed: recovery.resumed.length,
      failed: recovery.failed.length,
      skipped: recovery.skipped.length,
      projections: runtime.projections.names(),
    },
    "worker started"
  );

  let followUp: NodeJS.Timeout | null = null;
  let followUpRun: Promise<void> | null = null;
  if (recovery.skipped.length > 0) {
    followUp = setTimeout(() => {
      followUpRun = runtime.sagas.recoverPending({ quietForMs }).then(
        (report) =>
          logger.info(
            { resumed: report.resumed.length, failed: report.failed.length, skipped: report.skipped.length },
            "follow-up saga recovery finished"
          ),
        (err: unknown) => logger.error({ err }, "follow-up saga recovery failed")
      );
    }, quietForMs);
  }

  return {
    domain,
    recovery,
    stop: async () => {
      logger.info("worker stopping");
      if (followUp) clearTimeout(followUp);
      await followUpRun;
      await runtime.stop();
    },
  };
};
