import { afterEach, describe, expect, it } from "vitest";
import { AggregateRepository, InMemoryEventStore, createRuntime, loadConfig } from "../../../packages/runtime/src";
import { createTestPool } from "../../../packages/shared/src/testing/pgMem";
import {
  ACCOUNT_BALANCES,
  Accounts,
  accountAggregate,
  registerSampleDomain,
} from "../../../packages/sample-domain/src";
import { WorkerHandle, startWorker } from "./worker";

const clock = () => new Date("2024-05-01T10:00:00.000Z");

let workers: WorkerHandle[] = [];
afterEach(async () => {
  await Promise.all(workers.map((worker) => worker.stop()));
  workers = [];
});

describe("startWorker", () => {
  it("finishes a transfer interrupted after its first side effect", async () => {
    const store = new InMemoryEventStore({ clock });
    const accounts = new Accounts(new AggregateRepository(accountAggregate, { store }));
    await accounts.open("a", "ana", 1000);
    await accounts.open("b", "bo");
    // The previous process withdrew, then died before recording the step as completed.
    await accounts.withdraw("a", 100, "t-9:withdraw");
    await store.append("saga-t-9", 0, [
      {
        eventType: "SagaStarted",
        payload: {
          sagaId: "t-9",
          sagaType: "transfer",
          input: { from: "a", to: "b", amount: 100 },
          stepNames: ["withdraw-source", "deposit-target", "record-transfer"],
        },
      },
      { eventType: "StepStarted", payload: { stepIndex: 0, stepName: "withdraw-source", attempt: 1 } },
    ]);

    const config = loadConfig({
      STRATA_EVENTSTORE_ADAPTER: "memory",
      STRATA_LOG_LEVEL: "silent",
      STRATA_PROJECTION_POLL_MS: "10",
    });
    const runtime = createRuntime(config, { clock: () => new Date("2024-05-01T11:00:00.000Z"), store });
    const worker = await startWorker(runtime);
    workers.push(worker);

    expect(runtime.isStarted).toBe(true);
    expect(worker.recovery).toEqual({
      resumed: [{ sagaId: "t-9", sagaType: "transfer", status: "completed", failure: null }],
      failed: [],
      skipped: [],
    });
    expect(await accounts.balance("a")).toBe(900);
    expect(await accounts.balance("b")).toBe(100);

    await runtime.projections.waitForPosition(ACCOUNT_BALANCES, await store.headPosition());
    expect(await worker.domain.accountBalances.get("a")).toMatchObject({ balance: 900, version: 2 });
    expect(await worker.domain.accountBalances.get("b")).toMatchObject({ balance: 100, version: 2 });
  });

  it("leaves a saga that moved within the step timeout to the process running it", async () => {
    const store = new InMemoryEventStore({ clock });
    const accounts = new Accounts(new AggregateRepository(accountAggregate, { store }));
    await accounts.open("a", "ana", 1000);
    await accounts.open("b", "bo");
    await accounts.withdraw("a", 100, "t-10:withdraw");
    await store.append("saga-t-10", 0, [
      {
        eventType: "SagaStarted",
        payload: {
          sagaId: "t-10",
          sagaType: "transfer",
          input: { from: "a", to: "b", amount: 100 },
          stepNames: ["withdraw-source", "deposit-target", "record-transfer"],
        },
      },
      { eventType: "StepStarted", payload: { stepIndex: 0, stepName: "withdraw-source", attempt: 1 } },
    ]);

    const config = loadConfig({ STRATA_EVENTSTORE_ADAPTER: "memory", STRATA_LOG_LEVEL: "silent" });
    const runtime = createRuntime(config, { clock: () => new Date("2024-05-01T10:00:10.000Z"), store });
    const worker = await startWorker(runtime);
    workers.push(worker);

    expect(worker.recovery).toEqual({ resumed: [], failed: [], skipped: ["t-10"] });
    expect(await runtime.sagas.status("t-10")).toMatchObject({ status: "running", version: 2 });
    expect(await accounts.balance("b")).toBe(0);
  });

  it("keeps tailing into the new generation after the api process rebuilds a projection", async () => {
    const pool = createTestPool();
    let tick = 0;
    const ticking = () => new Date(Date.UTC(2024, 4, 1, 10) + tick++);
    const config = loadConfig({
      STRATA_DB_URL: "postgres://localhost/strata_test",
      STRATA_LOG_LEVEL: "silent",
      STRATA_PROJECTION_POLL_MS: "10",
    });
    const workerRuntime = createRuntime(config, { clock: ticking, pool });
    const worker = await startWorker(workerRuntime);
    workers.push(worker);
    const api = createRuntime(config, { clock: ticking, pool });
    const apiDomain = registerSampleDomain(api);

    await apiDomain.accounts.open("1", "ann", 100);
    await workerRuntime.projections.waitForPosition(ACCOUNT_BALANCES, 1);
    expect(await apiDomain.accountBalances.get("1")).toMatchObject({ balance: 100, version: 1 });

    expect(await api.projections.rebuild(ACCOUNT_BALANCES)).toEqual({
      projectionName: ACCOUNT_BALANCES,
      position: 1,
      eventsApplied: 1,
      deadLettered: 0,
    });
    await apiDomain.accounts.deposit("1", 50);
    await workerRuntime.projections.waitForPosition(ACCOUNT_BALANCES, 2);

    expect(await apiDomain.accountBalances.get("1")).toMatchObject({ balance: 150, version: 2 });
    expect(await worker.domain.accountBalances.get("1")).toMatchObject({ balance: 150, version: 2 });
    expect(await api.deadLetters.list(ACCOUNT_BALANCES)).toEqual([]);
  });
});
