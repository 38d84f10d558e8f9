import { afterEach, describe, expect, it } from "vitest";
import { AppendResult, InMemoryEventStore, collect } from "../../event-store/src";
import { Runtime, createRuntime } from "../../runtime/src";
import { NewEvent, StorageFailureError, ValidationError, loadConfig, silentLogger } from "../../shared/src";
import { registerSampleDomain } from "./index";
import { TRANSFER_SAGA } from "./transferSaga";

const clock = () => new Date("2024-05-01T10:00:00.000Z");

/** Fails every write to the transfer ledger streams. */
class LedgerDownStore extends InMemoryEventStore {
  async append(streamId: string, expectedVersion: number, events: readonly NewEvent[]): Promise<AppendResult> {
    if (streamId.startsWith("transfer-")) throw new StorageFailureError("transfer ledger unavailable");
    return super.append(streamId, expectedVersion, events);
  }
}

let runtimes: Runtime[] = [];
afterEach(async () => {
  await Promise.all(runtimes.map((runtime) => runtime.stop()));
  runtimes = [];
});

const setup = (store = new InMemoryEventStore({ clock })) => {
  const config = loadConfig({ STRATA_EVENTSTORE_ADAPTER: "memory" });
  const runtime = createRuntime(config, { logger: silentLogger(), clock, store });
  runtimes.push(runtime);
  const domain = registerSampleDomain(runtime);
  return { runtime, ...domain };
};

describe("transfer saga", () => {
  it("moves money and records the transfer", async () => {
    const { runtime, accounts } = setup();
    await accounts.open("a", "ana", 1000);
    await accounts.open("b", "bo");

    const outcome = await runtime.sagas.start(TRANSFER_SAGA, "t-1", { from: "a", to: "b", amount: 300 });

    expect(outcome).toEqual({ sagaId: "t-1", sagaType: "transfer", status: "completed", failure: null });
    expect(await accounts.balance("a")).toBe(700);
    expect(await accounts.balance("b")).toBe(300);
    const ledger = await collect(runtime.store.readStream("transfer-t-1"));
    expect(ledger.map((event) => [event.eventType, event.payload])).toEqual([
      ["TransferRecorded", { from: "a", to: "b", amount: 300 }],
    ]);
  });

  it("ends compensated without moving money when the source lacks funds", async () => {
    const { runtime, accounts } = setup();
    await accounts.open("a", "ana", 100);
    await accounts.open("b", "bo");

    const outcome = await runtime.sagas.start(TRANSFER_SAGA, "t-2", { from: "a", to: "b", amount: 500 });

    expect(outcome).toEqual({
      sagaId: "t-2",
      sagaType: "transfer",
      status: "compensated",
      failure: { stepName: "withdraw-source", error: "withdraw: insufficient funds in 'account-a': balance 100, requested 500" },
    });
    expect(await accounts.balance("a")).toBe(100);
    expect(await accounts.balance("b")).toBe(0);
  });

  it("refunds the source when the target account does not exist", async () => {
    const { runtime, accounts } = setup();
    await accounts.open("a", "ana", 1000);

    const outcome = await runtime.sagas.start(TRANSFER_SAGA, "t-3", { from: "a", to: "ghost", amount: 200 });

    expect(outcome.status).toBe("compensated");
    expect(outcome.failure).toEqual({ stepName: "deposit-target", error: "deposit: account 'account-ghost' does not exist" });
    const events = await collect(runtime.store.readStream("account-a"));
    expect(events.map((event) => [event.eventType, event.payload])).toEqual([
      ["AccountOpened", { accountId: "a", owner: "ana", openingBalance: 1000 }],
      ["MoneyWithdrawn", { amount: 200, reference: "t-3:withdraw" }],
      ["MoneyDeposited", { amount: 200, reference: "t-3:refund" }],
    ]);
    expect(await accounts.balance("a")).toBe(1000);
  });

  it("reverses both legs in reverse order when recording fails", async () => {
    const { runtime, accounts } = setup(new LedgerDownStore({ clock }));
    await accounts.open("a", "ana", 1000);
    await accounts.open("b", "bo");

    const outcome = await runtime.sagas.start(TRANSFER_SAGA, "t-4", { from: "a", to: "b", amount: 250 });

    expect(outcome.failure).toEqual({ stepName: "record-transfer", error: "transfer ledger unavailable" });
    expect(outcome.status).toBe("compensated");
    expect(await accounts.balance("a")).toBe(1000);
    expect(await accounts.balance("b")).toBe(0);

    const view = await runtime.sagas.status("t-4");
    const compensations = view.stepLog.filter((entry) => entry.status === "compensated").map((entry) => entry.stepName);
    expect(compensations).toEqual(["deposit-target", "withdraw-source"]);
  });

  it("rejects a transfer to the same account before starting", async () => {
    const { runtime } = setup();
    await expect(runtime.sagas.start(TRANSFER_SAGA, "t-5", { from: "a", to: "a", amount: 1 })).rejects.toBeInstanceOf(
      ValidationError
    );
    await expect(runtime.sagas.status("t-5")).rejects.toThrow("t-5");
  });
});
