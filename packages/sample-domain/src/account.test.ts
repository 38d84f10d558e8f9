import { afterEach, describe, expect, it } from "vitest";
import { AggregateRepository } from "../../aggregates/src";
import { InMemoryEventStore, collect } from "../../event-store/src";
import { Runtime, createRuntime } from "../../runtime/src";
import { loadConfig, silentLogger } from "../../shared/src";
import { InMemorySnapshotStore } from "../../snapshot-store/src";
import { Accounts, accountAggregate } from "./account";
import { ACCOUNT_BALANCES } from "./accountBalances";
import { registerSampleDomain } from "./index";

const clock = () => new Date("2024-05-01T10:00:00.000Z");

const setup = () => {
  const store = new InMemoryEventStore({ clock });
  const accounts = new Accounts(new AggregateRepository(accountAggregate, { store, clock }));
  return { store, accounts };
};

let runtimes: Runtime[] = [];
afterEach(async () => {
  await Promise.all(runtimes.map((runtime) => runtime.stop()));
  runtimes = [];
});

describe("Accounts", () => {
  it("opens an account and replays a withdrawal into the balance", async () => {
    const { store, accounts } = setup();

    expect(await accounts.open("1", "ana", 1000)).toEqual({ status: "success", version: 1 });
    expect(await accounts.withdraw("1", 250)).toEqual({ status: "success", version: 2 });

    expect(await accounts.balance("1")).toBe(750);
    const events = await collect(store.readStream("account-1"));
    expect(events.map((event) => [event.eventType, event.streamVersion])).toEqual([
      ["AccountOpened", 1],
      ["MoneyWithdrawn", 2],
    ]);
  });

  it("rejects commands that break account rules without appending", async () => {
    const { store, accounts } = setup();
    await accounts.open("1", "ana", 1000);

    expect(await accounts.withdraw("1", 5000)).toEqual({
      status: "validation_error",
      issues: ["insufficient funds in 'account-1': balance 1000, requested 5000"],
    });
    expect(await accounts.open("1", "bo", 0)).toEqual({
      status: "validation_error",
      issues: ["account '1' already exists"],
    });
    expect(await accounts.deposit("1", -5)).toEqual({
      status: "validation_error",
      issues: ["amount must be a positive whole number of cents"],
    });
    expect(await accounts.close("1")).toEqual({
      status: "validation_error",
      issues: ["only an account with a zero balance can be closed"],
    });
    expect(await accounts.deposit("2", 10)).toEqual({
      status: "validation_error",
      issues: ["account 'account-2' does not exist"],
    });
    expect(await accounts.balance("2")).toBeNull();
    expect(await store.headPosition()).toBe(1);
  });

  it("applies a referenced deposit once", async () => {
    const { accounts } = setup();
    await accounts.open("1", "ana", 0);

    expect(await accounts.deposit("1", 100, "ref-1")).toEqual({ status: "success", version: 2 });
    expect(await accounts.deposit("1", 100, "ref-1")).toEqual({ status: "success", version: 2 });
    expect(await accounts.balance("1")).toBe(100);
  });

  it("closes an emptied account and refuses further commands", async () => {
    const { accounts } = setup();
    await accounts.open("1", "ana", 40);
    await accounts.withdraw("1", 40);

    expect(await accounts.close("1", "moving away")).toEqual({ status: "success", version: 3 });
    expect(await accounts.deposit("1", 10)).toEqual({
      status: "validation_error",
      issues: ["account 'account-1' is closed"],
    });
  });

  it("loads the same state from a snapshot as from a full replay", async () => {
    const store = new InMemoryEventStore({ clock });
    const snapshots = new InMemorySnapshotStore();
    const snapshotted = new AggregateRepository(accountAggregate, { store, snapshots, snapshotEvery: 2, clock });
    const accounts = new Accounts(snapshotted);

    await accounts.open("1", "ana", 1000);
    await accounts.deposit("1", 200, "r1");
    await accounts.withdraw("1", 50);
    await accounts.deposit("1", 25);
    await accounts.withdraw("1", 75, "r2");
    await snapshotted.flushSnapshots();

    expect((await snapshots.latest("account-1"))?.version).toBe(4);
    const fromSnapshot = await snapshotted.load("account-1");
    const fromEvents = await new AggregateRepository(accountAggregate, { store }).load("account-1");

    expect(fromSnapshot.version).toBe(5);
    expect(fromSnapshot.state).toEqual(fromEvents.state);
    expect(fromEvents.state).toEqual({
      accountId: "1",
      owner: "ana",
      balance: 1100,
      status: "open",
      references: ["r1", "r2"],
    });
  });
});

describe("account-balances projection", () => {
  it("keeps one row per account in step with the log", async () => {
    const config = loadConfig({ STRATA_EVENTSTORE_ADAPTER: "memory", STRATA_PROJECTION_POLL_MS: "10" });
    const runtime = createRuntime(config, { logger: silentLogger(), clock });
    runtimes.push(runtime);
    const { accounts, accountBalances } = registerSampleDomain(runtime);
    runtime.start();

    await accounts.open("1", "ana", 1000);
    await accounts.withdraw("1", 250);
    await accounts.open("2", "bo");
    await accounts.close("2");
    await runtime.projections.waitForPosition(ACCOUNT_BALANCES, 4);

    expect(await accountBalances.list()).toEqual([
      {
        key: "1",
        row: { accountId: "1", owner: "ana", balance: 750, status: "open", version: 2, updatedAt: "2024-05-01T10:00:00.000Z" },
      },
      {
        key: "2",
        row: { accountId: "2", owner: "bo", balance: 0, status: "closed", version: 2, updatedAt: "2024-05-01T10:00:00.000Z" },
      },
    ]);
  });
});
