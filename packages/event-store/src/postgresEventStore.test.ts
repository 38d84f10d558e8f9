import { describe, expect, it } from "vitest";
import { createTestPool } from "../../shared/src/testing/pgMem";
import { VersionConflictError } from "../../shared/src";
import { collect } from "./eventStore";
import { PostgresEventStore } from "./postgresEventStore";

const setupStore = () => new PostgresEventStore({ pool: createTestPool(), pageSize: 2 });

describe("PostgresEventStore", () => {
  it("appends batches with contiguous versions and positions", async () => {
    const store = setupStore();
    const first = await store.append("acc-1", 0, [
      { eventType: "Opened", payload: { balance: 1000 }, metadata: { source: "test" } },
      { eventType: "Withdrawn", payload: { amount: 250 } },
    ]);
    const second = await store.append("acc-2", 0, [{ eventType: "Opened", payload: { balance: 5 } }]);
    const third = await store.append("acc-1", 2, [{ eventType: "Deposited", payload: { amount: 1 } }]);

    expect(first.ok && first.events.map((e) => e.globalPosition)).toEqual([1, 2]);
    expect(second.ok && second.events[0].globalPosition).toBe(3);
    expect(third.ok && third.version).toBe(3);

    const stream = await collect(store.readStream("acc-1"));
    expect(stream.map((e) => [e.eventType, e.streamVersion, e.globalPosition])).toEqual([
      ["Opened", 1, 1],
      ["Withdrawn", 2, 2],
      ["Deposited", 3, 4],
    ]);
    expect(stream[0].metadata).toEqual({ source: "test" });
    expect(stream[0].payload).toEqual({ balance: 1000 });
    expect(await store.headPosition()).toBe(4);
  });

  it("rejects a stale expected version and keeps the log unchanged", async () => {
    const store = setupStore();
    await store.append("acc-1", 0, [{ eventType: "Opened", payload: {} }]);
    const result = await store.append("acc-1", 0, [{ eventType: "Opened", payload: {} }]);
    expect(result.ok).toBe(false);
    expect(!result.ok && result.error).toBeInstanceOf(VersionConflictError);
    expect(await store.headPosition()).toBe(1);
  });

  it("pages through the global log with a type filter", async () => {
    const store = setupStore();
    await store.append("a", 0, [
      { eventType: "Opened", payload: {} },
      { eventType: "Deposited", payload: {} },
      { eventType: "Deposited", payload: {} },
    ]);
    await store.append("b", 0, [
      { eventType: "Opened", payload: {} },
      { eventType: "Deposited", payload: {} },
    ]);
    const deposits = await collect(store.readAll(0, Number.POSITIVE_INFINITY, ["Deposited"]));
    expect(deposits.map((e) => e.globalPosition)).toEqual([2, 3, 5]);
    const tail = await collect(store.readAll(3));
    expect(tail.map((e) => e.globalPosition)).toEqual([4, 5]);
  });

  it("floors fractional read bounds", async () => {
    const store = setupStore();
    await store.append("a", 0, [
      { eventType: "Opened", payload: {} },
      { eventType: "Deposited", payload: {} },
      { eventType: "Withdrawn", payload: {} },
    ]);

    expect((await collect(store.readAll(1.5, 2.9))).map((e) => e.globalPosition)).toEqual([2]);
    expect((await collect(store.readStream("a", 1.5))).map((e) => e.streamVersion)).toEqual([2, 3]);
  });
});
