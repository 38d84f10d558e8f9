import { afterEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { InMemoryEventStore } from "../../event-store/src";
import {
  FailurePolicy,
  ProjectionAlreadyRegisteredError,
  ProjectionNotFoundError,
  RebuildCancelledError,
  RecordedEvent,
  StepTimeoutError,
  sleep,
} from "../../shared/src";
import { InMemoryCheckpointStore } from "./checkpointStore";
import { InMemoryDeadLetterStore } from "./deadLetterStore";
import { ProjectionDefinition } from "./projection";
import { ProjectionEngine } from "./projectionEngine";
import { InMemoryReadModelStore } from "./readModelStore";

const tickEvents = z.discriminatedUnion("eventType", [
  z.object({ eventType: z.literal("Tick"), payload: z.object({ n: z.number() }) }),
  z.object({ eventType: z.literal("Boom"), payload: z.object({}) }),
]);
type TickEvent = z.infer<typeof tickEvents>;
type CountRow = { count: number; lastVersion: number };

type Hooks = {
  broken: boolean;
  onHandle?: (event: RecordedEvent<TickEvent>) => void;
};

const counts = (
  name: string,
  hooks: Hooks,
  failurePolicy?: FailurePolicy
): ProjectionDefinition<TickEvent, CountRow> & { readModel: InMemoryReadModelStore<CountRow> } => ({
  name,
  eventTypes: ["Tick", "Boom"],
  events: tickEvents,
  readModel: new InMemoryReadModelStore<CountRow>(name),
  failurePolicy,
  handle: async (event, view) => {
    hooks.onHandle?.(event);
    if (event.eventType === "Boom" && hooks.broken) throw new Error("boom handler");
    const row = (await view.get(event.streamId)) ?? { count: 0, lastVersion: 0 };
    if (event.streamVersion <= row.lastVersion) return;
    await view.put(event.streamId, { count: row.count + 1, lastVersion: event.streamVersion });
  },
});

const tick = (n: number) => ({ eventType: "Tick", payload: { n } });
const boom = () => ({ eventType: "Boom", payload: {} });
const clock = () => new Date("2024-05-01T10:00:00.000Z");

const until = async (check: () => Promise<boolean>, timeoutMs = 2_000) => {
  const deadline = Date.now() + timeoutMs;
  while (!(await check())) {
    if (Date.now() > deadline) throw new Error("condition not reached");
    await sleep(5);
  }
};

let engines: ProjectionEngine[] = [];

const setup = (settings: { batchSize?: number; partitionConcurrency?: number } = {}) => {
  const store = new InMemoryEventStore({ clock });
  const checkpoints = new InMemoryCheckpointStore();
  const deadLetters = new InMemoryDeadLetterStore();
  const engine = new ProjectionEngine({
    store,
    checkpoints,
    deadLetters,
    clock,
    settings: { pollIntervalMs: 10, batchSize: 2, ...settings },
  });
  engines.push(engine);
  return { store, checkpoints, deadLetters, engine };
};

afterEach(async () => {
  await Promise.all(engines.map((engine) => engine.stop()));
  engines = [];
});

describe("ProjectionEngine", () => {
  it("tails the log in batches and checkpoints the head", async () => {
    const { store, engine } = setup();
    const projection = counts("counts", { broken: false });
    engine.subscribe(projection);
    await store.append("s-1", 0, [tick(1), tick(2), tick(3)]);
    await store.append("s-2", 0, [tick(4), tick(5)]);

    engine.start();
    await engine.waitForPosition("counts", 5);

    expect(await projection.readModel.list()).toEqual([
      { key: "s-1", row: { count: 3, lastVersion: 3 } },
      { key: "s-2", row: { count: 2, lastVersion: 2 } },
    ]);
    expect(await engine.status("counts")).toEqual({
      projectionName: "counts",
      position: 5,
      status: "running",
      updatedAt: "2024-05-01T10:00:00.000Z",
      eventTypes: ["Tick", "Boom"],
      failurePolicy: "skip",
      lag: 0,
    });
  });

  it("wakes on new commits", async () => {
    const { store, engine } = setup();
    const projection = counts("counts", { broken: false });
    engine.subscribe(projection);
    engine.start();

    await store.append("s-1", 0, [tick(1)]);
    await engine.waitForPosition("counts", 1);
    await store.append("s-1", 1, [tick(2)]);
    await engine.waitForPosition("counts", 2);

    expect(await projection.readModel.get("s-1")).toEqual({ count: 2, lastVersion: 2 });
  });

  it("moves the checkpoint past events outside its type filter", async () => {
    const { store, engine } = setup();
    const projection = counts("counts", { broken: false });
    engine.subscribe(projection);
    await store.append("s-1", 0, [tick(1)]);
    await store.append("noise-1", 0, [{ eventType: "Noise", payload: {} }, { eventType: "Noise", payload: {} }]);

    engine.start();
    await engine.waitForPosition("counts", 3);

    expect(await projection.readModel.count()).toBe(1);
    expect((await engine.status("counts")).lag).toBe(0);
  });

  it("dead-letters and skips a failing event under the skip policy", async () => {
    const { store, deadLetters, engine } = setup();
    const projection = counts("counts", { broken: true });
    engine.subscribe(projection);
    await store.append("s-1", 0, [tick(1), boom(), tick(3)]);

    engine.start();
    await engine.waitForPosition("counts", 3);

    expect(await projection.readModel.get("s-1")).toEqual({ count: 2, lastVersion: 3 });
    const letters = await deadLetters.list("counts");
    expect(letters).toHaveLength(1);
    expect(letters[0]).toMatchObject({
      projectionName: "counts",
      error: "boom handler",
      failedAt: "2024-05-01T10:00:00.000Z",
    });
    expect(letters[0].event.globalPosition).toBe(2);
    expect(letters[0].event.eventType).toBe("Boom");
  });

  it("halts only the failing projection under the halt policy and resumes on request", async () => {
    const { store, deadLetters, engine } = setup();
    const hooks = { broken: true };
    const halting = counts("halting", hooks, "halt");
    const skipping = counts("skipping", hooks);
    engine.subscribe(halting);
    engine.subscribe(skipping);
    await store.append("s-1", 0, [tick(1), boom(), tick(3)]);

    engine.start();
    await engine.waitForPosition("skipping", 3);
    await until(async () => (await engine.status("halting")).status === "failed");

    const halted = await engine.status("halting");
    expect(halted.position).toBe(1);
    expect(await halting.readModel.get("s-1")).toEqual({ count: 1, lastVersion: 1 });
    expect(await skipping.readModel.get("s-1")).toEqual({ count: 2, lastVersion: 3 });
    expect(await deadLetters.list("halting")).toHaveLength(1);

    hooks.broken = false;
    expect(await engine.resume("halting")).toBe(true);
    await engine.waitForPosition("halting", 3);
    expect(await halting.readModel.get("s-1")).toEqual({ count: 3, lastVersion: 3 });
    expect(await engine.resume("halting")).toBe(false);
  });

  it("keeps per-stream order when partitions run concurrently", async () => {
    const { store, engine } = setup({ batchSize: 50, partitionConcurrency: 3 });
    const seen = new Map<string, number[]>();
    const projection = counts("counts", {
      broken: false,
      onHandle: (event) => seen.set(event.streamId, [...(seen.get(event.streamId) ?? []), event.streamVersion]),
    });
    engine.subscribe(projection);
    for (let version = 0; version < 5; version += 1) {
      for (const streamId of ["a", "b", "c", "d"]) {
        await store.append(streamId, version, [tick(version)]);
      }
    }

    engine.start();
    await engine.waitForPosition("counts", 20);

    for (const streamId of ["a", "b", "c", "d"]) {
      expect(seen.get(streamId)).toEqual([1, 2, 3, 4, 5]);
      expect(await projection.readModel.get(streamId)).toEqual({ count: 5, lastVersion: 5 });
    }
  });

  it("rebuilds into a fresh generation that matches the live read model", async () => {
    const { store, engine } = setup();
    const projection = counts("counts", { broken: false });
    engine.subscribe(projection);
    await store.append("s-1", 0, [tick(1), tick(2), tick(3)]);
    await store.append("s-2", 0, [tick(4), tick(5)]);
    await store.append("s-3", 0, [tick(6)]);
    engine.start();
    await engine.waitForPosition("counts", 6);
    const live = await projection.readModel.list();

    const result = await engine.rebuild("counts");

    expect(result).toEqual({ projectionName: "counts", position: 6, eventsApplied: 6, deadLettered: 0 });
    expect(await projection.readModel.list()).toEqual(live);
    expect(await engine.status("counts")).toMatchObject({ position: 6, status: "running" });

    await store.append("s-3", 1, [tick(7)]);
    await engine.waitForPosition("counts", 7);
    expect(await projection.readModel.get("s-3")).toEqual({ count: 2, lastVersion: 2 });
  });

  it("applies events committed during a rebuild after the swap", async () => {
    const { store, engine } = setup();
    const hooks: Hooks = { broken: false };
    const projection = counts("counts", hooks);
    engine.subscribe(projection);
    await store.append("s-1", 0, [tick(1), tick(2)]);
    await store.append("s-2", 0, [tick(3)]);
    engine.start();
    await engine.waitForPosition("counts", 3);

    let appends: Promise<unknown> | null = null;
    hooks.onHandle = (event) => {
      if (appends || event.globalPosition !== 2) return;
      appends = Promise.all([
        store.append("s-3", 0, [tick(4), tick(5)]),
        store.append("s-1", 2, [tick(6)]),
        store.append("s-4", 0, [tick(7)]),
      ]);
    };

    const result = await engine.rebuild("counts");
    await appends;
    await engine.waitForPosition("counts", 7);

    expect(result).toEqual({ projectionName: "counts", position: 3, eventsApplied: 3, deadLettered: 0 });
    expect(await projection.readModel.list()).toEqual([
      { key: "s-1", row: { count: 3, lastVersion: 3 } },
      { key: "s-2", row: { count: 1, lastVersion: 1 } },
      { key: "s-3", row: { count: 2, lastVersion: 2 } },
      { key: "s-4", row: { count: 1, lastVersion: 1 } },
    ]);
    expect(await engine.status("counts")).toMatchObject({ position: 7, status: "running", lag: 0 });
  });

  it("discards the staging generation when a rebuild is cancelled", async () => {
    const { store, engine } = setup();
    const hooks: Hooks = { broken: false };
    const projection = counts("counts", hooks);
    engine.subscribe(projection);
    await store.append("s-1", 0, [tick(1), tick(2), tick(3), tick(4)]);
    engine.start();
    await engine.waitForPosition("counts", 4);
    const live = await projection.readModel.list();

    const controller = new AbortController();
    hooks.onHandle = (event) => {
      if (event.globalPosition === 2) controller.abort();
    };
    await expect(engine.rebuild("counts", { signal: controller.signal })).rejects.toBeInstanceOf(
      RebuildCancelledError
    );

    expect(await projection.readModel.list()).toEqual(live);
    expect(await engine.status("counts")).toMatchObject({ position: 4, status: "running" });
    expect(engine.cancelRebuild("counts")).toBe(false);
  });

  it("discards a rebuild left behind by a crash", async () => {
    const { store, checkpoints, engine } = setup();
    const projection = counts("counts", { broken: false });
    engine.subscribe(projection);
    await store.append("s-1", 0, [tick(1), tick(2)]);
    await checkpoints.save({
      projectionName: "counts",
      position: 0,
      status: "rebuilding",
      updatedAt: "2024-05-01T09:00:00.000Z",
    });
    const staging = await projection.readModel.beginRebuild();
    await staging.put("half-built", { count: 99, lastVersion: 99 });

    engine.start();
    await engine.waitForPosition("counts", 2);

    expect(await engine.status("counts")).toMatchObject({ position: 2, status: "running" });
    expect(await projection.readModel.list()).toEqual([{ key: "s-1", row: { count: 2, lastVersion: 2 } }]);
  });

  it("leaves a rebuild claimed elsewhere alone until its lease runs out", async () => {
    let now = new Date("2024-05-01T10:00:00.000Z");
    const store = new InMemoryEventStore({ clock });
    const checkpoints = new InMemoryCheckpointStore();
    const engine = new ProjectionEngine({
      store,
      checkpoints,
      deadLetters: new InMemoryDeadLetterStore(),
      clock: () => now,
      settings: { pollIntervalMs: 10, batchSize: 2, rebuildLeaseMs: 60_000 },
    });
    engines.push(engine);
    const projection = counts("counts", { broken: false });
    engine.subscribe(projection);
    await store.append("s-1", 0, [tick(1), tick(2)]);
    await checkpoints.save({
      projectionName: "counts",
      position: 0,
      status: "rebuilding",
      updatedAt: "2024-05-01T10:00:00.000Z",
    });

    engine.start();
    await sleep(50);
    expect(await engine.status("counts")).toMatchObject({ position: 0, status: "rebuilding" });
    expect(await projection.readModel.list()).toEqual([]);
    await expect(engine.rebuild("counts")).rejects.toThrow("[Projection: counts] rebuild already in progress");

    now = new Date("2024-05-01T10:01:00.001Z");
    await engine.waitForPosition("counts", 2);

    expect(await engine.status("counts")).toMatchObject({ position: 2, status: "running" });
    expect(await projection.readModel.list()).toEqual([{ key: "s-1", row: { count: 2, lastVersion: 2 } }]);
  });

  it("does not advance the checkpoint when another writer moved it during the batch", async () => {
    const { store, checkpoints, engine } = setup();
    const hooks: Hooks = { broken: false };
    const projection = counts("counts", hooks);
    engine.subscribe(projection);
    await store.append("s-1", 0, [tick(1)]);
    let claimed = false;
    hooks.onHandle = () => {
      if (claimed) return;
      claimed = true;
      void checkpoints.save({
        projectionName: "counts",
        position: 0,
        status: "rebuilding",
        updatedAt: "2024-05-01T10:00:00.000Z",
      });
    };

    engine.start();
    await sleep(50);

    expect(await checkpoints.load("counts")).toEqual({
      projectionName: "counts",
      position: 0,
      status: "rebuilding",
      updatedAt: "2024-05-01T10:00:00.000Z",
    });
  });

  it("sets stopped projections back to idle", async () => {
    const { store, engine } = setup();
    engine.subscribe(counts("counts", { broken: false }));
    await store.append("s-1", 0, [tick(1)]);
    engine.start();
    await engine.waitForPosition("counts", 1);
    await engine.stop();

    expect(await engine.status("counts")).toMatchObject({ position: 1, status: "idle" });
  });

  it("rejects duplicate and unknown projection names", async () => {
    const { engine } = setup();
    engine.subscribe(counts("counts", { broken: false }));

    expect(() => engine.subscribe(counts("counts", { broken: false }))).toThrow(ProjectionAlreadyRegisteredError);
    expect(() => engine.cancelRebuild("missing")).toThrow(ProjectionNotFoundError);
    expect(engine.names()).toEqual(["counts"]);
  });

  it("times out waiting for a position the projection never reaches", async () => {
    const { engine } = setup();
    engine.subscribe(counts("counts", { broken: false }));

    await expect(engine.waitForPosition("counts", 1, 20)).rejects.toBeInstanceOf(StepTimeoutError);
  });
});
