import { EventStore } from "../../event-store/src";
import { CheckpointStore } from "../../projections/src";
import { KeyedMutex, Logger, RecordedEvent, WakeSignal, silentLogger } from "../../shared/src";
import { EventPublisher } from "./publisher";

export type EventRelayDeps = {
  store: EventStore;
  checkpoints: CheckpointStore;
  publisher: EventPublisher;
  name?: string;
  logger?: Logger;
  clock?: () => Date;
  batchSize?: number;
  pollIntervalMs?: number;
  retryBaseMs?: number;
  retryMaxMs?: number;
};

/**
 * Forwards committed events to a publisher in commit order, at least once. Progress is
 * kept as a checkpoint named `$relay:<name>` next to the projection checkpoints.
 */
export class EventRelay {
  readonly checkpointName: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly batchSize: number;
  private readonly pollIntervalMs: number;
  private readonly retryBaseMs: number;
  private readonly retryMaxMs: number;
  private readonly mutex = new KeyedMutex();
  private readonly wakeup = new WakeSignal();
  private running = false;
  private loop: Promise<void> | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(private readonly deps: EventRelayDeps) {
    this.checkpointName = `$relay:${deps.name ?? "default"}`;
    this.logger = (deps.logger ?? silentLogger()).child({ relay: this.checkpointName });
    this.now = deps.clock ?? (() => new Date());
    this.batchSize = deps.batchSize ?? 100;
    this.pollIntervalMs = deps.pollIntervalMs ?? 500;
    this.retryBaseMs = deps.retryBaseMs ?? 100;
    this.retryMaxMs = deps.retryMaxMs ?? 10_000;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.unsubscribe = this.deps.store.onCommit(() => this.wakeup.notify());
    this.wakeup.notify();
    this.loop = this.run();
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.wakeup.notify();
    await this.loop;
    this.loop = null;
  }

  private async run(): Promise<void> {
    let failures = 0;
    while (this.running) {
      let delay = this.pollIntervalMs;
      try {
        const published = await this.publishPending();
        failures = 0;
        if (published > 0) continue;
      } catch (err) {
        failures += 1;
        delay = Math.min(this.retryMaxMs, this.retryBaseMs * 2 ** (failures - 1));
        this.logger.warn({ err, failures, retryInMs: delay }, "publish failed");
      }
      if (this.running) await this.wakeup.wait(delay);
    }
  }

  /** Publishes everything committed since the checkpoint. Returns the number of events sent. */
  publishPending(): Promise<number> {
    return this.mutex.run("relay", async () => {
      const checkpoint = await this.deps.checkpoints.load(this.checkpointName);
      let position = checkpoint?.position ?? 0;
      const head = await this.deps.store.headPosition();
      let published = 0;
      while (position < head) {
        const batch: RecordedEvent[] = [];
        for await (const event of this.deps.store.readAll(position, head)) {
          batch.push(event);
          if (batch.length >= this.batchSize) break;
        }
        const last = batch.at(-1);
        if (!last) break;
        await this.deps.publisher.publish(batch);
        position = last.globalPosition;
        await this.deps.checkpoints.save({
          projectionName: this.checkpointName,
          position,
          status: "running",
          updatedAt: this.now().toISOString(),
        });
        published += batch.length;
      }
      if (published > 0) this.logger.debug({ published, position }, "events published");
      return published;
    });
  }
}
