import { RecordedEvent } from "../../shared/src";

export interface EventPublisher {
  /** Publishes in order. A rejection means some events may have gone out; callers republish the batch. */
  publish(events: readonly RecordedEvent[]): Promise<void>;
}

/** The slice of an ioredis client the stream publisher uses. */
export type RedisStreamClient = {
  xadd(key: string, id: string, ...fieldsAndValues: string[]): Promise<string | null>;
};

export const streamFields = (event: RecordedEvent): string[] => [
  "eventId",
  event.eventId,
  "streamId",
  event.streamId,
  "eventType",
  event.eventType,
  "streamVersion",
  String(event.streamVersion),
  "globalPosition",
  String(event.globalPosition),
  "data",
  JSON.stringify(event),
];

export class RedisStreamPublisher implements EventPublisher {
  constructor(
    private readonly client: RedisStreamClient,
    private readonly stream: string
  ) {}

  async publish(events: readonly RecordedEvent[]): Promise<void> {
    for (const event of events) {
      await this.client.xadd(this.stream, "*", ...streamFields(event));
    }
  }
}

export class InMemoryPublisher implements EventPublisher {
  readonly published: RecordedEvent[] = [];

  async publish(events: readonly RecordedEvent[]): Promise<void> {
    this.published.push(...events);
  }
}
