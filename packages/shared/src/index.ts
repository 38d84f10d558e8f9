export type EventMetadata = Record<string, string>;

/**
 * Minimal shape every domain event variant has. Domain modules declare a closed
 * union of these keyed by `eventType` so `switch (event.eventType)` is exhaustive.
 */
export type EventShape = {
  eventType: string;
  payload: unknown;
};

export type EventHeader = {
  eventId: string;
  streamId: string;
  streamVersion: number;
  globalPosition: number;
  timestamp: string;
  causationId: string | null;
  correlationId: string | null;
  metadata: EventMetadata;
};

export type RecordedEvent<E extends EventShape = EventShape> = EventHeader & E;

export type EventOptions = {
  eventId?: string;
  causationId?: string | null;
  correlationId?: string | null;
  metadata?: EventMetadata;
};

export type NewEvent<E extends EventShape = EventShape> = E & EventOptions;

export const eventHeader = (event: EventHeader): EventHeader => ({
  eventId: event.eventId,
  streamId: event.streamId,
  streamVersion: event.streamVersion,
  globalPosition: event.globalPosition,
  timestamp: event.timestamp,
  causationId: event.causationId,
  correlationId: event.correlationId,
  metadata: event.metadata,
});

export * from "./errors";
export * from "./logger";
export * from "./config";
export * from "./keyedMutex";
export * from "./timeout";
export * from "./wakeSignal";
