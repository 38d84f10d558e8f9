import { z } from "zod";
import { EventShape, FailurePolicy, RecordedEvent } from "../../shared/src";
import { ReadModelStore, ReadModelView } from "./readModelStore";

/**
 * A named read-model builder. `handle` sees decoded events in commit order and must be
 * idempotent: after a crash the events since the last checkpoint are delivered again.
 */
export type ProjectionDefinition<E extends EventShape, Row> = {
  name: string;
  eventTypes: readonly E["eventType"][];
  events: z.ZodType<E, z.ZodTypeDef, unknown>;
  readModel: ReadModelStore<Row>;
  handle: (event: RecordedEvent<E>, view: ReadModelView<Row>) => Promise<void>;
  failurePolicy?: FailurePolicy;
};
