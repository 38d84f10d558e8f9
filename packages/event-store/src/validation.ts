import { randomUUID } from "crypto";
import { z } from "zod";
import { EventMetadata, NewEvent, ValidationError } from "../../shared/src";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number().finite(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const streamIdSchema = z.string().min(1, "streamId must be non-empty").max(200);
export const metadataSchema = z.record(z.string());

const readBoundSchema = z.number();

/** Versions and positions are whole numbers: a bound is floored, and `Infinity` reads to the head. */
export const readBound = (name: string, value: number): number => {
  const parsed = readBoundSchema.safeParse(value);
  if (!parsed.success) throw ValidationError.fromZod(parsed.error, `invalid ${name}`);
  return Math.max(0, Number.isFinite(parsed.data) ? Math.floor(parsed.data) : parsed.data);
};

export const newEventSchema = z.object({
  eventId: z.string().uuid().optional(),
  eventType: z.string().min(1).max(200),
  payload: jsonValueSchema,
  causationId: z.string().min(1).nullable().optional(),
  correlationId: z.string().min(1).nullable().optional(),
  metadata: metadataSchema.optional(),
});

export const appendRequestSchema = z.object({
  streamId: streamIdSchema,
  expectedVersion: z.number().int().nonnegative(),
  events: z.array(newEventSchema).min(1, "events must be non-empty"),
});

export const recordedEventSchema = z.object({
  eventId: z.string().min(1),
  streamId: streamIdSchema,
  eventType: z.string().min(1),
  streamVersion: z.number().int().positive(),
  globalPosition: z.number().int().positive(),
  timestamp: z.string(),
  causationId: z.string().nullable(),
  correlationId: z.string().nullable(),
  metadata: metadataSchema,
  payload: jsonValueSchema,
});

/** Everything about a new event except its position in the log. */
export type EventDraft = {
  eventId: string;
  eventType: string;
  payload: JsonValue;
  timestamp: string;
  causationId: string | null;
  correlationId: string | null;
  metadata: EventMetadata;
};

export type PreparedAppend = { ok: true; drafts: EventDraft[] } | { ok: false; error: ValidationError };

export const prepareAppend = (
  streamId: string,
  expectedVersion: number,
  events: readonly NewEvent[],
  now: Date
): PreparedAppend => {
  const parsed = appendRequestSchema.safeParse({ streamId, expectedVersion, events });
  if (!parsed.success) {
    return { ok: false, error: ValidationError.fromZod(parsed.error, "invalid append request") };
  }
  const timestamp = now.toISOString();
  const drafts = parsed.data.events.map(
    (event): EventDraft => ({
      eventId: event.eventId ?? randomUUID(),
      eventType: event.eventType,
      payload: event.payload,
      timestamp,
      causationId: event.causationId ?? null,
      correlationId: event.correlationId ?? null,
      metadata: event.metadata ?? {},
    })
  );
  const ids = new Set(drafts.map((draft) => draft.eventId));
  if (ids.size !== drafts.length) {
    return { ok: false, error: new ValidationError("invalid append request", ["events: duplicate eventId in batch"]) };
  }
  return { ok: true, drafts };
};
