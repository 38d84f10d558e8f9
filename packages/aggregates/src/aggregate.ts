import { z } from "zod";
import { EventOptions, EventShape, NewEvent } from "../../shared/src";

/**
 * Describes one aggregate type. `applyEvent` must be a pure function of its inputs;
 * it runs both when events are raised and when they are replayed.
 */
export type AggregateDefinition<S, E extends EventShape> = {
  category: string;
  initialState: () => S;
  applyEvent: (state: S, event: E) => S;
  events: z.ZodType<E, z.ZodTypeDef, unknown>;
  stateSchema: z.ZodType<S, z.ZodTypeDef, unknown>;
};

export class Aggregate<S, E extends EventShape> {
  private currentState: S;
  private committedVersion: number;
  private pending: NewEvent<E>[] = [];

  constructor(
    readonly definition: AggregateDefinition<S, E>,
    readonly streamId: string,
    state: S,
    version: number
  ) {
    this.currentState = state;
    this.committedVersion = version;
  }

  get state(): S {
    return this.currentState;
  }

  /** Version the aggregate was loaded at or last saved at. */
  get version(): number {
    return this.committedVersion;
  }

  get pendingEvents(): readonly NewEvent<E>[] {
    return this.pending;
  }

  /** True when the aggregate has never been committed and nothing is pending. */
  get isNew(): boolean {
    return this.committedVersion === 0 && this.pending.length === 0;
  }

  raise(event: E, options: EventOptions = {}): void {
    this.currentState = this.definition.applyEvent(this.currentState, event);
    this.pending.push({ ...event, ...options });
  }

  markCommitted(version: number): void {
    this.pending = [];
    this.committedVersion = version;
  }
}
