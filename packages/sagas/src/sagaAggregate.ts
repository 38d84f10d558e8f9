import { z } from "zod";
import { AggregateDefinition } from "../../aggregates/src";
import { jsonValueSchema } from "../../event-store/src";

export const SAGA_STATUSES = [
  "not_started",
  "running",
  "completed",
  "compensating",
  "compensated",
  "compensation_failed",
] as const;
export type SagaStatus = (typeof SAGA_STATUSES)[number];

export const TERMINAL_SAGA_STATUSES: readonly SagaStatus[] = ["completed", "compensated", "compensation_failed"];

const stepRef = {
  stepIndex: z.number().int().nonnegative(),
  stepName: z.string().min(1),
};

export const sagaEventSchema = z.discriminatedUnion("eventType", [
  z.object({
    eventType: z.literal("SagaStarted"),
    payload: z.object({
      sagaId: z.string().min(1),
      sagaType: z.string().min(1),
      input: jsonValueSchema,
      stepNames: z.array(z.string().min(1)),
    }),
  }),
  z.object({ eventType: z.literal("StepStarted"), payload: z.object({ ...stepRef, attempt: z.number().int().positive() }) }),
  z.object({ eventType: z.literal("StepCompleted"), payload: z.object({ ...stepRef, result: jsonValueSchema.optional() }) }),
  z.object({ eventType: z.literal("StepFailed"), payload: z.object({ ...stepRef, error: z.string() }) }),
  z.object({
    eventType: z.literal("CompensationStarted"),
    payload: z.object({ failedStep: z.string().min(1), reason: z.string() }),
  }),
  z.object({ eventType: z.literal("StepCompensated"), payload: z.object({ ...stepRef, skipped: z.boolean() }) }),
  z.object({ eventType: z.literal("CompensationFailed"), payload: z.object({ ...stepRef, error: z.string() }) }),
  z.object({ eventType: z.literal("CompensationCompleted"), payload: z.object({}) }),
  z.object({ eventType: z.literal("SagaCompleted"), payload: z.object({}) }),
]);
export type SagaEvent = z.infer<typeof sagaEventSchema>;

const stepLogEntrySchema = z.object({
  stepIndex: z.number().int().nonnegative(),
  stepName: z.string(),
  status: z.enum(["started", "completed", "failed", "compensated", "compensation_skipped", "compensation_failed"]),
  error: z.string().optional(),
});
export type StepLogEntry = z.infer<typeof stepLogEntrySchema>;

export const sagaStateSchema = z.object({
  sagaId: z.string().nullable(),
  sagaType: z.string().nullable(),
  input: jsonValueSchema,
  status: z.enum(SAGA_STATUSES),
  stepNames: z.array(z.string()),
  stepIndex: z.number().int().nonnegative(),
  completedSteps: z.array(z.number().int().nonnegative()),
  compensatedSteps: z.array(z.number().int().nonnegative()),
  results: z.record(jsonValueSchema),
  stepLog: z.array(stepLogEntrySchema),
  failure: z.object({ stepName: z.string(), error: z.string() }).nullable(),
});
export type SagaState = z.infer<typeof sagaStateSchema>;

const initialState = (): SagaState => ({
  sagaId: null,
  sagaType: null,
  input: null,
  status: "not_started",
  stepNames: [],
  stepIndex: 0,
  completedSteps: [],
  compensatedSteps: [],
  results: {},
  stepLog: [],
  failure: null,
});

const applyEvent = (state: SagaState, event: SagaEvent): SagaState => {
  switch (event.eventType) {
    case "SagaStarted":
      return {
        ...state,
        sagaId: event.payload.sagaId,
        sagaType: event.payload.sagaType,
        input: event.payload.input,
        stepNames: event.payload.stepNames,
        status: "running",
        stepIndex: 0,
      };
    case "StepStarted": {
      const { stepIndex, stepName } = event.payload;
      return { ...state, stepIndex, stepLog: [...state.stepLog, { stepIndex, stepName, status: "started" }] };
    }
    case "StepCompleted": {
      const { stepIndex, stepName, result } = event.payload;
      return {
        ...state,
        stepIndex: stepIndex + 1,
        completedSteps: [...state.completedSteps, stepIndex],
        results: result === undefined ? state.results : { ...state.results, [stepName]: result },
        stepLog: [...state.stepLog, { stepIndex, stepName, status: "completed" }],
      };
    }
    case "StepFailed": {
      const { stepIndex, stepName, error } = event.payload;
      return {
        ...state,
        failure: { stepName, error },
        stepLog: [...state.stepLog, { stepIndex, stepName, status: "failed", error }],
      };
    }
    case "CompensationStarted":
      return { ...state, status: "compensating" };
    case "StepCompensated": {
      const { stepIndex, stepName, skipped } = event.payload;
      return {
        ...state,
        compensatedSteps: [...state.compensatedSteps, stepIndex],
        stepLog: [
          ...state.stepLog,
          { stepIndex, stepName, status: skipped ? "compensation_skipped" : "compensated" },
        ],
      };
    }
    case "CompensationFailed": {
      const { stepIndex, stepName, error } = event.payload;
      return {
        ...state,
        status: "compensation_failed",
        failure: { stepName, error },
        stepLog: [...state.stepLog, { stepIndex, stepName, status: "compensation_failed", error }],
      };
    }
    case "CompensationCompleted":
      return { ...state, status: "compensated" };
    case "SagaCompleted":
      return { ...state, status: "completed" };
  }
};

/** Saga progress is an ordinary aggregate stream, `saga-<sagaId>`. */
export const sagaAggregate: AggregateDefinition<SagaState, SagaEvent> = {
  category: "saga",
  initialState,
  applyEvent,
  events: sagaEventSchema,
  stateSchema: sagaStateSchema,
};

/** Completed steps that still need compensating, newest first. */
export const pendingCompensations = (state: SagaState): number[] =>
  [...state.completedSteps].reverse().filter((index) => !state.compensatedSteps.includes(index));

export const startedAttempts = (state: SagaState, stepIndex: number): number =>
  state.stepLog.filter((entry) => entry.stepIndex === stepIndex && entry.status === "started").length;
