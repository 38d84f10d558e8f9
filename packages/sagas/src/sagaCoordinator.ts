import { z } from "zod";
import { Aggregate, AggregateRepository } from "../../aggregates/src";
import { EventStore, JsonValue, jsonValueSchema } from "../../event-store/src";
import {
  KeyedMutex,
  Logger,
  SagaCompensationFailureError,
  SagaNotFoundError,
  SagaStepFailureError,
  UnknownSagaTypeError,
  ValidationError,
  errorMessage,
  silentLogger,
  withTimeout,
} from "../../shared/src";
import {
  SagaEvent,
  SagaState,
  SagaStatus,
  StepLogEntry,
  TERMINAL_SAGA_STATUSES,
  pendingCompensations,
  startedAttempts,
} from "./sagaAggregate";

export type SagaContext<I> = {
  sagaId: string;
  input: I;
  /** Results returned by earlier steps, keyed by step name. */
  results: Readonly<Record<string, JsonValue>>;
  signal: AbortSignal;
};

export type SagaStep<I> = {
  name: string;
  execute: (context: SagaContext<I>) => Promise<JsonValue | void>;
  compensate?: (context: SagaContext<I>) => Promise<void>;
  timeoutMs?: number;
};

export type SagaDefinition<I> = {
  type: string;
  input: z.ZodType<I, z.ZodTypeDef, unknown>;
  steps: readonly SagaStep<I>[];
};

export type SagaOutcome = {
  sagaId: string;
  sagaType: string;
  status: SagaStatus;
  failure: { stepName: string; error: string } | null;
};

export type SagaView = SagaOutcome & {
  stepIndex: number;
  version: number;
  stepLog: StepLogEntry[];
};

export type RecoveryReport = {
  resumed: SagaOutcome[];
  failed: { sagaId: string; error: string }[];
  /** Non-terminal sagas left alone because their stream moved within the quiet window. */
  skipped: string[];
};

export type RecoveryOptions = {
  /**
   * Only resume sagas whose latest event is at least this old. Another process may still be
   * driving a saga it wrote to recently. Defaults to 0: resume everything.
   */
  quietForMs?: number;
};

type SagaRepository = AggregateRepository<SagaState, SagaEvent>;
type SagaInstance = Aggregate<SagaState, SagaEvent>;

export type SagaCoordinatorDeps = {
  repository: SagaRepository;
  store: EventStore;
  logger?: Logger;
  defaultTimeoutMs?: number;
  clock?: () => Date;
};

/** Type-erased view of a registered definition. */
interface RunnableSaga {
  readonly type: string;
  readonly stepNames: string[];
  parseInput(raw: unknown): void;
  drive(instance: SagaInstance): Promise<void>;
}

const isTerminal = (status: SagaStatus) => TERMINAL_SAGA_STATUSES.includes(status);

class SagaRunner<I> implements RunnableSaga {
  constructor(
    private readonly definition: SagaDefinition<I>,
    private readonly repository: SagaRepository,
    private readonly logger: Logger,
    private readonly defaultTimeoutMs: number
  ) {}

  get type(): string {
    return this.definition.type;
  }

  get stepNames(): string[] {
    return this.definition.steps.map((step) => step.name);
  }

  parseInput(raw: unknown): I {
    const parsed = this.definition.input.safeParse(raw);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, `invalid input for saga '${this.type}'`);
    }
    return parsed.data;
  }

  private async commit(instance: SagaInstance): Promise<void> {
    const result = await this.repository.save(instance);
    if (!result.ok) throw result.error;
  }

  /** Runs the instance forward from its replayed state until it reaches a terminal status. */
  async drive(instance: SagaInstance): Promise<void> {
    const input = this.parseInput(instance.state.input);
    const sagaId = instance.state.sagaId ?? instance.streamId;
    const log = this.logger.child({ sagaId, sagaType: this.type });

    while (!isTerminal(instance.state.status)) {
      const state = instance.state;
      const context = (signal: AbortSignal): SagaContext<I> => ({ sagaId, input, results: state.results, signal });

      if (state.status === "running") {
        const step = this.definition.steps.at(state.stepIndex);
        if (!step) {
          instance.raise({ eventType: "SagaCompleted", payload: {} });
          await this.commit(instance);
          log.info("saga completed");
          continue;
        }
        const ref = { stepIndex: state.stepIndex, stepName: step.name };
        instance.raise({ eventType: "StepStarted", payload: { ...ref, attempt: startedAttempts(state, state.stepIndex) + 1 } });
        await this.commit(instance);

        let result: JsonValue | undefined;
        try {
          const returned = await withTimeout(`${this.type}.${step.name}`, step.timeoutMs ?? this.defaultTimeoutMs, (signal) =>
            step.execute(context(signal))
          );
          if (returned !== undefined) {
            const parsed = jsonValueSchema.safeParse(returned);
            if (!parsed.success) throw ValidationError.fromZod(parsed.error, "step result is not JSON");
            result = parsed.data;
          }
        } catch (cause) {
          const failure = new SagaStepFailureError(sagaId, step.name, cause);
          log.warn({ err: failure, stepName: step.name }, "saga step failed, compensating");
          const error = errorMessage(cause);
          instance.raise({ eventType: "StepFailed", payload: { ...ref, error } });
          instance.raise({ eventType: "CompensationStarted", payload: { failedStep: step.name, reason: error } });
          await this.commit(instance);
          continue;
        }
        instance.raise({ eventType: "StepCompleted", payload: result === undefined ? ref : { ...ref, result } });
        await this.commit(instance);
        continue;
      }

      // compensating
      const stepIndex = pendingCompensations(state).at(0);
      if (stepIndex === undefined) {
        instance.raise({ eventType: "CompensationCompleted", payload: {} });
        await this.commit(instance);
        log.info({ failure: state.failure }, "saga compensated");
        continue;
      }
      const step = this.definition.steps.at(stepIndex);
      const stepName = step?.name ?? state.stepNames[stepIndex] ?? `#${stepIndex}`;
      if (!step?.compensate) {
        instance.raise({ eventType: "StepCompensated", payload: { stepIndex, stepName, skipped: true } });
        await this.commit(instance);
        continue;
      }
      try {
        const compensate = step.compensate;
        await withTimeout(`${this.type}.${stepName}.compensate`, step.timeoutMs ?? this.defaultTimeoutMs, (signal) =>
          compensate(context(signal))
        );
      } catch (cause) {
        const failure = new SagaCompensationFailureError(sagaId, stepName, cause);
        instance.raise({ eventType: "CompensationFailed", payload: { stepIndex, stepName, error: errorMessage(cause) } });
        await this.commit(instance);
        log.error({ err: failure, stepName }, "saga compensation failed, manual intervention required");
        continue;
      }
      instance.raise({ eventType: "StepCompensated", payload: { stepIndex, stepName, skipped: false } });
      await this.commit(instance);
    }
  }
}

const outcomeOf = (state: SagaState, sagaId: string): SagaOutcome => ({
  sagaId,
  sagaType: state.sagaType ?? "",
  status: state.status,
  failure: state.failure,
});

/**
 * Runs sagas as sequences of steps with compensation. Progress is persisted as saga events
 * before and after each action, so a crashed instance can be resumed from its stream.
 */
export class SagaCoordinator {
  private readonly sagas = new Map<string, RunnableSaga>();
  private readonly locks = new KeyedMutex();
  private readonly repository: SagaRepository;
  private readonly logger: Logger;
  private readonly defaultTimeoutMs: number;

  constructor(private readonly deps: SagaCoordinatorDeps) {
    this.repository = deps.repository;
    this.logger = (deps.logger ?? silentLogger()).child({ component: "sagas" });
    this.defaultTimeoutMs = deps.defaultTimeoutMs ?? 30_000;
  }

  register<I>(definition: SagaDefinition<I>): void {
    if (this.sagas.has(definition.type)) {
      throw new ValidationError(`saga type '${definition.type}' is already registered`);
    }
    this.sagas.set(definition.type, new SagaRunner(definition, this.repository, this.logger, this.defaultTimeoutMs));
  }

  types(): string[] {
    return [...this.sagas.keys()];
  }

  private runner(type: string): RunnableSaga {
    const saga = this.sagas.get(type);
    if (!saga) throw new UnknownSagaTypeError(type);
    return saga;
  }

  async start(type: string, sagaId: string, input: unknown): Promise<SagaOutcome> {
    const saga = this.runner(type);
    saga.parseInput(input);
    const inputJson = jsonValueSchema.safeParse(input);
    if (!inputJson.success) {
      throw ValidationError.fromZod(inputJson.error, `input for saga '${type}' is not JSON`);
    }
    return this.locks.run(sagaId, async () => {
      const instance = await this.repository.load(this.repository.streamIdFor(sagaId));
      if (instance.version > 0) {
        throw new ValidationError(`saga '${sagaId}' already exists`);
      }
      instance.raise({
        eventType: "SagaStarted",
        payload: { sagaId, sagaType: type, input: inputJson.data, stepNames: saga.stepNames },
      });
      const saved = await this.repository.save(instance);
      if (!saved.ok) throw saved.error;
      this.logger.info({ sagaId, sagaType: type }, "saga started");
      await saga.drive(instance);
      return outcomeOf(instance.state, sagaId);
    });
  }

  /** Continues a non-terminal saga from its persisted progress. Terminal sagas are returned as they are. */
  async resume(sagaId: string): Promise<SagaOutcome> {
    return this.locks.run(sagaId, async () => {
      const instance = await this.loadExisting(sagaId);
      if (!isTerminal(instance.state.status)) {
        this.logger.info({ sagaId, status: instance.state.status }, "resuming saga");
        await this.runner(instance.state.sagaType ?? "").drive(instance);
      }
      return outcomeOf(instance.state, sagaId);
    });
  }

  /** Resumes every saga whose stream ends in a non-terminal status. */
  async recoverPending(options: RecoveryOptions = {}): Promise<RecoveryReport> {
    const quietForMs = options.quietForMs ?? 0;
    const now = (this.deps.clock ?? (() => new Date()))().getTime();
    const sagaIds = new Set<string>();
    for await (const event of this.deps.store.readAll(0, undefined, ["SagaStarted"])) {
      const started = this.repository.decode(event);
      if (started.eventType === "SagaStarted") sagaIds.add(started.payload.sagaId);
    }

    const pending: string[] = [];
    const skipped: string[] = [];
    for (const sagaId of sagaIds) {
      const instance = await this.repository.load(this.repository.streamIdFor(sagaId));
      if (isTerminal(instance.state.status)) continue;
      if (quietForMs > 0 && now - (await this.lastEventAt(instance)) < quietForMs) {
        skipped.push(sagaId);
      } else {
        pending.push(sagaId);
      }
    }
    if (skipped.length > 0) {
      this.logger.info({ skipped, quietForMs }, "recently active sagas left to their current owner");
    }

    const settled = await Promise.allSettled(pending.map((sagaId) => this.resume(sagaId)));
    const report: RecoveryReport = { resumed: [], failed: [], skipped };
    settled.forEach((result, i) => {
      if (result.status === "fulfilled") {
        report.resumed.push(result.value);
      } else {
        const error = errorMessage(result.reason);
        this.logger.error({ sagaId: pending[i], err: result.reason }, "saga recovery failed");
        report.failed.push({ sagaId: pending[i], error });
      }
    });
    return report;
  }

  async status(sagaId: string): Promise<SagaView> {
    const instance = await this.loadExisting(sagaId);
    const { state } = instance;
    return {
      ...outcomeOf(state, sagaId),
      stepIndex: state.stepIndex,
      version: instance.version,
      stepLog: state.stepLog,
    };
  }

  private async lastEventAt(instance: SagaInstance): Promise<number> {
    let last = 0;
    for await (const event of this.deps.store.readStream(instance.streamId, instance.version - 1)) {
      last = Date.parse(event.timestamp);
    }
    return last;
  }

  private async loadExisting(sagaId: string): Promise<SagaInstance> {
    const instance = await this.repository.load(this.repository.streamIdFor(sagaId));
    if (instance.version === 0) throw new SagaNotFoundError(sagaId);
    return instance;
  }
}
