import { EventShape, ValidationError } from "../../shared/src";
import { Aggregate } from "./aggregate";
import { AggregateRepository } from "./repository";

export type CommandResult =
  | { status: "success"; version: number }
  | { status: "version_conflict"; expectedVersion: number; actualVersion: number }
  | { status: "validation_error"; issues: string[] };

export type Decide<S, E extends EventShape> = (aggregate: Aggregate<S, E>) => void | Promise<void>;

/**
 * Load, decide, save. Domain rule violations are thrown as `ValidationError` by `decide`
 * and returned as `validation_error`; storage faults propagate.
 */
export const executeCommand = async <S, E extends EventShape>(
  repository: AggregateRepository<S, E>,
  streamId: string,
  decide: Decide<S, E>
): Promise<CommandResult> => {
  const aggregate = await repository.load(streamId);
  try {
    await decide(aggregate);
  } catch (err) {
    if (err instanceof ValidationError) {
      return { status: "validation_error", issues: err.issues };
    }
    throw err;
  }

  const result = await repository.save(aggregate);
  if (result.ok) {
    return { status: "success", version: result.version };
  }
  const { error } = result;
  if (error instanceof ValidationError) {
    return { status: "validation_error", issues: error.issues };
  }
  return { status: "version_conflict", expectedVersion: error.expectedVersion, actualVersion: error.actualVersion };
};
