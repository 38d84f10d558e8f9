import { z } from "zod";
import { CommandResult } from "../../aggregates/src";
import { EventStore } from "../../event-store/src";
import { SagaDefinition } from "../../sagas/src";
import { ValidationError } from "../../shared/src";
import { Accounts } from "./account";

export const TRANSFER_SAGA = "transfer";

export const transferInputSchema = z
  .object({
    from: z.string().min(1),
    to: z.string().min(1),
    amount: z.number().int().positive(),
  })
  .refine((input) => input.from !== input.to, { message: "cannot transfer to the same account", path: ["to"] });
export type TransferInput = z.infer<typeof transferInputSchema>;

const CONFLICT_RETRIES = 3;

/** Runs an account command, retrying on version conflicts. Anything but success throws. */
const settle = async (label: string, run: () => Promise<CommandResult>): Promise<number> => {
  for (let attempt = 1; ; attempt += 1) {
    const result = await run();
    switch (result.status) {
      case "success":
        return result.version;
      case "validation_error":
        throw new ValidationError(`${label}: ${result.issues.join("; ")}`, result.issues);
      case "version_conflict":
        if (attempt >= CONFLICT_RETRIES) {
          throw new Error(`${label}: still conflicting after ${attempt} attempts`);
        }
    }
  }
};

/**
 * Moves money between two accounts. Each leg carries a reference derived from the saga id,
 * so re-running a step after a crash does not move the money twice.
 */
export const transferSaga = (accounts: Accounts, store: EventStore): SagaDefinition<TransferInput> => ({
  type: TRANSFER_SAGA,
  input: transferInputSchema,
  steps: [
    {
      name: "withdraw-source",
      execute: async ({ sagaId, input }) => {
        const version = await settle("withdraw", () => accounts.withdraw(input.from, input.amount, `${sagaId}:withdraw`));
        return { version };
      },
      compensate: async ({ sagaId, input }) => {
        await settle("refund", () => accounts.deposit(input.from, input.amount, `${sagaId}:refund`));
      },
    },
    {
      name: "deposit-target",
      execute: async ({ sagaId, input }) => {
        const version = await settle("deposit", () => accounts.deposit(input.to, input.amount, `${sagaId}:deposit`));
        return { version };
      },
      compensate: async ({ sagaId, input }) => {
        await settle("reverse deposit", () => accounts.withdraw(input.to, input.amount, `${sagaId}:reverse`));
      },
    },
    {
      name: "record-transfer",
      execute: async ({ sagaId, input }) => {
        const result = await store.append(`transfer-${sagaId}`, 0, [
          { eventType: "TransferRecorded", payload: { from: input.from, to: input.to, amount: input.amount } },
        ]);
        // A conflict means an earlier attempt already recorded it.
        if (!result.ok && result.error instanceof ValidationError) throw result.error;
      },
    },
  ],
});
