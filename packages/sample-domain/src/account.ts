import { z } from "zod";
import { Aggregate, AggregateDefinition, AggregateRepository, CommandResult, executeCommand } from "../../aggregates/src";
import { ValidationError } from "../../shared/src";

const amount = z.number().int("amounts are whole cents").positive("amount must be positive");
const reference = z.string().min(1).max(200).optional();

export const accountEventSchema = z.discriminatedUnion("eventType", [
  z.object({
    eventType: z.literal("AccountOpened"),
    payload: z.object({
      accountId: z.string().min(1),
      owner: z.string().min(1),
      openingBalance: z.number().int().nonnegative(),
    }),
  }),
  z.object({ eventType: z.literal("MoneyDeposited"), payload: z.object({ amount, reference }) }),
  z.object({ eventType: z.literal("MoneyWithdrawn"), payload: z.object({ amount, reference }) }),
  z.object({ eventType: z.literal("AccountClosed"), payload: z.object({ reason: z.string().optional() }) }),
]);
export type AccountEvent = z.infer<typeof accountEventSchema>;
export const ACCOUNT_EVENT_TYPES = ["AccountOpened", "MoneyDeposited", "MoneyWithdrawn", "AccountClosed"] as const;

export const accountStateSchema = z.object({
  accountId: z.string().nullable(),
  owner: z.string().nullable(),
  balance: z.number().int(),
  status: z.enum(["new", "open", "closed"]),
  references: z.array(z.string()),
});
export type AccountState = z.infer<typeof accountStateSchema>;

const remember = (state: AccountState, ref: string | undefined) =>
  ref === undefined ? state.references : [...state.references, ref];

export const accountAggregate: AggregateDefinition<AccountState, AccountEvent> = {
  category: "account",
  initialState: () => ({ accountId: null, owner: null, balance: 0, status: "new", references: [] }),
  applyEvent: (state, event) => {
    switch (event.eventType) {
      case "AccountOpened":
        return {
          ...state,
          accountId: event.payload.accountId,
          owner: event.payload.owner,
          balance: event.payload.openingBalance,
          status: "open",
        };
      case "MoneyDeposited":
        return {
          ...state,
          balance: state.balance + event.payload.amount,
          references: remember(state, event.payload.reference),
        };
      case "MoneyWithdrawn":
        return {
          ...state,
          balance: state.balance - event.payload.amount,
          references: remember(state, event.payload.reference),
        };
      case "AccountClosed":
        return { ...state, status: "closed" };
    }
  },
  events: accountEventSchema,
  stateSchema: accountStateSchema,
};

type Account = Aggregate<AccountState, AccountEvent>;

const ensureOpen = (account: Account) => {
  if (account.state.status === "new") throw new ValidationError(`account '${account.streamId}' does not exist`);
  if (account.state.status === "closed") throw new ValidationError(`account '${account.streamId}' is closed`);
};

const ensurePositive = (value: number) => {
  if (!Number.isInteger(value) || value <= 0) throw new ValidationError("amount must be a positive whole number of cents");
};

export const openAccount = (account: Account, command: { accountId: string; owner: string; openingBalance: number }) => {
  if (!account.isNew) throw new ValidationError(`account '${command.accountId}' already exists`);
  if (!Number.isInteger(command.openingBalance) || command.openingBalance < 0) {
    throw new ValidationError("opening balance must be a non-negative whole number of cents");
  }
  account.raise({ eventType: "AccountOpened", payload: command });
};

// Payloads are JSON, so optional fields are left out rather than set to undefined.
const withReference = (amountCents: number, ref: string | undefined) =>
  ref === undefined ? { amount: amountCents } : { amount: amountCents, reference: ref };

/** A deposit carrying a reference that was already applied is a no-op. */
export const depositMoney = (account: Account, amountCents: number, ref?: string) => {
  ensureOpen(account);
  ensurePositive(amountCents);
  if (ref !== undefined && account.state.references.includes(ref)) return;
  account.raise({ eventType: "MoneyDeposited", payload: withReference(amountCents, ref) });
};

export const withdrawMoney = (account: Account, amountCents: number, ref?: string) => {
  ensureOpen(account);
  ensurePositive(amountCents);
  if (ref !== undefined && account.state.references.includes(ref)) return;
  if (account.state.balance < amountCents) {
    throw new ValidationError(
      `insufficient funds in '${account.streamId}': balance ${account.state.balance}, requested ${amountCents}`
    );
  }
  account.raise({ eventType: "MoneyWithdrawn", payload: withReference(amountCents, ref) });
};

export const closeAccount = (account: Account, reason?: string) => {
  ensureOpen(account);
  if (account.state.balance !== 0) throw new ValidationError("only an account with a zero balance can be closed");
  account.raise({ eventType: "AccountClosed", payload: reason === undefined ? {} : { reason } });
};

/** Command surface over the account repository. Every method returns a `CommandResult`. */
export class Accounts {
  constructor(readonly repository: AggregateRepository<AccountState, AccountEvent>) {}

  streamId(accountId: string): string {
    return this.repository.streamIdFor(accountId);
  }

  open(accountId: string, owner: string, openingBalance = 0): Promise<CommandResult> {
    return executeCommand(this.repository, this.streamId(accountId), (account) =>
      openAccount(account, { accountId, owner, openingBalance })
    );
  }

  deposit(accountId: string, amountCents: number, ref?: string): Promise<CommandResult> {
    return executeCommand(this.repository, this.streamId(accountId), (account) => depositMoney(account, amountCents, ref));
  }

  withdraw(accountId: string, amountCents: number, ref?: string): Promise<CommandResult> {
    return executeCommand(this.repository, this.streamId(accountId), (account) => withdrawMoney(account, amountCents, ref));
  }

  close(accountId: string, reason?: string): Promise<CommandResult> {
    return executeCommand(this.repository, this.streamId(accountId), (account) => closeAccount(account, reason));
  }

  async balance(accountId: string): Promise<number | null> {
    const account = await this.repository.load(this.streamId(accountId));
    return account.state.status === "new" ? null : account.state.balance;
  }
}
