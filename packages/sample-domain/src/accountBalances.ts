import { z } from "zod";
import { ProjectionDefinition, ReadModelStore } from "../../projections/src";
import { ACCOUNT_EVENT_TYPES, AccountEvent, accountEventSchema } from "./account";

export const ACCOUNT_BALANCES = "account-balances";

export const accountBalanceRowSchema = z.object({
  accountId: z.string(),
  owner: z.string(),
  balance: z.number().int(),
  status: z.enum(["open", "closed"]),
  version: z.number().int().nonnegative(),
  updatedAt: z.string(),
});
export type AccountBalanceRow = z.infer<typeof accountBalanceRowSchema>;

/** One row per account, keyed by account id. Events at or below the row's version are ignored. */
export const accountBalancesProjection = (
  readModel: ReadModelStore<AccountBalanceRow>
): ProjectionDefinition<AccountEvent, AccountBalanceRow> => ({
  name: ACCOUNT_BALANCES,
  eventTypes: ACCOUNT_EVENT_TYPES,
  events: accountEventSchema,
  readModel,
  handle: async (event, view) => {
    if (event.eventType === "AccountOpened") {
      const existing = await view.get(event.payload.accountId);
      if (existing && existing.version >= event.streamVersion) return;
      await view.put(event.payload.accountId, {
        accountId: event.payload.accountId,
        owner: event.payload.owner,
        balance: event.payload.openingBalance,
        status: "open",
        version: event.streamVersion,
        updatedAt: event.timestamp,
      });
      return;
    }

    const accountId = event.streamId.replace(/^account-/, "");
    const row = await view.get(accountId);
    if (!row) throw new Error(`no balance row for '${accountId}'`);
    if (row.version >= event.streamVersion) return;
    const next = { ...row, version: event.streamVersion, updatedAt: event.timestamp };
    switch (event.eventType) {
      case "MoneyDeposited":
        await view.put(accountId, { ...next, balance: row.balance + event.payload.amount });
        return;
      case "MoneyWithdrawn":
        await view.put(accountId, { ...next, balance: row.balance - event.payload.amount });
        return;
      case "AccountClosed":
        await view.put(accountId, { ...next, status: "closed" });
        return;
    }
  },
});
