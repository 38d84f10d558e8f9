import { Runtime } from "../../runtime/src";
import { Accounts, accountAggregate } from "./account";
import { ACCOUNT_BALANCES, accountBalanceRowSchema, accountBalancesProjection } from "./accountBalances";
import { Orders, orderAggregate } from "./order";
import { ORDER_SUMMARY, orderSummaryProjection, orderSummaryRowSchema } from "./orderSummary";
import { transferSaga } from "./transferSaga";

export * from "./account";
export * from "./accountBalances";
export * from "./order";
export * from "./orderSummary";
export * from "./transferSaga";

export type SampleDomain = ReturnType<typeof registerSampleDomain>;

/** Wires the account and order aggregates, their read models and the transfer saga into a runtime. */
export const registerSampleDomain = (runtime: Runtime) => {
  const accounts = new Accounts(runtime.repository(accountAggregate));
  const orders = new Orders(runtime.repository(orderAggregate));
  const accountBalances = runtime.readModel(ACCOUNT_BALANCES, accountBalanceRowSchema);
  const orderSummaries = runtime.readModel(ORDER_SUMMARY, orderSummaryRowSchema);

  runtime.projections.subscribe(accountBalancesProjection(accountBalances));
  runtime.projections.subscribe(orderSummaryProjection(orderSummaries));
  runtime.sagas.register(transferSaga(accounts, runtime.store));

  return { accounts, orders, accountBalances, orderSummaries };
};
