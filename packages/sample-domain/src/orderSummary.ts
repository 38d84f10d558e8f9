import { z } from "zod";
import { ProjectionDefinition, ReadModelStore } from "../../projections/src";
import { ORDER_EVENT_TYPES, OrderEvent, orderEventSchema } from "./order";

export const ORDER_SUMMARY = "order-summary";

export const orderSummaryRowSchema = z.object({
  orderId: z.string(),
  customerId: z.string(),
  itemCount: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
  status: z.enum(["placed", "shipped", "cancelled"]),
  version: z.number().int().nonnegative(),
});
export type OrderSummaryRow = z.infer<typeof orderSummaryRowSchema>;

const orderIdOf = (streamId: string) => streamId.replace(/^order-/, "");

export const orderSummaryProjection = (
  readModel: ReadModelStore<OrderSummaryRow>
): ProjectionDefinition<OrderEvent, OrderSummaryRow> => ({
  name: ORDER_SUMMARY,
  eventTypes: ORDER_EVENT_TYPES,
  events: orderEventSchema,
  readModel,
  handle: async (event, view) => {
    const orderId = orderIdOf(event.streamId);
    const row = await view.get(orderId);
    if (row && row.version >= event.streamVersion) return;

    if (event.eventType === "OrderPlaced") {
      await view.put(orderId, {
        orderId: event.payload.orderId,
        customerId: event.payload.customerId,
        itemCount: 0,
        total: 0,
        status: "placed",
        version: event.streamVersion,
      });
      return;
    }
    if (!row) throw new Error(`no summary row for order '${orderId}'`);
    const version = event.streamVersion;
    switch (event.eventType) {
      case "OrderItemAdded":
        await view.put(orderId, {
          ...row,
          itemCount: row.itemCount + event.payload.quantity,
          total: row.total + event.payload.quantity * event.payload.unitPrice,
          version,
        });
        return;
      case "OrderShipped":
        await view.put(orderId, { ...row, status: "shipped", version });
        return;
      case "OrderCancelled":
        await view.put(orderId, { ...row, status: "cancelled", version });
        return;
    }
  },
});
