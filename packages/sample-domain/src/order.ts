import { z } from "zod";
import { Aggregate, AggregateDefinition, AggregateRepository, CommandResult, executeCommand } from "../../aggregates/src";
import { ValidationError } from "../../shared/src";

export const orderEventSchema = z.discriminatedUnion("eventType", [
  z.object({
    eventType: z.literal("OrderPlaced"),
    payload: z.object({ orderId: z.string().min(1), customerId: z.string().min(1) }),
  }),
  z.object({
    eventType: z.literal("OrderItemAdded"),
    payload: z.object({
      sku: z.string().min(1),
      quantity: z.number().int().positive(),
      unitPrice: z.number().int().nonnegative(),
    }),
  }),
  z.object({ eventType: z.literal("OrderShipped"), payload: z.object({ carrier: z.string().min(1) }) }),
  z.object({ eventType: z.literal("OrderCancelled"), payload: z.object({ reason: z.string() }) }),
]);
export type OrderEvent = z.infer<typeof orderEventSchema>;
export const ORDER_EVENT_TYPES = ["OrderPlaced", "OrderItemAdded", "OrderShipped", "OrderCancelled"] as const;

const lineSchema = z.object({ sku: z.string(), quantity: z.number().int(), unitPrice: z.number().int() });

export const orderStateSchema = z.object({
  orderId: z.string().nullable(),
  customerId: z.string().nullable(),
  status: z.enum(["new", "placed", "shipped", "cancelled"]),
  lines: z.array(lineSchema),
  total: z.number().int(),
});
export type OrderState = z.infer<typeof orderStateSchema>;

export const orderAggregate: AggregateDefinition<OrderState, OrderEvent> = {
  category: "order",
  initialState: () => ({ orderId: null, customerId: null, status: "new", lines: [], total: 0 }),
  applyEvent: (state, event) => {
    switch (event.eventType) {
      case "OrderPlaced":
        return { ...state, orderId: event.payload.orderId, customerId: event.payload.customerId, status: "placed" };
      case "OrderItemAdded":
        return {
          ...state,
          lines: [...state.lines, event.payload],
          total: state.total + event.payload.quantity * event.payload.unitPrice,
        };
      case "OrderShipped":
        return { ...state, status: "shipped" };
      case "OrderCancelled":
        return { ...state, status: "cancelled" };
    }
  },
  events: orderEventSchema,
  stateSchema: orderStateSchema,
};

type Order = Aggregate<OrderState, OrderEvent>;

const ensurePlaced = (order: Order, action: string) => {
  if (order.state.status !== "placed") {
    throw new ValidationError(`cannot ${action} order '${order.streamId}' in status '${order.state.status}'`);
  }
};

export const placeOrder = (order: Order, orderId: string, customerId: string) => {
  if (order.state.status !== "new") throw new ValidationError(`order '${orderId}' already exists`);
  order.raise({ eventType: "OrderPlaced", payload: { orderId, customerId } });
};

export const addOrderItem = (order: Order, item: { sku: string; quantity: number; unitPrice: number }) => {
  ensurePlaced(order, "add items to");
  order.raise({ eventType: "OrderItemAdded", payload: item });
};

export const shipOrder = (order: Order, carrier: string) => {
  ensurePlaced(order, "ship");
  if (order.state.lines.length === 0) throw new ValidationError("an order without items cannot ship");
  order.raise({ eventType: "OrderShipped", payload: { carrier } });
};

export const cancelOrder = (order: Order, reason: string) => {
  ensurePlaced(order, "cancel");
  order.raise({ eventType: "OrderCancelled", payload: { reason } });
};

export class Orders {
  constructor(readonly repository: AggregateRepository<OrderState, OrderEvent>) {}

  streamId(orderId: string): string {
    return this.repository.streamIdFor(orderId);
  }

  place(orderId: string, customerId: string): Promise<CommandResult> {
    return executeCommand(this.repository, this.streamId(orderId), (order) => placeOrder(order, orderId, customerId));
  }

  addItem(orderId: string, item: { sku: string; quantity: number; unitPrice: number }): Promise<CommandResult> {
    return executeCommand(this.repository, this.streamId(orderId), (order) => addOrderItem(order, item));
  }

  ship(orderId: string, carrier: string): Promise<CommandResult> {
    return executeCommand(this.repository, this.streamId(orderId), (order) => shipOrder(order, carrier));
  }

  cancel(orderId: string, reason: string): Promise<CommandResult> {
    return executeCommand(this.repository, this.streamId(orderId), (order) => cancelOrder(order, reason));
  }
}
