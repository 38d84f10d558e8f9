export * from "./sagaAggregate";
export * from "./sagaCoordinator";
