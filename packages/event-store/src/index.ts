export * from "./eventStore";
export * from "./postgresEventStore";
export * from "./validation";
