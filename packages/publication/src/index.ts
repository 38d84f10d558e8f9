export * from "./publisher";
export * from "./eventRelay";
