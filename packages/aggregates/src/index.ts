export * from "./aggregate";
export * from "./repository";
export * from "./commandHandler";
