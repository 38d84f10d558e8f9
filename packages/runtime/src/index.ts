export * from "./runtimeContext";
export * from "../../shared/src";
export * from "../../event-store/src";
export * from "../../snapshot-store/src";
export * from "../../aggregates/src";
export * from "../../projections/src";
export * from "../../publication/src";
export * from "../../sagas/src";
