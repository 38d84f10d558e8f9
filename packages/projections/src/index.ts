export * from "./checkpointStore";
export * from "./deadLetterStore";
export * from "./readModelStore";
export * from "./projection";
export * from "./projectionWorker";
export * from "./projectionEngine";
