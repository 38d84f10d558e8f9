export * from "./snapshotStore";
