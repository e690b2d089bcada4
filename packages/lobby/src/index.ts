// packages/lobby/src/index.ts

export * from "./model";
export * from "./frames";
export * from "./view";
export { applyAction } from "./actions/registry";
export { isTelemetryComplete, MESSAGES } from "./actions/shared";
