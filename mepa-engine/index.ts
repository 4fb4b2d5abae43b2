// 公開 API の集約バレル
export * from "./lib/execution/engine";
export * from "./lib/execution/debug-controller";
export { inspectState } from "./lib/execution/inspect";

export * from "./lib/core/errors";
export * from "./lib/core/state";
export * from "./lib/core/state-ops";

export * from "./lib/semantics";
