export * as Config from "./config";
export * as Logger from "./logger";
export * as Records from "./record_types";
export * as Schemas from "./record_schemas";
export * as TaskSummary from "./task_summary";
export * as Validation from "./validation";

// Interface only - implementations live in ./fs and ./memory
export type { TaskStore } from "./task_store";

export { TaskStoreLoadError } from "./validation";
