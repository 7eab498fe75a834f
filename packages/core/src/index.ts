export * as Adapters from "./adapters";
export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";
export * as Errors from "./errors";
export * as EventBus from "./event_bus";
export * as Factories from "./record_factories";
export * as Logger from "./logger";
export * as Notifier from "./notifier";
export * as Records from "./record_types";
export * as Renderer from "./document_renderer";
export * as Store from "./record_store";
export * as Transaction from "./transaction";
export * as Utils from "./utils";
export * as Validation from "./validation";

export { EntityStore } from "./entity_store";
export type { ProblemQuery, DeleteListResult } from "./entity_store";

// Facade
export { Remedy, createRemedy } from "./remedy";
export type { RemedyDependencies, SubmitReportOptions } from "./remedy";
