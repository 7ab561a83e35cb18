export * as Config from "./config_manager";
export * as Errors from "./errors";
export * as Logger from "./logger";
export * as Schemas from "./schemas";
export * as Units from "./units";

// Domain model
export * as Model from "./model";
export { Project, Metric, Task } from "./model";

// Store, loaders and import
export * as ProjectStore from "./project_store";
export * as SchemaLoader from "./schema_loader";
export * as ImportEngine from "./import_engine";
export * as Tracker from "./tracker";

export {
  TallyError,
  ParsingError,
  ConfigError,
  DetailedValidationError,
  ProjectConflictError,
  ModelError,
  TransactionError,
} from "./errors";

export type { ConfigStore } from "./config_store";
